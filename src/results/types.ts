/**
 * Results collaborator — receives position openings and trade records.
 *
 * The engine has no knowledge of how these are rendered or persisted.
 */

import type { Trade } from "../position/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { InstrumentSymbol, PositionId } from "../shared/identifiers.js";

export type ResultEvent =
	| {
			readonly type: "position_opened";
			readonly positionId: PositionId;
			readonly symbol: InstrumentSymbol;
			readonly entryPrice: Decimal;
			readonly lots: number;
			readonly quantity: number;
			readonly entryTimeMs: number;
	  }
	| { readonly type: "trade"; readonly trade: Trade };

export interface ResultsSink {
	/** Called on the consumer path; must not block. */
	record(event: ResultEvent): void;
	/** Resolves once everything recorded so far is stored. */
	flush(): Promise<void>;
}
