/**
 * Domain primitive identifiers — branded types for compile-time safety.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Tradable instrument symbol (e.g. "NIFTY24DECFUT"). */
export type InstrumentSymbol = Brand<string, "InstrumentSymbol">;
/** Engine-assigned position identifier, unique per session. */
export type PositionId = Brand<string, "PositionId">;

// ── Factory functions with validation ────────────────────────────────

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated InstrumentSymbol from a raw string. Throws if empty. */
export function instrumentSymbol(value: string): InstrumentSymbol {
	return createBrandedId(value, "InstrumentSymbol");
}

/** Create a validated PositionId from a raw string. Throws if empty. */
export function positionId(value: string): PositionId {
	return createBrandedId(value, "PositionId");
}

/** Extract the raw string from any branded identifier type. */
export function idToString(id: InstrumentSymbol | PositionId): string {
	return id as string;
}
