/**
 * ExitPipeline — ordered exit policy evaluation.
 *
 * First policy that triggers wins, so the order of `.with()` calls is the
 * priority order. Immutable builder: `.with()` returns a new pipeline.
 */

import type { RiskConfig } from "../shared/config.js";
import { EmergencyExit } from "./exits/emergency.js";
import { StopLossExit } from "./exits/stop-loss.js";
import { TakeProfitExit } from "./exits/take-profit.js";
import { TimeExit } from "./exits/time-exit.js";
import { TrailingStopExit } from "./exits/trailing-stop.js";
import type { ExitContext, ExitPolicy, ExitReason, PositionLike } from "./types.js";

export class ExitPipeline {
	private readonly policies: readonly ExitPolicy[];

	private constructor(policies: readonly ExitPolicy[]) {
		this.policies = policies;
	}

	static create(): ExitPipeline {
		return new ExitPipeline([]);
	}

	with(policy: ExitPolicy): ExitPipeline {
		return new ExitPipeline([...this.policies, policy]);
	}

	evaluate(position: PositionLike, ctx: ExitContext): ExitReason | null {
		for (const policy of this.policies) {
			const reason = policy.shouldExit(position, ctx);
			if (reason !== null) return reason;
		}
		return null;
	}

	isEmpty(): boolean {
		return this.policies.length === 0;
	}

	len(): number {
		return this.policies.length;
	}

	policyNames(): readonly string[] {
		return this.policies.map((p) => p.name);
	}

	// ── Presets ────────────────────────────────────────────────────

	/**
	 * Emergency, then stop-loss and take-profit, then the trailing stop
	 * (when enabled), then holding time.
	 */
	static fromRisk(
		risk: RiskConfig,
		maxHoldMs: number,
		trailing: TrailingStopExit | null = null,
	): ExitPipeline {
		let pipeline = ExitPipeline.create()
			.with(EmergencyExit.fromPct(risk.emergencyExitPercent))
			.with(StopLossExit.create())
			.with(TakeProfitExit.create());
		if (trailing !== null) {
			pipeline = pipeline.with(trailing);
		}
		return pipeline.with(TimeExit.create(maxHoldMs));
	}
}
