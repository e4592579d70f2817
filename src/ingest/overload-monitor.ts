/**
 * OverloadMonitor — the transfer buffer's back-pressure policy.
 *
 * Every push outcome is reported here. `overflowThreshold` consecutive
 * failures while a position is open switch emergency mode on;
 * `recoveryPushes` consecutive successes switch it off. Each switch-on raises
 * exactly one Critical diagnostic, each switch-off one Info.
 */

import type { DiagnosticLogger } from "../diagnostics/types.js";
import { Severity } from "../diagnostics/types.js";

const COMPONENT = "ingest.overload";

export interface OverloadMonitorConfig {
	readonly overflowThreshold: number;
	readonly recoveryPushes: number;
	/** Read-only view of the consumer's position slot. */
	readonly isPositionOpen: () => boolean;
	readonly diagnostics: DiagnosticLogger;
	readonly onModeChange?: (emergency: boolean) => void;
}

export interface OverloadStats {
	readonly overflows: number;
	readonly consecutiveFailures: number;
	readonly emergency: boolean;
	readonly activations: number;
}

export class OverloadMonitor {
	private readonly overflowThreshold: number;
	private readonly recoveryPushes: number;
	private readonly isPositionOpen: () => boolean;
	private readonly diagnostics: DiagnosticLogger;
	private readonly onModeChange: ((emergency: boolean) => void) | undefined;
	private overflowCount = 0;
	private failureStreak = 0;
	private successStreak = 0;
	private emergencyMode = false;
	private activationCount = 0;

	constructor(config: OverloadMonitorConfig) {
		this.overflowThreshold = config.overflowThreshold;
		this.recoveryPushes = config.recoveryPushes;
		this.isPositionOpen = config.isPositionOpen;
		this.diagnostics = config.diagnostics;
		this.onModeChange = config.onModeChange;
	}

	recordPush(accepted: boolean, sequence: number | null = null): void {
		if (accepted) {
			this.recordSuccess(sequence);
		} else {
			this.recordFailure(sequence);
		}
	}

	get emergency(): boolean {
		return this.emergencyMode;
	}

	stats(): OverloadStats {
		return {
			overflows: this.overflowCount,
			consecutiveFailures: this.failureStreak,
			emergency: this.emergencyMode,
			activations: this.activationCount,
		};
	}

	private recordFailure(sequence: number | null): void {
		this.overflowCount++;
		this.failureStreak++;
		this.successStreak = 0;

		if (this.emergencyMode || this.failureStreak < this.overflowThreshold || !this.isPositionOpen()) {
			return;
		}
		this.emergencyMode = true;
		this.activationCount++;
		this.diagnostics.log(
			Severity.Critical,
			COMPONENT,
			`Emergency mode on: ${this.failureStreak} consecutive buffer overflows with a position open`,
			sequence,
		);
		this.onModeChange?.(true);
	}

	private recordSuccess(sequence: number | null): void {
		this.failureStreak = 0;
		if (!this.emergencyMode) return;

		this.successStreak++;
		if (this.successStreak < this.recoveryPushes) return;

		this.emergencyMode = false;
		this.successStreak = 0;
		this.diagnostics.log(
			Severity.Info,
			COMPONENT,
			`Emergency mode off after ${this.recoveryPushes} consecutive successful pushes`,
			sequence,
		);
		this.onModeChange?.(false);
	}
}
