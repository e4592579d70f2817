/**
 * Diagnostic event types shared by every component that reports.
 */

export const Severity = {
	Debug: "debug",
	Info: "info",
	Warning: "warning",
	Critical: "critical",
} as const;

export type Severity = (typeof Severity)[keyof typeof Severity];

const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
	debug: 0,
	info: 1,
	warning: 2,
	critical: 3,
};

/** Compare severities: negative when `a` is less severe than `b`. */
export function compareSeverity(a: Severity, b: Severity): number {
	return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export interface DiagnosticEvent {
	readonly severity: Severity;
	readonly component: string;
	readonly message: string;
	/** Sequence number of the tick being handled, when there is one. */
	readonly tickSequence: number | null;
	readonly timestampMs: number;
}

/**
 * Destination for diagnostic events. A writer may complete synchronously or
 * return a promise; the sink bounds critical writes either way.
 */
export interface DiagnosticWriter {
	write(event: DiagnosticEvent): void | Promise<void>;
}

/** What components hold: fire-and-forget reporting, never awaited on the tick path. */
export interface DiagnosticLogger {
	log(severity: Severity, component: string, message: string, tickSequence?: number | null): void;
}
