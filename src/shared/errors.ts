/**
 * TradingError hierarchy — structured error classification.
 *
 * Every error has a category (retryable, non-retryable, fatal). Per-tick
 * anomalies are non-fatal and handled where they occur; only configuration
 * errors at startup and critical-log failures propagate as fatal.
 */

/** Error severity categories that drive halt behavior at the engine layer. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing TradingError subclasses with optional cause chain. */
interface TradingErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & TradingErrorOptions;

/** Base error class for the engine, with category-based halt semantics. */
export class TradingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "TradingError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

function splitCause(context: ErrorContext): { cause: unknown; rest: Record<string, unknown> } {
	const { cause, ...rest } = context;
	return { cause, rest };
}

// ── Startup ──────────────────────────────────────────────────────────

/** Fatal error for required configuration keys that are absent. */
export class ConfigMissingError extends TradingError {
	readonly missing: readonly string[];

	constructor(missing: readonly string[], context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(
			`Missing required configuration: ${missing.join(", ")}`,
			"CONFIG_MISSING",
			ErrorCategory.Fatal,
			{ ...rest, missing },
			"Every recognized key must be present; no defaults are applied",
		);
		this.name = "ConfigMissingError";
		this.missing = missing;
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for configuration values that are present but invalid. */
export class ConfigError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Per-tick anomalies ───────────────────────────────────────────────

/** Non-fatal: an inbound record could not be normalized into a Tick. */
export class MalformedTickError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "MALFORMED_TICK", ErrorCategory.NonRetryable, rest);
		this.name = "MalformedTickError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Non-fatal: a tick repeated the immediately preceding delivery. */
export class DuplicateTickError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "DUPLICATE_TICK", ErrorCategory.NonRetryable, rest);
		this.name = "DuplicateTickError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Non-fatal: the transfer buffer was full when the producer pushed. */
export class BufferOverflowError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "BUFFER_OVERFLOW", ErrorCategory.Retryable, rest);
		this.name = "BufferOverflowError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Entry rejected: requested notional exceeds the allocatable capital. */
export class PositionSizeExceededError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "POSITION_SIZE_EXCEEDED", ErrorCategory.NonRetryable, rest);
		this.name = "PositionSizeExceededError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Entry rejected: the instrument already has a non-closed position. */
export class PositionAlreadyOpenError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "POSITION_ALREADY_OPEN", ErrorCategory.NonRetryable, rest);
		this.name = "PositionAlreadyOpenError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal: the position state machine refused a transition the manager requested. */
export class LifecycleViolationError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "LIFECYCLE_VIOLATION", ErrorCategory.Fatal, rest);
		this.name = "LifecycleViolationError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Operational ──────────────────────────────────────────────────────

/** Fatal: a critical diagnostic could not be recorded within its time bound. */
export class CriticalLogTimeoutError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(
			message,
			"CRITICAL_LOG_TIMEOUT",
			ErrorCategory.Fatal,
			rest,
			"New entries are halted; open positions keep being managed",
		);
		this.name = "CriticalLogTimeoutError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Reported, not fatal: the live feed dropped its connection. */
export class FeedDisconnectedError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "FEED_DISCONNECTED", ErrorCategory.Retryable, rest);
		this.name = "FeedDisconnectedError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable error for network connectivity failures. */
export class NetworkError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "NETWORK_ERROR", ErrorCategory.Retryable, rest);
		this.name = "NetworkError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for ConfigMissingError. */
export function isConfigMissing(e: unknown): e is ConfigMissingError {
	return e instanceof ConfigMissingError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

/** Type guard for CriticalLogTimeoutError. */
export function isCriticalLogTimeout(e: unknown): e is CriticalLogTimeoutError {
	return e instanceof CriticalLogTimeoutError;
}

/** True for any TradingError whose category halts new entries. */
export function isFatal(e: unknown): boolean {
	return e instanceof TradingError && e.isFatal;
}
