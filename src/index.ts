// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type InstrumentSymbol,
	type PositionId,
	instrumentSymbol,
	positionId,
	idToString,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	unwrap,
	Decimal,
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	TradingError,
	ErrorCategory,
	ConfigMissingError,
	ConfigError,
	MalformedTickError,
	DuplicateTickError,
	BufferOverflowError,
	PositionSizeExceededError,
	LifecycleViolationError,
	PositionAlreadyOpenError,
	CriticalLogTimeoutError,
	FeedDisconnectedError,
	NetworkError,
	isConfigMissing,
	isConfigError,
	isCriticalLogTimeout,
	isFatal,
	type EngineConfig,
	type EngineConfigError,
	type LotsPerTrade,
	type RawEngineConfigInput,
	type RiskConfig,
	type SessionConfig,
	type StrategyConfig,
	parseEngineConfig,
	requireEngineConfig,
} from "./shared/index.js";

// ── Feed ─────────────────────────────────────────────────────────────
export {
	TickOrigin,
	type Tick,
	type TickEmitter,
	type TickSource,
	type TickSourceStats,
	TickNormalizer,
	type LiveChannel,
	EmitterLiveChannel,
	WsLiveChannel,
	PushTickSource,
	ReplayTickSource,
	type ReplayPacing,
	readTickFile,
	toTickLines,
} from "./feed/index.js";

// ── Ingest ───────────────────────────────────────────────────────────
export { TransferBuffer, DedupGuard, type GapCheck, OverloadMonitor, type OverloadStats } from "./ingest/index.js";

// ── Diagnostics ──────────────────────────────────────────────────────
export {
	Severity,
	type DiagnosticEvent,
	type DiagnosticLogger,
	type DiagnosticWriter,
	AsyncDiagnosticSink,
	type DiagnosticSinkStats,
	LoggerDiagnosticWriter,
	MemoryDiagnosticWriter,
} from "./diagnostics/index.js";

// ── Strategy ─────────────────────────────────────────────────────────
export {
	HoldReason,
	type StrategyDecision,
	type StrategyView,
	type WarmupState,
	WarmupTracker,
	SessionWindow,
	IndicatorSet,
	type IndicatorSnapshot,
	StrategyEngine,
} from "./strategy/index.js";

// ── Signal & Exits ───────────────────────────────────────────────────
export {
	type ExitContext,
	type ExitPolicy,
	type ExitReason,
	type ExitReasonType,
	type PositionLike,
	type TakeProfitTarget,
	ExitPipeline,
	EmergencyExit,
	StopLossExit,
	TakeProfitExit,
	TrailingStopExit,
	TimeExit,
} from "./signal/index.js";

// ── Lifecycle ────────────────────────────────────────────────────────
export {
	PositionState,
	type PositionTransition,
	type StateError,
	StateErrorKind,
	PositionStateMachine,
} from "./lifecycle/index.js";

// ── Position ─────────────────────────────────────────────────────────
export {
	type OpenIntent,
	type PositionSnapshot,
	type Trade,
	Position,
	sizeEntry,
	PositionLifecycleManager,
} from "./position/index.js";

// ── Accounting ───────────────────────────────────────────────────────
export { type CommissionModel, noCommission, turnoverCommission } from "./accounting/index.js";

// ── Results ──────────────────────────────────────────────────────────
export {
	type ResultEvent,
	type ResultsSink,
	MemoryResultsSink,
	FileResultsSink,
} from "./results/index.js";

// ── Observability ────────────────────────────────────────────────────
export { LatencyHistogram, type LatencySnapshot } from "./observability/index.js";

// ── Engine ───────────────────────────────────────────────────────────
export { TradingEngine, type TradingEngineDeps, type EngineCounters, type EngineEvents } from "./engine/index.js";

// ── Lib: WebSocket ───────────────────────────────────────────────────
export { WsClient } from "./lib/websocket/index.js";
export type { WsConfig, WsState } from "./lib/websocket/index.js";

// ── Lib: Logger ──────────────────────────────────────────────────────
export { createLogger } from "./lib/logger/index.js";
export type { Logger, LoggerConfig, LogLevel } from "./lib/logger/index.js";

// ── Lib: Validation ──────────────────────────────────────────────────
export { validate, ValidationError, z } from "./lib/validation/index.js";
export type { ValidationIssue } from "./lib/validation/index.js";

// ── Lib: Events ──────────────────────────────────────────────────────
export { TypedEmitter } from "./lib/events/index.js";
export type { EventMap } from "./lib/events/index.js";
