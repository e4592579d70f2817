export {
	type InstrumentSymbol,
	type PositionId,
	instrumentSymbol,
	positionId,
	idToString,
} from "./identifiers.js";

export { type Result, ok, err, map, unwrap, isOk, isErr, tryCatch } from "./result.js";

export {
	ErrorCategory,
	TradingError,
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
} from "./errors.js";

export { Decimal } from "./decimal.js";
export { type Clock, SystemClock, FakeClock, Duration, parseDurationMs } from "./time.js";
export {
	type EngineConfig,
	type EngineConfigError,
	type InstrumentConfig,
	type LotsPerTrade,
	type RawEngineConfig,
	type RawEngineConfigInput,
	type RiskConfig,
	type SessionConfig,
	type StrategyConfig,
	parseEngineConfig,
	requireEngineConfig,
} from "./config.js";
