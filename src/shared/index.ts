export {
	type AccountId,
	type AssetId,
	type TradeId,
	accountId,
	assetId,
	tradeId,
	idToString,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	flatMap,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
} from "./result.js";

export {
	ErrorCategory,
	ErrorCode,
	LedgerError,
	AuthorizationError,
	InvalidStateError,
	FundsError,
	ParameterError,
	PriceError,
	ArithmeticRangeError,
	NotFoundError,
	ConfigError,
	isBatchSkippable,
} from "./errors.js";

export {
	SCALE,
	BPS_DENOMINATOR,
	PRICE_BITS,
	AMOUNT_BITS,
	LOTS_BITS,
	parseFixed6,
	formatFixed6,
	ceilDiv,
	mulDiv,
	bpsOf,
	checkedWidth,
} from "./fixed-point.js";
export { TradeSide, sideSign, isLong } from "./trade-side.js";
export { type Clock, SystemClock, FakeClock, nowSeconds } from "./time.js";
export { UndoLog, type UndoMark, type Journaled, type ActiveLog, runAtomic } from "./undo-log.js";
export {
	type EngineConfig,
	type LedgerConfig,
	DEFAULT_ENGINE_CONFIG,
	DEFAULT_LEDGER_CONFIG,
	resolveEngineConfig,
	resolveLedgerConfig,
	configFromEnv,
} from "./config.js";
