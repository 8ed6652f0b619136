export {
	type BatchOutcome,
	type BatchProcessedEvent,
	type BatchResult,
	CloseReason,
	type EngineEvents,
	type Exposure,
	type OpenLimitParams,
	type OpenMarketParams,
	type StopsUpdate,
	type Trade,
	type TradeClosedEvent,
	TradeState,
	type TriggerReason,
} from "./types.js";
export { checkTransition, isTerminal, type TradeTransition } from "./trade-lifecycle.js";
export {
	applyFunding,
	applySpread,
	checkLeverage,
	checkPrice,
	isAdverse,
	liquidationHit,
	liquidationPriceOf,
	marginFor,
	notionalOf,
	quantityOf,
	realizedPnl,
	validateStops,
	withinTolerance,
} from "./margin.js";
export { TradeBook } from "./trade-book.js";
export {
	PositionEngine,
	type PositionEngineOptions,
	type TraderSession,
} from "./position-engine.js";
