/**
 * Position engine types: trade records, operation parameters, batch
 * outcomes and domain events.
 *
 * A trade is created as an ORDER (limit) or OPEN (market), and ends CLOSED
 * or CANCELLED. Terminal records never change.
 */

import type { ErrorCode } from "../shared/errors.js";
import type { AccountId, AssetId, TradeId } from "../shared/identifiers.js";
import type { TradeSide } from "../shared/trade-side.js";

// ── States ───────────────────────────────────────────────────────────

export const TradeState = {
	/** Limit order waiting for the price to reach its target */
	Order: "order",
	/** Live position */
	Open: "open",
	/** Terminal: position closed and settled */
	Closed: "closed",
	/** Terminal: order withdrawn before execution */
	Cancelled: "cancelled",
} as const;

export type TradeState = (typeof TradeState)[keyof typeof TradeState];

export const CloseReason = {
	Market: "market",
	StopLoss: "stop_loss",
	TakeProfit: "take_profit",
	Liquidation: "liquidation",
} as const;

export type CloseReason = (typeof CloseReason)[keyof typeof CloseReason];

/** Reasons a keeper may close a trade for; `market` is the owner's own close. */
export type TriggerReason = Exclude<CloseReason, typeof CloseReason.Market>;

// ── Trade record ─────────────────────────────────────────────────────

/**
 * Prices, margin and PnL are ×1e6 fixed point. A zero stop or target means
 * "not set". `liquidationPrice` is fixed when the trade is created.
 */
export interface Trade {
	readonly id: TradeId;
	readonly owner: AccountId;
	readonly asset: AssetId;
	readonly side: TradeSide;
	readonly lots: bigint;
	readonly state: TradeState;
	/** Spread-adjusted fill price; 0 while an order */
	readonly entryPrice: bigint;
	/** Limit price; cleared to 0 when the order executes */
	readonly targetPrice: bigint;
	readonly stopLoss: bigint;
	readonly takeProfit: bigint;
	readonly liquidationPrice: bigint;
	readonly leverage: number;
	readonly marginReserved: bigint;
	/** Seconds since the epoch the position opened; 0 while an order */
	readonly openedAt: number;
	readonly createdAt: number;
	readonly closedAt: number | null;
	readonly exitPrice: bigint | null;
	readonly realizedPnl: bigint | null;
	readonly closeReason: CloseReason | null;
}

/** Net lots held per side for one asset. */
export interface Exposure {
	readonly longLots: bigint;
	readonly shortLots: bigint;
}

// ── Parameters ───────────────────────────────────────────────────────

export interface OpenMarketParams {
	readonly asset: AssetId;
	readonly side: TradeSide;
	readonly lots: bigint;
	readonly leverage: number;
	readonly stopLoss?: bigint;
	readonly takeProfit?: bigint;
}

export interface OpenLimitParams extends OpenMarketParams {
	readonly targetPrice: bigint;
}

export interface StopsUpdate {
	readonly stopLoss: bigint;
	readonly takeProfit: bigint;
}

// ── Batches ──────────────────────────────────────────────────────────

export type BatchOutcome =
	| { readonly id: TradeId; readonly status: "executed" | "closed" }
	| {
			readonly id: TradeId;
			readonly status: "skipped";
			readonly code: ErrorCode;
			readonly message: string;
	  };

export interface BatchResult {
	readonly processed: number;
	readonly skipped: number;
	readonly outcomes: readonly BatchOutcome[];
}

// ── Events ───────────────────────────────────────────────────────────

export interface TradeClosedEvent {
	readonly trade: Trade;
	readonly reason: CloseReason;
	readonly exitPrice: bigint;
	readonly pnl: bigint;
}

export interface BatchProcessedEvent {
	readonly kind: "execute" | "close";
	readonly asset: AssetId;
	readonly reason: CloseReason | null;
	readonly processed: number;
	readonly skipped: number;
}

export type EngineEvents = {
	orderPlaced: (trade: Trade) => void;
	tradeOpened: (trade: Trade) => void;
	orderExecuted: (trade: Trade) => void;
	orderCancelled: (trade: Trade) => void;
	stopsUpdated: (trade: Trade) => void;
	tradeClosed: (e: TradeClosedEvent) => void;
	batchProcessed: (e: BatchProcessedEvent) => void;
};
