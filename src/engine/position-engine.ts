/**
 * PositionEngine: order and position lifecycle against a custody ledger.
 *
 * Every operation runs as one transaction over the trade book and the
 * ledger: a failure anywhere leaves no trace, and events are emitted only
 * once the transaction commits. Batches decode their proof once and skip
 * items whose failure is local to the item (wrong state, wrong asset,
 * trigger not hit), while accounting failures abort the whole batch.
 */

import { type AccessControl, Role } from "../access/access-control.js";
import type { CustodyLedger } from "../custody/custody-ledger.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { readPriceFromProof } from "../oracle/price-proof.js";
import type { PriceOracle, PricePoint, PriceProof } from "../oracle/types.js";
import type { AssetRegistry } from "../registry/types.js";
import { type EngineConfig, resolveEngineConfig } from "../shared/config.js";
import {
	AuthorizationError,
	ErrorCode,
	FundsError,
	type LedgerError,
	ParameterError,
	PriceError,
	isBatchSkippable,
} from "../shared/errors.js";
import { PRICE_BITS, checkedWidth, requirePositive } from "../shared/fixed-point.js";
import { type AccountId, type AssetId, type TradeId, idToString } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock, nowSeconds } from "../shared/time.js";
import { TradeSide } from "../shared/trade-side.js";
import { type ActiveLog, type UndoLog, runAtomic } from "../shared/undo-log.js";
import {
	applyFunding,
	applySpread,
	checkLeverage,
	checkPrice,
	liquidationHit,
	liquidationPriceOf,
	marginFor,
	quantityOf,
	realizedPnl,
	validateStops,
	withinTolerance,
} from "./margin.js";
import { checkTransition } from "./trade-lifecycle.js";
import { TradeBook } from "./trade-book.js";
import {
	type BatchOutcome,
	type BatchResult,
	CloseReason,
	type EngineEvents,
	type Exposure,
	type OpenLimitParams,
	type OpenMarketParams,
	type StopsUpdate,
	type Trade,
	TradeState,
	type TriggerReason,
} from "./types.js";

export interface PositionEngineOptions {
	readonly access: AccessControl;
	readonly ledger: CustodyLedger;
	readonly registry: AssetRegistry;
	readonly oracle: PriceOracle;
	/** Account the engine acts as toward the ledger; must hold ledger_controller */
	readonly controller: AccountId;
	readonly clock?: Clock;
	readonly config?: Partial<EngineConfig>;
	readonly logger?: Logger;
}

/** Trader-bound entry points handed to a relayer by `onBehalfOf`. */
export interface TraderSession {
	readonly trader: AccountId;
	openLimit(params: OpenLimitParams): Result<Trade, LedgerError>;
	openMarket(params: OpenMarketParams, proof: PriceProof): Result<Trade, LedgerError>;
	cancel(id: TradeId): Result<Trade, LedgerError>;
	updateStops(id: TradeId, stops: StopsUpdate): Result<Trade, LedgerError>;
	closeMarket(id: TradeId, proof: PriceProof): Result<Trade, LedgerError>;
}

type BatchKind = "execute" | "close";

export class PositionEngine {
	readonly events = new TypedEmitter<EngineEvents>();

	private readonly book = new TradeBook();
	private readonly active: ActiveLog = { current: null };

	private constructor(
		private readonly access: AccessControl,
		private readonly ledger: CustodyLedger,
		private readonly registry: AssetRegistry,
		private readonly oracle: PriceOracle,
		private readonly controller: AccountId,
		private readonly clock: Clock,
		readonly config: EngineConfig,
		private readonly logger: Logger,
	) {}

	/**
	 * @throws ConfigError if `config` overrides are invalid
	 */
	static create(options: PositionEngineOptions): PositionEngine {
		const config = resolveEngineConfig(options.config);
		if (!config.ok) throw config.error;
		const logger = (options.logger ?? silentLogger()).child({ component: "position-engine" });
		return new PositionEngine(
			options.access,
			options.ledger,
			options.registry,
			options.oracle,
			options.controller,
			options.clock ?? SystemClock,
			config.value,
			logger,
		);
	}

	// ── Queries ────────────────────────────────────────────────────

	getTrade(id: TradeId): Result<Trade, LedgerError> {
		return this.book.get(id);
	}

	stateOf(id: TradeId): Result<TradeState, LedgerError> {
		const trade = this.book.get(id);
		return trade.ok ? ok(trade.value.state) : trade;
	}

	sideOf(id: TradeId): Result<TradeSide, LedgerError> {
		const trade = this.book.get(id);
		return trade.ok ? ok(trade.value.side) : trade;
	}

	exposure(asset: AssetId): Exposure {
		return this.book.exposure(asset);
	}

	tradesOf(owner: AccountId): readonly Trade[] {
		return this.book.byOwner(owner);
	}

	// ── Opening ────────────────────────────────────────────────────

	/** Places a limit order; margin is sized and locked at the target price. */
	openLimit(caller: AccountId, params: OpenLimitParams): Result<Trade, LedgerError> {
		return this.atomic((log) => {
			const target = checkPrice(params.targetPrice, "targetPrice");
			if (!target.ok) return target;

			const trade = this.create(caller, params, params.targetPrice, TradeState.Order);
			if (!trade.ok) return trade;
			this.publish(log, "orderPlaced", trade.value);
			this.logger.info(
				{ tradeId: trade.value.id, owner: caller, asset: params.asset, side: params.side },
				"Order placed",
			);
			return trade;
		});
	}

	/** Opens a position at the proof's price, adjusted by the asset's spread. */
	openMarket(
		caller: AccountId,
		params: OpenMarketParams,
		proof: PriceProof,
	): Result<Trade, LedgerError> {
		return this.atomic((log) => {
			const open = this.registry.isMarketOpen(params.asset);
			if (!open.ok) return open;
			if (!open.value) {
				return err(
					new ParameterError(`Market for ${params.asset} is closed`, ErrorCode.MarketClosed, {
						asset: params.asset,
					}),
				);
			}

			const point = this.priceFromProof(proof, params.asset);
			if (!point.ok) return point;
			const entry = this.fillPrice(params.asset, params.side, point.value.price);
			if (!entry.ok) return entry;

			const trade = this.create(caller, params, entry.value, TradeState.Open);
			if (!trade.ok) return trade;
			const exposure = this.book.adjustExposure(params.asset, params.side, params.lots);
			if (!exposure.ok) return exposure;

			this.publish(log, "tradeOpened", trade.value);
			this.logger.info(
				{ tradeId: trade.value.id, owner: caller, entryPrice: trade.value.entryPrice },
				"Trade opened",
			);
			return trade;
		});
	}

	// ── Owner operations ───────────────────────────────────────────

	/** Withdraws a pending order and releases its margin. */
	cancel(caller: AccountId, id: TradeId): Result<Trade, LedgerError> {
		return this.atomic((log) => {
			const trade = this.ownedTrade(caller, id);
			if (!trade.ok) return trade;
			const to = checkTransition(id, trade.value.state, "cancel");
			if (!to.ok) return to;

			const unlocked = this.ledger.unlock(this.controller, trade.value.owner, trade.value.marginReserved);
			if (!unlocked.ok) return unlocked;
			const cancelled = this.book.update(trade.value, { state: to.value, closedAt: this.now() });

			this.publish(log, "orderCancelled", cancelled);
			this.logger.info({ tradeId: id }, "Order cancelled");
			return ok(cancelled);
		});
	}

	/**
	 * Replaces both stop levels. They are validated against the target while
	 * the trade is an order and against the entry once it is open.
	 */
	updateStops(caller: AccountId, id: TradeId, stops: StopsUpdate): Result<Trade, LedgerError> {
		return this.atomic((log) => {
			const trade = this.ownedTrade(caller, id);
			if (!trade.ok) return trade;
			const to = checkTransition(id, trade.value.state, "update_stops");
			if (!to.ok) return to;

			const t = trade.value;
			const reference = t.state === TradeState.Order ? t.targetPrice : t.entryPrice;
			const valid = this.checkStops(t.side, reference, t.liquidationPrice, stops.stopLoss, stops.takeProfit);
			if (!valid.ok) return valid;

			const updated = this.book.update(t, { stopLoss: stops.stopLoss, takeProfit: stops.takeProfit });
			this.publish(log, "stopsUpdated", updated);
			this.logger.info(
				{ tradeId: id, stopLoss: stops.stopLoss, takeProfit: stops.takeProfit },
				"Stops updated",
			);
			return ok(updated);
		});
	}

	/** Closes an open position at the proof's price. */
	closeMarket(caller: AccountId, id: TradeId, proof: PriceProof): Result<Trade, LedgerError> {
		return this.atomic((log) => {
			const trade = this.ownedTrade(caller, id);
			if (!trade.ok) return trade;
			const point = this.priceFromProof(proof, trade.value.asset);
			if (!point.ok) return point;

			const closed = this.closeOne(trade.value, point.value.price, CloseReason.Market, log);
			if (!closed.ok) return closed;
			const exposure = this.book.adjustExposure(closed.value.asset, closed.value.side, -closed.value.lots);
			return exposure.ok ? closed : exposure;
		});
	}

	// ── Keeper operations ──────────────────────────────────────────

	/** Fills a limit order whose target is within tolerance of the proof's price. */
	executeLimit(caller: AccountId, id: TradeId, proof: PriceProof): Result<Trade, LedgerError> {
		const auth = this.access.require(Role.Keeper, caller);
		if (!auth.ok) return auth;

		return this.atomic((log) => {
			const trade = this.book.get(id);
			if (!trade.ok) return trade;
			const point = this.priceFromProof(proof, trade.value.asset);
			if (!point.ok) return point;

			const executed = this.executeOne(trade.value, point.value.price, log);
			if (!executed.ok) return executed;
			const exposure = this.book.adjustExposure(executed.value.asset, executed.value.side, executed.value.lots);
			return exposure.ok ? executed : exposure;
		});
	}

	/** Closes an open position because its stop, take-profit or liquidation level was reached. */
	closeTrigger(
		caller: AccountId,
		id: TradeId,
		reason: TriggerReason,
		proof: PriceProof,
	): Result<Trade, LedgerError> {
		const auth = this.access.require(Role.Keeper, caller);
		if (!auth.ok) return auth;

		return this.atomic((log) => {
			const trade = this.book.get(id);
			if (!trade.ok) return trade;
			const point = this.priceFromProof(proof, trade.value.asset);
			if (!point.ok) return point;

			const closed = this.closeOne(trade.value, point.value.price, reason, log);
			if (!closed.ok) return closed;
			const exposure = this.book.adjustExposure(closed.value.asset, closed.value.side, -closed.value.lots);
			return exposure.ok ? closed : exposure;
		});
	}

	/** Executes every order in `ids` that the proof's price reaches. */
	execLimits(
		caller: AccountId,
		asset: AssetId,
		ids: readonly TradeId[],
		proof: PriceProof,
	): Result<BatchResult, LedgerError> {
		return this.runBatch(caller, "execute", asset, ids, proof, null, (trade, price, log) =>
			this.executeOne(trade, price, log),
		);
	}

	/** Closes every trade in `ids` whose `reason` trigger the proof's price reaches. */
	closeBatch(
		caller: AccountId,
		asset: AssetId,
		ids: readonly TradeId[],
		reason: TriggerReason,
		proof: PriceProof,
	): Result<BatchResult, LedgerError> {
		return this.runBatch(caller, "close", asset, ids, proof, reason, (trade, price, log) =>
			this.closeOne(trade, price, reason, log),
		);
	}

	// ── Delegation ─────────────────────────────────────────────────

	/**
	 * Binds the owner entry points to `trader` for a relayer that has
	 * already authenticated the trader. The role is checked again on every call.
	 */
	onBehalfOf(relayer: AccountId, trader: AccountId): Result<TraderSession, LedgerError> {
		const auth = this.access.require(Role.Relayer, relayer);
		if (!auth.ok) return auth;

		const guarded =
			<A extends unknown[], T>(fn: (...args: A) => Result<T, LedgerError>) =>
			(...args: A): Result<T, LedgerError> => {
				const still = this.access.require(Role.Relayer, relayer);
				if (!still.ok) return still;
				this.logger.debug({ relayer, trader }, "Delegated call");
				return fn(...args);
			};

		return ok({
			trader,
			openLimit: guarded((params: OpenLimitParams) => this.openLimit(trader, params)),
			openMarket: guarded((params: OpenMarketParams, proof: PriceProof) =>
				this.openMarket(trader, params, proof),
			),
			cancel: guarded((id: TradeId) => this.cancel(trader, id)),
			updateStops: guarded((id: TradeId, stops: StopsUpdate) => this.updateStops(trader, id, stops)),
			closeMarket: guarded((id: TradeId, proof: PriceProof) => this.closeMarket(trader, id, proof)),
		});
	}

	// ── Transitions ────────────────────────────────────────────────

	private create(
		owner: AccountId,
		params: OpenMarketParams,
		reference: bigint,
		state: typeof TradeState.Order | typeof TradeState.Open,
	): Result<Trade, LedgerError> {
		const leverage = checkLeverage(params.leverage, this.config.maxLeverage);
		if (!leverage.ok) return leverage;
		const lot = this.registry.getLot(params.asset);
		if (!lot.ok) return lot;
		const quantity = quantityOf(params.lots, lot.value);
		if (!quantity.ok) return quantity;
		const margin = marginFor(quantity.value, reference, params.leverage);
		if (!margin.ok) return margin;
		const positive = requirePositive(margin.value, "margin");
		if (!positive.ok) return positive;

		const available = this.ledger.available(owner);
		if (available < margin.value) {
			return err(
				new FundsError("Available collateral does not cover margin", ErrorCode.InsufficientFunds, {
					owner,
					margin: margin.value.toString(),
					available: available.toString(),
				}),
			);
		}

		const liquidation = liquidationPriceOf(
			params.side,
			reference,
			params.leverage,
			this.config.liquidationLossBps,
		);
		if (!liquidation.ok) return liquidation;
		const stopLoss = params.stopLoss ?? 0n;
		const takeProfit = params.takeProfit ?? 0n;
		const stops = this.checkStops(params.side, reference, liquidation.value, stopLoss, takeProfit);
		if (!stops.ok) return stops;

		const locked = this.ledger.lock(this.controller, owner, margin.value);
		if (!locked.ok) return locked;

		const now = this.now();
		const open = state === TradeState.Open;
		return ok(
			this.book.insert({
				owner,
				asset: params.asset,
				side: params.side,
				lots: params.lots,
				state,
				entryPrice: open ? reference : 0n,
				targetPrice: open ? 0n : reference,
				stopLoss,
				takeProfit,
				liquidationPrice: liquidation.value,
				leverage: params.leverage,
				marginReserved: margin.value,
				openedAt: open ? now : 0,
				createdAt: now,
				closedAt: null,
				exitPrice: null,
				realizedPnl: null,
				closeReason: null,
			}),
		);
	}

	/** ORDER → OPEN at `price`; the caller accounts for exposure. */
	private executeOne(trade: Trade, price: bigint, log: UndoLog): Result<Trade, LedgerError> {
		const to = checkTransition(trade.id, trade.state, "execute");
		if (!to.ok) return to;
		if (!withinTolerance(price, trade.targetPrice, this.config.toleranceBps)) {
			return err(
				new PriceError("Price is not within tolerance of the target", ErrorCode.PriceNotNear, {
					tradeId: trade.id,
					price: price.toString(),
					target: trade.targetPrice.toString(),
				}),
			);
		}
		const entry = this.fillPrice(trade.asset, trade.side, price);
		if (!entry.ok) return entry;

		const executed = this.book.update(trade, {
			state: to.value,
			entryPrice: entry.value,
			targetPrice: 0n,
			openedAt: this.now(),
		});
		this.publish(log, "orderExecuted", executed);
		this.logger.info({ tradeId: trade.id, entryPrice: entry.value }, "Order executed");
		return ok(executed);
	}

	/** OPEN → CLOSED at `price`; the caller accounts for exposure. */
	private closeOne(
		trade: Trade,
		price: bigint,
		reason: CloseReason,
		log: UndoLog,
	): Result<Trade, LedgerError> {
		const to = checkTransition(trade.id, trade.state, "close");
		if (!to.ok) return to;
		if (reason !== CloseReason.Market) {
			const hit = this.checkTrigger(trade, reason, price);
			if (!hit.ok) return hit;
		}

		const lot = this.registry.getLot(trade.asset);
		if (!lot.ok) return lot;
		const quantity = quantityOf(trade.lots, lot.value);
		if (!quantity.ok) return quantity;
		const spread = this.registry.halfSpread(trade.asset);
		if (!spread.ok) return spread;
		const rate = this.registry.fundingRate(trade.asset);
		if (!rate.ok) return rate;

		const now = this.now();
		const exit = applyFunding(
			trade.side,
			applySpread(trade.side, price, spread.value, false),
			rate.value,
			trade.openedAt,
			now,
			this.config.fundingIntervalSec,
		);
		const pnl = realizedPnl(
			trade.side,
			quantity.value,
			trade.entryPrice,
			exit,
			this.config.capPnlToMargin ? trade.marginReserved : null,
		);

		const unlocked = this.ledger.unlock(this.controller, trade.owner, trade.marginReserved);
		if (!unlocked.ok) return unlocked;
		const settled = this.ledger.settle(this.controller, trade.owner, pnl);
		if (!settled.ok) return settled;

		const closed = this.book.update(trade, {
			state: to.value,
			closedAt: now,
			exitPrice: exit,
			realizedPnl: pnl,
			closeReason: reason,
		});
		this.publish(log, "tradeClosed", { trade: closed, reason, exitPrice: exit, pnl });
		this.logger.info({ tradeId: trade.id, reason, exitPrice: exit, pnl }, "Trade closed");
		return ok(closed);
	}

	// ── Batches ────────────────────────────────────────────────────

	private runBatch(
		caller: AccountId,
		kind: BatchKind,
		asset: AssetId,
		ids: readonly TradeId[],
		proof: PriceProof,
		reason: TriggerReason | null,
		step: (trade: Trade, price: bigint, log: UndoLog) => Result<Trade, LedgerError>,
	): Result<BatchResult, LedgerError> {
		const auth = this.access.require(Role.Keeper, caller);
		if (!auth.ok) return auth;
		if (ids.length === 0 || ids.length > this.config.maxBatchSize) {
			return err(
				new ParameterError(
					`Batch must hold 1..${this.config.maxBatchSize} ids`,
					ErrorCode.InvalidAmount,
					{ size: ids.length },
				),
			);
		}

		return this.atomic((log) => {
			const point = this.priceFromProof(proof, asset);
			if (!point.ok) return point;

			const outcomes: BatchOutcome[] = [];
			let longDelta = 0n;
			let shortDelta = 0n;
			const sign = kind === "execute" ? 1n : -1n;

			for (const id of ids) {
				const mark = log.mark();
				const done = this.batchItem(id, asset, point.value.price, log, step);
				if (done.ok) {
					if (done.value.side === TradeSide.Long) longDelta += sign * done.value.lots;
					else shortDelta += sign * done.value.lots;
					outcomes.push({ id, status: kind === "execute" ? "executed" : "closed" });
					continue;
				}
				if (!isBatchSkippable(done.error)) {
					this.logger.warn({ tradeId: id, code: done.error.code, kind }, "Batch aborted");
					return done;
				}
				log.rollbackTo(mark);
				this.logger.debug({ tradeId: id, code: done.error.code }, "Batch item skipped");
				outcomes.push({ id, status: "skipped", code: done.error.code, message: done.error.message });
			}

			const longs = this.book.adjustExposure(asset, TradeSide.Long, longDelta);
			if (!longs.ok) return longs;
			const shorts = this.book.adjustExposure(asset, TradeSide.Short, shortDelta);
			if (!shorts.ok) return shorts;

			const skipped = outcomes.filter((o) => o.status === "skipped").length;
			const result: BatchResult = { processed: outcomes.length - skipped, skipped, outcomes };
			this.publish(log, "batchProcessed", {
				kind,
				asset,
				reason,
				processed: result.processed,
				skipped,
			});
			this.logger.info({ kind, asset, processed: result.processed, skipped }, "Batch processed");
			return ok(result);
		});
	}

	private batchItem(
		id: TradeId,
		asset: AssetId,
		price: bigint,
		log: UndoLog,
		step: (trade: Trade, price: bigint, log: UndoLog) => Result<Trade, LedgerError>,
	): Result<Trade, LedgerError> {
		const trade = this.book.get(id);
		if (!trade.ok) return trade;
		if (trade.value.asset !== asset) {
			return err(
				new ParameterError(`Trade ${id} is not on ${asset}`, ErrorCode.WrongAsset, {
					tradeId: id,
					asset,
					tradeAsset: trade.value.asset,
				}),
			);
		}
		return step(trade.value, price, log);
	}

	// ── Checks ─────────────────────────────────────────────────────

	private checkTrigger(trade: Trade, reason: TriggerReason, price: bigint): Result<void, LedgerError> {
		const level =
			reason === CloseReason.StopLoss
				? trade.stopLoss
				: reason === CloseReason.TakeProfit
					? trade.takeProfit
					: trade.liquidationPrice;
		if (level === 0n) {
			return err(
				new ParameterError(`Trade ${trade.id} has no ${reason} level`, ErrorCode.NoTrigger, {
					tradeId: trade.id,
					reason,
				}),
			);
		}

		const tolerance = this.config.toleranceBps;
		const hit =
			reason === CloseReason.Liquidation
				? liquidationHit(trade.side, price, level, tolerance)
				: withinTolerance(price, level, tolerance);
		if (hit) return ok(undefined);

		return err(
			new PriceError(`Price does not reach the ${reason} level`, ErrorCode.TriggerNotHit, {
				tradeId: trade.id,
				reason,
				price: price.toString(),
				level: level.toString(),
			}),
		);
	}

	private checkStops(
		side: TradeSide,
		reference: bigint,
		liquidation: bigint,
		stopLoss: bigint,
		takeProfit: bigint,
	): Result<void, LedgerError> {
		for (const [label, level] of [
			["stopLoss", stopLoss],
			["takeProfit", takeProfit],
		] as const) {
			if (level > 0n) {
				const width = checkedWidth(level, PRICE_BITS, label);
				if (!width.ok) return width;
			}
		}
		return validateStops(side, reference, liquidation, stopLoss, takeProfit);
	}

	private ownedTrade(caller: AccountId, id: TradeId): Result<Trade, LedgerError> {
		const trade = this.book.get(id);
		if (!trade.ok) return trade;
		if (trade.value.owner !== caller) {
			return err(
				new AuthorizationError(`${caller} does not own trade ${id}`, ErrorCode.Unauthorized, {
					tradeId: id,
					caller,
				}),
			);
		}
		return trade;
	}

	// ── Prices ─────────────────────────────────────────────────────

	private priceFromProof(proof: PriceProof, asset: AssetId): Result<PricePoint, LedgerError> {
		return readPriceFromProof(this.oracle, proof, idToString(asset), {
			nowSec: this.now(),
			maxAgeSec: this.config.maxProofAgeSec,
			maxFutureSkewSec: this.config.maxFutureSkewSec,
		});
	}

	/** Entry price: the reference plus the asset's half-spread against the trader. */
	private fillPrice(asset: AssetId, side: TradeSide, reference: bigint): Result<bigint, LedgerError> {
		const spread = this.registry.halfSpread(asset);
		if (!spread.ok) return spread;
		const price = applySpread(side, reference, spread.value, true);
		const valid = checkPrice(price, "execution price");
		return valid.ok ? ok(price) : valid;
	}

	// ── Internal ───────────────────────────────────────────────────

	private now(): number {
		return nowSeconds(this.clock);
	}

	private atomic<T>(fn: (log: UndoLog) => Result<T, LedgerError>): Result<T, LedgerError> {
		return runAtomic([this.book, this.ledger], this.active, fn);
	}

	private publish<K extends keyof EngineEvents>(
		log: UndoLog,
		event: K,
		payload: Parameters<EngineEvents[K]>[0],
	): void {
		log.defer(() => {
			this.events.emit(event, payload);
		});
	}
}
