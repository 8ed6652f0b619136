/**
 * TradeBook: arena of trade records plus per-asset exposure counters.
 *
 * Ids come from a monotonic counter and are never reused. Records are
 * frozen; an update replaces the record. Every write is journaled when an
 * UndoLog is attached, so the engine can undo a failed operation or a
 * skipped batch item.
 */

import { ErrorCode, type LedgerError, NotFoundError } from "../shared/errors.js";
import { AMOUNT_BITS, checkedWidth } from "../shared/fixed-point.js";
import { type AccountId, type AssetId, type TradeId, tradeId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { TradeSide } from "../shared/trade-side.js";
import type { Journaled, UndoLog } from "../shared/undo-log.js";
import type { Exposure, Trade } from "./types.js";

const NO_EXPOSURE: Exposure = Object.freeze({ longLots: 0n, shortLots: 0n });

export class TradeBook implements Journaled {
	private lastId = 0;
	private readonly trades = new Map<TradeId, Trade>();
	private readonly exposures = new Map<AssetId, Exposure>();
	private journal: UndoLog | null = null;

	attachJournal(log: UndoLog | null): void {
		this.journal = log;
	}

	// ── Queries ────────────────────────────────────────────────────

	get(id: TradeId): Result<Trade, LedgerError> {
		const trade = this.trades.get(id);
		if (!trade) {
			return err(new NotFoundError(`Trade ${id} does not exist`, ErrorCode.UnknownTrade, { tradeId: id }));
		}
		return ok(trade);
	}

	exposure(asset: AssetId): Exposure {
		return this.exposures.get(asset) ?? NO_EXPOSURE;
	}

	byOwner(owner: AccountId): readonly Trade[] {
		return [...this.trades.values()].filter((t) => t.owner === owner);
	}

	get size(): number {
		return this.trades.size;
	}

	// ── Writes ─────────────────────────────────────────────────────

	/** Stores a new record under the next id. */
	insert(draft: Omit<Trade, "id">): Trade {
		const prevId = this.lastId;
		const id = tradeId(prevId + 1);
		this.journal?.record(() => {
			this.trades.delete(id);
			this.lastId = prevId;
		});
		this.lastId = prevId + 1;
		const trade = Object.freeze({ id, ...draft });
		this.trades.set(id, trade);
		return trade;
	}

	/** Replaces a record with `patch` applied. */
	update(trade: Trade, patch: Partial<Omit<Trade, "id" | "owner" | "asset" | "side">>): Trade {
		const prev = trade;
		this.journal?.record(() => {
			this.trades.set(prev.id, prev);
		});
		const next = Object.freeze({ ...trade, ...patch });
		this.trades.set(trade.id, next);
		return next;
	}

	/**
	 * Adds `deltaLots` (signed) to one side of an asset's exposure.
	 * @returns Err(VALUE_RANGE) if the counter would go negative or overflow
	 */
	adjustExposure(asset: AssetId, side: TradeSide, deltaLots: bigint): Result<Exposure, LedgerError> {
		if (deltaLots === 0n) return ok(this.exposure(asset));
		const current = this.exposure(asset);
		const long = side === TradeSide.Long;
		const value = checkedWidth(
			(long ? current.longLots : current.shortLots) + deltaLots,
			AMOUNT_BITS,
			`${side} exposure`,
		);
		if (!value.ok) return value;

		const prev = this.exposures.get(asset);
		this.journal?.record(() => {
			if (prev === undefined) this.exposures.delete(asset);
			else this.exposures.set(asset, prev);
		});
		const next: Exposure = Object.freeze(
			long ? { ...current, longLots: value.value } : { ...current, shortLots: value.value },
		);
		this.exposures.set(asset, next);
		return ok(next);
	}
}
