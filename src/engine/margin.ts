/**
 * Margin math: pure functions over ×1e6 fixed point.
 *
 * Nothing here touches state; the engine composes these into its
 * operations and stores what they return.
 */

import type { LotRatio } from "../registry/types.js";
import {
	type ArithmeticRangeError,
	ErrorCode,
	type LedgerError,
	ParameterError,
} from "../shared/errors.js";
import {
	AMOUNT_BITS,
	BPS_DENOMINATOR,
	LOTS_BITS,
	PRICE_BITS,
	SCALE,
	absBig,
	ceilDiv,
	checkedWidth,
	clampAbs,
} from "../shared/fixed-point.js";
import { type Result, err, ok } from "../shared/result.js";
import { TradeSide, isLong, sideSign } from "../shared/trade-side.js";

// ── Sizing ──────────────────────────────────────────────────────────

/**
 * Base quantity (×1e6) for `lots` of an asset.
 * @example quantityOf(3n, { numerator: 1n, denominator: 100n }) // ok(30_000n)
 */
export function quantityOf(lots: bigint, lot: LotRatio): Result<bigint, LedgerError> {
	const width = checkedWidth(lots, LOTS_BITS, "lots");
	if (!width.ok) return width;
	if (lots === 0n || lot.numerator === 0n) {
		return err(new ParameterError("Quantity is zero", ErrorCode.QtyZero, { lots: lots.toString() }));
	}
	const quantity = (lots * lot.numerator * SCALE) / lot.denominator;
	if (quantity === 0n) {
		return err(
			new ParameterError("Quantity truncates to zero", ErrorCode.QtyZero, {
				lots: lots.toString(),
				numerator: lot.numerator.toString(),
				denominator: lot.denominator.toString(),
			}),
		);
	}
	return checkedWidth(quantity, AMOUNT_BITS, "quantity");
}

export function notionalOf(quantity: bigint, price: bigint): bigint {
	return (quantity * price) / SCALE;
}

/** `ceil(notional / leverage)`, range-checked to the amount container. */
export function marginFor(
	quantity: bigint,
	price: bigint,
	leverage: number,
): Result<bigint, ArithmeticRangeError> {
	return checkedWidth(ceilDiv(notionalOf(quantity, price), BigInt(leverage)), AMOUNT_BITS, "margin");
}

// ── Liquidation ─────────────────────────────────────────────────────

/**
 * Price at which the position has lost `lossBps` of its margin:
 * `P × (1 − F/L)` for a long, `P × (1 + F/L)` for a short.
 * @example liquidationPriceOf("long", 100_000000n, 10, 8_000) // ok(92_000000n)
 */
export function liquidationPriceOf(
	side: TradeSide,
	price: bigint,
	leverage: number,
	lossBps: number,
): Result<bigint, ArithmeticRangeError> {
	const move = (price * BigInt(lossBps)) / (BigInt(leverage) * BPS_DENOMINATOR);
	const liq = isLong(side) ? price - move : price + move;
	return checkedWidth(liq, PRICE_BITS, "liquidation price");
}

// ── Stops ───────────────────────────────────────────────────────────

/**
 * Take-profit must sit on the profitable side of `reference`; stop-loss
 * between the liquidation price (inclusive) and `reference` (exclusive).
 * Zero means unset and always passes.
 */
export function validateStops(
	side: TradeSide,
	reference: bigint,
	liquidation: bigint,
	stopLoss: bigint,
	takeProfit: bigint,
): Result<void, ParameterError> {
	const long = isLong(side);
	const tpOk = takeProfit === 0n || (long ? takeProfit >= reference : takeProfit <= reference);
	const slOk =
		stopLoss === 0n ||
		(long
			? stopLoss >= liquidation && stopLoss < reference
			: stopLoss > reference && stopLoss <= liquidation);
	if (tpOk && slOk && stopLoss >= 0n && takeProfit >= 0n) return ok(undefined);

	return err(
		new ParameterError("Stop level out of range", ErrorCode.InvalidStopRange, {
			side,
			reference: reference.toString(),
			liquidation: liquidation.toString(),
			stopLoss: stopLoss.toString(),
			takeProfit: takeProfit.toString(),
		}),
	);
}

// ── Trigger acceptance ──────────────────────────────────────────────

/** `|price − target| × 10000 ≤ target × toleranceBps` */
export function withinTolerance(price: bigint, target: bigint, toleranceBps: number): boolean {
	return absBig(price - target) * BPS_DENOMINATOR <= target * BigInt(toleranceBps);
}

/** Whether `price` has moved past `liquidation` against the position. */
export function isAdverse(side: TradeSide, price: bigint, liquidation: bigint): boolean {
	return isLong(side) ? price <= liquidation : price >= liquidation;
}

/** Liquidation fires within tolerance of the level or anywhere past it. */
export function liquidationHit(
	side: TradeSide,
	price: bigint,
	liquidation: bigint,
	toleranceBps: number,
): boolean {
	return withinTolerance(price, liquidation, toleranceBps) || isAdverse(side, price, liquidation);
}

// ── Execution prices ────────────────────────────────────────────────

/**
 * Adjusts a reference price by the half-spread so the trader always pays:
 * up for a long entry or a short exit, down for a short entry or a long exit.
 * Floors at zero.
 */
export function applySpread(
	side: TradeSide,
	reference: bigint,
	halfSpread: bigint,
	opening: boolean,
): bigint {
	const up = opening === isLong(side);
	const adjusted = up ? reference + halfSpread : reference - halfSpread;
	return adjusted < 0n ? 0n : adjusted;
}

/**
 * Folds accrued funding into an exit price: a long's exit is lowered and a
 * short's raised, so a positive rate is a cost to either side. Floors at zero.
 */
export function applyFunding(
	side: TradeSide,
	exit: bigint,
	ratePerInterval: bigint,
	openedAt: number,
	now: number,
	intervalSec: number,
): bigint {
	if (intervalSec <= 0 || now <= openedAt) return exit;
	const intervals = BigInt(Math.floor((now - openedAt) / intervalSec));
	const total = intervals * ratePerInterval;
	const adjusted = side === TradeSide.Long ? exit - total : exit + total;
	return adjusted < 0n ? 0n : adjusted;
}

// ── PnL ─────────────────────────────────────────────────────────────

/**
 * `sign × quantity × (exit − entry) / 1e6`, truncated toward zero and,
 * when `cap` is given, clamped to ±cap.
 */
export function realizedPnl(
	side: TradeSide,
	quantity: bigint,
	entry: bigint,
	exit: bigint,
	cap: bigint | null,
): bigint {
	const pnl = (sideSign(side) * quantity * (exit - entry)) / SCALE;
	return cap === null ? pnl : clampAbs(pnl, cap);
}

/** Fails INVALID_LEVERAGE outside `1..maxLeverage` or for a non-integer. */
export function checkLeverage(leverage: number, maxLeverage: number): Result<void, ParameterError> {
	if (!Number.isInteger(leverage) || leverage < 1 || leverage > maxLeverage) {
		return err(
			new ParameterError(`Leverage must be an integer in 1..${maxLeverage}`, ErrorCode.InvalidLeverage, {
				leverage,
			}),
		);
	}
	return ok(undefined);
}

/** Fails INVALID_PRICE for a non-positive price or one beyond the price container. */
export function checkPrice(price: bigint, label: string): Result<void, LedgerError> {
	if (price <= 0n) {
		return err(
			new ParameterError(`${label} must be positive`, ErrorCode.InvalidPrice, {
				label,
				price: price.toString(),
			}),
		);
	}
	const width = checkedWidth(price, PRICE_BITS, label);
	return width.ok ? ok(undefined) : width;
}
