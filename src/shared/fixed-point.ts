/**
 * Fixed-point helpers: ×1e6 bigint arithmetic.
 *
 * Prices, amounts, margin and PnL are all integers scaled by one million
 * (the stablecoin's 6 decimals). Never use `number` for money.
 *
 * Storage containers are fixed width: prices fit 64 bits, amounts 128 bits,
 * lot counts 32 bits. Values are range-checked before they are stored.
 */

import { ArithmeticRangeError, ErrorCode, ParameterError } from "./errors.js";
import { type Result, err, ok } from "./result.js";

export const DECIMALS = 6;
export const SCALE = 1_000_000n;
export const BPS_DENOMINATOR = 10_000n;

export const PRICE_BITS = 64;
export const AMOUNT_BITS = 128;
export const LOTS_BITS = 32;

/** Largest unsigned value that fits in `bits` bits. */
export function maxUint(bits: number): bigint {
	return (1n << BigInt(bits)) - 1n;
}

// ── Parsing / formatting ────────────────────────────────────────────

const FIXED_RE = /^(-)?(\d+)(?:\.(\d+))?$/;

/**
 * Parses a decimal string into ×1e6 fixed point, truncating extra digits.
 * @throws Error if the string is not a plain decimal
 * @example parseFixed6("100.05") // 100_050_000n
 */
export function parseFixed6(value: string): bigint {
	const match = FIXED_RE.exec(value.trim());
	if (!match) {
		throw new Error(`parseFixed6: invalid decimal "${value}"`);
	}
	const [, sign, intPart = "0", fracPart = ""] = match;
	const frac = fracPart.padEnd(DECIMALS, "0").slice(0, DECIMALS);
	const raw = BigInt(intPart) * SCALE + BigInt(frac);
	return sign ? -raw : raw;
}

/**
 * Formats ×1e6 fixed point with all six decimals.
 * @example formatFixed6(100_050_000n) // "100.050000"
 */
export function formatFixed6(value: bigint): string {
	const negative = value < 0n;
	const abs = negative ? -value : value;
	const intPart = abs / SCALE;
	const fracPart = (abs % SCALE).toString().padStart(DECIMALS, "0");
	return `${negative ? "-" : ""}${intPart}.${fracPart}`;
}

// ── Arithmetic ──────────────────────────────────────────────────────

/** Division rounding toward positive infinity. Both operands must be non-negative. */
export function ceilDiv(numerator: bigint, denominator: bigint): bigint {
	if (denominator <= 0n) {
		throw new Error("ceilDiv: denominator must be positive");
	}
	return (numerator + denominator - 1n) / denominator;
}

/** `a × b / c` truncated toward zero. */
export function mulDiv(a: bigint, b: bigint, c: bigint): bigint {
	if (c === 0n) {
		throw new Error("mulDiv: division by zero");
	}
	return (a * b) / c;
}

/** `value × bps / 10000`, truncated toward zero. */
export function bpsOf(value: bigint, bps: bigint | number): bigint {
	return (value * BigInt(bps)) / BPS_DENOMINATOR;
}

/** Absolute value of a bigint. */
export function absBig(value: bigint): bigint {
	return value < 0n ? -value : value;
}

/** Clamp a signed value to [-bound, bound]. */
export function clampAbs(value: bigint, bound: bigint): bigint {
	if (value > bound) return bound;
	if (value < -bound) return -bound;
	return value;
}

// ── Range checks ────────────────────────────────────────────────────

/**
 * Ensures a non-negative value fits an unsigned container of `bits` width.
 * @param label - Field name reported in the error context
 */
export function checkedWidth(
	value: bigint,
	bits: number,
	label: string,
): Result<bigint, ArithmeticRangeError> {
	if (value < 0n || value > maxUint(bits)) {
		return err(
			new ArithmeticRangeError(`${label} does not fit ${bits} bits`, ErrorCode.ValueRange, {
				label,
				value: value.toString(),
				bits,
			}),
		);
	}
	return ok(value);
}

/** Rejects non-positive amounts with INVALID_AMOUNT. */
export function requirePositive(value: bigint, label: string): Result<bigint, ParameterError> {
	if (value <= 0n) {
		return err(
			new ParameterError(`${label} must be positive`, ErrorCode.InvalidAmount, {
				label,
				value: value.toString(),
			}),
		);
	}
	return ok(value);
}
