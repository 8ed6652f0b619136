/**
 * Price-proof ingestion: pick the requested pair out of decoded oracle
 * entries, reject stale or skewed observations, rescale to ×1e6.
 */

import {
	ArithmeticRangeError,
	ErrorCode,
	type LedgerError,
	NotFoundError,
	PriceError,
} from "../shared/errors.js";
import { DECIMALS, PRICE_BITS, maxUint } from "../shared/fixed-point.js";
import { type Result, err, ok } from "../shared/result.js";
import type {
	FreshnessPolicy,
	PriceEntry,
	PriceOracle,
	PricePoint,
	PriceProof,
} from "./types.js";

/** Timestamps above this are taken to be milliseconds. */
const MILLISECOND_THRESHOLD = 1e12;

/** Converts a millisecond timestamp to seconds; second timestamps pass through. */
export function normalizeTimestamp(timestamp: number): number {
	return timestamp > MILLISECOND_THRESHOLD ? Math.floor(timestamp / 1_000) : timestamp;
}

/**
 * Rescales a raw price from `decimals` to 6 decimals.
 * @returns Err(PROOF_RANGE) if the result does not fit the 64-bit price container
 * @example rescalePrice(10_005_000_000n, 8) // ok(100_050_000n)
 */
export function rescalePrice(raw: bigint, decimals: number): Result<bigint, LedgerError> {
	let scaled: bigint;
	if (decimals > DECIMALS) {
		scaled = raw / 10n ** BigInt(decimals - DECIMALS);
	} else if (decimals < DECIMALS) {
		scaled = raw * 10n ** BigInt(DECIMALS - decimals);
	} else {
		scaled = raw;
	}

	if (scaled > maxUint(PRICE_BITS)) {
		return err(
			new ArithmeticRangeError("Rescaled price does not fit 64 bits", ErrorCode.ProofRange, {
				raw: raw.toString(),
				decimals,
			}),
		);
	}
	return ok(scaled);
}

/**
 * Reads the price for `pair` from already-decoded entries.
 * Batches decode a proof once and call this once per batch.
 */
export function readPrice(
	entries: readonly PriceEntry[],
	pair: string,
	policy: FreshnessPolicy,
): Result<PricePoint, LedgerError> {
	const entry = entries.find((e) => e.pair === pair);
	if (!entry) {
		return err(new NotFoundError(`No price for ${pair} in proof`, ErrorCode.NotFound, { pair }));
	}

	const timestamp = normalizeTimestamp(entry.timestamp);
	if (timestamp > policy.nowSec + policy.maxFutureSkewSec) {
		return err(
			new PriceError("Proof timestamp is ahead of the clock", ErrorCode.ProofBadTimestamp, {
				pair,
				timestamp,
				nowSec: policy.nowSec,
			}),
		);
	}
	if (timestamp < policy.nowSec - policy.maxAgeSec) {
		return err(
			new PriceError("Proof is too old", ErrorCode.ProofTooOld, {
				pair,
				ageSec: policy.nowSec - timestamp,
				maxAgeSec: policy.maxAgeSec,
			}),
		);
	}

	if (entry.price <= 0n) {
		return err(new PriceError("Proof price is not positive", ErrorCode.ProofPriceZero, { pair }));
	}

	const scaled = rescalePrice(entry.price, entry.decimals);
	if (!scaled.ok) return scaled;
	if (scaled.value === 0n) {
		return err(
			new PriceError("Proof price rounds to zero at 6 decimals", ErrorCode.ProofPriceZero, {
				pair,
				decimals: entry.decimals,
			}),
		);
	}

	return ok({ pair, price: scaled.value, timestamp, round: entry.round });
}

/** Decodes `proof` through the oracle and reads `pair` from it. */
export function readPriceFromProof(
	oracle: PriceOracle,
	proof: PriceProof,
	pair: string,
	policy: FreshnessPolicy,
): Result<PricePoint, LedgerError> {
	const entries = oracle.decodeProof(proof);
	if (!entries.ok) return entries;
	return readPrice(entries.value, pair, policy);
}
