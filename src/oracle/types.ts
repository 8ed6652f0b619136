/**
 * Price oracle types.
 *
 * Verifying an attestation and parsing it into entries is the oracle's job;
 * the ledger only consumes the decoded entries.
 */

import type { LedgerError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";

/** Opaque attestation blob as submitted by a caller. */
export type PriceProof = Uint8Array;

/** One decoded price observation, still in the source's native decimals. */
export interface PriceEntry {
	readonly pair: string;
	readonly price: bigint;
	readonly decimals: number;
	/** Seconds or milliseconds since the epoch, depending on the source */
	readonly timestamp: number;
	readonly round: bigint;
}

/** External oracle: verifies and decodes a proof. Fails PROOF_MALFORMED when it cannot. */
export interface PriceOracle {
	decodeProof(proof: PriceProof): Result<readonly PriceEntry[], LedgerError>;
}

/** A validated price at the canonical ×1e6 scale. */
export interface PricePoint {
	readonly pair: string;
	readonly price: bigint;
	/** Seconds since the epoch */
	readonly timestamp: number;
	readonly round: bigint;
}

/** Freshness window applied when reading a price out of decoded entries. */
export interface FreshnessPolicy {
	readonly nowSec: number;
	readonly maxAgeSec: number;
	readonly maxFutureSkewSec: number;
}
