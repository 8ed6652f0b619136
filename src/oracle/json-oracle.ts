/**
 * JsonPriceOracle: decodes UTF-8 JSON proofs of the form
 * `{ "entries": [{ pair, price, decimals, timestamp, round }] }`.
 *
 * It performs no signature verification and is meant for tests, local
 * simulation and feeds that are already trusted upstream.
 */

import { bigintLike, validate, z } from "../lib/validation/index.js";
import { ErrorCode, type LedgerError, ParameterError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { PriceEntry, PriceOracle, PriceProof } from "./types.js";

const entrySchema = z.object({
	pair: z.string().min(1),
	price: bigintLike,
	decimals: z.number().int().min(0).max(36),
	timestamp: z.number().int().min(0),
	round: bigintLike.default(0n),
});

const proofSchema = z.object({
	entries: z.array(entrySchema),
});

/** Input shape for `encodeJsonProof`; bigints are written as strings. */
export interface JsonProofEntry {
	readonly pair: string;
	readonly price: bigint;
	readonly decimals: number;
	readonly timestamp: number;
	readonly round?: bigint;
}

const decoder = new TextDecoder();
const encoder = new TextEncoder();

export class JsonPriceOracle implements PriceOracle {
	decodeProof(proof: PriceProof): Result<readonly PriceEntry[], LedgerError> {
		let payload: unknown;
		try {
			payload = JSON.parse(decoder.decode(proof));
		} catch (e: unknown) {
			return err(
				new ParameterError("Proof is not valid JSON", ErrorCode.ProofMalformed, {
					cause: e instanceof Error ? e.message : String(e),
				}),
			);
		}

		const parsed = validate(proofSchema, payload);
		if (!parsed.ok) {
			return err(
				new ParameterError("Proof does not match the expected shape", ErrorCode.ProofMalformed, {
					issues: parsed.error.context["issues"],
				}),
			);
		}
		return ok(parsed.value.entries);
	}
}

/**
 * Encodes entries as a JSON proof.
 * @example encodeJsonProof([{ pair: "BTC-USD", price: 100_000000n, decimals: 6, timestamp: 1_700_000_000 }])
 */
export function encodeJsonProof(entries: readonly JsonProofEntry[]): PriceProof {
	return encoder.encode(
		JSON.stringify({
			entries: entries.map((e) => ({
				pair: e.pair,
				price: e.price.toString(),
				decimals: e.decimals,
				timestamp: e.timestamp,
				round: (e.round ?? 0n).toString(),
			})),
		}),
	);
}
