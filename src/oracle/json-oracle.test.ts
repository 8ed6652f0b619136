import { describe, expect, it } from "vitest";
import { ErrorCode } from "../shared/errors.js";
import { JsonPriceOracle, encodeJsonProof } from "./json-oracle.js";

const oracle = new JsonPriceOracle();
const encode = (payload: unknown) => new TextEncoder().encode(JSON.stringify(payload));

describe("JsonPriceOracle", () => {
	it("decodes entries written by encodeJsonProof", () => {
		const proof = encodeJsonProof([
			{ pair: "BTC-USD", price: 10_000_000_000n, decimals: 8, timestamp: 1_700_000_000, round: 9n },
			{ pair: "ETH-USD", price: 2_000_000000n, decimals: 6, timestamp: 1_700_000_000_000 },
		]);
		expect(oracle.decodeProof(proof)).toEqual({
			ok: true,
			value: [
				{ pair: "BTC-USD", price: 10_000_000_000n, decimals: 8, timestamp: 1_700_000_000, round: 9n },
				{ pair: "ETH-USD", price: 2_000_000000n, decimals: 6, timestamp: 1_700_000_000_000, round: 0n },
			],
		});
	});

	it("accepts numeric prices and a missing round", () => {
		const result = oracle.decodeProof(
			encode({ entries: [{ pair: "BTC-USD", price: 100, decimals: 0, timestamp: 1 }] }),
		);
		expect(result.ok && result.value[0]?.round).toBe(0n);
	});

	it.each([
		["bytes that are not JSON", new Uint8Array([0x7b, 0x7b])],
		["a missing entries array", encode({ prices: [] })],
		["a fractional price", encode({ entries: [{ pair: "BTC-USD", price: "1.5", decimals: 6, timestamp: 1 }] })],
		["negative decimals", encode({ entries: [{ pair: "BTC-USD", price: "1", decimals: -1, timestamp: 1 }] })],
	])("fails PROOF_MALFORMED for %s", (_label, proof) => {
		const result = oracle.decodeProof(proof);
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.code).toBe(ErrorCode.ProofMalformed);
	});
});
