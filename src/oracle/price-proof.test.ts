import { describe, expect, it } from "vitest";
import { ErrorCode } from "../shared/errors.js";
import { JsonPriceOracle, encodeJsonProof } from "./json-oracle.js";
import { normalizeTimestamp, readPrice, readPriceFromProof, rescalePrice } from "./price-proof.js";
import type { FreshnessPolicy, PriceEntry } from "./types.js";

const NOW_SEC = 1_700_000_000;
const policy: FreshnessPolicy = { nowSec: NOW_SEC, maxAgeSec: 60, maxFutureSkewSec: 180 };

function entry(overrides: Partial<PriceEntry> = {}): PriceEntry {
	return { pair: "BTC-USD", price: 100_000000n, decimals: 6, timestamp: NOW_SEC, round: 1n, ...overrides };
}

function codeOf(entries: readonly PriceEntry[], pair = "BTC-USD"): string | null {
	const result = readPrice(entries, pair, policy);
	return result.ok ? null : result.error.code;
}

describe("normalizeTimestamp", () => {
	it("converts milliseconds and keeps seconds", () => {
		expect(normalizeTimestamp(1_700_000_000_500)).toBe(1_700_000_000);
		expect(normalizeTimestamp(1_700_000_000)).toBe(1_700_000_000);
	});
});

describe("rescalePrice", () => {
	it("scales down, up, or not at all", () => {
		expect(rescalePrice(10_005_000_000n, 8)).toEqual({ ok: true, value: 100_050000n });
		expect(rescalePrice(10_005n, 2)).toEqual({ ok: true, value: 100_050000n });
		expect(rescalePrice(7n, 6)).toEqual({ ok: true, value: 7n });
	});

	it("fails PROOF_RANGE past 64 bits", () => {
		const result = rescalePrice(1n << 64n, 6);
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.code).toBe(ErrorCode.ProofRange);
	});
});

describe("readPrice", () => {
	it("returns the pair's price at 6 decimals", () => {
		const result = readPrice(
			[entry({ pair: "ETH-USD" }), entry({ price: 9_500_000_000n, decimals: 8, round: 4n })],
			"BTC-USD",
			policy,
		);
		expect(result).toEqual({
			ok: true,
			value: { pair: "BTC-USD", price: 95_000000n, timestamp: NOW_SEC, round: 4n },
		});
	});

	it("fails NOT_FOUND for a missing pair", () => {
		expect(codeOf([entry()], "SOL-USD")).toBe(ErrorCode.NotFound);
	});

	it("accepts a proof exactly at the age limit", () => {
		expect(codeOf([entry({ timestamp: NOW_SEC - 60 })])).toBeNull();
	});

	it("fails PROOF_TOO_OLD past the age limit", () => {
		expect(codeOf([entry({ timestamp: NOW_SEC - 61 })])).toBe(ErrorCode.ProofTooOld);
		expect(codeOf([entry({ timestamp: NOW_SEC - 120 })])).toBe(ErrorCode.ProofTooOld);
	});

	it("accepts the same 120 s old proof under a 180 s limit", () => {
		const result = readPrice([entry({ timestamp: NOW_SEC - 120 })], "BTC-USD", { ...policy, maxAgeSec: 180 });
		expect(result.ok).toBe(true);
	});

	it("fails PROOF_BAD_TIMESTAMP beyond the future skew", () => {
		expect(codeOf([entry({ timestamp: NOW_SEC + 180 })])).toBeNull();
		expect(codeOf([entry({ timestamp: NOW_SEC + 181 })])).toBe(ErrorCode.ProofBadTimestamp);
	});

	it("applies the window to millisecond timestamps", () => {
		expect(codeOf([entry({ timestamp: (NOW_SEC - 30) * 1_000 })])).toBeNull();
		expect(codeOf([entry({ timestamp: (NOW_SEC - 120) * 1_000 })])).toBe(ErrorCode.ProofTooOld);
	});

	it("fails PROOF_PRICE_ZERO for zero or sub-unit prices", () => {
		expect(codeOf([entry({ price: 0n })])).toBe(ErrorCode.ProofPriceZero);
		expect(codeOf([entry({ price: 99n, decimals: 8 })])).toBe(ErrorCode.ProofPriceZero);
	});
});

describe("readPriceFromProof", () => {
	it("decodes through the oracle", () => {
		const proof = encodeJsonProof([{ pair: "BTC-USD", price: 101_250000n, decimals: 6, timestamp: NOW_SEC }]);
		const result = readPriceFromProof(new JsonPriceOracle(), proof, "BTC-USD", policy);
		expect(result.ok && result.value.price).toBe(101_250000n);
	});

	it("passes decoding failures through", () => {
		const result = readPriceFromProof(new JsonPriceOracle(), new Uint8Array([1, 2, 3]), "BTC-USD", policy);
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.code).toBe(ErrorCode.ProofMalformed);
	});
});
