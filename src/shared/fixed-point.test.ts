import { describe, expect, it } from "vitest";
import { ErrorCode } from "./errors.js";
import {
	AMOUNT_BITS,
	PRICE_BITS,
	absBig,
	bpsOf,
	ceilDiv,
	checkedWidth,
	clampAbs,
	formatFixed6,
	maxUint,
	mulDiv,
	parseFixed6,
	requirePositive,
} from "./fixed-point.js";

describe("fixed point", () => {
	describe("parseFixed6", () => {
		it.each([
			["100", 100_000000n],
			["100.05", 100_050000n],
			["0.000001", 1n],
			["-2.5", -2_500000n],
			["1.1234569", 1_123456n],
		])("parses %s", (raw, expected) => {
			expect(parseFixed6(raw)).toBe(expected);
		});

		it.each(["", "abc", "1.2.3", "1e6"])("rejects %j", (raw) => {
			expect(() => parseFixed6(raw)).toThrow("parseFixed6: invalid decimal");
		});
	});

	describe("formatFixed6", () => {
		it("prints six decimals", () => {
			expect(formatFixed6(100_050000n)).toBe("100.050000");
			expect(formatFixed6(1n)).toBe("0.000001");
			expect(formatFixed6(-9_955000n)).toBe("-9.955000");
		});
	});

	describe("arithmetic", () => {
		it("ceilDiv rounds up only on a remainder", () => {
			expect(ceilDiv(10n, 5n)).toBe(2n);
			expect(ceilDiv(11n, 5n)).toBe(3n);
			expect(ceilDiv(0n, 5n)).toBe(0n);
			expect(() => ceilDiv(1n, 0n)).toThrow("denominator must be positive");
		});

		it("mulDiv truncates", () => {
			expect(mulDiv(7n, 3n, 2n)).toBe(10n);
			expect(() => mulDiv(1n, 1n, 0n)).toThrow("division by zero");
		});

		it("bpsOf takes basis points", () => {
			expect(bpsOf(30_000000n, 1_000)).toBe(3_000000n);
			expect(bpsOf(99n, 5n)).toBe(0n);
		});

		it("absBig and clampAbs", () => {
			expect(absBig(-4n)).toBe(4n);
			expect(clampAbs(15n, 10n)).toBe(10n);
			expect(clampAbs(-15n, 10n)).toBe(-10n);
			expect(clampAbs(3n, 10n)).toBe(3n);
		});
	});

	describe("range checks", () => {
		it("accepts the widest value of a container", () => {
			expect(checkedWidth(maxUint(PRICE_BITS), PRICE_BITS, "price")).toEqual({
				ok: true,
				value: 18_446_744_073_709_551_615n,
			});
		});

		it("rejects one past it, and negatives", () => {
			for (const value of [1n << BigInt(AMOUNT_BITS), -1n]) {
				const result = checkedWidth(value, AMOUNT_BITS, "amount");
				expect(result.ok).toBe(false);
				if (!result.ok) {
					expect(result.error.code).toBe(ErrorCode.ValueRange);
					expect(result.error.message).toBe("amount does not fit 128 bits");
				}
			}
		});

		it("requirePositive fails INVALID_AMOUNT for zero", () => {
			const result = requirePositive(0n, "deposit");
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe(ErrorCode.InvalidAmount);
			expect(requirePositive(1n, "deposit").ok).toBe(true);
		});
	});
});
