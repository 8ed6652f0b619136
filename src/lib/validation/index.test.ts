import { describe, expect, it } from "vitest";
import { ErrorCategory, ErrorCode, LedgerError } from "../../shared/errors.js";
import { ValidationError, bigintLike, validate, z } from "./index.js";

describe("validation wrapper", () => {
	describe("validate()", () => {
		it("returns ok(data) for valid input", () => {
			expect(validate(z.string(), "hello")).toEqual({ ok: true, value: "hello" });
		});

		it("returns a parameter-category ValidationError for invalid input", () => {
			const result = validate(z.number(), "not a number");
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(ValidationError);
				expect(result.error).toBeInstanceOf(LedgerError);
				expect(result.error.code).toBe(ErrorCode.ValidationFailed);
				expect(result.error.category).toBe(ErrorCategory.Parameter);
			}
		});

		it("reports every issue with its path", () => {
			const schema = z.object({ lot: z.object({ numerator: z.number(), denominator: z.number() }) });
			const result = validate(schema, { lot: { numerator: "1", denominator: null } });
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.issues.map((i) => i.path.join("."))).toEqual([
					"lot.numerator",
					"lot.denominator",
				]);
				expect(result.error.context["issues"]).toHaveLength(2);
			}
		});

		it("returns transformed output", () => {
			const result = validate(z.string().transform((s) => s.length), "four");
			expect(result).toEqual({ ok: true, value: 4 });
		});
	});

	describe("bigintLike", () => {
		it.each([
			[5n, 5n],
			[42, 42n],
			["-17", -17n],
			["340282366920938463463374607431768211455", (1n << 128n) - 1n],
		])("accepts %s", (input, expected) => {
			expect(validate(bigintLike, input)).toEqual({ ok: true, value: expected });
		});

		it.each([1.5, "1.5", "0x10", "", Number.MAX_SAFE_INTEGER + 2, null])("rejects %s", (input) => {
			expect(validate(bigintLike, input).ok).toBe(false);
		});
	});
});
