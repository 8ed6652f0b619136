import { describe, expect, it } from "vitest";
import { err, flatMap, isErr, isOk, map, ok, unwrap, unwrapOr } from "./result.js";

describe("Result", () => {
	describe("ok / err factories", () => {
		it("ok wraps a value", () => {
			const r = ok(42);
			expect(r.ok).toBe(true);
			if (r.ok) expect(r.value).toBe(42);
		});

		it("err wraps an error", () => {
			const r = err("something failed");
			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error).toBe("something failed");
		});
	});

	describe("isOk / isErr type guards", () => {
		it("narrows an ok result", () => {
			expect(isOk(ok(10))).toBe(true);
			expect(isErr(ok(10))).toBe(false);
		});

		it("narrows an err result", () => {
			expect(isOk(err("fail"))).toBe(false);
			expect(isErr(err("fail"))).toBe(true);
		});
	});

	describe("map / flatMap", () => {
		it("map transforms the ok value", () => {
			expect(map(ok(5), (x) => x * 2)).toEqual(ok(10));
		});

		it("map passes an error through", () => {
			expect(map(err("bad"), (x: number) => x * 2)).toEqual(err("bad"));
		});

		it("flatMap chains and short-circuits", () => {
			const half = (x: number) => (x % 2 === 0 ? ok(x / 2) : err("odd"));
			expect(flatMap(ok(8), half)).toEqual(ok(4));
			expect(flatMap(ok(7), half)).toEqual(err("odd"));
			expect(flatMap(err("earlier"), half)).toEqual(err("earlier"));
		});
	});

	describe("unwrap / unwrapOr", () => {
		it("unwrap returns the value or throws", () => {
			expect(unwrap(ok("v"))).toBe("v");
			expect(() => unwrap(err(new Error("boom")))).toThrow("boom");
			expect(() => unwrap(err("plain"))).toThrow("plain");
		});

		it("unwrapOr falls back on error", () => {
			expect(unwrapOr(ok(1), 0)).toBe(1);
			expect(unwrapOr(err("x"), 0)).toBe(0);
		});
	});
});
