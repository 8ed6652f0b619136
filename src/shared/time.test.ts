import { describe, expect, it } from "vitest";
import { FakeClock, SystemClock, nowSeconds } from "./time.js";

describe("Clock", () => {
	it("SystemClock returns the current time", () => {
		const before = Date.now();
		const now = SystemClock.now();
		expect(now).toBeGreaterThanOrEqual(before);
		expect(now).toBeLessThanOrEqual(Date.now());
	});

	describe("FakeClock", () => {
		it("starts at the given time, or 0", () => {
			expect(new FakeClock(1000).now()).toBe(1000);
			expect(new FakeClock().now()).toBe(0);
		});

		it("advance and set move time", () => {
			const clock = new FakeClock(100);
			clock.advance(50);
			expect(clock.now()).toBe(150);
			clock.set(9999);
			expect(clock.now()).toBe(9999);
		});
	});

	describe("nowSeconds", () => {
		it("floors milliseconds to whole seconds", () => {
			expect(nowSeconds(new FakeClock(1_700_000_000_999))).toBe(1_700_000_000);
		});
	});
});
