import { describe, expect, it } from "vitest";
import { accountId, assetId, idToString, tradeId } from "./identifiers.js";

describe("branded identifiers", () => {
	it("trims string ids", () => {
		expect(idToString(assetId("  BTC-USD "))).toBe("BTC-USD");
		expect(idToString(accountId(" alice "))).toBe("alice");
	});

	it("lowercases hex account addresses", () => {
		expect(idToString(accountId("0xAbCDef0000000000000000000000000000000001"))).toBe(
			"0xabcdef0000000000000000000000000000000001",
		);
	});

	it("keeps the case of named accounts", () => {
		expect(idToString(accountId("Treasury"))).toBe("Treasury");
	});

	it.each(["", "   "])("rejects empty string %j", (raw) => {
		expect(() => assetId(raw)).toThrow("AssetId cannot be empty");
		expect(() => accountId(raw)).toThrow("AccountId cannot be empty");
	});

	it("accepts positive safe integer trade ids", () => {
		expect(tradeId(1)).toBe(1);
		expect(tradeId(Number.MAX_SAFE_INTEGER)).toBe(Number.MAX_SAFE_INTEGER);
	});

	it.each([0, -1, 1.5, Number.NaN, Number.MAX_SAFE_INTEGER + 1])("rejects trade id %s", (raw) => {
		expect(() => tradeId(raw)).toThrow("TradeId must be a positive integer");
	});
});
