import { describe, expect, it } from "vitest";
import {
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	resolveEngineConfig,
	resolveLedgerConfig,
} from "./config.js";
import { ConfigError } from "./errors.js";

describe("EngineConfig", () => {
	it("has the deployed defaults", () => {
		expect(DEFAULT_ENGINE_CONFIG).toEqual({
			toleranceBps: 5,
			liquidationLossBps: 8_000,
			maxLeverage: 100,
			maxProofAgeSec: 60,
			maxFutureSkewSec: 180,
			fundingIntervalSec: 2_700,
			capPnlToMargin: true,
			maxBatchSize: 200,
		});
	});

	it("merges overrides onto the defaults", () => {
		const result = resolveEngineConfig({ maxLeverage: 50, capPnlToMargin: false });
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.maxLeverage).toBe(50);
			expect(result.value.capPnlToMargin).toBe(false);
			expect(result.value.toleranceBps).toBe(5);
		}
	});

	it("lists every invalid field", () => {
		const result = resolveEngineConfig({ liquidationLossBps: 0, maxBatchSize: 0 });
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(ConfigError);
			expect(result.error.message).toBe("Invalid engine config");
			expect(result.error.context["issues"]).toHaveLength(2);
		}
	});

	it("validates the ledger fee", () => {
		expect(resolveLedgerConfig({ protocolFeeBps: 250 }).ok).toBe(true);
		expect(resolveLedgerConfig({ protocolFeeBps: 10_001 }).ok).toBe(false);
	});
});

describe("configFromEnv", () => {
	it("returns empty overrides for an empty environment", () => {
		expect(configFromEnv({})).toEqual({ engine: {}, ledger: {} });
	});

	it("splits engine and ledger settings", () => {
		const result = configFromEnv({
			LEDGER_TOLERANCE_BPS: "10",
			LEDGER_FUNDING_INTERVAL_SEC: "0",
			LEDGER_CAP_PNL: "false",
			LEDGER_PROTOCOL_FEE_BPS: "100",
		});
		expect(result).toEqual({
			engine: { toleranceBps: 10, fundingIntervalSec: 0, capPnlToMargin: false },
			ledger: { protocolFeeBps: 100 },
		});
	});

	it.each([
		["LEDGER_MAX_LEVERAGE", "abc"],
		["LEDGER_MAX_LEVERAGE", "0"],
		["LEDGER_MAX_BATCH_SIZE", "12.5"],
		["LEDGER_CAP_PNL", "yes"],
	])("throws ConfigError for %s=%s", (key, value) => {
		expect(() => configFromEnv({ [key]: value })).toThrow(ConfigError);
	});
});
