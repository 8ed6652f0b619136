/**
 * Engine and ledger configuration.
 *
 * Defaults match the deployed constants: 5 bps trigger tolerance, 80% margin
 * loss at the liquidation price, leverage up to 100x, 45 minute funding
 * intervals. Every override is validated before use.
 */

import { validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import { type Result, err, ok } from "./result.js";

export interface EngineConfig {
	/** Relative band (basis points) within which an observed price matches a trigger */
	readonly toleranceBps: number;
	/** Fraction of margin (basis points) lost when price reaches the liquidation level */
	readonly liquidationLossBps: number;
	/** Highest accepted leverage; the lowest is always 1 */
	readonly maxLeverage: number;
	/** Oldest acceptable price proof, in seconds */
	readonly maxProofAgeSec: number;
	/** How far a proof timestamp may run ahead of the local clock, in seconds */
	readonly maxFutureSkewSec: number;
	/** Funding accrual interval in seconds; 0 disables funding */
	readonly fundingIntervalSec: number;
	/** Clamp realized PnL to ±marginReserved before settlement */
	readonly capPnlToMargin: boolean;
	/** Maximum trade ids accepted by one batch call */
	readonly maxBatchSize: number;
}

export interface LedgerConfig {
	/** Share of each trader loss (basis points) diverted to owner fees instead of the pool */
	readonly protocolFeeBps: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	toleranceBps: 5,
	liquidationLossBps: 8_000,
	maxLeverage: 100,
	maxProofAgeSec: 60,
	maxFutureSkewSec: 180,
	fundingIntervalSec: 2_700,
	capPnlToMargin: true,
	maxBatchSize: 200,
};

export const DEFAULT_LEDGER_CONFIG: LedgerConfig = {
	protocolFeeBps: 0,
};

const engineConfigSchema = z.object({
	toleranceBps: z.number().int().min(0).max(10_000),
	liquidationLossBps: z.number().int().min(1).max(10_000),
	maxLeverage: z.number().int().min(1).max(1_000),
	maxProofAgeSec: z.number().int().positive(),
	maxFutureSkewSec: z.number().int().min(0),
	fundingIntervalSec: z.number().int().min(0),
	capPnlToMargin: z.boolean(),
	maxBatchSize: z.number().int().positive(),
});

const ledgerConfigSchema = z.object({
	protocolFeeBps: z.number().int().min(0).max(10_000),
});

/**
 * Merges overrides onto the defaults and validates the result.
 * @returns Ok with the full config, or Err(ConfigError) listing the bad fields
 */
export function resolveEngineConfig(
	overrides: Partial<EngineConfig> = {},
): Result<EngineConfig, ConfigError> {
	const result = validate(engineConfigSchema, { ...DEFAULT_ENGINE_CONFIG, ...overrides });
	if (!result.ok) {
		return err(
			new ConfigError("Invalid engine config", {
				issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
			}),
		);
	}
	return ok(result.value);
}

export function resolveLedgerConfig(
	overrides: Partial<LedgerConfig> = {},
): Result<LedgerConfig, ConfigError> {
	const result = validate(ledgerConfigSchema, { ...DEFAULT_LEDGER_CONFIG, ...overrides });
	if (!result.ok) {
		return err(
			new ConfigError("Invalid ledger config", {
				issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
			}),
		);
	}
	return ok(result.value);
}

// ── Environment ─────────────────────────────────────────────────────

/** Mutable builder shape for constructing Partial<EngineConfig> without TS4111 index issues. */
interface MutableConfig {
	toleranceBps?: number;
	liquidationLossBps?: number;
	maxLeverage?: number;
	maxProofAgeSec?: number;
	maxFutureSkewSec?: number;
	fundingIntervalSec?: number;
	capPnlToMargin?: boolean;
	maxBatchSize?: number;
	protocolFeeBps?: number;
}

type NumericKey = {
	[K in keyof MutableConfig]-?: MutableConfig[K] extends number | undefined ? K : never;
}[keyof MutableConfig];

/**
 * Reads config overrides from environment variables.
 * Supported: LEDGER_TOLERANCE_BPS, LEDGER_LIQUIDATION_LOSS_BPS, LEDGER_MAX_LEVERAGE,
 * LEDGER_MAX_PROOF_AGE_SEC, LEDGER_MAX_FUTURE_SKEW_SEC, LEDGER_FUNDING_INTERVAL_SEC,
 * LEDGER_CAP_PNL, LEDGER_MAX_BATCH_SIZE, LEDGER_PROTOCOL_FEE_BPS.
 * @throws ConfigError if a numeric env var contains an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): {
	engine: Partial<EngineConfig>;
	ledger: Partial<LedgerConfig>;
} {
	const result: MutableConfig = {};

	parseIntEnv(env, "LEDGER_TOLERANCE_BPS", "toleranceBps", result, 0);
	parseIntEnv(env, "LEDGER_LIQUIDATION_LOSS_BPS", "liquidationLossBps", result, 1);
	parseIntEnv(env, "LEDGER_MAX_LEVERAGE", "maxLeverage", result, 1);
	parseIntEnv(env, "LEDGER_MAX_PROOF_AGE_SEC", "maxProofAgeSec", result, 1);
	parseIntEnv(env, "LEDGER_MAX_FUTURE_SKEW_SEC", "maxFutureSkewSec", result, 0);
	parseIntEnv(env, "LEDGER_FUNDING_INTERVAL_SEC", "fundingIntervalSec", result, 0);
	parseIntEnv(env, "LEDGER_MAX_BATCH_SIZE", "maxBatchSize", result, 1);
	parseIntEnv(env, "LEDGER_PROTOCOL_FEE_BPS", "protocolFeeBps", result, 0);

	const capPnl = env["LEDGER_CAP_PNL"];
	if (capPnl !== undefined) {
		if (capPnl !== "true" && capPnl !== "false") {
			throw new ConfigError(`Invalid LEDGER_CAP_PNL: "${capPnl}" must be true or false`);
		}
		result.capPnlToMargin = capPnl === "true";
	}

	const { protocolFeeBps, ...engine } = result;
	return {
		engine,
		ledger: protocolFeeBps === undefined ? {} : { protocolFeeBps },
	};
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parseIntEnv(
	env: NodeJS.ProcessEnv,
	envKey: string,
	configKey: NumericKey,
	result: MutableConfig,
	min: number,
): void {
	const raw = env[envKey];
	if (!raw) return;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed < min) {
		throw new ConfigError(`Invalid ${envKey}: "${raw}" must be an integer >= ${min}`);
	}
	result[configKey] = parsed;
}
