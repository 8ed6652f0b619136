// ── Shared Kernel ────────────────────────────────────────────────────
export * from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LoggerConfig, type LogLevel, createLogger, silentLogger } from "./lib/logger/index.js";
export { TypedEmitter, type EventMap } from "./lib/events/index.js";
export { ValidationError, type ValidationIssue, validate } from "./lib/validation/index.js";
export * from "./lib/ethereum/index.js";

// ── Access & Configuration ───────────────────────────────────────────
export * from "./access/index.js";
export * from "./registry/index.js";

// ── Prices ───────────────────────────────────────────────────────────
export * from "./oracle/index.js";

// ── Custody ──────────────────────────────────────────────────────────
export * from "./custody/index.js";

// ── Positions ────────────────────────────────────────────────────────
export * from "./engine/index.js";

// ── Delegated Calls ──────────────────────────────────────────────────
export * from "./relay/index.js";
