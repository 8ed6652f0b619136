/**
 * LedgerError hierarchy: structured error classification.
 *
 * Every error carries a category from the ledger taxonomy and a stable code.
 * The category decides batch behaviour: state, price and parameter failures
 * skip a single item, funds and range failures abort the whole batch.
 */

/** Error taxonomy shared by the ledger, the engine and the relayer. */
export const ErrorCategory = {
	Authorization: "authorization",
	State: "state",
	Funds: "funds",
	Parameter: "parameter",
	Price: "price",
	ArithmeticRange: "arithmetic_range",
	NotFound: "not_found",
	Config: "config",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Stable error codes surfaced to callers and events. */
export const ErrorCode = {
	Unauthorized: "UNAUTHORIZED",
	BadSignature: "BAD_SIGNATURE",
	BadNonce: "BAD_NONCE",
	CallExpired: "CALL_EXPIRED",
	InvalidState: "INVALID_STATE",
	InsufficientAvailable: "INSUFFICIENT_AVAILABLE",
	InsufficientFunds: "INSUFFICIENT_FUNDS",
	OverUnlock: "OVER_UNLOCK",
	LiquidityLow: "LIQUIDITY_LOW",
	FundsLow: "FUNDS_LOW",
	PoolInsolvent: "POOL_INSOLVENT",
	InvalidAmount: "INVALID_AMOUNT",
	InvalidPrice: "INVALID_PRICE",
	InvalidLeverage: "INVALID_LEVERAGE",
	QtyZero: "QTY_ZERO",
	InvalidStopRange: "INVALID_STOP_RANGE",
	NoTrigger: "NO_TRIGGER",
	WrongAsset: "WRONG_ASSET",
	MarketClosed: "MARKET_CLOSED",
	PriceNotNear: "PRICE_NOT_NEAR",
	TriggerNotHit: "TRIGGER_NOT_HIT",
	ProofBadTimestamp: "PROOF_BAD_TIMESTAMP",
	ProofTooOld: "PROOF_TOO_OLD",
	ProofPriceZero: "PROOF_PRICE_ZERO",
	ProofMalformed: "PROOF_MALFORMED",
	ProofRange: "PROOF_RANGE",
	ValueRange: "VALUE_RANGE",
	NotFound: "NOT_FOUND",
	UnknownAsset: "UNKNOWN_ASSET",
	UnknownTrade: "UNKNOWN_TRADE",
	ValidationFailed: "VALIDATION_FAILED",
	ConfigError: "CONFIG_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Base error class for every refused ledger or engine operation. */
export class LedgerError extends Error {
	readonly category: ErrorCategory;
	readonly code: ErrorCode;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: ErrorCode,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
	) {
		super(message);
		this.name = "LedgerError";
		this.category = category;
		this.code = code;
		this.context = context;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Wrong caller, wrong owner, bad delegated signature. */
export class AuthorizationError extends LedgerError {
	constructor(
		message: string,
		code: ErrorCode = ErrorCode.Unauthorized,
		context: Record<string, unknown> = {},
	) {
		super(message, code, ErrorCategory.Authorization, context);
		this.name = "AuthorizationError";
	}
}

/** Transition not allowed from the trade's current state. */
export class InvalidStateError extends LedgerError {
	constructor(message: string, context: Record<string, unknown> = {}) {
		super(message, ErrorCode.InvalidState, ErrorCategory.State, context);
		this.name = "InvalidStateError";
	}
}

/** Insufficient available or total balance, or insufficient pool liquidity. */
export class FundsError extends LedgerError {
	constructor(message: string, code: ErrorCode, context: Record<string, unknown> = {}) {
		super(message, code, ErrorCategory.Funds, context);
		this.name = "FundsError";
	}
}

/** Zero or invalid price, lot, amount or leverage; stop level out of range. */
export class ParameterError extends LedgerError {
	constructor(message: string, code: ErrorCode, context: Record<string, unknown> = {}) {
		super(message, code, ErrorCategory.Parameter, context);
		this.name = "ParameterError";
	}
}

/** Stale or skewed proof, unmatched trigger, out-of-tolerance price. */
export class PriceError extends LedgerError {
	constructor(message: string, code: ErrorCode, context: Record<string, unknown> = {}) {
		super(message, code, ErrorCategory.Price, context);
		this.name = "PriceError";
	}
}

/** A computed value does not fit the fixed-width container it is stored in. */
export class ArithmeticRangeError extends LedgerError {
	constructor(
		message: string,
		code: ErrorCode = ErrorCode.ValueRange,
		context: Record<string, unknown> = {},
	) {
		super(message, code, ErrorCategory.ArithmeticRange, context);
		this.name = "ArithmeticRangeError";
	}
}

/** Unknown asset, trade or price pair. */
export class NotFoundError extends LedgerError {
	constructor(
		message: string,
		code: ErrorCode = ErrorCode.NotFound,
		context: Record<string, unknown> = {},
	) {
		super(message, code, ErrorCategory.NotFound, context);
		this.name = "NotFoundError";
	}
}

/** Invalid or missing configuration. */
export class ConfigError extends LedgerError {
	constructor(message: string, context: Record<string, unknown> = {}) {
		super(message, ErrorCode.ConfigError, ErrorCategory.Config, context);
		this.name = "ConfigError";
	}
}

// ── Classification helpers ───────────────────────────────────────────

const BATCH_SKIPPABLE: ReadonlySet<ErrorCategory> = new Set([
	ErrorCategory.State,
	ErrorCategory.Price,
	ErrorCategory.Parameter,
	ErrorCategory.NotFound,
]);

/**
 * Whether a per-item failure inside a batch is skipped rather than aborting the batch.
 * A malformed proof is never skippable: it is shared by every item.
 */
export function isBatchSkippable(error: LedgerError): boolean {
	if (error.code === ErrorCode.ProofMalformed) return false;
	return BATCH_SKIPPABLE.has(error.category);
}
