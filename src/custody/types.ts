/**
 * Custody domain types.
 */

import type { LedgerError } from "../shared/errors.js";
import type { AccountId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import type { Journaled } from "../shared/undo-log.js";

/** Funds held for one account; `locked` never exceeds `balance`. */
export interface LedgerAccount {
	readonly balance: bigint;
	readonly locked: bigint;
}

/**
 * The other side of every trade. Trader profits are paid out of it and
 * trader losses are absorbed into it.
 */
export interface CounterpartyPool extends Journaled {
	/** Funds available to pay trader profits. */
	liquidity(): bigint;
	canCover(amount: bigint): boolean;
	/** Pays `amount` to a winning trader; fails LIQUIDITY_LOW when it cannot cover it. */
	payOut(amount: bigint): Result<void, LedgerError>;
	/** Receives a losing trader's payment. */
	absorb(amount: bigint): Result<void, LedgerError>;
}

/** Outcome of one `settle` call. */
export interface Settlement {
	readonly account: AccountId;
	readonly pnl: bigint;
	/** Portion of a loss diverted to owner fees */
	readonly fee: bigint;
	/** Signed change in pool liquidity */
	readonly poolDelta: bigint;
}

// ── Events ───────────────────────────────────────────────────────────

export interface BalanceMoved {
	readonly account: AccountId;
	readonly amount: bigint;
	readonly balance: bigint;
	readonly locked: bigint;
}

export type LedgerEvents = {
	deposited: (e: BalanceMoved) => void;
	withdrawn: (e: BalanceMoved) => void;
	locked: (e: BalanceMoved) => void;
	unlocked: (e: BalanceMoved) => void;
	settled: (e: Settlement) => void;
	feesWithdrawn: (e: { readonly to: AccountId; readonly amount: bigint }) => void;
};
