/**
 * CashPool: a single owner-operated balance on the other side of every trade.
 */

import { type AccessControl, Role } from "../access/access-control.js";
import { ErrorCode, FundsError, type LedgerError } from "../shared/errors.js";
import { AMOUNT_BITS, checkedWidth, requirePositive } from "../shared/fixed-point.js";
import type { AccountId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { UndoLog } from "../shared/undo-log.js";
import type { CounterpartyPool } from "./types.js";

export class CashPool implements CounterpartyPool {
	private balance = 0n;
	private journal: UndoLog | null = null;

	constructor(private readonly access: AccessControl) {}

	attachJournal(log: UndoLog | null): void {
		this.journal = log;
	}

	liquidity(): bigint {
		return this.balance;
	}

	canCover(amount: bigint): boolean {
		return amount <= this.balance;
	}

	/** Owner adds operating capital. */
	fund(caller: AccountId, amount: bigint): Result<bigint, LedgerError> {
		const auth = this.access.require(Role.Owner, caller);
		if (!auth.ok) return auth;
		const valid = requirePositive(amount, "amount");
		if (!valid.ok) return valid;
		const next = checkedWidth(this.balance + amount, AMOUNT_BITS, "pool balance");
		if (!next.ok) return next;
		this.write(next.value);
		return ok(this.balance);
	}

	/** Owner takes operating capital back out. */
	defund(caller: AccountId, amount: bigint): Result<bigint, LedgerError> {
		const auth = this.access.require(Role.Owner, caller);
		if (!auth.ok) return auth;
		const valid = requirePositive(amount, "amount");
		if (!valid.ok) return valid;
		const paid = this.payOut(amount);
		if (!paid.ok) return paid;
		return ok(this.balance);
	}

	payOut(amount: bigint): Result<void, LedgerError> {
		if (!this.canCover(amount)) {
			return err(
				new FundsError("Pool cannot cover payout", ErrorCode.LiquidityLow, {
					amount: amount.toString(),
					liquidity: this.balance.toString(),
				}),
			);
		}
		this.write(this.balance - amount);
		return ok(undefined);
	}

	absorb(amount: bigint): Result<void, LedgerError> {
		const next = checkedWidth(this.balance + amount, AMOUNT_BITS, "pool balance");
		if (!next.ok) return next;
		this.write(next.value);
		return ok(undefined);
	}

	private write(next: bigint): void {
		const prev = this.balance;
		this.journal?.record(() => {
			this.balance = prev;
		});
		this.balance = next;
	}
}
