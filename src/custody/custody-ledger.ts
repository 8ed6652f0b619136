/**
 * CustodyLedger: per-account collateral with lock/unlock/settle bookkeeping.
 *
 * Traders deposit and withdraw freely up to their available balance. Locking,
 * unlocking and settlement are reserved for the ledger controller (the
 * position engine). Settlement moves PnL between the account and the
 * counterparty pool, skimming the protocol fee off trader losses.
 *
 * Every write is journaled when an UndoLog is attached, so a caller running
 * several ledger operations in one transaction can undo all of them. Events
 * are deferred to the journal's commit.
 */

import { type AccessControl, Role } from "../access/access-control.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { type LedgerConfig, resolveLedgerConfig } from "../shared/config.js";
import { ErrorCode, FundsError, type LedgerError } from "../shared/errors.js";
import { AMOUNT_BITS, bpsOf, checkedWidth, requirePositive } from "../shared/fixed-point.js";
import type { AccountId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type ActiveLog, type UndoLog, runAtomic } from "../shared/undo-log.js";
import type { BalanceMoved, CounterpartyPool, LedgerAccount, LedgerEvents, Settlement } from "./types.js";

const EMPTY: LedgerAccount = Object.freeze({ balance: 0n, locked: 0n });

export interface CustodyLedgerOptions {
	readonly access: AccessControl;
	readonly pool: CounterpartyPool;
	readonly config?: Partial<LedgerConfig>;
	readonly logger?: Logger;
}

export class CustodyLedger {
	readonly events = new TypedEmitter<LedgerEvents>();

	private readonly accounts = new Map<AccountId, LedgerAccount>();
	private fees = 0n;
	private journal: UndoLog | null = null;
	private readonly standalone: ActiveLog = { current: null };

	private constructor(
		private readonly access: AccessControl,
		private readonly pool: CounterpartyPool,
		private readonly config: LedgerConfig,
		private readonly logger: Logger,
	) {}

	/**
	 * @throws ConfigError if `config` overrides are invalid
	 */
	static create(options: CustodyLedgerOptions): CustodyLedger {
		const config = resolveLedgerConfig(options.config);
		if (!config.ok) throw config.error;
		const logger = (options.logger ?? silentLogger()).child({ component: "custody-ledger" });
		return new CustodyLedger(options.access, options.pool, config.value, logger);
	}

	/** Joins (or leaves) an outer transaction; the pool journals into the same log. */
	attachJournal(log: UndoLog | null): void {
		this.journal = log;
		this.pool.attachJournal(log);
	}

	// ── Queries ────────────────────────────────────────────────────

	account(id: AccountId): LedgerAccount {
		return this.accounts.get(id) ?? EMPTY;
	}

	balanceOf(id: AccountId): bigint {
		return this.account(id).balance;
	}

	lockedOf(id: AccountId): bigint {
		return this.account(id).locked;
	}

	available(id: AccountId): bigint {
		const { balance, locked } = this.account(id);
		return balance - locked;
	}

	ownerFees(): bigint {
		return this.fees;
	}

	poolLiquidity(): bigint {
		return this.pool.liquidity();
	}

	/** Every non-empty account, for inspection and invariant checks. */
	snapshot(): ReadonlyMap<AccountId, LedgerAccount> {
		return new Map(this.accounts);
	}

	// ── Trader operations ──────────────────────────────────────────

	deposit(account: AccountId, amount: bigint): Result<LedgerAccount, LedgerError> {
		return this.atomic(() => {
			const valid = requirePositive(amount, "amount");
			if (!valid.ok) return valid;
			const current = this.account(account);
			const balance = checkedWidth(current.balance + amount, AMOUNT_BITS, "balance");
			if (!balance.ok) return balance;

			const next = this.write(account, { balance: balance.value, locked: current.locked });
			this.publish("deposited", { account, amount, ...next });
			this.logger.info({ account, amount, balance: next.balance }, "Deposited");
			return ok(next);
		});
	}

	withdraw(account: AccountId, amount: bigint): Result<LedgerAccount, LedgerError> {
		return this.atomic(() => {
			const valid = requirePositive(amount, "amount");
			if (!valid.ok) return valid;
			const short = this.requireAvailable(account, amount);
			if (!short.ok) return short;

			const current = this.account(account);
			const next = this.write(account, {
				balance: current.balance - amount,
				locked: current.locked,
			});
			this.publish("withdrawn", { account, amount, ...next });
			this.logger.info({ account, amount, balance: next.balance }, "Withdrawn");
			return ok(next);
		});
	}

	// ── Controller operations ──────────────────────────────────────

	/** Reserves `amount` of the account's available balance. */
	lock(caller: AccountId, account: AccountId, amount: bigint): Result<LedgerAccount, LedgerError> {
		return this.atomic(() => {
			const auth = this.access.require(Role.LedgerController, caller);
			if (!auth.ok) return auth;
			const valid = requirePositive(amount, "amount");
			if (!valid.ok) return valid;
			const short = this.requireAvailable(account, amount);
			if (!short.ok) return short;

			const current = this.account(account);
			const next = this.write(account, {
				balance: current.balance,
				locked: current.locked + amount,
			});
			this.publish("locked", { account, amount, ...next });
			this.logger.debug({ account, amount, locked: next.locked }, "Locked");
			return ok(next);
		});
	}

	unlock(caller: AccountId, account: AccountId, amount: bigint): Result<LedgerAccount, LedgerError> {
		return this.atomic(() => {
			const auth = this.access.require(Role.LedgerController, caller);
			if (!auth.ok) return auth;
			const valid = requirePositive(amount, "amount");
			if (!valid.ok) return valid;

			const current = this.account(account);
			if (amount > current.locked) {
				return err(
					new FundsError("Unlock exceeds locked balance", ErrorCode.OverUnlock, {
						account,
						amount: amount.toString(),
						locked: current.locked.toString(),
					}),
				);
			}

			const next = this.write(account, {
				balance: current.balance,
				locked: current.locked - amount,
			});
			this.publish("unlocked", { account, amount, ...next });
			this.logger.debug({ account, amount, locked: next.locked }, "Unlocked");
			return ok(next);
		});
	}

	/**
	 * Realizes `pnl` for `account` against the counterparty pool.
	 *
	 * A profit is paid out of the pool. A loss is taken from the account's
	 * unreserved balance; `protocolFeeBps` of it accrues to the owner and the
	 * rest goes to the pool. Zero is a no-op.
	 */
	settle(caller: AccountId, account: AccountId, pnl: bigint): Result<Settlement, LedgerError> {
		return this.atomic(() => {
			const auth = this.access.require(Role.LedgerController, caller);
			if (!auth.ok) return auth;
			if (pnl === 0n) {
				return ok({ account, pnl, fee: 0n, poolDelta: 0n });
			}

			const current = this.account(account);
			let settlement: Settlement;

			if (pnl > 0n) {
				const paid = this.pool.payOut(pnl);
				if (!paid.ok) return paid;
				const balance = checkedWidth(current.balance + pnl, AMOUNT_BITS, "balance");
				if (!balance.ok) return balance;
				this.write(account, { balance: balance.value, locked: current.locked });
				settlement = { account, pnl, fee: 0n, poolDelta: -pnl };
			} else {
				const loss = -pnl;
				// Margin of other open trades stays reserved.
				if (loss > current.balance - current.locked) {
					return err(
						new FundsError("Balance cannot cover loss", ErrorCode.FundsLow, {
							account,
							loss: loss.toString(),
							balance: current.balance.toString(),
							locked: current.locked.toString(),
						}),
					);
				}
				const fee = bpsOf(loss, this.config.protocolFeeBps);
				const absorbed = this.pool.absorb(loss - fee);
				if (!absorbed.ok) return absorbed;
				this.write(account, { balance: current.balance - loss, locked: current.locked });
				this.writeFees(this.fees + fee);
				settlement = { account, pnl, fee, poolDelta: loss - fee };
			}

			this.publish("settled", settlement);
			this.logger.info(
				{ account, pnl, fee: settlement.fee, poolDelta: settlement.poolDelta },
				"Settled",
			);
			return ok(settlement);
		});
	}

	// ── Owner operations ───────────────────────────────────────────

	/** Pays accrued protocol fees out to the calling owner. */
	withdrawFees(caller: AccountId, amount: bigint): Result<bigint, LedgerError> {
		return this.atomic(() => {
			const auth = this.access.require(Role.Owner, caller);
			if (!auth.ok) return auth;
			const valid = requirePositive(amount, "amount");
			if (!valid.ok) return valid;
			if (amount > this.fees) {
				return err(
					new FundsError("Fee withdrawal exceeds accrued fees", ErrorCode.InsufficientAvailable, {
						amount: amount.toString(),
						fees: this.fees.toString(),
					}),
				);
			}
			this.writeFees(this.fees - amount);
			this.publish("feesWithdrawn", { to: caller, amount });
			this.logger.info({ to: caller, amount }, "Fees withdrawn");
			return ok(this.fees);
		});
	}

	// ── Internal ───────────────────────────────────────────────────

	/** Runs `fn` in the attached transaction, or in a private one when none is attached. */
	private atomic<T>(fn: () => Result<T, LedgerError>): Result<T, LedgerError> {
		if (this.journal) return fn();
		return runAtomic([this], this.standalone, () => fn());
	}

	private requireAvailable(account: AccountId, amount: bigint): Result<void, LedgerError> {
		const available = this.available(account);
		if (amount > available) {
			return err(
				new FundsError("Amount exceeds available balance", ErrorCode.InsufficientAvailable, {
					account,
					amount: amount.toString(),
					available: available.toString(),
				}),
			);
		}
		return ok(undefined);
	}

	private write(id: AccountId, next: LedgerAccount): LedgerAccount {
		const prev = this.accounts.get(id);
		this.journal?.record(() => {
			if (prev === undefined) this.accounts.delete(id);
			else this.accounts.set(id, prev);
		});
		const frozen = Object.freeze({ balance: next.balance, locked: next.locked });
		this.accounts.set(id, frozen);
		return frozen;
	}

	private writeFees(next: bigint): void {
		const prev = this.fees;
		this.journal?.record(() => {
			this.fees = prev;
		});
		this.fees = next;
	}

	private publish<K extends keyof LedgerEvents>(event: K, payload: Parameters<LedgerEvents[K]>[0]): void {
		if (this.journal) {
			this.journal.defer(() => {
				this.events.emit(event, payload);
			});
		} else {
			this.events.emit(event, payload);
		}
	}
}
