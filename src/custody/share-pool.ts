/**
 * SharePool: liquidity providers own the counterparty side pro rata.
 *
 * price = NAV / totalShares (1.0 while no shares exist). Minting and
 * redeeming round down in the pool's favour, so neither moves the price
 * down; only settlement of trader PnL changes NAV. NAV that accrues while
 * no shares exist is set aside as residual before the next mint, so the
 * first provider buys in at 1.0.
 */

import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { ErrorCode, FundsError, type LedgerError } from "../shared/errors.js";
import {
	AMOUNT_BITS,
	SCALE,
	checkedWidth,
	mulDiv,
	requirePositive,
} from "../shared/fixed-point.js";
import type { AccountId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { UndoLog } from "../shared/undo-log.js";
import type { CounterpartyPool } from "./types.js";

/** Result of a mint or redeem. */
export interface ShareMovement {
	readonly provider: AccountId;
	readonly shares: bigint;
	readonly amount: bigint;
	/** ×1e6 share price after the movement */
	readonly price: bigint;
}

export class SharePool implements CounterpartyPool {
	private nav = 0n;
	private supply = 0n;
	private residual = 0n;
	private readonly holdings = new Map<AccountId, bigint>();
	private journal: UndoLog | null = null;
	private readonly logger: Logger;

	constructor(logger?: Logger) {
		this.logger = (logger ?? silentLogger()).child({ component: "share-pool" });
	}

	attachJournal(log: UndoLog | null): void {
		this.journal = log;
	}

	// ── Queries ────────────────────────────────────────────────────

	netAssetValue(): bigint {
		return this.nav;
	}

	totalShares(): bigint {
		return this.supply;
	}

	sharesOf(provider: AccountId): bigint {
		return this.holdings.get(provider) ?? 0n;
	}

	/** ×1e6 price of one share; 1.000000 while the pool has no shares. */
	sharePrice(): bigint {
		if (this.supply === 0n) return SCALE;
		return mulDiv(this.nav, SCALE, this.supply);
	}

	/** Value swept out of NAV because it accrued while no shares existed. */
	residualValue(): bigint {
		return this.residual;
	}

	liquidity(): bigint {
		return this.nav;
	}

	canCover(amount: bigint): boolean {
		return amount <= this.nav;
	}

	// ── Providers ──────────────────────────────────────────────────

	/**
	 * Adds `amount` to NAV and mints shares at the current price.
	 * @example pool.deposit(lp, 1_000_000000n) // 1000 shares into an empty pool
	 */
	deposit(provider: AccountId, amount: bigint): Result<ShareMovement, LedgerError> {
		const valid = requirePositive(amount, "amount");
		if (!valid.ok) return valid;

		let minted: bigint;
		if (this.supply === 0n) {
			minted = amount;
		} else {
			if (this.nav === 0n) {
				return err(
					new FundsError("Pool has shares but no assets", ErrorCode.PoolInsolvent, {
						totalShares: this.supply.toString(),
					}),
				);
			}
			minted = mulDiv(amount, this.supply, this.nav);
		}
		if (minted === 0n) {
			return err(
				new FundsError("Deposit too small to mint a share unit", ErrorCode.InsufficientFunds, {
					amount: amount.toString(),
				}),
			);
		}

		const unowned = this.supply === 0n ? this.nav : 0n;
		const nav = checkedWidth(this.nav - unowned + amount, AMOUNT_BITS, "pool NAV");
		if (!nav.ok) return nav;

		if (unowned > 0n) this.sweepResidual();
		this.write(nav.value, this.supply + minted, provider, this.sharesOf(provider) + minted);
		this.logger.info({ provider, amount, minted }, "Liquidity deposited");
		return ok({ provider, shares: minted, amount, price: this.sharePrice() });
	}

	/** Burns `shares` and pays out their pro-rata share of NAV. */
	redeem(provider: AccountId, shares: bigint): Result<ShareMovement, LedgerError> {
		const valid = requirePositive(shares, "shares");
		if (!valid.ok) return valid;
		const held = this.sharesOf(provider);
		if (shares > held) {
			return err(
				new FundsError("Redeeming more shares than held", ErrorCode.InsufficientAvailable, {
					provider,
					shares: shares.toString(),
					held: held.toString(),
				}),
			);
		}

		const amount = mulDiv(shares, this.nav, this.supply);
		this.write(this.nav - amount, this.supply - shares, provider, held - shares);
		this.logger.info({ provider, shares, amount }, "Liquidity redeemed");
		return ok({ provider, shares, amount, price: this.sharePrice() });
	}

	// ── Settlement hook ────────────────────────────────────────────

	payOut(amount: bigint): Result<void, LedgerError> {
		if (!this.canCover(amount)) {
			return err(
				new FundsError("Pool cannot cover payout", ErrorCode.LiquidityLow, {
					amount: amount.toString(),
					nav: this.nav.toString(),
				}),
			);
		}
		this.write(this.nav - amount, this.supply);
		return ok(undefined);
	}

	absorb(amount: bigint): Result<void, LedgerError> {
		const nav = checkedWidth(this.nav + amount, AMOUNT_BITS, "pool NAV");
		if (!nav.ok) return nav;
		this.write(nav.value, this.supply);
		return ok(undefined);
	}

	// ── Internal ───────────────────────────────────────────────────

	private sweepResidual(): void {
		const swept = this.nav;
		const prevResidual = this.residual;
		this.journal?.record(() => {
			this.residual = prevResidual;
		});
		this.residual = prevResidual + swept;
		this.write(0n, this.supply);
		this.logger.warn({ swept }, "Unowned pool value set aside before first mint");
	}

	private write(nav: bigint, supply: bigint, provider?: AccountId, held?: bigint): void {
		const prevNav = this.nav;
		const prevSupply = this.supply;
		const prevHeld = provider === undefined ? undefined : this.holdings.get(provider);
		this.journal?.record(() => {
			this.nav = prevNav;
			this.supply = prevSupply;
			if (provider === undefined) return;
			if (prevHeld === undefined) this.holdings.delete(provider);
			else this.holdings.set(provider, prevHeld);
		});

		this.nav = nav;
		this.supply = supply;
		if (provider !== undefined && held !== undefined) {
			if (held === 0n) this.holdings.delete(provider);
			else this.holdings.set(provider, held);
		}
	}
}
