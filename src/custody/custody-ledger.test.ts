import { describe, expect, it } from "vitest";
import { AccessControl, Role } from "../access/access-control.js";
import { ErrorCode } from "../shared/errors.js";
import { accountId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { CashPool } from "./cash-pool.js";
import { CustodyLedger } from "./custody-ledger.js";
import type { BalanceMoved, Settlement } from "./types.js";

const owner = accountId("owner");
const engine = accountId("engine");
const alice = accountId("alice");

function setup(protocolFeeBps = 0) {
	const access = AccessControl.create(owner);
	unwrap(access.grant(owner, Role.LedgerController, engine));
	const pool = new CashPool(access);
	unwrap(pool.fund(owner, 1_000_000000n));
	const ledger = CustodyLedger.create({ access, pool, config: { protocolFeeBps } });
	return { access, pool, ledger };
}

describe("CustodyLedger", () => {
	describe("deposit / withdraw", () => {
		it("credits the balance and reports the new account", () => {
			const { ledger } = setup();
			const result = ledger.deposit(alice, 500_000000n);
			expect(result.ok).toBe(true);
			expect(ledger.account(alice)).toEqual({ balance: 500_000000n, locked: 0n });
			expect(ledger.available(alice)).toBe(500_000000n);
		});

		it("rejects a zero deposit with INVALID_AMOUNT", () => {
			const { ledger } = setup();
			const result = ledger.deposit(alice, 0n);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe(ErrorCode.InvalidAmount);
		});

		it("refuses to withdraw locked funds", () => {
			const { ledger } = setup();
			unwrap(ledger.deposit(alice, 100_000000n));
			unwrap(ledger.lock(engine, alice, 60_000000n));
			const result = ledger.withdraw(alice, 50_000000n);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe(ErrorCode.InsufficientAvailable);
			expect(ledger.balanceOf(alice)).toBe(100_000000n);
		});

		it("withdraws up to the available balance", () => {
			const { ledger } = setup();
			unwrap(ledger.deposit(alice, 100_000000n));
			unwrap(ledger.lock(engine, alice, 60_000000n));
			unwrap(ledger.withdraw(alice, 40_000000n));
			expect(ledger.account(alice)).toEqual({ balance: 60_000000n, locked: 60_000000n });
		});
	});

	describe("lock / unlock", () => {
		it("requires the ledger controller role", () => {
			const { ledger } = setup();
			unwrap(ledger.deposit(alice, 100_000000n));
			const result = ledger.lock(alice, alice, 10_000000n);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe(ErrorCode.Unauthorized);
		});

		it("fails OVER_UNLOCK when unlocking more than locked", () => {
			const { ledger } = setup();
			unwrap(ledger.deposit(alice, 100_000000n));
			unwrap(ledger.lock(engine, alice, 10_000000n));
			const result = ledger.unlock(engine, alice, 10_000001n);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe(ErrorCode.OverUnlock);
			expect(ledger.lockedOf(alice)).toBe(10_000000n);
		});
	});

	describe("settle", () => {
		it("pays a profit out of the pool", () => {
			const { ledger, pool } = setup();
			unwrap(ledger.deposit(alice, 100_000000n));
			const settlement = unwrap(ledger.settle(engine, alice, 25_000000n));
			expect(settlement).toEqual({ account: alice, pnl: 25_000000n, fee: 0n, poolDelta: -25_000000n });
			expect(ledger.balanceOf(alice)).toBe(125_000000n);
			expect(pool.liquidity()).toBe(975_000000n);
		});

		it("fails LIQUIDITY_LOW when the pool cannot cover a profit", () => {
			const { ledger, pool } = setup();
			unwrap(ledger.deposit(alice, 100_000000n));
			const result = ledger.settle(engine, alice, 1_000_000001n);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe(ErrorCode.LiquidityLow);
			expect(ledger.balanceOf(alice)).toBe(100_000000n);
			expect(pool.liquidity()).toBe(1_000_000000n);
		});

		it("moves a loss into the pool", () => {
			const { ledger, pool } = setup();
			unwrap(ledger.deposit(alice, 100_000000n));
			unwrap(ledger.settle(engine, alice, -30_000000n));
			expect(ledger.balanceOf(alice)).toBe(70_000000n);
			expect(pool.liquidity()).toBe(1_030_000000n);
		});

		it("skims the protocol fee off a loss", () => {
			const { ledger, pool } = setup(1_000);
			unwrap(ledger.deposit(alice, 100_000000n));
			const settlement = unwrap(ledger.settle(engine, alice, -30_000000n));
			expect(settlement.fee).toBe(3_000000n);
			expect(settlement.poolDelta).toBe(27_000000n);
			expect(ledger.ownerFees()).toBe(3_000000n);
			expect(pool.liquidity()).toBe(1_027_000000n);
		});

		it("fails FUNDS_LOW when the loss exceeds the unreserved balance", () => {
			const { ledger } = setup();
			unwrap(ledger.deposit(alice, 100_000000n));
			unwrap(ledger.lock(engine, alice, 80_000000n));
			const result = ledger.settle(engine, alice, -20_000001n);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe(ErrorCode.FundsLow);
		});

		it("treats zero pnl as a no-op", () => {
			const { ledger } = setup();
			const emitted: Settlement[] = [];
			ledger.events.on("settled", (e) => emitted.push(e));
			const settlement = unwrap(ledger.settle(engine, alice, 0n));
			expect(settlement.poolDelta).toBe(0n);
			expect(emitted).toHaveLength(0);
		});
	});

	describe("owner fees", () => {
		it("lets only the owner withdraw accrued fees", () => {
			const { ledger } = setup(1_000);
			unwrap(ledger.deposit(alice, 100_000000n));
			unwrap(ledger.settle(engine, alice, -10_000000n));

			const denied = ledger.withdrawFees(alice, 1_000000n);
			expect(denied.ok).toBe(false);
			if (!denied.ok) expect(denied.error.code).toBe(ErrorCode.Unauthorized);

			expect(unwrap(ledger.withdrawFees(owner, 1_000000n))).toBe(0n);
		});

		it("refuses to withdraw more than accrued", () => {
			const { ledger } = setup(1_000);
			const result = ledger.withdrawFees(owner, 1n);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe(ErrorCode.InsufficientAvailable);
		});
	});

	describe("events", () => {
		it("emits balance movements after they are applied", () => {
			const { ledger } = setup();
			const seen: BalanceMoved[] = [];
			ledger.events.on("deposited", (e) => seen.push(e));
			ledger.events.on("locked", (e) => seen.push(e));
			unwrap(ledger.deposit(alice, 10_000000n));
			unwrap(ledger.lock(engine, alice, 4_000000n));
			expect(seen).toEqual([
				{ account: alice, amount: 10_000000n, balance: 10_000000n, locked: 0n },
				{ account: alice, amount: 4_000000n, balance: 10_000000n, locked: 4_000000n },
			]);
		});

		it("emits nothing for a refused operation", () => {
			const { ledger } = setup();
			let count = 0;
			ledger.events.on("withdrawn", () => {
				count += 1;
			});
			expect(ledger.withdraw(alice, 1n).ok).toBe(false);
			expect(count).toBe(0);
		});
	});

	it("rejects invalid config at construction", () => {
		const access = AccessControl.create(owner);
		expect(() =>
			CustodyLedger.create({ access, pool: new CashPool(access), config: { protocolFeeBps: 20_000 } }),
		).toThrow("Invalid ledger config");
	});
});
