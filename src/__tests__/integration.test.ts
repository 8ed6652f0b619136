import { describe, expect, it } from "vitest";
import { AccessControl, Role } from "../access/access-control.js";
import { CustodyLedger } from "../custody/custody-ledger.js";
import { SharePool } from "../custody/share-pool.js";
import { PositionEngine } from "../engine/position-engine.js";
import { type BatchProcessedEvent, CloseReason, TradeState } from "../engine/types.js";
import { JsonPriceOracle, encodeJsonProof } from "../oracle/json-oracle.js";
import { InMemoryAssetRegistry } from "../registry/memory-registry.js";
import { ErrorCode } from "../shared/errors.js";
import { accountId, assetId, tradeId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import { TradeSide } from "../shared/trade-side.js";

const NOW_SEC = 1_700_000_000;
const BTC = assetId("BTC-USD");
const owner = accountId("owner");
const controller = accountId("engine");
const keeper = accountId("keeper");
const lp = accountId("lp");
const alice = accountId("alice");
const bob = accountId("bob");

function createStack(liquidity: bigint) {
	const access = AccessControl.create(owner);
	unwrap(access.grant(owner, Role.LedgerController, controller));
	unwrap(access.grant(owner, Role.Keeper, keeper));

	const pool = new SharePool();
	unwrap(pool.deposit(lp, liquidity));
	const ledger = CustodyLedger.create({ access, pool, config: { protocolFeeBps: 1_000 } });
	unwrap(ledger.deposit(alice, 1_000_000000n));
	unwrap(ledger.deposit(bob, 1_000_000000n));

	const registry = unwrap(
		InMemoryAssetRegistry.fromListings([{ asset: "BTC-USD", lot: { numerator: 1, denominator: 1 } }]),
	);
	const clock = new FakeClock(NOW_SEC * 1_000);
	const engine = PositionEngine.create({
		access,
		ledger,
		registry,
		oracle: new JsonPriceOracle(),
		controller,
		clock,
	});
	const proof = (price: bigint) =>
		encodeJsonProof([{ pair: "BTC-USD", price, decimals: 6, timestamp: Math.floor(clock.now() / 1_000) }]);

	return { pool, ledger, engine, clock, proof };
}

describe("Integration: engine, ledger and share pool", () => {
	it("settles a winner and a liquidation against liquidity providers", () => {
		const { pool, ledger, engine, clock, proof } = createStack(1_000_000000n);
		const closedReasons: string[] = [];
		const batches: BatchProcessedEvent[] = [];
		engine.events.on("tradeClosed", (e) => closedReasons.push(e.reason));
		engine.events.on("batchProcessed", (e) => batches.push(e));

		const long = unwrap(
			engine.openMarket(
				alice,
				{ asset: BTC, side: TradeSide.Long, lots: 1n, leverage: 10, takeProfit: 110_000000n },
				proof(100_000000n),
			),
		);
		expect(long.marginReserved).toBe(10_000000n);

		const order = unwrap(
			engine.openLimit(bob, { asset: BTC, side: TradeSide.Short, lots: 2n, leverage: 5, targetPrice: 100_000000n }),
		);
		expect(order.marginReserved).toBe(40_000000n);
		expect(order.liquidationPrice).toBe(116_000000n);

		const executed = unwrap(engine.execLimits(keeper, BTC, [order.id], proof(100_020000n)));
		expect(executed.processed).toBe(1);
		expect(unwrap(engine.getTrade(order.id)).entryPrice).toBe(100_020000n);
		expect(engine.exposure(BTC)).toEqual({ longLots: 1n, shortLots: 2n });

		clock.advance(10_000);
		const takeProfits = unwrap(
			engine.closeBatch(keeper, BTC, [long.id, order.id], CloseReason.TakeProfit, proof(110_000000n)),
		);
		expect(takeProfits.outcomes).toEqual([
			{ id: long.id, status: "closed" },
			{
				id: order.id,
				status: "skipped",
				code: ErrorCode.NoTrigger,
				message: "Trade 2 has no take_profit level",
			},
		]);
		expect(pool.netAssetValue()).toBe(990_000000n);

		const liquidated = unwrap(
			engine.closeTrigger(keeper, order.id, CloseReason.Liquidation, proof(116_000000n)),
		);
		expect(liquidated.realizedPnl).toBe(-31_960000n);

		expect(ledger.account(alice)).toEqual({ balance: 1_010_000000n, locked: 0n });
		expect(ledger.account(bob)).toEqual({ balance: 968_040000n, locked: 0n });
		expect(ledger.ownerFees()).toBe(3_196000n);
		expect(pool.netAssetValue()).toBe(1_018_764000n);
		expect(pool.sharePrice()).toBe(1_018764n);
		expect(engine.exposure(BTC)).toEqual({ longLots: 0n, shortLots: 0n });

		expect(closedReasons).toEqual([CloseReason.TakeProfit, CloseReason.Liquidation]);
		expect(batches).toEqual([
			{ kind: "execute", asset: BTC, reason: null, processed: 1, skipped: 0 },
			{ kind: "close", asset: BTC, reason: CloseReason.TakeProfit, processed: 1, skipped: 1 },
		]);

		const redeemed = unwrap(pool.redeem(lp, 1_000_000000n));
		expect(redeemed.amount).toBe(1_018_764000n);
	});

	it("leaves no trace when the pool cannot pay a profit", () => {
		const { pool, ledger, engine, proof } = createStack(5_000000n);
		let closed = 0;
		engine.events.on("tradeClosed", () => {
			closed++;
		});

		const trade = unwrap(
			engine.openMarket(
				alice,
				{ asset: BTC, side: TradeSide.Long, lots: 1n, leverage: 10, takeProfit: 110_000000n },
				proof(100_000000n),
			),
		);

		const result = engine.closeTrigger(keeper, trade.id, CloseReason.TakeProfit, proof(110_000000n));
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.code).toBe(ErrorCode.LiquidityLow);

		expect(unwrap(engine.stateOf(tradeId(1)))).toBe(TradeState.Open);
		expect(ledger.account(alice)).toEqual({ balance: 1_000_000000n, locked: 10_000000n });
		expect(pool.netAssetValue()).toBe(5_000000n);
		expect(engine.exposure(BTC)).toEqual({ longLots: 1n, shortLots: 0n });
		expect(closed).toBe(0);
	});
});
