import { bench, describe } from "vitest";
import { AccessControl, Role } from "../src/access/access-control.js";
import { CashPool } from "../src/custody/cash-pool.js";
import { CustodyLedger } from "../src/custody/custody-ledger.js";
import { liquidationPriceOf, marginFor, realizedPnl } from "../src/engine/margin.js";
import { PositionEngine } from "../src/engine/position-engine.js";
import { CloseReason } from "../src/engine/types.js";
import { JsonPriceOracle, encodeJsonProof } from "../src/oracle/json-oracle.js";
import { InMemoryAssetRegistry } from "../src/registry/memory-registry.js";
import { type TradeId, accountId, assetId } from "../src/shared/identifiers.js";
import { unwrap } from "../src/shared/result.js";
import { FakeClock } from "../src/shared/time.js";
import { TradeSide } from "../src/shared/trade-side.js";

describe("margin math", () => {
	bench("margin + liquidation price 1000x", () => {
		for (let i = 1; i <= 1000; i++) {
			marginFor(1_000000n, 64_000_000000n + BigInt(i), 20);
			liquidationPriceOf(TradeSide.Long, 64_000_000000n + BigInt(i), 20, 8_000);
		}
	});

	bench("realized pnl 1000x", () => {
		for (let i = 1; i <= 1000; i++) {
			realizedPnl(TradeSide.Short, 2_000000n, 64_000_000000n, 63_000_000000n + BigInt(i), 6_400_000000n);
		}
	});
});

describe("batch close", () => {
	const NOW_SEC = 1_700_000_000;
	const BTC = assetId("BTC-USD");
	const owner = accountId("owner");
	const controller = accountId("engine");
	const keeper = accountId("keeper");
	const trader = accountId("trader");

	bench("liquidate 200 trades in one batch", () => {
		const access = AccessControl.create(owner);
		unwrap(access.grant(owner, Role.LedgerController, controller));
		unwrap(access.grant(owner, Role.Keeper, keeper));
		const pool = new CashPool(access);
		unwrap(pool.fund(owner, 1_000_000_000000n));
		const ledger = CustodyLedger.create({ access, pool });
		unwrap(ledger.deposit(trader, 1_000_000_000000n));
		const registry = unwrap(
			InMemoryAssetRegistry.fromListings([{ asset: "BTC-USD", lot: { numerator: 1, denominator: 1 } }]),
		);
		const engine = PositionEngine.create({
			access,
			ledger,
			registry,
			oracle: new JsonPriceOracle(),
			controller,
			clock: new FakeClock(NOW_SEC * 1_000),
		});
		const proof = (price: bigint) =>
			encodeJsonProof([{ pair: "BTC-USD", price, decimals: 6, timestamp: NOW_SEC }]);

		const ids: TradeId[] = [];
		for (let i = 0; i < 200; i++) {
			const trade = unwrap(
				engine.openMarket(trader, { asset: BTC, side: TradeSide.Long, lots: 1n, leverage: 10 }, proof(100_000000n)),
			);
			ids.push(trade.id);
		}
		unwrap(engine.closeBatch(keeper, BTC, ids, CloseReason.Liquidation, proof(90_000000n)));
	});
});
