/**
 * Ledger Demo: one liquidity provider, two traders, a keeper and a relayer.
 *
 * Walks a market long to its take-profit, a signed limit order through the
 * relayer, and a short into liquidation, then prints the books.
 *
 * Run: npx tsx examples/ledger-demo.ts
 */

import {
	AccessControl,
	CloseReason,
	CustodyLedger,
	DEFAULT_RELAY_DOMAIN,
	DelegatedAction,
	FakeClock,
	InMemoryAssetRegistry,
	JsonPriceOracle,
	PositionEngine,
	Relayer,
	Role,
	SharePool,
	TradeSide,
	accountId,
	assetId,
	createLogger,
	createSigner,
	encodeJsonProof,
	formatFixed6,
	nowSeconds,
	parseFixed6,
	signDelegatedCall,
	unwrap,
} from "../src/index.js";

const logger = createLogger({ level: "info" });
const clock = new FakeClock(Date.now());

const owner = accountId("owner");
const controller = accountId("engine");
const keeper = accountId("keeper");
const relayerId = accountId("relayer");
const lp = accountId("lp");
const alice = accountId("alice");

const access = AccessControl.create(owner);
unwrap(access.grant(owner, Role.LedgerController, controller));
unwrap(access.grant(owner, Role.Keeper, keeper));
unwrap(access.grant(owner, Role.Relayer, relayerId));

const pool = new SharePool(logger);
unwrap(pool.deposit(lp, parseFixed6("100000")));

const ledger = CustodyLedger.create({ access, pool, config: { protocolFeeBps: 500 }, logger });
const registry = unwrap(
	InMemoryAssetRegistry.fromListings([
		{ asset: "BTC-USD", lot: { numerator: 1, denominator: 100 }, halfSpread: parseFixed6("5") },
	]),
);
const engine = PositionEngine.create({
	access,
	ledger,
	registry,
	oracle: new JsonPriceOracle(),
	controller,
	clock,
	logger,
});
const relayer = new Relayer({ engine, identity: relayerId, clock, logger });

const BTC = assetId("BTC-USD");
const proof = (price: string) =>
	encodeJsonProof([{ pair: "BTC-USD", price: parseFixed6(price), decimals: 6, timestamp: nowSeconds(clock) }]);

engine.events.on("tradeClosed", (e) => {
	console.log(
		`Trade ${e.trade.id} closed (${e.reason}) at ${formatFixed6(e.exitPrice)}, pnl ${formatFixed6(e.pnl)}`,
	);
});

// Alice: market long with a take-profit
unwrap(ledger.deposit(alice, parseFixed6("5000")));
const long = unwrap(
	engine.openMarket(
		alice,
		{ asset: BTC, side: TradeSide.Long, lots: 50n, leverage: 20, takeProfit: parseFixed6("66000") },
		proof("64000"),
	),
);
console.log(`Long entry ${formatFixed6(long.entryPrice)}, liquidation ${formatFixed6(long.liquidationPrice)}`);

clock.advance(60_000);
unwrap(engine.closeBatch(keeper, BTC, [long.id], CloseReason.TakeProfit, proof("66000")));

// Bob signs a short limit order; the relayer submits it
const bob = createSigner(`0x${"33".repeat(32)}`);
unwrap(ledger.deposit(accountId(bob.address), parseFixed6("2000")));
const signed = await signDelegatedCall(bob, DEFAULT_RELAY_DOMAIN, {
	request: {
		action: DelegatedAction.OpenLimit,
		params: { asset: BTC, side: TradeSide.Short, lots: 20n, leverage: 10, targetPrice: parseFixed6("66000") },
	},
	nonce: relayer.nextNonce(bob.address),
	deadline: BigInt(nowSeconds(clock) + 300),
});
const order = unwrap(await relayer.relay(signed.call, signed.signature));

unwrap(engine.execLimits(keeper, BTC, [order.id], proof("66010")));
const short = unwrap(engine.getTrade(order.id));
console.log(`Short entry ${formatFixed6(short.entryPrice)}, liquidation ${formatFixed6(short.liquidationPrice)}`);

clock.advance(3_600_000);
unwrap(
	engine.closeTrigger(keeper, order.id, CloseReason.Liquidation, proof(formatFixed6(short.liquidationPrice))),
);

console.log("\nBooks:");
console.log(`  alice balance: ${formatFixed6(ledger.balanceOf(alice))}`);
console.log(`  bob balance:   ${formatFixed6(ledger.balanceOf(accountId(bob.address)))}`);
console.log(`  owner fees:    ${formatFixed6(ledger.ownerFees())}`);
console.log(`  pool NAV:      ${formatFixed6(pool.netAssetValue())}`);
console.log(`  share price:   ${formatFixed6(pool.sharePrice())}`);
console.log(`  pool residual: ${formatFixed6(pool.residualValue())}`);
