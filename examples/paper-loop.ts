/**
 * Paper Loop Example
 *
 * Runs the full system against the paper venue:
 * - Registers an MA crossover strategy from the "aggressive" preset
 * - Feeds a synthetic candle series through processMarketData()
 * - Prints signals and fills as they happen, then shuts down
 */

import {
	DataType,
	EventType,
	MemoryStateStore,
	PaperExecutionClient,
	TradingSystem,
	maCrossoverPreset,
} from "../src/index.js";

const SYMBOL = "SOL-USDC";

const venue = new PaperExecutionClient({ slippageBps: 5, feeBps: 10 });
const system = new TradingSystem({
	store: new MemoryStateStore(),
	executionClient: venue,
	config: { logLevel: "warn", trading: { accountSize: 10_000 } },
});

system.bus.subscribe(EventType.StrategySignal, (event) => {
	console.log(`signal  ${String(event.payload.side)} @ ${String(event.payload.price)}`);
});
system.bus.subscribe(EventType.OrderFilled, (event) => {
	console.log(`filled  ${String(event.payload.id)} @ ${String(event.payload.filledPrice)}`);
});

/** Sideways drift, a rally, then a slide. */
function syntheticCloses(): number[] {
	const closes: number[] = [];
	let price = 100;
	for (let i = 0; i < 90; i++) {
		const drift = i < 30 ? 0 : i < 60 ? 0.8 : -0.9;
		price += drift + Math.sin(i / 3) * 0.4;
		closes.push(Number(price.toFixed(2)));
	}
	return closes;
}

async function run(): Promise<void> {
	await system.addStrategy({
		id: "ma-demo",
		kind: "ma_crossover",
		symbol: SYMBOL,
		params: maCrossoverPreset("aggressive", { minVolume: 0 }),
	});
	await system.start();

	let previous: number | undefined;
	for (const close of syntheticCloses()) {
		venue.setPrice(SYMBOL, close);
		const open = previous ?? close;
		system.processMarketData(SYMBOL, DataType.Candle, {
			open,
			high: Math.max(open, close),
			low: Math.min(open, close),
			close,
			volume: 1_000_000,
		});
		previous = close;
		await system.whenIdle();
	}

	const status = system.getSystemStatus();
	console.log(`\nopen positions: ${status.positions.totalPositions}`);
	console.log(`unrealized PnL: ${status.positions.totalUnrealizedPnl}`);

	await system.stop();
	console.log(`trades: ${system.getTradeHistory().totalTrades}`);
}

run().catch((err) => {
	console.error("Error:", err);
	process.exit(1);
});
