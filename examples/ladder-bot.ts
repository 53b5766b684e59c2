/**
 * Ladder Bot Example
 *
 * Runs one ladder against the venue:
 * - Reads a JSON config file (first argument) and LADDER_* overrides
 * - Takes credentials from NONKYC_API_KEY / NONKYC_API_SECRET
 * - Optionally rebalances base/quote before seeding an empty book
 * - Streams order reports when enabled and polls as a fallback
 * - Stops cleanly on SIGINT/SIGTERM, writing the final snapshot
 *
 * The config path defaults to config/ladder.example.json (dry-run mode).
 */

import { readFile } from "node:fs/promises";
import {
	BalanceTracker,
	LadderEngine,
	LadderRunner,
	MonotonicClock,
	RestClient,
	StartupRebalancer,
	StateStore,
	StreamClient,
	configFromEnv,
	createCredentials,
	createLogger,
	loadConfig,
	toLadderConfig,
	toRebalanceSettings,
	toRestSetup,
	toStreamSetup,
} from "../src/index.js";

async function main(): Promise<void> {
	const configPath = process.argv[2] ?? "config/ladder.example.json";
	const raw: unknown = JSON.parse(await readFile(configPath, "utf8"));
	const loaded = loadConfig(raw, configFromEnv());
	if (!loaded.ok) throw loaded.error;
	const config = loaded.value;

	const logger = createLogger({ level: config.logLevel, base: { symbol: config.ladder.symbol } });
	const credentials = createCredentials({
		// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
		apiKey: process.env["NONKYC_API_KEY"] ?? "",
		// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
		apiSecret: process.env["NONKYC_API_SECRET"] ?? "",
	});

	const rest = RestClient.create(toRestSetup(config), { credentials, logger });
	const balances = new BalanceTracker({
		fetcher: () => rest.getBalances(),
		cacheTtlMs: config.runner.balanceCacheTtlMs,
		clock: MonotonicClock,
		logger: logger.child({ component: "balances" }),
	});
	const ladder = toLadderConfig(config.ladder);
	const engine = new LadderEngine(ladder, {
		venue: rest,
		balances,
		logger: logger.child({ component: "ladder" }),
	});
	engine.events.on("filled", (order, fill) => {
		logger.info(
			{ side: order.side, price: fill.price.toString(), revenue: engine.grossRevenue.toString() },
			"fill",
		);
	});

	const rebalancer = config.runner.startupRebalance
		? new StartupRebalancer(ladder, toRebalanceSettings(config.runner), { venue: rest, balances, logger })
		: undefined;

	const stream = config.stream.enabled ? StreamClient.create(toStreamSetup(config), { credentials, logger }) : undefined;
	const runner = new LadderRunner(
		{
			symbol: config.ladder.symbol,
			pollIntervalMs: config.runner.pollIntervalMs,
			maxPollBackoffMs: config.runner.maxPollBackoffMs,
			startupCancelAll: config.runner.startupCancelAll,
		},
		{
			engine,
			venue: rest,
			store: new StateStore({ filePath: config.runner.statePath, logger }),
			stream,
			rebalancer,
			logger: logger.child({ component: "runner" }),
		},
	);

	const shutdown = (): void => {
		runner.stop().catch((error: unknown) => {
			logger.error({ err: error instanceof Error ? error.message : String(error) }, "stop failed");
			process.exitCode = 1;
		});
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);

	await runner.start();
	await runner.done();
	if (runner.lastFatal !== null) process.exitCode = 1;
}

main().catch((error: unknown) => {
	console.error(error);
	process.exitCode = 1;
});
