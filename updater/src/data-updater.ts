import type winston from "winston";

import { loadConfig } from "./lib/config";
import type { AppConfig } from "./lib/config";
import { PersistenceGateway } from "./lib/db";
import { asAppError } from "./lib/errors";
import { createLogger } from "./lib/log";
import { SchemaRegistry } from "./storage/schema-registry";
import { SyncOrchestrator } from "./sync/orchestrator";
import { runPeriodically } from "./sync/scheduler";
import { ThingsBoardClient } from "./thingsboard/client";

const SERVICE_NAME = "data-updater";

// exit codes
const EXIT_OK = 0;
const EXIT_FATAL = 1;
const EXIT_PARTIAL = 2;

async function run(config: AppConfig, logger: winston.Logger): Promise<number> {
	const gateway = new PersistenceGateway(config.database, logger);
	const source = new ThingsBoardClient(config.thingsboard, logger);
	const registry = new SchemaRegistry(gateway, logger);
	const orchestrator = new SyncOrchestrator(
		{ source, registry, writer: gateway, logger },
		{ deviceType: config.thingsboard.deviceType, skipDuplicates: config.sync.skipDuplicates }
	);

	await gateway.connect();
	try {
		await source.connect();

		if (config.sync.intervalMs === undefined) {
			const report = await orchestrator.runOnce();
			return report.failed > 0 ? EXIT_PARTIAL : EXIT_OK;
		}

		const stop = new AbortController();
		process.once("SIGTERM", () => {
			logger.info("Stopping after the current cycle (signal=SIGTERM)");
			stop.abort();
		});
		process.once("SIGINT", () => {
			logger.info("Immediate stop requested (signal=SIGINT)");
			process.exit(EXIT_OK);
		});

		logger.info("Data updater polling every %dms", config.sync.intervalMs);
		const cycles = await runPeriodically(orchestrator, {
			intervalMs: config.sync.intervalMs,
			signal: stop.signal,
			logger
		});
		logger.info("Data updater ran %d cycle(s)", cycles);
		return EXIT_OK;
	} finally {
		await gateway.disconnect();
	}
}

async function main(): Promise<number> {
	const config = loadConfig();

	const logger = createLogger({
		logDir: config.logging.dir,
		serviceName: SERVICE_NAME,
		level: config.logging.level,
		console: config.logging.console
	});

	logger.info("Data updater starting (deviceType=%s)", config.thingsboard.deviceType);
	try {
		return await run(config, logger);
	} catch (err) {
		const failure = asAppError(err);
		logger.error("Data updater failed (%s): %s", failure.code, failure.stack ?? failure.message);
		return EXIT_FATAL;
	} finally {
		logger.info("Data updater exiting");
	}
}

main()
	.then(code => process.exit(code))
	.catch(err => {
		console.error(err);
		process.exit(EXIT_FATAL);
	});
