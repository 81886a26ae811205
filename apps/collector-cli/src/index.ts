import {
	createLogger,
	getConfigMetadata,
	getStringArg,
	getWorkspaceRoot,
	loadCollectorConfig,
	loadEnvFiles,
	parseCliArgs,
} from "@tickcast/core";
import {
	createBroadcastServer,
	createCollector,
	prepareCollector,
} from "@tickcast/app-di";

const logger = createLogger("collector-cli");

const USAGE = `Usage:
  npm run collector -- [options]

Options:
  --config <path>   Collector config file (default config/collector.json)
  --once            Evaluate the schedule, run at most one pass, then exit
  --help            Show this message`;

const main = async (): Promise<void> => {
	const args = parseCliArgs(process.argv.slice(2));
	if (args.help) {
		console.log(USAGE);
		return;
	}

	const envFiles = loadEnvFiles(getWorkspaceRoot());
	const config = loadCollectorConfig({
		configPath: getStringArg(args, "config"),
	});
	logger.info("collector_config_loaded", {
		path: getConfigMetadata(config)?.path ?? null,
		envFiles,
		exchange: config.provider.exchange,
		instruments: config.instruments.length,
		cadences: config.cadences.map((cadence) => cadence.id),
		rateLimit: config.rateLimit,
	});

	// Refuse to collect anything unless subscribers can be served.
	const server = createBroadcastServer(config.broadcast);
	await server.start();
	logger.info("broadcast_listening", {
		host: config.broadcast.host,
		port: server.port,
	});

	const services = createCollector(config, { channel: server });
	const shutdown = async (): Promise<void> => {
		await services.loop.stop();
		await services.store.flush();
		await server.close();
	};

	try {
		await prepareCollector(services);
	} catch (error) {
		await server.close();
		throw error;
	}

	if (args.once) {
		try {
			const outcome = await services.loop.runOnce();
			logger.info("collector_once_complete", {
				runId: outcome.runId,
				due: outcome.due.length,
				published: outcome.published,
				failed: Object.keys(outcome.failed).length,
			});
		} finally {
			await shutdown();
		}
		return;
	}

	let stopping = false;
	const onSignal = (signal: NodeJS.Signals): void => {
		if (stopping) {
			return;
		}
		stopping = true;
		logger.info("collector_shutdown", { signal });
		shutdown().then(
			() => {
				logger.info("collector_shutdown_complete", {});
			},
			(error: unknown) => {
				logger.error("collector_shutdown_failed", {
					message: error instanceof Error ? error.message : String(error),
				});
				process.exitCode = 1;
			}
		);
	};
	process.once("SIGINT", onSignal);
	process.once("SIGTERM", onSignal);

	services.loop.start();
};

main().catch((error) => {
	logger.error("collector_failed", {
		message: error instanceof Error ? error.message : String(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
