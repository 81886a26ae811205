import process from "node:process";
import {
	getConfigMetadata,
	getStringArg,
	getWorkspaceRoot,
	loadCollectorConfig,
	loadEnvFiles,
	parseCliArgs,
} from "@tickcast/core";
import { estimateCollectionMs } from "@tickcast/data";

const USAGE = `Usage:
  npm run print-config -- [options]

Options:
  --config <path>   Collector config file (default config/collector.json)
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

	const counts: Record<string, number> = {};
	for (const instrument of config.instruments) {
		counts[instrument.cadence] = (counts[instrument.cadence] ?? 0) + 1;
	}
	const cadences = config.cadences.map((cadence) => ({
		...cadence,
		instruments: counts[cadence.id] ?? 0,
		estimatedCollectionMs: estimateCollectionMs(
			counts[cadence.id] ?? 0,
			config.rateLimit.capacity,
			config.rateLimit.windowMs
		),
	}));

	const { instruments, ...rest } = config;
	console.log(
		JSON.stringify(
			{
				source: getConfigMetadata(config),
				envFiles,
				...rest,
				cadences,
				instruments: instruments.length,
			},
			null,
			2
		)
	);
};

main().catch((error) => {
	console.error(
		"print-config failed:",
		error instanceof Error ? error.message : error
	);
	process.exitCode = 1;
});
