import {
	createLogger,
	getListArg,
	getStringArg,
	getWorkspaceRoot,
	loadEnvFiles,
	parseCliArgs,
} from "@tickcast/core";
import { WsBroadcastSubscriber } from "@tickcast/broadcast";

const logger = createLogger("subscriber-cli");

const DEFAULT_PORT = 21_000;

const USAGE = `Usage:
  npm run subscriber -- [options]

Options:
  --url <ws-url>     Collector broadcast endpoint (default ws://127.0.0.1:<TICKCAST_BROADCAST_PORT or 21000>)
  --topics <a,b>     Instrument topics to receive (default: all)
  --help             Show this message`;

const resolveUrl = (explicit: string | undefined): string => {
	if (explicit) {
		return explicit;
	}
	const port = Number(process.env.TICKCAST_BROADCAST_PORT ?? DEFAULT_PORT);
	return `ws://127.0.0.1:${Number.isFinite(port) ? port : DEFAULT_PORT}`;
};

const main = async (): Promise<void> => {
	const args = parseCliArgs(process.argv.slice(2));
	if (args.help) {
		console.log(USAGE);
		return;
	}
	loadEnvFiles(getWorkspaceRoot());

	const subscriber = new WsBroadcastSubscriber({
		url: resolveUrl(getStringArg(args, "url")),
		topics: getListArg(args, "topics"),
	});
	subscriber.onRecord((envelope) => {
		logger.info("record_received", {
			topic: envelope.topic,
			instrument: envelope.instrument,
			timeframe: envelope.timeframe,
			timestamp: envelope.timestamp,
			open: envelope.open,
			high: envelope.high,
			low: envelope.low,
			close: envelope.close,
			volume: envelope.volume,
		});
	});

	const onSignal = (signal: NodeJS.Signals): void => {
		logger.info("subscriber_shutdown", { signal });
		subscriber.stop();
	};
	process.once("SIGINT", onSignal);
	process.once("SIGTERM", onSignal);

	subscriber.start();
};

main().catch((error) => {
	logger.error("subscriber_failed", {
		message: error instanceof Error ? error.message : String(error),
	});
	process.exit(1);
});
