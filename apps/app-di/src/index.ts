export { createOhlcvProvider } from "./createOhlcvProvider";
export { createBroadcastServer } from "./createBroadcastServer";
export {
	createCollector,
	logCollectionEstimates,
	prepareCollector,
} from "./createCollector";
export type { CollectorDependencies, CollectorServices } from "./createCollector";
