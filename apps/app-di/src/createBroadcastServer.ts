import type { BroadcastConfig } from "@tickcast/core";
import { WsBroadcastServer } from "@tickcast/broadcast";

/** The server is returned unstarted; callers await start() before collecting. */
export const createBroadcastServer = (config: BroadcastConfig): WsBroadcastServer =>
	new WsBroadcastServer({
		host: config.host,
		port: config.port,
		maxBufferedBytes: config.maxBufferedBytes,
	});
