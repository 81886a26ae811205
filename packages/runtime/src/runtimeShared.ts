import { createLogger } from "@tickcast/core";

export const collectorLogger = createLogger("collector");
