export { collectorLogger } from "./runtimeShared";
export { InstrumentRegistry } from "./registry/InstrumentRegistry";
export { WeekdayTradingCalendar } from "./schedule/tradingCalendar";
export type { TradingCalendar, TradingSession } from "./schedule/tradingCalendar";
export { createCadenceSchedule } from "./schedule/cadenceSchedule";
export type { CadenceSchedule } from "./schedule/cadenceSchedule";
export { ScheduleTrigger } from "./schedule/ScheduleTrigger";
export type { ScheduleTriggerOptions, UpcomingTrigger } from "./schedule/ScheduleTrigger";
export { RecordPublisher } from "./publish/RecordPublisher";
export type { PublishResult, RecordSink } from "./publish/RecordPublisher";
export { RunCoordinator } from "./coordinator/RunCoordinator";
export type { RunCoordinatorOptions, RunPassOptions } from "./coordinator/RunCoordinator";
export { CollectorLoop } from "./collector/CollectorLoop";
export type { CollectorLoopOptions } from "./collector/CollectorLoop";
