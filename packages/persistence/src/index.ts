export { BaseStateStore, InMemoryStateStore } from "./stateStore";
export type { CollectorStateStore } from "./stateStore";
export { FileStateStore, parseCollectorState } from "./fileStateStore";
