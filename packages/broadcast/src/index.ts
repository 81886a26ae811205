export * from "./types";
export {
	WIRE_SCHEMA,
	WIRE_VERSION,
	decodeRecordMessage,
	encodeRecordMessage,
	envelopeToRecord,
	formatWireTimestamp,
	toRecordEnvelope,
} from "./wire";
export type { RecordEnvelope } from "./wire";
export {
	encodeClientMessage,
	parseClientMessage,
	topicForInstrument,
	topicMatches,
} from "./topics";
export { BroadcastHub, MAX_BUFFERED_BYTES } from "./hub";
export type { BroadcastHubOptions, HubDelivery } from "./hub";
export { InMemoryBroadcastChannel } from "./memoryChannel";
export type { MessageHandler, PublishedMessage } from "./memoryChannel";
export { WsBroadcastServer } from "./wsServer";
export type { WsBroadcastServerOptions } from "./wsServer";
export { WsBroadcastSubscriber } from "./wsSubscriber";
export type { EnvelopeHandler, WsBroadcastSubscriberOptions } from "./wsSubscriber";
