import { PublishFailureError, errorMessage } from "@tickcast/core";
import type { OhlcvRecord } from "@tickcast/core";
import {
	encodeRecordMessage,
	formatWireTimestamp,
	topicForInstrument,
} from "@tickcast/broadcast";
import type { BroadcastChannel } from "@tickcast/broadcast";
import { collectorLogger } from "../runtimeShared";

export type PublishResult =
	| { ok: true; topic: string }
	| { ok: false; topic: string; error: PublishFailureError };

export interface RecordSink {
	publish(record: OhlcvRecord): Promise<PublishResult>;
}

/** Hands records to the broadcast channel, one message per record. */
export class RecordPublisher implements RecordSink {
	constructor(private readonly channel: BroadcastChannel) {}

	async publish(record: OhlcvRecord): Promise<PublishResult> {
		let topic = record.instrument.trim();
		try {
			topic = topicForInstrument(record.instrument);
			const payload = encodeRecordMessage(topic, record);
			await this.channel.publish(topic, payload);
		} catch (error) {
			const failure = new PublishFailureError(errorMessage(error), {
				cause: error,
			});
			collectorLogger.warn("publish_failed", {
				instrument: record.instrument,
				topic,
				timestamp: record.timestamp,
				message: failure.message,
			});
			return { ok: false, topic, error: failure };
		}
		collectorLogger.debug("record_published", {
			instrument: record.instrument,
			topic,
			timestamp: formatWireTimestamp(record.timestamp, record.timeframe),
			open: record.open,
			high: record.high,
			low: record.low,
			close: record.close,
			volume: record.volume,
		});
		return { ok: true, topic };
	}
}
