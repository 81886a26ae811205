import { ALL_TOPICS } from "./types";
import type { ClientMessage } from "./types";

/** Topic for an instrument's records: the trimmed identifier. */
export const topicForInstrument = (instrumentId: string): string => {
	const topic = instrumentId.trim();
	if (!topic.length) {
		throw new Error("Instrument id must not be empty");
	}
	return topic;
};

export const topicMatches = (subscribed: ReadonlySet<string>, topic: string): boolean =>
	subscribed.has(ALL_TOPICS) || subscribed.has(topic);

const isStringArray = (value: unknown): value is string[] =>
	Array.isArray(value) && value.every((entry) => typeof entry === "string");

/** Parses a client control frame; null when it is not one. */
export const parseClientMessage = (raw: string): ClientMessage | null => {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch {
		return null;
	}
	if (typeof parsed !== "object" || parsed === null) {
		return null;
	}
	const op: unknown = Reflect.get(parsed, "op");
	const topics: unknown = Reflect.get(parsed, "topics");
	if ((op !== "subscribe" && op !== "unsubscribe") || !isStringArray(topics)) {
		return null;
	}
	const cleaned = topics.map((topic) => topic.trim()).filter(Boolean);
	return op === "subscribe"
		? { op: "subscribe", topics: cleaned }
		: { op: "unsubscribe", topics: cleaned };
};

export const encodeClientMessage = (message: ClientMessage): string =>
	JSON.stringify(message);
