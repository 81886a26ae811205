import { randomUUID } from "node:crypto";
import {
	FetchFailedError,
	systemClock,
	toCollectorError,
} from "@tickcast/core";
import type {
	Clock,
	DueCadence,
	FailureReason,
	Instrument,
	OhlcvRecord,
	PublishFailureEntry,
	RunOutcome,
} from "@tickcast/core";
import type { Fetcher } from "@tickcast/data";
import type { CollectorStateStore } from "@tickcast/persistence";
import type { InstrumentRegistry } from "../registry/InstrumentRegistry";
import type { RecordSink } from "../publish/RecordPublisher";
import type { ScheduleTrigger } from "../schedule/ScheduleTrigger";
import { collectorLogger } from "../runtimeShared";

export interface RunCoordinatorOptions {
	registry: InstrumentRegistry;
	trigger: ScheduleTrigger;
	fetcher: Fetcher;
	publisher: RecordSink;
	store: CollectorStateStore;
	/** Instruments fetched in parallel; each is handled by one worker. */
	concurrency?: number;
	clock?: Clock;
	createRunId?: () => string;
}

export interface RunPassOptions {
	signal?: AbortSignal;
}

interface WorkItem {
	instrument: Instrument;
	due: DueCadence;
}

interface PassState {
	attempted: string[];
	succeeded: string[];
	failed: Record<string, FailureReason>;
	flagged: string[];
	published: number;
	publishFailures: PublishFailureEntry[];
}

const toFailureReason = (error: unknown): FailureReason => {
	if (error instanceof FetchFailedError) {
		return { kind: error.kind, message: error.message, attempts: error.attempts };
	}
	const failure = toCollectorError(error);
	return { kind: failure.kind, message: failure.message, attempts: 1 };
};

const freezeOutcome = (outcome: RunOutcome): RunOutcome =>
	Object.freeze({
		...outcome,
		due: Object.freeze(outcome.due.map((entry) => Object.freeze({ ...entry }))),
		attempted: Object.freeze([...outcome.attempted]),
		succeeded: Object.freeze([...outcome.succeeded]),
		failed: Object.freeze({ ...outcome.failed }),
		flagged: Object.freeze([...outcome.flagged]),
		publishFailures: Object.freeze([...outcome.publishFailures]),
	});

/**
 * One collection pass: due classes → member instruments → fetch → publish →
 * advance watermark. A failing instrument never stops the others.
 */
export class RunCoordinator {
	private readonly concurrency: number;
	private readonly clock: Clock;
	private readonly createRunId: () => string;

	constructor(private readonly options: RunCoordinatorOptions) {
		this.concurrency = Math.max(Math.floor(options.concurrency ?? 1), 1);
		this.clock = options.clock ?? systemClock;
		this.createRunId = options.createRunId ?? randomUUID;
	}

	async runPass(now: number = this.clock(), options: RunPassOptions = {}): Promise<RunOutcome> {
		const runId = this.createRunId();
		const startedAt = this.clock();
		const due = this.options.trigger.evaluate(now);
		const state: PassState = {
			attempted: [],
			succeeded: [],
			failed: {},
			flagged: [],
			published: 0,
			publishFailures: [],
		};

		if (!due.length) {
			return freezeOutcome({
				runId,
				startedAt,
				finishedAt: this.clock(),
				due: [],
				...state,
				interrupted: false,
			});
		}

		collectorLogger.info("pass_started", {
			runId,
			due: due.map((entry) => ({ cadence: entry.cadence.id, instant: entry.instant })),
		});

		const work: WorkItem[] = [];
		const remaining = new Map<string, number>();
		for (const entry of due) {
			const members = this.options.registry
				.membersOf(entry.cadence.id)
				.filter((instrument) => {
					if (instrument.flagged) {
						collectorLogger.debug("instrument_skipped_flagged", {
							instrument: instrument.id,
							reason: instrument.flagged,
						});
						return false;
					}
					return true;
				});
			remaining.set(entry.cadence.id, members.length);
			members.forEach((instrument) => work.push({ instrument, due: entry }));
		}

		for (const entry of due) {
			if (remaining.get(entry.cadence.id) === 0) {
				await this.markFired(entry);
			}
		}

		let cursor = 0;
		let interrupted = false;
		const worker = async (): Promise<void> => {
			while (cursor < work.length) {
				if (options.signal?.aborted) {
					interrupted = true;
					return;
				}
				const item = work[cursor];
				cursor += 1;
				if (!item) {
					return;
				}
				await this.processInstrument(item, state, now);
				const left = (remaining.get(item.due.cadence.id) ?? 1) - 1;
				remaining.set(item.due.cadence.id, left);
				if (left === 0) {
					await this.markFired(item.due);
				}
			}
		};

		await Promise.all(
			Array.from({ length: Math.min(this.concurrency, work.length) }, () => worker())
		);

		const outcome = freezeOutcome({
			runId,
			startedAt,
			finishedAt: this.clock(),
			due: due.map((entry) => ({ cadence: entry.cadence.id, instant: entry.instant })),
			...state,
			interrupted,
		});

		collectorLogger.info("run_outcome", {
			...outcome,
			durationMs: outcome.finishedAt - outcome.startedAt,
		});
		return outcome;
	}

	private async processInstrument(
		item: WorkItem,
		state: PassState,
		now: number
	): Promise<void> {
		const { instrument, due } = item;
		state.attempted.push(instrument.id);

		let records: OhlcvRecord[];
		try {
			// Bars still open at the evaluation instant wait for a later pass.
			records = await this.options.fetcher.fetch(
				{ id: instrument.id, lastObservedAt: instrument.lastObservedAt },
				due.cadence.timeframe,
				this.options.trigger.openBarsFrom(due.cadence.id, now)
			);
		} catch (error) {
			const reason = toFailureReason(error);
			state.failed[instrument.id] = reason;
			collectorLogger.warn("instrument_failed", {
				instrument: instrument.id,
				cadence: due.cadence.id,
				...reason,
			});
			if (reason.kind === "NotFound") {
				await this.flagNotFound(instrument.id, state);
			}
			return;
		}

		for (const record of records) {
			const result = await this.options.publisher.publish(record);
			if (result.ok) {
				state.published += 1;
			} else {
				state.publishFailures.push({
					instrument: instrument.id,
					timestamp: record.timestamp,
					topic: result.topic,
					message: result.error.message,
				});
			}
		}

		const newest = records.at(-1);
		if (newest && this.options.registry.advanceWatermark(instrument.id, newest.timestamp)) {
			try {
				await this.options.store.writeWatermark(instrument.id, newest.timestamp);
			} catch (error) {
				collectorLogger.error("state_write_failed", {
					instrument: instrument.id,
					watermark: newest.timestamp,
					message: error instanceof Error ? error.message : String(error),
				});
			}
		}
		state.succeeded.push(instrument.id);
	}

	private async markFired(due: DueCadence): Promise<void> {
		try {
			await this.options.trigger.markFired(due.cadence.id, due.instant);
		} catch (error) {
			collectorLogger.error("state_write_failed", {
				cadence: due.cadence.id,
				instant: due.instant,
				message: error instanceof Error ? error.message : String(error),
			});
		}
	}

	private async flagNotFound(instrumentId: string, state: PassState): Promise<void> {
		this.options.registry.flag(instrumentId, "not_found");
		state.flagged.push(instrumentId);
		try {
			await this.options.store.writeFlag(instrumentId, "not_found");
		} catch (error) {
			collectorLogger.error("state_write_failed", {
				instrument: instrumentId,
				flag: "not_found",
				message: error instanceof Error ? error.message : String(error),
			});
		}
	}
}
