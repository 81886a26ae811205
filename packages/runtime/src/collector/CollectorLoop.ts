import { systemClock } from "@tickcast/core";
import type { Clock, RunOutcome } from "@tickcast/core";
import type { RunCoordinator } from "../coordinator/RunCoordinator";
import type { ScheduleTrigger } from "../schedule/ScheduleTrigger";
import { collectorLogger } from "../runtimeShared";

const MIN_POLL_INTERVAL_MS = 1_000;

export interface CollectorLoopOptions {
	coordinator: RunCoordinator;
	trigger: ScheduleTrigger;
	pollIntervalMs: number;
	clock?: Clock;
}

/**
 * Single timer loop: evaluate, run a pass to completion, wait, repeat.
 */
export class CollectorLoop {
	private readonly pollIntervalMs: number;
	private readonly clock: Clock;
	private running = false;
	private timer: ReturnType<typeof setTimeout> | null = null;
	private controller: AbortController | null = null;
	private inFlight: Promise<RunOutcome> | null = null;

	constructor(private readonly options: CollectorLoopOptions) {
		this.pollIntervalMs = Math.max(options.pollIntervalMs, MIN_POLL_INTERVAL_MS);
		this.clock = options.clock ?? systemClock;
	}

	get isRunning(): boolean {
		return this.running;
	}

	start(): void {
		if (this.running) {
			return;
		}
		this.running = true;
		const next = this.options.trigger.nextTriggerAt(this.clock());
		collectorLogger.info("collector_started", {
			pollIntervalMs: this.pollIntervalMs,
			nextTrigger: next
				? { cadence: next.cadence, at: new Date(next.instant).toISOString() }
				: null,
		});
		void this.tick();
	}

	/** Stops polling; an in-flight pass finishes its current instrument first. */
	async stop(): Promise<void> {
		this.running = false;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
		this.controller?.abort();
		if (this.inFlight) {
			// A failed pass is already logged by tick().
			await this.inFlight.catch(() => undefined);
		}
		collectorLogger.info("collector_stopped", {});
	}

	/** Runs one evaluation and, when something is due, one full pass. */
	async runOnce(now: number = this.clock()): Promise<RunOutcome> {
		this.controller = new AbortController();
		const pass = this.options.coordinator.runPass(now, {
			signal: this.controller.signal,
		});
		this.inFlight = pass;
		try {
			const outcome = await pass;
			this.checkLag(now, outcome);
			return outcome;
		} finally {
			this.inFlight = null;
			this.controller = null;
		}
	}

	private checkLag(evaluatedAt: number, outcome: RunOutcome): void {
		if (!outcome.due.length) {
			return;
		}
		const next = this.options.trigger.nextTriggerAt(evaluatedAt);
		if (next && outcome.finishedAt > next.instant) {
			collectorLogger.warn("collector_falling_behind", {
				runId: outcome.runId,
				nextCadence: next.cadence,
				lagMs: outcome.finishedAt - next.instant,
			});
		}
	}

	private async tick(): Promise<void> {
		if (!this.running) {
			return;
		}

		try {
			await this.runOnce();
		} catch (error) {
			collectorLogger.error("collector_pass_failed", {
				message: error instanceof Error ? error.message : String(error),
			});
		}

		if (this.running) {
			this.timer = setTimeout(() => {
				void this.tick();
			}, this.pollIntervalMs);
		}
	}
}
