import type { CadenceClass, DueCadence } from "@tickcast/core";
import type { CollectorStateStore } from "@tickcast/persistence";
import { createCadenceSchedule } from "./cadenceSchedule";
import type { CadenceSchedule } from "./cadenceSchedule";
import type { TradingCalendar } from "./tradingCalendar";

export interface ScheduleTriggerOptions {
	cadences: readonly CadenceClass[];
	calendar: TradingCalendar;
	store: CollectorStateStore;
}

export interface UpcomingTrigger {
	cadence: string;
	instant: number;
}

/**
 * Decides which cadence classes are due. A class is due when its most recent
 * trigger instant is later than the persisted last-fired instant; missed
 * instants older than that are not fired.
 */
export class ScheduleTrigger {
	private readonly schedules: CadenceSchedule[];
	private readonly store: CollectorStateStore;

	constructor(options: ScheduleTriggerOptions) {
		const ids = new Set<string>();
		for (const cadence of options.cadences) {
			if (ids.has(cadence.id)) {
				throw new Error(`Duplicate cadence id ${cadence.id}`);
			}
			ids.add(cadence.id);
		}
		this.schedules = options.cadences.map((cadence) =>
			createCadenceSchedule(cadence, options.calendar)
		);
		this.store = options.store;
	}

	get cadences(): CadenceClass[] {
		return this.schedules.map((schedule) => schedule.cadence);
	}

	evaluate(now: number): DueCadence[] {
		const { lastFired } = this.store.snapshot();
		const due: DueCadence[] = [];
		for (const schedule of this.schedules) {
			const instant = schedule.latestAtOrBefore(now);
			if (instant === null) {
				continue;
			}
			const fired = lastFired[schedule.cadence.id];
			if (fired === undefined || instant > fired) {
				due.push({ cadence: schedule.cadence, instant });
			}
		}
		return due;
	}

	/** Persists the fired instant; never moves a class backwards. */
	async markFired(cadenceId: string, instant: number): Promise<void> {
		const fired = this.store.snapshot().lastFired[cadenceId];
		if (fired !== undefined && fired >= instant) {
			return;
		}
		await this.store.writeFiredAt(cadenceId, instant);
	}

	/** Start of the bars of `cadenceId` that have not closed by `now`. */
	openBarsFrom(cadenceId: string, now: number): number {
		const schedule = this.schedules.find((entry) => entry.cadence.id === cadenceId);
		if (!schedule) {
			throw new Error(`Unknown cadence ${cadenceId}`);
		}
		return schedule.openBarsFrom(now);
	}

	nextTriggerAt(now: number): UpcomingTrigger | null {
		let next: UpcomingTrigger | null = null;
		for (const schedule of this.schedules) {
			const instant = schedule.nextAfter(now);
			if (instant !== null && (next === null || instant < next.instant)) {
				next = { cadence: schedule.cadence.id, instant };
			}
		}
		return next;
	}
}
