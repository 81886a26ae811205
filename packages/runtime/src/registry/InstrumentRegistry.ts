import type {
	CadenceClass,
	CollectorState,
	FlagReason,
	Instrument,
	InstrumentConfig,
} from "@tickcast/core";

/**
 * Tracked instruments in registration order. The run coordinator is the only
 * writer of watermarks and flags; readers get copies.
 */
export class InstrumentRegistry {
	private readonly instruments = new Map<string, Instrument>();

	static fromConfig(
		instruments: readonly InstrumentConfig[],
		cadences: readonly CadenceClass[]
	): InstrumentRegistry {
		const known = new Set(cadences.map((cadence) => cadence.id));
		const registry = new InstrumentRegistry();
		for (const entry of instruments) {
			if (!known.has(entry.cadence)) {
				throw new Error(
					`Instrument ${entry.id} references unknown cadence ${entry.cadence}`
				);
			}
			registry.register(entry.id, entry.cadence);
		}
		return registry;
	}

	register(id: string, cadence: string): Instrument {
		const trimmed = id.trim();
		if (!trimmed.length) {
			throw new Error("Instrument id must not be empty");
		}
		if (this.instruments.has(trimmed)) {
			throw new Error(`Instrument ${trimmed} is already registered`);
		}
		const instrument: Instrument = { id: trimmed, cadence };
		this.instruments.set(trimmed, instrument);
		return { ...instrument };
	}

	/** Applies persisted watermarks and flags to registered instruments. */
	hydrate(state: CollectorState): void {
		for (const instrument of this.instruments.values()) {
			const watermark = state.watermarks[instrument.id];
			if (watermark !== undefined) {
				instrument.lastObservedAt = watermark;
			}
			const flag = state.flagged[instrument.id];
			if (flag) {
				instrument.flagged = flag;
			}
		}
	}

	get size(): number {
		return this.instruments.size;
	}

	get(id: string): Instrument | undefined {
		const instrument = this.instruments.get(id);
		return instrument ? { ...instrument } : undefined;
	}

	list(): Instrument[] {
		return Array.from(this.instruments.values(), (instrument) => ({
			...instrument,
		}));
	}

	/** Members of a cadence class, flagged ones included. */
	membersOf(cadenceId: string): Instrument[] {
		return this.list().filter((instrument) => instrument.cadence === cadenceId);
	}

	countByCadence(): Record<string, number> {
		const counts: Record<string, number> = {};
		for (const instrument of this.instruments.values()) {
			counts[instrument.cadence] = (counts[instrument.cadence] ?? 0) + 1;
		}
		return counts;
	}

	/** Moves the watermark forward; returns false when `timestamp` is not newer. */
	advanceWatermark(id: string, timestamp: number): boolean {
		const instrument = this.require(id);
		if (
			instrument.lastObservedAt !== undefined &&
			timestamp <= instrument.lastObservedAt
		) {
			return false;
		}
		instrument.lastObservedAt = timestamp;
		return true;
	}

	flag(id: string, reason: FlagReason): void {
		this.require(id).flagged = reason;
	}

	clearFlag(id: string): void {
		delete this.require(id).flagged;
	}

	private require(id: string): Instrument {
		const instrument = this.instruments.get(id);
		if (!instrument) {
			throw new Error(`Unknown instrument ${id}`);
		}
		return instrument;
	}
}
