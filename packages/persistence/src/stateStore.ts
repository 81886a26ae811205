import { createEmptyState } from "@tickcast/core";
import type { CollectorState, FlagReason } from "@tickcast/core";

/**
 * Durable watermarks, last-fired instants and instrument flags. Every write
 * resolves once the change is persisted.
 */
export interface CollectorStateStore {
	load(): Promise<CollectorState>;
	snapshot(): CollectorState;
	writeWatermark(instrumentId: string, timestamp: number): Promise<void>;
	writeFiredAt(cadenceId: string, instant: number): Promise<void>;
	/** `null` clears the flag. */
	writeFlag(instrumentId: string, reason: FlagReason | null): Promise<void>;
	flush(): Promise<void>;
}

const cloneState = (state: CollectorState): CollectorState => ({
	version: 1,
	watermarks: { ...state.watermarks },
	lastFired: { ...state.lastFired },
	flagged: { ...state.flagged },
});

export abstract class BaseStateStore implements CollectorStateStore {
	protected state: CollectorState = createEmptyState();
	private pending: Promise<void> = Promise.resolve();

	abstract load(): Promise<CollectorState>;

	protected abstract persist(state: CollectorState): Promise<void>;

	snapshot(): CollectorState {
		return cloneState(this.state);
	}

	writeWatermark(instrumentId: string, timestamp: number): Promise<void> {
		this.state.watermarks[instrumentId] = timestamp;
		return this.enqueue();
	}

	writeFiredAt(cadenceId: string, instant: number): Promise<void> {
		this.state.lastFired[cadenceId] = instant;
		return this.enqueue();
	}

	writeFlag(instrumentId: string, reason: FlagReason | null): Promise<void> {
		if (reason) {
			this.state.flagged[instrumentId] = reason;
		} else {
			delete this.state.flagged[instrumentId];
		}
		return this.enqueue();
	}

	flush(): Promise<void> {
		return this.pending;
	}

	private enqueue(): Promise<void> {
		const snapshot = cloneState(this.state);
		const write = this.pending.then(() => this.persist(snapshot));
		// The failure belongs to this write's caller; the queue moves on.
		this.pending = write.catch(() => undefined);
		return write;
	}
}

export class InMemoryStateStore extends BaseStateStore {
	writes = 0;

	constructor(initial?: Partial<CollectorState>) {
		super();
		this.state = cloneState({ ...createEmptyState(), ...initial });
	}

	async load(): Promise<CollectorState> {
		return this.snapshot();
	}

	protected async persist(): Promise<void> {
		this.writes += 1;
	}
}
