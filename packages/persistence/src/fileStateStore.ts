import { promises as fs } from "node:fs";
import path from "node:path";
import { createEmptyState, createLogger } from "@tickcast/core";
import type { CollectorState, FlagReason } from "@tickcast/core";
import { BaseStateStore } from "./stateStore";

const stateLogger = createLogger("state");

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readNumberMap = (value: unknown, field: string): Record<string, number> => {
	if (value === undefined) {
		return {};
	}
	if (!isRecord(value)) {
		throw new Error(`State field ${field} must be an object`);
	}
	const result: Record<string, number> = {};
	for (const [key, entry] of Object.entries(value)) {
		if (typeof entry !== "number" || !Number.isFinite(entry)) {
			throw new Error(`State field ${field}.${key} must be a finite number`);
		}
		result[key] = entry;
	}
	return result;
};

const readFlags = (value: unknown): Record<string, FlagReason> => {
	if (value === undefined) {
		return {};
	}
	if (!isRecord(value)) {
		throw new Error("State field flagged must be an object");
	}
	const result: Record<string, FlagReason> = {};
	for (const [key, entry] of Object.entries(value)) {
		if (entry !== "not_found") {
			throw new Error(`State field flagged.${key} has unknown reason ${String(entry)}`);
		}
		result[key] = entry;
	}
	return result;
};

export const parseCollectorState = (raw: unknown): CollectorState => {
	if (!isRecord(raw)) {
		throw new Error("State document must be a JSON object");
	}
	if (raw.version !== 1) {
		throw new Error(`Unsupported state version ${String(raw.version)}`);
	}
	return {
		version: 1,
		watermarks: readNumberMap(raw.watermarks, "watermarks"),
		lastFired: readNumberMap(raw.lastFired, "lastFired"),
		flagged: readFlags(raw.flagged),
	};
};

const isMissingFile = (error: unknown): boolean =>
	error instanceof Error && Reflect.get(error, "code") === "ENOENT";

/**
 * JSON document on disk. Writes go to a temp file that is renamed over the
 * target, one at a time.
 */
export class FileStateStore extends BaseStateStore {
	constructor(private readonly filePath: string) {
		super();
	}

	get path(): string {
		return this.filePath;
	}

	async load(): Promise<CollectorState> {
		let contents: string;
		try {
			contents = await fs.readFile(this.filePath, "utf8");
		} catch (error) {
			if (!isMissingFile(error)) {
				throw error;
			}
			this.state = createEmptyState();
			stateLogger.info("state_initialized", { path: this.filePath });
			return this.snapshot();
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(contents);
		} catch (error) {
			throw new Error(`State file ${this.filePath} is not valid JSON`, {
				cause: error,
			});
		}
		this.state = parseCollectorState(parsed);
		stateLogger.info("state_loaded", {
			path: this.filePath,
			watermarks: Object.keys(this.state.watermarks).length,
			flagged: Object.keys(this.state.flagged).length,
		});
		return this.snapshot();
	}

	protected async persist(state: CollectorState): Promise<void> {
		const tempPath = `${this.filePath}.${process.pid}.tmp`;
		await fs.mkdir(path.dirname(this.filePath), { recursive: true });
		await fs.writeFile(tempPath, `${JSON.stringify(state, null, 2)}\n`, "utf8");
		await fs.rename(tempPath, this.filePath);
	}
}
