import { config as dotenvConfig } from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";
import { refreshLoggerSettings } from "./utils/logger";

const loaded = new Set<string>();

/**
 * Loads TICKCAST_ENV_FILE, .env and .env.local from the project root, later
 * files overriding earlier ones. Returns the files actually read.
 */
export function loadEnvFiles(projectRoot: string): string[] {
	const candidates = filterUnique(
		[process.env.TICKCAST_ENV_FILE, ".env", ".env.local"].filter(
			(value): value is string => Boolean(value)
		)
	);

	const read: string[] = [];
	candidates.forEach((candidate) => {
		const fullPath = path.isAbsolute(candidate)
			? candidate
			: path.join(projectRoot, candidate);
		if (!existsSync(fullPath) || loaded.has(fullPath)) {
			return;
		}
		dotenvConfig({ path: fullPath, override: true });
		loaded.add(fullPath);
		read.push(fullPath);
	});
	if (read.length) {
		refreshLoggerSettings();
	}
	return read;
}

function filterUnique(values: string[]): string[] {
	return values.filter((value, index) => values.indexOf(value) === index);
}
