import packageJson from "../../package.json";
import type { ExtractionContext } from "../types";

export const DEFAULT_CONCURRENCY = 8;

export interface ExtractionEnv {
	USC_ENGINE_VERSION?: string;
}

/**
 * Default clock/config collaborator. The engine attaches the returned
 * context to every record without reading the clock itself.
 */
export function createExtractionContext(
	env: ExtractionEnv = process.env,
	now: () => Date = () => new Date(),
): ExtractionContext {
	const engineVersion = env.USC_ENGINE_VERSION?.trim() || packageJson.version;
	return {
		extractedAt: now().toISOString(),
		engineVersion,
	};
}
