import { config as dotenvConfig } from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";

const loaded = new Set<string>();

export const ENV_FILE_VARIABLE = "ALGORUNNER_ENV_FILE";

/**
 * Load `.env` style files from the project root. Later files override earlier
 * ones; each file is read at most once per process.
 */
export function loadEnvFiles(projectRoot: string): string[] {
	const candidates = filterUnique(
		[process.env[ENV_FILE_VARIABLE], ".env", ".env.local"].filter(
			(value): value is string => typeof value === "string" && value.length > 0
		)
	);

	const applied: string[] = [];
	candidates.forEach((candidate) => {
		const fullPath = path.isAbsolute(candidate)
			? candidate
			: path.join(projectRoot, candidate);
		if (!existsSync(fullPath) || loaded.has(fullPath)) {
			return;
		}
		dotenvConfig({ path: fullPath, override: true });
		loaded.add(fullPath);
		applied.push(fullPath);
	});
	return applied;
}

function filterUnique(values: string[]): string[] {
	return values.filter((value, index) => values.indexOf(value) === index);
}

export const readEnvString = (
	env: NodeJS.ProcessEnv,
	key: string
): string | undefined => {
	const value = env[key]?.trim();
	return value ? value : undefined;
};
