import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

/**
 * Configuration schema definition
 */
const configSchema = {
	// Log level for pino logger
	LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("warn"),

	// Remote used for upstream comparisons. When unset, the branch's tracking ref is used
	// (falling back to origin/<branch>).
	NEST_UPSTREAM_REMOTE: z.string().trim().min(1).optional(),

	// External tool used to check and apply keep-file patches
	NEST_PATCH_TOOL: z.enum(["patch", "git"]).default("patch"),

	// Minimum hours between two archive scans of the backup tree
	NEST_ARCHIVE_INTERVAL_HOURS: z.coerce.number().positive().default(24),

	// Default retention for `backup cleanup`
	NEST_BACKUP_RETENTION_DAYS: z.coerce.number().int().positive().default(90),

	// Pager used to display diffs (falls back to plain stdout)
	PAGER: z.string().optional(),
};

/**
 * Infer the config type from the schema
 */
type ConfigSchema = typeof configSchema;
export type Config = {
	[K in keyof ConfigSchema]: z.infer<ConfigSchema[K]>;
};

/**
 * Parse a .env file content into key-value pairs.
 * Supports basic .env format: KEY=value, with optional quotes.
 */
function parseEnvFile(content: string): Record<string, string> {
	const result: Record<string, string> = {};

	for (const line of content.split("\n")) {
		const trimmed = line.trim();
		if (!trimmed || trimmed.startsWith("#")) {
			continue;
		}

		const eqIndex = trimmed.indexOf("=");
		if (eqIndex === -1) {
			continue;
		}

		const key = trimmed.slice(0, eqIndex).trim();
		let value = trimmed.slice(eqIndex + 1).trim();

		if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
			value = value.slice(1, -1);
		}

		result[key] = value;
	}

	return result;
}

/**
 * Load .env file from a path, returning empty object if file doesn't exist.
 */
function loadEnvFile(path: string): Record<string, string> {
	try {
		const content = readFileSync(path, "utf-8");
		return parseEnvFile(content);
	} catch {
		return {};
	}
}

/**
 * Load environment variables from .env files.
 * Priority (highest to lowest):
 * 1. Process environment variables (e.g., from shell)
 * 2. .env in current working directory (project-level)
 * 3. ~/.git-nest/.env (user-level)
 */
function loadEnvFiles(): Record<string, string> {
	const userEnv = loadEnvFile(join(homedir(), ".git-nest", ".env"));
	const localEnv = loadEnvFile(join(process.cwd(), ".env"));
	return { ...userEnv, ...localEnv };
}

/**
 * Parse environment variables and return validated config
 */
function createConfig(): Config {
	const envFromFiles = loadEnvFiles();

	function getEnvValue(key: keyof ConfigSchema): string | undefined {
		const envValue = process.env[key] ?? envFromFiles[key];
		// Treat empty string as undefined so defaults apply
		return envValue === "" ? undefined : envValue;
	}

	return {
		LOG_LEVEL: configSchema.LOG_LEVEL.parse(getEnvValue("LOG_LEVEL")),
		NEST_UPSTREAM_REMOTE: configSchema.NEST_UPSTREAM_REMOTE.parse(getEnvValue("NEST_UPSTREAM_REMOTE")),
		NEST_PATCH_TOOL: configSchema.NEST_PATCH_TOOL.parse(getEnvValue("NEST_PATCH_TOOL")),
		NEST_ARCHIVE_INTERVAL_HOURS: configSchema.NEST_ARCHIVE_INTERVAL_HOURS.parse(
			getEnvValue("NEST_ARCHIVE_INTERVAL_HOURS"),
		),
		NEST_BACKUP_RETENTION_DAYS: configSchema.NEST_BACKUP_RETENTION_DAYS.parse(
			getEnvValue("NEST_BACKUP_RETENTION_DAYS"),
		),
		PAGER: configSchema.PAGER.parse(getEnvValue("PAGER")),
	};
}

/**
 * Cached config instance
 */
let currentConfig: Config | undefined;

/**
 * Gets the current configuration object.
 * Config is created on first access and cached.
 */
export function getConfig(): Config {
	if (!currentConfig) {
		currentConfig = createConfig();
	}
	return currentConfig;
}

/**
 * Resets the config cache (useful for testing)
 */
export function resetConfig(): void {
	currentConfig = undefined;
}
