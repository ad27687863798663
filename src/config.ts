import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { parse } from "yaml";
import { ConfigurationError } from "./errors.js";
import * as logger from "./output/logger.js";
import type { Reporter } from "./reporter.js";
import type { CrashtrackFileConfig, CrashtrackSettings, OutputModeSetting } from "./types/index.js";

const CONFIG_DIR = ".crashtrack";
const CONFIG_FILE = "config.yaml";
const DEFAULT_HOST = "https://gitlab.com";
const OUTPUT_MODES: OutputModeSetting[] = ["default", "json", "quiet"];

export function getConfigPath(cwd: string = process.cwd()): string {
	return resolve(cwd, CONFIG_DIR, CONFIG_FILE);
}

export function findConfigDir(startDir: string = process.cwd()): string | null {
	let dir = startDir;
	while (true) {
		if (existsSync(getConfigPath(dir))) return dir;
		const parent = resolve(dir, "..");
		if (parent === dir) return null; // filesystem root
		dir = parent;
	}
}

function stringField(fields: Map<string, unknown>, key: string): string | undefined {
	const value = fields.get(key);
	if (value === undefined || value === null) return undefined;
	if (typeof value !== "string") {
		throw new ConfigurationError(`${key} must be a string`);
	}
	return value;
}

function idField(fields: Map<string, unknown>, key: string): number | string | undefined {
	const value = fields.get(key);
	if (value === undefined || value === null) return undefined;
	if (typeof value !== "number" && typeof value !== "string") {
		throw new ConfigurationError(`${key} must be a number`);
	}
	return value;
}

function isOutputMode(value: string): value is OutputModeSetting {
	return OUTPUT_MODES.some((mode) => mode === value);
}

function outputField(value: string | undefined): OutputModeSetting | undefined {
	if (value === undefined) return undefined;
	if (!isOutputMode(value)) {
		throw new ConfigurationError(`output must be one of ${OUTPUT_MODES.join(", ")}, got "${value}"`);
	}
	return value;
}

export function readConfigFile(path: string): CrashtrackFileConfig {
	const parsed: unknown = parse(readFileSync(path, "utf-8"));
	if (parsed === null || parsed === undefined) return {};
	if (typeof parsed !== "object" || Array.isArray(parsed)) {
		throw new ConfigurationError(`${path} must contain a mapping`);
	}

	const fields = new Map(Object.entries(parsed));
	return {
		host: stringField(fields, "host"),
		token: stringField(fields, "token"),
		project_id: idField(fields, "project_id"),
		assignee_id: idField(fields, "assignee_id"),
		log_file: stringField(fields, "log_file"),
		output: outputField(stringField(fields, "output")),
	};
}

// parseId accepts a positive integer or its decimal string form.
export function parseId(value: number | string | undefined, field: string): number | null {
	if (value === undefined || value === "") return null;
	if (typeof value === "number") {
		if (Number.isInteger(value) && value > 0) return value;
	} else if (/^\d+$/.test(value.trim())) {
		const parsed = Number.parseInt(value, 10);
		if (parsed > 0) return parsed;
	}
	throw new ConfigurationError(`Invalid ${field}: ${value}`);
}

// An unset or empty variable falls back to the file value, whatever that value is.
function envOr(value: string | undefined, fallback: number | string | undefined): number | string | undefined {
	return value === undefined || value === "" ? fallback : value;
}

/**
 * Reads `.crashtrack/config.yaml` from `cwd` or the nearest parent that has one, then
 * applies the environment on top:
 *
 * - `GITLAB_BASE_URL` → host
 * - `GITLAB_TOKEN` → token
 * - `CRASHTRACK_PROJECT_ID` / `CRASHTRACK_ASSIGNEE_ID`
 * - `CRASHTRACK_OUTPUT` → default | json | quiet
 */
export function loadSettings(
	cwd: string = process.cwd(),
	env: NodeJS.ProcessEnv = process.env,
): CrashtrackSettings {
	const configDir = findConfigDir(cwd);
	const configPath = configDir ? getConfigPath(configDir) : null;
	const file = configPath ? readConfigFile(configPath) : {};

	const logFile = file.log_file && configPath ? resolve(dirname(configPath), file.log_file) : undefined;

	return {
		host: env.GITLAB_BASE_URL || file.host || DEFAULT_HOST,
		token: env.GITLAB_TOKEN || file.token || null,
		projectId: parseId(envOr(env.CRASHTRACK_PROJECT_ID, file.project_id), "project_id"),
		assigneeId: parseId(envOr(env.CRASHTRACK_ASSIGNEE_ID, file.assignee_id), "assignee_id") ?? undefined,
		logFile,
		output: outputField(env.CRASHTRACK_OUTPUT || undefined) ?? file.output ?? "default",
	};
}

/**
 * Applies logging settings and initializes `reporter` when a token and a project are set.
 * Returns whether the reporter is now configured.
 */
export function applySettings(reporter: Reporter, settings: CrashtrackSettings): boolean {
	logger.setOutputMode(settings.output);
	if (settings.logFile) logger.initLogFile(settings.logFile);

	if (!settings.token || settings.projectId === null) {
		logger.warn(
			"GITLAB_TOKEN and CRASHTRACK_PROJECT_ID are required; uncaught errors will not be reported.",
		);
		return false;
	}

	reporter.initialize(settings.host, settings.token, settings.projectId, settings.assigneeId);
	return true;
}
