import { applySettings, loadSettings } from "./config.js";
import { Reporter } from "./reporter.js";
import type { IssueRef } from "./types/index.js";

// Process-wide reporter used by the functions below.
export const reporter = new Reporter();

export function initialize(host: string, token: string, projectId: number, assigneeId?: number): void {
	reporter.initialize(host, token, projectId, assigneeId);
}

export function isConfigured(): boolean {
	return reporter.isConfigured();
}

export function capture(error: unknown): Promise<IssueRef | null> {
	return reporter.capture(error);
}

/** Initializes the process-wide reporter from `.crashtrack/config.yaml` and the environment. */
export function initializeFromConfig(cwd: string = process.cwd()): boolean {
	return applySettings(reporter, loadSettings(cwd));
}

export { Reporter, type ReporterOptions } from "./reporter.js";
export { syncIssue } from "./sync.js";
export { KeyedMutex } from "./lock.js";
export {
	errorTypeName,
	formatDescription,
	formatTitle,
	formatTrace,
	localIsoTimestamp,
} from "./signature.js";
export { createProcessHooks } from "./hooks.js";
export { GitLabTracker, type GitLabTrackerOptions } from "./tracker/gitlab.js";
export { findConfigDir, getConfigPath, loadSettings } from "./config.js";
export {
	AuthError,
	ConfigurationError,
	CrashtrackError,
	FormattingError,
	NotFoundError,
	TrackerApiError,
} from "./errors.js";
export type {
	HookSlot,
	HostHooks,
	IssueRef,
	IssueState,
	NewIssue,
	ProjectHandle,
	ReporterConfig,
	ThreadErrorArgs,
	ThreadErrorHandler,
	TrackerClient,
	UncaughtErrorHandler,
} from "./types/index.js";
