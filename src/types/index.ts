import type { Worker } from "node:worker_threads";

export type IssueState = "open" | "closed";

export interface IssueRef {
	readonly title: string;
	readonly description: string;
	readonly state: IssueState;
	readonly url?: string;
	setState(state: IssueState): void;
	setDescription(text: string): void;
	/** Persists the pending field changes. */
	save(): Promise<void>;
}

export interface NewIssue {
	title: string;
	description: string;
	assigneeId?: number;
}

export interface ProjectHandle {
	readonly id: number;
	/** Every issue of the project, open or closed, fetched page by page as it is consumed. */
	listIssues(): AsyncIterable<IssueRef>;
	createIssue(issue: NewIssue): Promise<IssueRef>;
}

export interface TrackerClient {
	getProject(id: number): Promise<ProjectHandle>;
}

export interface ReporterConfig {
	client: TrackerClient;
	projectId: number;
	assigneeId?: number;
}

export type UncaughtErrorHandler = (
	errorType: string,
	errorValue: unknown,
	trace: string | null,
) => void | Promise<void>;

export interface ThreadErrorArgs {
	errorType: string;
	errorValue: unknown;
	trace: string | null;
	thread: Worker | null;
}

export type ThreadErrorHandler = (args: ThreadErrorArgs) => void | Promise<void>;

export interface HookSlot<H> {
	get(): H;
	set(handler: H): void;
}

export interface HostHooks {
	uncaught: HookSlot<UncaughtErrorHandler>;
	/** Null where the runtime has no way to observe worker thread failures. */
	thread: HookSlot<ThreadErrorHandler> | null;
}

export type OutputModeSetting = "default" | "json" | "quiet";

export interface CrashtrackFileConfig {
	host?: string;
	token?: string;
	project_id?: number | string;
	assignee_id?: number | string;
	log_file?: string;
	output?: OutputModeSetting;
}

export interface CrashtrackSettings {
	host: string;
	token: string | null;
	projectId: number | null;
	assigneeId?: number;
	logFile?: string;
	output: OutputModeSetting;
}
