import { ConfigurationError } from "./errors.js";
import { createProcessHooks } from "./hooks.js";
import { KeyedMutex } from "./lock.js";
import * as logger from "./output/logger.js";
import { errorTypeName, formatDescription, formatTitle, formatTrace } from "./signature.js";
import { syncIssue } from "./sync.js";
import { GitLabTracker } from "./tracker/gitlab.js";
import type {
	HostHooks,
	IssueRef,
	ReporterConfig,
	ThreadErrorArgs,
	ThreadErrorHandler,
	TrackerClient,
	UncaughtErrorHandler,
} from "./types/index.js";

export interface ReporterOptions {
	/** Where the handlers get installed. Defaults to the current process. */
	hooks?: HostHooks;
	createClient?: (host: string, token: string) => TrackerClient;
	lock?: KeyedMutex;
	/** Clock used for the description timestamp. */
	now?: () => Date;
}

interface OriginalHandlers {
	uncaught: UncaughtErrorHandler;
	thread: ThreadErrorHandler | null;
}

const NOT_CONFIGURED = "Reporter not configured. Nothing to report.";

// The logger writes to a file that may have gone away; a reporting path must not throw on it.
function safely(write: () => void): void {
	try {
		write();
	} catch (err) {
		console.error(`[crashtrack] Logging failed: ${err instanceof Error ? err.message : "unknown error"}`);
	}
}

export class Reporter {
	private config: ReporterConfig | null = null;
	private originals: OriginalHandlers | null = null;
	private hostHooks: HostHooks | null;
	private readonly createClient: (host: string, token: string) => TrackerClient;
	private readonly lock: KeyedMutex;
	private readonly now: () => Date;

	readonly handleUncaughtError: UncaughtErrorHandler = async (errorType, errorValue, trace) => {
		try {
			await this.reportIfConfigured(errorType, errorValue, trace);
		} finally {
			await this.originalUncaught()(errorType, errorValue, trace);
		}
	};

	readonly handleUncaughtThreadError: ThreadErrorHandler = async (args) => {
		try {
			await this.reportIfConfigured(args.errorType, args.errorValue, args.trace);
		} finally {
			const original = this.originalThread();
			if (original) await original(args);
		}
	};

	constructor(options: ReporterOptions = {}) {
		this.hostHooks = options.hooks ?? null;
		this.createClient = options.createClient ?? ((host, token) => new GitLabTracker(host, token));
		this.lock = options.lock ?? new KeyedMutex();
		this.now = options.now ?? (() => new Date());
	}

	/**
	 * Configures the GitLab project that receives the issues and installs the handlers.
	 * Calling it again replaces the configuration; the handlers stay chained to whatever
	 * was installed before the first call.
	 */
	initialize(host: string, token: string, projectId: number, assigneeId?: number): void {
		this.configure({ client: this.createClient(host, token), projectId, assigneeId });
	}

	configure(config: ReporterConfig): void {
		this.config = { ...config };
		this.install();
	}

	isConfigured(): boolean {
		return this.config !== null;
	}

	getConfig(): Readonly<ReporterConfig> | null {
		return this.config;
	}

	install(): void {
		const hooks = this.hooks();
		if (!this.originals) {
			this.originals = { uncaught: hooks.uncaught.get(), thread: hooks.thread?.get() ?? null };
		}
		hooks.uncaught.set(this.handleUncaughtError);
		hooks.thread?.set(this.handleUncaughtThreadError);
	}

	/** Puts back the handlers that were active before the first install. Keeps the configuration. */
	uninstall(): void {
		if (!this.originals) return;
		const hooks = this.hooks();
		hooks.uncaught.set(this.originals.uncaught);
		if (this.originals.thread) hooks.thread?.set(this.originals.thread);
		this.originals = null;
	}

	isInstalled(): boolean {
		return this.originals !== null;
	}

	/**
	 * Opens or reopens the issue for an error. Never rejects: failures are logged and
	 * resolve to null.
	 */
	async report(errorType: string, errorValue: unknown, trace: string | null): Promise<IssueRef | null> {
		try {
			const config = this.config;
			if (!config) {
				throw new ConfigurationError("Reporter not initialized. Call initialize() first.");
			}

			const title = formatTitle(errorType, errorValue);
			const description = formatDescription(errorType, errorValue, trace, this.now());
			const issue = await this.lock.run(title, () =>
				syncIssue(config.client, config.projectId, title, description, config.assigneeId),
			);
			safely(() => logger.ok(`Reported "${title}"${issue.url ? ` to ${issue.url}` : ""}`));
			return issue;
		} catch (err) {
			safely(() => logger.exception("Failed to report uncaught error", err));
			return null;
		}
	}

	/** Reports an error the application caught itself. */
	async capture(error: unknown): Promise<IssueRef | null> {
		if (!this.isConfigured()) {
			safely(() => logger.log(NOT_CONFIGURED));
			return null;
		}
		return this.report(errorTypeName(error), error, formatTrace(error));
	}

	private async reportIfConfigured(errorType: string, errorValue: unknown, trace: string | null): Promise<void> {
		if (this.isConfigured()) {
			await this.report(errorType, errorValue, trace);
		} else {
			safely(() => logger.log(NOT_CONFIGURED));
		}
	}

	private hooks(): HostHooks {
		this.hostHooks ??= createProcessHooks();
		return this.hostHooks;
	}

	private originalUncaught(): UncaughtErrorHandler {
		return this.originals?.uncaught ?? this.hooks().uncaught.get();
	}

	private originalThread(): ThreadErrorHandler | null {
		if (this.originals) return this.originals.thread;
		return this.hooks().thread?.get() ?? null;
	}
}
