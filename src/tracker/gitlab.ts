import { AuthError, NotFoundError, TrackerApiError } from "../errors.js";
import type {
	IssueRef,
	IssueState,
	NewIssue,
	ProjectHandle,
	TrackerClient,
} from "../types/index.js";

const DEFAULT_HOST = "https://gitlab.com";
const REQUEST_TIMEOUT_MS = 30_000;
const PAGE_SIZE = 100;

interface GitLabProject {
	id: number;
}

interface GitLabIssue {
	id: number;
	iid: number;
	title: string;
	description: string | null;
	state: string;
	web_url: string;
}

interface GitLabResponse<T> {
	data: T;
	nextPage: number | null;
}

export interface GitLabTrackerOptions {
	timeoutMs?: number;
	pageSize?: number;
}

// normalizeHost accepts "gitlab.example.com" as well as a full base URL.
export function normalizeHost(host: string): string {
	const trimmed = host.trim().replace(/\/+$/, "");
	if (!trimmed) return DEFAULT_HOST;
	return /^https?:\/\//.test(trimmed) ? trimmed : `https://${trimmed}`;
}

function toIssueState(state: string): IssueState {
	return state === "closed" ? "closed" : "open";
}

function apiError(status: number, text: string): TrackerApiError {
	const message = `GitLab API error (${status}): ${text}`;
	if (status === 401 || status === 403) return new AuthError(message, status);
	if (status === 404) return new NotFoundError(message, status);
	return new TrackerApiError(message, status);
}

export class GitLabTracker implements TrackerClient {
	readonly url: string;
	private readonly token: string;
	private readonly timeoutMs: number;
	readonly pageSize: number;

	constructor(host: string, token: string, options: GitLabTrackerOptions = {}) {
		this.url = normalizeHost(host);
		this.token = token;
		this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
		this.pageSize = options.pageSize ?? PAGE_SIZE;
	}

	async request<T>(method: string, path: string, body?: unknown): Promise<GitLabResponse<T>> {
		const url = `${this.url}/api/v4${path}`;
		const headers: Record<string, string> = {
			"PRIVATE-TOKEN": this.token,
			"Content-Type": "application/json",
		};

		let res: Response;
		try {
			res = await fetch(url, {
				method,
				headers,
				body: body !== undefined ? JSON.stringify(body) : undefined,
				signal: AbortSignal.timeout(this.timeoutMs),
			});
		} catch (err) {
			throw new TrackerApiError(`GitLab request failed: ${method} ${path}`, null, { cause: err });
		}

		if (!res.ok) {
			const text = await res.text();
			throw apiError(res.status, text);
		}

		const next = Number.parseInt(res.headers.get("x-next-page") ?? "", 10);
		return {
			data: (await res.json()) as T,
			nextPage: Number.isNaN(next) ? null : next,
		};
	}

	async getProject(id: number): Promise<ProjectHandle> {
		const { data } = await this.request<GitLabProject>("GET", `/projects/${id}`);
		return new GitLabProjectHandle(this, data);
	}
}

class GitLabProjectHandle implements ProjectHandle {
	readonly id: number;

	constructor(
		private readonly tracker: GitLabTracker,
		project: GitLabProject,
	) {
		this.id = project.id;
	}

	// Pages are requested only as the caller keeps iterating.
	async *listIssues(): AsyncGenerator<IssueRef> {
		let page: number | null = 1;
		while (page !== null) {
			const res: GitLabResponse<GitLabIssue[]> = await this.tracker.request<GitLabIssue[]>(
				"GET",
				`/projects/${this.id}/issues?per_page=${this.tracker.pageSize}&page=${page}`,
			);
			for (const issue of res.data) {
				yield new GitLabIssueRef(this.tracker, this.id, issue);
			}
			page = res.data.length > 0 ? res.nextPage : null;
		}
	}

	async createIssue(issue: NewIssue): Promise<IssueRef> {
		const { data } = await this.tracker.request<GitLabIssue>("POST", `/projects/${this.id}/issues`, {
			title: issue.title,
			description: issue.description,
			...(issue.assigneeId !== undefined ? { assignee_ids: [issue.assigneeId] } : {}),
		});
		return new GitLabIssueRef(this.tracker, this.id, data);
	}
}

export class GitLabIssueRef implements IssueRef {
	private data: GitLabIssue;
	private pendingState: IssueState | null = null;
	private pendingDescription: string | null = null;

	constructor(
		private readonly tracker: GitLabTracker,
		private readonly projectId: number,
		data: GitLabIssue,
	) {
		this.data = data;
	}

	get title(): string {
		return this.data.title;
	}

	get description(): string {
		return this.pendingDescription ?? this.data.description ?? "";
	}

	get state(): IssueState {
		return this.pendingState ?? toIssueState(this.data.state);
	}

	get url(): string {
		return this.data.web_url;
	}

	setState(state: IssueState): void {
		this.pendingState = state;
	}

	setDescription(text: string): void {
		this.pendingDescription = text;
	}

	async save(): Promise<void> {
		const changes: Record<string, string> = {};
		if (this.pendingState !== null && this.pendingState !== toIssueState(this.data.state)) {
			changes.state_event = this.pendingState === "open" ? "reopen" : "close";
		}
		if (this.pendingDescription !== null) {
			changes.description = this.pendingDescription;
		}

		if (Object.keys(changes).length > 0) {
			const { data } = await this.tracker.request<GitLabIssue>(
				"PUT",
				`/projects/${this.projectId}/issues/${this.data.iid}`,
				changes,
			);
			this.data = data;
		}
		this.pendingState = null;
		this.pendingDescription = null;
	}
}
