/**
 * In-memory tracker for tests. Issues live in `FakeTracker.issues`; writes made through
 * `save` and `createIssue` land there, so a second sync sees the first one's effect.
 */

import { NotFoundError, TrackerApiError } from "../errors.js";
import type {
	IssueRef,
	IssueState,
	NewIssue,
	ProjectHandle,
	TrackerClient,
} from "../types/index.js";

export interface StoredIssue {
	iid: number;
	title: string;
	description: string;
	state: IssueState;
	assigneeId?: number;
}

export class FakeIssue implements IssueRef {
	private pending: Partial<Pick<StoredIssue, "state" | "description">> = {};

	constructor(
		private readonly stored: StoredIssue,
		private readonly tracker: FakeTracker,
	) {}

	get title(): string {
		return this.stored.title;
	}

	get description(): string {
		return this.pending.description ?? this.stored.description;
	}

	get state(): IssueState {
		return this.pending.state ?? this.stored.state;
	}

	setState(state: IssueState): void {
		this.pending.state = state;
	}

	setDescription(text: string): void {
		this.pending.description = text;
	}

	async save(): Promise<void> {
		this.tracker.saves.push(this.stored.iid);
		Object.assign(this.stored, this.pending);
		this.pending = {};
	}
}

export class FakeTracker implements TrackerClient {
	readonly issues: StoredIssue[] = [];
	readonly saves: number[] = [];
	readonly created: NewIssue[] = [];
	/** Issues handed out by `listIssues`, in order. */
	readonly scanned: number[] = [];
	failScanAfter: number | null = null;
	projectIds: number[] = [1];

	constructor(issues: Omit<StoredIssue, "iid">[] = []) {
		for (const issue of issues) this.add(issue);
	}

	add(issue: Omit<StoredIssue, "iid">): StoredIssue {
		const stored = { iid: this.issues.length + 1, ...issue };
		this.issues.push(stored);
		return stored;
	}

	async getProject(id: number): Promise<ProjectHandle> {
		if (!this.projectIds.includes(id)) {
			throw new NotFoundError(`Project ${id} not found`, 404);
		}
		return {
			id,
			listIssues: () => this.listIssues(),
			createIssue: (issue) => this.createIssue(issue),
		};
	}

	private async *listIssues(): AsyncGenerator<IssueRef> {
		for (const stored of [...this.issues]) {
			if (this.failScanAfter !== null && this.scanned.length >= this.failScanAfter) {
				throw new TrackerApiError("GitLab API error (502): Bad Gateway", 502);
			}
			this.scanned.push(stored.iid);
			yield new FakeIssue(stored, this);
		}
		if (this.failScanAfter !== null && this.scanned.length >= this.failScanAfter) {
			throw new TrackerApiError("GitLab API error (502): Bad Gateway", 502);
		}
	}

	private async createIssue(issue: NewIssue): Promise<IssueRef> {
		this.created.push(issue);
		const stored = this.add({
			title: issue.title,
			description: issue.description,
			state: "open",
			assigneeId: issue.assigneeId,
		});
		return new FakeIssue(stored, this);
	}
}
