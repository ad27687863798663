import { AuthError, ConfigurationError, NotFoundError } from "./errors.js";
import type { IssueRef, ProjectHandle, TrackerClient } from "./types/index.js";

async function openProject(client: TrackerClient, projectId: number): Promise<ProjectHandle> {
	if (!Number.isInteger(projectId) || projectId <= 0) {
		throw new ConfigurationError(`Invalid project id: ${projectId}`);
	}
	try {
		return await client.getProject(projectId);
	} catch (err) {
		if (err instanceof NotFoundError || err instanceof AuthError) {
			throw new ConfigurationError(`Project ${projectId} is not reachable with this client`, {
				cause: err,
			});
		}
		throw err;
	}
}

async function reopenIssue(issue: IssueRef, description: string): Promise<void> {
	issue.setState("open");
	issue.setDescription(description);
	await issue.save();
}

/**
 * Reopens and refreshes the first issue titled exactly `title`, or creates one when
 * the project has none. Performs a single write either way.
 */
export async function syncIssue(
	client: TrackerClient,
	projectId: number,
	title: string,
	description: string,
	assigneeId?: number,
): Promise<IssueRef> {
	const project = await openProject(client, projectId);

	for await (const issue of project.listIssues()) {
		if (issue.title === title) {
			await reopenIssue(issue, description);
			return issue;
		}
	}

	return project.createIssue({ title, description, assigneeId });
}
