import { errorMessage } from "../shared/errors";
import { getLog } from "../shared/logger";
import type { GitClient } from "./Git";

const logger = getLog(import.meta);

export type SkipWorktreeGit = Pick<GitClient, "setSkipWorktree" | "clearSkipWorktree">;

/**
 * Runs `work` with the skip-worktree flag cleared on `files` and sets it again on the
 * same files however `work` ends.
 *
 * A failure to clear is logged and `work` still runs. A failure to restore is thrown
 * when `work` succeeded; when `work` failed, its error wins and the restore failure
 * is logged.
 */
export async function withSkipWorktreeTransaction<T>(
	git: SkipWorktreeGit,
	workspacePath: string,
	files: ReadonlyArray<string>,
	work: () => Promise<T>,
): Promise<T> {
	const snapshot = [...files];
	if (snapshot.length === 0) {
		return work();
	}

	try {
		await git.clearSkipWorktree(workspacePath, snapshot);
	} catch (err) {
		logger.warn(`Could not clear skip-worktree in ${workspacePath}: ${errorMessage(err)}`);
	}

	let result: T;
	try {
		result = await work();
	} catch (workError) {
		try {
			await git.setSkipWorktree(workspacePath, snapshot);
		} catch (restoreError) {
			logger.error(`Could not restore skip-worktree in ${workspacePath}: ${errorMessage(restoreError)}`);
		}
		throw workError;
	}

	await git.setSkipWorktree(workspacePath, snapshot);
	return result;
}
