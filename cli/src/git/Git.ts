/**
 * Git collaborator
 *
 * Thin wrapper over the `git` binary for the operations keep-file handling needs.
 * Every call runs with the workspace as its working directory.
 */

import { errorMessage, GitCommandError, RemoteCheckError, SkipWorktreeError } from "../shared/errors";
import { getLog } from "../shared/logger";
import { combinedOutput, type ProcessResult, runProcess } from "./Exec";

const logger = getLog(import.meta);

export interface GitClient {
	isRepo(path: string): Promise<boolean>;
	/** Top-level directory of the repository containing `cwd`. */
	getRepoRoot(cwd: string): Promise<string>;
	getCurrentBranch(path: string): Promise<string>;
	fetch(path: string): Promise<void>;
	pull(path: string): Promise<void>;
	/** Reference that `branch` is compared against, e.g. `origin/main`. */
	resolveUpstreamRef(path: string, branch: string): Promise<string>;
	/**
	 * Whether the upstream version of `file` differs from HEAD.
	 * False when the upstream reference does not exist.
	 */
	hasRemoteChanges(path: string, file: string, branch: string): Promise<boolean>;
	getFileDiff(path: string, file: string, branch: string): Promise<string>;
	/** Overwrites the working copy of `file` with its upstream version. */
	resetFile(path: string, file: string, branch: string): Promise<void>;
	setSkipWorktree(path: string, files: ReadonlyArray<string>): Promise<void>;
	clearSkipWorktree(path: string, files: ReadonlyArray<string>): Promise<void>;
	listSkipWorktree(path: string): Promise<Array<string>>;
	/** The files present in the index, in the order given. Untracked files cannot carry the skip-worktree flag. */
	filterTracked(path: string, files: ReadonlyArray<string>): Promise<Array<string>>;
	/** Tracked files whose working copy differs from HEAD. */
	getModifiedFiles(path: string): Promise<Array<string>>;
	countChangedFiles(path: string, fromRef: string): Promise<number>;
	getHeadCommit(path: string): Promise<string>;
}

export interface GitClientOptions {
	/** Compare against `<remote>/<branch>` instead of the branch's tracking reference. */
	readonly upstreamRemote?: string;
}

function lines(output: string): Array<string> {
	return output
		.split("\n")
		.map(line => line.trim())
		.filter(line => line.length > 0);
}

export function createGitClient(options: GitClientOptions = {}): GitClient {
	function git(cwd: string, args: ReadonlyArray<string>): Promise<ProcessResult> {
		logger.debug(`git ${args.join(" ")} (in ${cwd})`);
		return runProcess("git", args, { cwd });
	}

	async function gitOrThrow(cwd: string, args: ReadonlyArray<string>): Promise<string> {
		const result = await git(cwd, args);
		if (result.exitCode !== 0) {
			throw new GitCommandError(args, result.exitCode, combinedOutput(result));
		}
		return result.stdout;
	}

	async function resolveUpstreamRef(path: string, branch: string): Promise<string> {
		if (options.upstreamRemote) {
			return `${options.upstreamRemote}/${branch}`;
		}
		const tracking = await git(path, ["rev-parse", "--abbrev-ref", "--symbolic-full-name", `${branch}@{upstream}`]);
		const ref = tracking.stdout.trim();
		if (tracking.exitCode === 0 && ref.length > 0) {
			return ref;
		}
		return `origin/${branch}`;
	}

	async function updateSkipWorktree(path: string, files: ReadonlyArray<string>, action: "set" | "clear") {
		const flag = action === "set" ? "--skip-worktree" : "--no-skip-worktree";
		const failures: Array<{ file: string; output: string }> = [];
		for (const file of files) {
			const result = await git(path, ["update-index", flag, "--", file]);
			if (result.exitCode !== 0) {
				failures.push({ file, output: combinedOutput(result) });
			}
		}
		if (failures.length > 0) {
			throw new SkipWorktreeError(action, failures);
		}
	}

	return {
		async isRepo(path) {
			try {
				const result = await git(path, ["rev-parse", "--is-inside-work-tree"]);
				return result.exitCode === 0 && result.stdout.trim() === "true";
			} catch (err) {
				logger.debug(`${path} is not a repository: ${errorMessage(err)}`);
				return false;
			}
		},

		async getRepoRoot(cwd) {
			return (await gitOrThrow(cwd, ["rev-parse", "--show-toplevel"])).trim();
		},

		async getCurrentBranch(path) {
			return (await gitOrThrow(path, ["rev-parse", "--abbrev-ref", "HEAD"])).trim();
		},

		async fetch(path) {
			await gitOrThrow(path, ["fetch"]);
		},

		async pull(path) {
			await gitOrThrow(path, ["pull"]);
		},

		resolveUpstreamRef,

		async hasRemoteChanges(path, file, branch) {
			try {
				const ref = await resolveUpstreamRef(path, branch);
				const verify = await git(path, ["rev-parse", "--verify", "--quiet", `${ref}^{commit}`]);
				if (verify.exitCode !== 0) {
					logger.debug(`Upstream ${ref} does not exist in ${path}`);
					return false;
				}
				const diff = await git(path, ["diff", "--quiet", "HEAD", ref, "--", file]);
				if (diff.exitCode === 0) {
					return false;
				}
				if (diff.exitCode === 1) {
					return true;
				}
				throw new Error(`git diff exited with ${diff.exitCode}: ${combinedOutput(diff)}`);
			} catch (err) {
				throw new RemoteCheckError(file, errorMessage(err), { cause: err });
			}
		},

		async getFileDiff(path, file, branch) {
			const ref = await resolveUpstreamRef(path, branch);
			return gitOrThrow(path, ["diff", "HEAD", ref, "--", file]);
		},

		async resetFile(path, file, branch) {
			const ref = await resolveUpstreamRef(path, branch);
			await gitOrThrow(path, ["checkout", ref, "--", file]);
		},

		async setSkipWorktree(path, files) {
			await updateSkipWorktree(path, files, "set");
		},

		async clearSkipWorktree(path, files) {
			await updateSkipWorktree(path, files, "clear");
		},

		async listSkipWorktree(path) {
			const output = await gitOrThrow(path, ["ls-files", "-v"]);
			return output
				.split("\n")
				.filter(line => line.startsWith("S "))
				.map(line => line.slice(2));
		},

		async filterTracked(path, files) {
			if (files.length === 0) {
				return [];
			}
			const output = await gitOrThrow(path, ["--literal-pathspecs", "ls-files", "-z", "--", ...files]);
			const tracked = new Set(output.split("\0").filter(name => name.length > 0));
			return files.filter(file => tracked.has(file));
		},

		async getModifiedFiles(path) {
			return lines(await gitOrThrow(path, ["diff", "--name-only", "HEAD"]));
		},

		async countChangedFiles(path, fromRef) {
			return lines(await gitOrThrow(path, ["diff", "--name-only", fromRef, "HEAD"])).length;
		},

		async getHeadCommit(path) {
			return (await gitOrThrow(path, ["rev-parse", "HEAD"])).trim();
		},
	};
}
