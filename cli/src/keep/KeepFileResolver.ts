/**
 * Keep-File Resolver
 *
 * For each keep file of a workspace whose upstream version changed, asks the user
 * whether to reapply the local edits on top of the remote version, discard them, or
 * leave the file alone. Reapplying always backs up the file and its patch first; if the
 * patch does not apply cleanly the file is left at the remote version and the patch
 * and backup stay on disk for manual recovery.
 *
 * The whole loop runs inside a skip-worktree transaction so the flag is restored on
 * every keep file however the loop ends.
 */

import {
	type BackupOptions,
	type BackupResult,
	createFileBackup,
	createPatchBackup,
	type PatchBackupOptions,
} from "../backup/BackupStore";
import type { GitClient } from "../git/Git";
import { withSkipWorktreeTransaction } from "../git/SkipWorktree";
import { BackupError, errorMessage, RemoteCheckError } from "../shared/errors";
import { getBackupRoot, getPatchesRoot, getPatchPath } from "../shared/Layout";
import { getLog } from "../shared/logger";
import type { PatchEngine } from "./PatchEngine";
import type { Prompter } from "./Prompter";
import { rm } from "node:fs/promises";
import { join } from "node:path";

const logger = getLog(import.meta);

export type KeepFileOutcome =
	/** Upstream did not change the file; nothing was touched. */
	| "unchanged"
	| "reapplied"
	| "discarded"
	| "skipped"
	/** File is at the remote version; patch and backup were kept for manual recovery. */
	| "retained"
	/** Not in the workspace's index, so it cannot carry the skip-worktree flag; left untouched. */
	| "untracked"
	| "failed";

export interface KeepFileResult {
	readonly file: string;
	readonly outcome: KeepFileOutcome;
	readonly patchPath?: string;
	readonly backupPath?: string;
	readonly error?: Error;
}

export interface KeepFileRequest {
	readonly workspacePath: string;
	readonly branch: string;
	readonly keepFiles: ReadonlyArray<string>;
	/** Parent repository root; backups and patches live under its `.workspaces/`. */
	readonly repoRoot: string;
	/** Workspace path relative to the parent root, used to namespace patches. */
	readonly workspaceRelPath: string;
}

export type ResolverGit = Pick<
	GitClient,
	"hasRemoteChanges" | "resetFile" | "getFileDiff" | "setSkipWorktree" | "clearSkipWorktree" | "filterTracked"
>;

export interface BackupWriter {
	createFileBackup(
		filePath: string,
		backupRoot: string,
		repoRoot: string,
		options?: BackupOptions,
	): Promise<BackupResult>;
	createPatchBackup(patchPath: string, backupRoot: string, options?: PatchBackupOptions): Promise<BackupResult>;
}

export interface KeepFileResolverDeps {
	readonly git: ResolverGit;
	readonly patches: PatchEngine;
	readonly prompter: Prompter;
	readonly backups?: BackupWriter;
	readonly now?: () => Date;
	/** Sink for user-facing lines (defaults to console.log). */
	readonly print?: (line: string) => void;
}

const defaultBackups: BackupWriter = { createFileBackup, createPatchBackup };

function asError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}

function backupLocation(result: BackupResult): string | undefined {
	return result.status === "missing" ? undefined : result.path;
}

/**
 * Resolves every keep file of one workspace in order. Per-file failures are reported in
 * the results; a failing prompt aborts the remaining files and rejects. Keep files that
 * are not tracked are reported and stay out of the skip-worktree transaction.
 */
export async function resolveKeepFiles(request: KeepFileRequest, deps: KeepFileResolverDeps): Promise<Array<KeepFileResult>> {
	const { workspacePath, branch, repoRoot, workspaceRelPath } = request;
	const { git, patches, prompter } = deps;
	const backups = deps.backups ?? defaultBackups;
	const print = deps.print ?? ((line: string) => console.log(line));
	const clock = { now: deps.now };
	const backupRoot = getBackupRoot(repoRoot);

	function warnRetained(file: string, reason: string, patchPath: string, backupPath: string | undefined): void {
		print(`  Warning: ${reason}`);
		print(`    ${file} now matches the remote version.`);
		print(`    Your local changes are kept in: ${patchPath}`);
		if (backupPath) {
			print(`    Backup of your version: ${backupPath}`);
		}
		print("    Apply the patch by hand once you have resolved the conflict.");
	}

	async function discard(file: string): Promise<KeepFileResult> {
		try {
			await git.resetFile(workspacePath, file, branch);
		} catch (err) {
			print(`  Warning: could not reset ${file}: ${errorMessage(err)}`);
			return { file, outcome: "failed", error: asError(err) };
		}
		print(`  Updated ${file} to the remote version (local changes discarded)`);
		return { file, outcome: "discarded" };
	}

	async function reapply(file: string): Promise<KeepFileResult> {
		const patchPath = getPatchPath(repoRoot, workspaceRelPath, file);

		let backupPath: string | undefined;
		try {
			backupPath = backupLocation(await backups.createFileBackup(join(workspacePath, file), backupRoot, repoRoot, clock));
		} catch (err) {
			const error = err instanceof BackupError ? err : new BackupError(file, errorMessage(err), { cause: err });
			print(`  Warning: ${error.message}`);
			print(`    ${file} was left untouched.`);
			return { file, outcome: "failed", error };
		}

		let diff: string;
		try {
			diff = await patches.createPatch(workspacePath, file, patchPath);
		} catch (err) {
			print(`  Warning: could not capture local changes to ${file}: ${errorMessage(err)}`);
			print(`    ${file} was left untouched.`);
			if (backupPath) {
				print(`    Backup of your version: ${backupPath}`);
			}
			return { file, outcome: "failed", backupPath, error: asError(err) };
		}

		if (diff.trim() === "") {
			await rm(patchPath, { force: true });
			try {
				await git.resetFile(workspacePath, file, branch);
			} catch (err) {
				print(`  Warning: could not reset ${file}: ${errorMessage(err)}`);
				return { file, outcome: "failed", backupPath, error: asError(err) };
			}
			print(`  Updated ${file} to the remote version (no local changes to reapply)`);
			return { file, outcome: "reapplied", backupPath };
		}

		try {
			await backups.createPatchBackup(patchPath, backupRoot, { ...clock, patchesRoot: getPatchesRoot(repoRoot) });
		} catch (err) {
			const error = err instanceof BackupError ? err : new BackupError(patchPath, errorMessage(err), { cause: err });
			print(`  Warning: ${error.message}`);
			print(`    ${file} was left untouched; its patch is at ${patchPath}`);
			return { file, outcome: "failed", patchPath, backupPath, error };
		}

		try {
			await git.resetFile(workspacePath, file, branch);
		} catch (err) {
			print(`  Warning: could not reset ${file}: ${errorMessage(err)}`);
			print(`    Your local changes are kept in: ${patchPath}`);
			return { file, outcome: "failed", patchPath, backupPath, error: asError(err) };
		}

		let conflict: boolean;
		try {
			conflict = await patches.checkPatch(workspacePath, patchPath);
		} catch (err) {
			warnRetained(file, `could not check the patch for ${file}: ${errorMessage(err)}`, patchPath, backupPath);
			return { file, outcome: "retained", patchPath, backupPath, error: asError(err) };
		}
		if (conflict) {
			warnRetained(file, `local changes to ${file} conflict with the remote version`, patchPath, backupPath);
			return { file, outcome: "retained", patchPath, backupPath };
		}

		try {
			await patches.applyPatch(workspacePath, patchPath);
		} catch (err) {
			try {
				await git.resetFile(workspacePath, file, branch);
			} catch (resetError) {
				logger.error(`Could not reset ${file} after a failed apply: ${errorMessage(resetError)}`);
			}
			warnRetained(file, `applying the patch for ${file} failed: ${errorMessage(err)}`, patchPath, backupPath);
			return { file, outcome: "retained", patchPath, backupPath, error: asError(err) };
		}

		await rm(patchPath, { force: true });
		print(`  Updated ${file} and reapplied local changes`);
		return { file, outcome: "reapplied", backupPath };
	}

	async function resolveFile(file: string): Promise<KeepFileResult> {
		let changed: boolean;
		try {
			changed = await git.hasRemoteChanges(workspacePath, file, branch);
		} catch (err) {
			const error = err instanceof RemoteCheckError ? err : new RemoteCheckError(file, errorMessage(err), { cause: err });
			print(`  Warning: ${error.message}`);
			return { file, outcome: "failed", error };
		}
		if (!changed) {
			logger.debug(`${file} has no upstream changes`);
			return { file, outcome: "unchanged" };
		}

		while (true) {
			const choice = await prompter.chooseKeepFileAction(file);
			switch (choice) {
				case "show-diff":
					try {
						await prompter.showDiff(await git.getFileDiff(workspacePath, file, branch));
					} catch (err) {
						print(`  Warning: could not show the diff for ${file}: ${errorMessage(err)}`);
					}
					break;
				case "skip":
					print(`  Skipped ${file} (keeping current state)`);
					return { file, outcome: "skipped" };
				case "discard":
					return discard(file);
				case "reapply":
					return reapply(file);
			}
		}
	}

	const tracked = await git.filterTracked(workspacePath, request.keepFiles);
	const trackedSet = new Set(tracked);

	return withSkipWorktreeTransaction(git, workspacePath, tracked, async () => {
		const results: Array<KeepFileResult> = [];
		for (const file of request.keepFiles) {
			if (!trackedSet.has(file)) {
				print(`  Warning: ${file} is not tracked in ${workspaceRelPath}; left untouched`);
				results.push({ file, outcome: "untracked" });
				continue;
			}
			results.push(await resolveFile(file));
		}
		return results;
	});
}
