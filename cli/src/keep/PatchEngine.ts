/**
 * Patch Engine
 *
 * Captures a keep file's local edits as a unified diff against HEAD and reapplies
 * them with an external patch tool. `patch -p1` and `git apply` are supported; both
 * understand the `a/` and `b/` prefixes that `git diff` writes.
 */

import { combinedOutput, type ProcessResult, runProcess } from "../git/Exec";
import { ApplyError, DiffError, errorMessage, PatchToolError } from "../shared/errors";
import { getLog } from "../shared/logger";
import { mkdir, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

const logger = getLog(import.meta);

export type PatchTool = "patch" | "git";

export interface PatchEngine {
	/**
	 * Writes `git diff HEAD [-- file]` to `patchPath`, creating parent directories.
	 * Returns the diff; an empty diff is valid and means no local divergence.
	 */
	createPatch(workspacePath: string, file: string | undefined, patchPath: string): Promise<string>;
	/** Dry run. True when hunks fail or are rejected. */
	checkPatch(workspacePath: string, patchPath: string): Promise<boolean>;
	applyPatch(workspacePath: string, patchPath: string): Promise<void>;
}

interface ToolBackend {
	readonly command: string;
	args(patchPath: string, dryRun: boolean): Array<string>;
	isConflict(output: string): boolean;
}

const BACKENDS: Record<PatchTool, ToolBackend> = {
	patch: {
		command: "patch",
		// No .orig or .rej files are left behind when hunks fail
		args: (patchPath, dryRun) => [
			"-p1",
			"--force",
			"--no-backup-if-mismatch",
			"--reject-file=-",
			...(dryRun ? ["--dry-run"] : []),
			"-i",
			patchPath,
		],
		isConflict: output => output.includes("FAILED") || output.includes("rejected"),
	},
	git: {
		command: "git",
		args: (patchPath, dryRun) => ["apply", ...(dryRun ? ["--check"] : []), patchPath],
		isConflict: output => output.includes("patch does not apply") || output.includes("patch failed"),
	},
};

async function requirePatchFile(patchPath: string): Promise<void> {
	try {
		await stat(patchPath);
	} catch (err) {
		throw new PatchToolError(patchPath, "Patch file not found", errorMessage(err));
	}
}

export function createPatchEngine(tool: PatchTool = "patch"): PatchEngine {
	const backend = BACKENDS[tool];

	async function runTool(workspacePath: string, patchPath: string, dryRun: boolean): Promise<ProcessResult> {
		try {
			return await runProcess(backend.command, backend.args(patchPath, dryRun), { cwd: workspacePath });
		} catch (err) {
			throw new PatchToolError(patchPath, `Could not run ${backend.command}`, errorMessage(err));
		}
	}

	return {
		async createPatch(workspacePath, file, patchPath) {
			const args = ["diff", "HEAD", ...(file ? ["--", file] : [])];
			let result: ProcessResult;
			try {
				result = await runProcess("git", args, { cwd: workspacePath });
			} catch (err) {
				throw new DiffError("git diff could not be started", errorMessage(err));
			}
			if (result.exitCode !== 0) {
				throw new DiffError(`git diff failed (exit ${result.exitCode})`, result.stderr.trim());
			}

			try {
				await mkdir(dirname(patchPath), { recursive: true });
				await writeFile(patchPath, result.stdout, "utf8");
			} catch (err) {
				throw new DiffError(`Failed to write ${patchPath}`, errorMessage(err));
			}
			logger.debug(`Wrote ${result.stdout.length} byte patch to ${patchPath}`);
			return result.stdout;
		},

		async checkPatch(workspacePath, patchPath) {
			await requirePatchFile(patchPath);
			const result = await runTool(workspacePath, patchPath, true);
			if (result.exitCode === 0) {
				return false;
			}
			const output = combinedOutput(result);
			if (backend.isConflict(output)) {
				logger.info(`Dry run of ${patchPath} reports conflicts`);
				return true;
			}
			throw new PatchToolError(patchPath, `${backend.command} check failed (exit ${result.exitCode})`, output);
		},

		async applyPatch(workspacePath, patchPath) {
			await requirePatchFile(patchPath);
			const result = await runTool(workspacePath, patchPath, false);
			if (result.exitCode !== 0) {
				throw new ApplyError(patchPath, combinedOutput(result));
			}
		},
	};
}
