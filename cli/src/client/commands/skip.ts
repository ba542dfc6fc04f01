import { loadCommandContext, reportFailure } from "./context";
import type { Command } from "commander";
import { join } from "node:path";

async function runSkipApply(path: string | undefined): Promise<void> {
	const { git, repoRoot, workspaces } = await loadCommandContext(path);
	for (const entry of workspaces) {
		if (entry.keep.length === 0) {
			continue;
		}
		try {
			const workspacePath = join(repoRoot, entry.path);
			const tracked = await git.filterTracked(workspacePath, entry.keep);
			await git.setSkipWorktree(workspacePath, tracked);
			console.log(`${entry.path}: skip-worktree set on ${tracked.length} keep file(s)`);
			for (const file of entry.keep.filter(keep => !tracked.includes(keep))) {
				console.log(`  ${file}: not tracked, skipped`);
			}
		} catch (error) {
			reportFailure(`skip apply ${entry.path}`, error);
		}
	}
}

async function runSkipList(path: string | undefined): Promise<void> {
	const { git, repoRoot, workspaces } = await loadCommandContext(path);
	for (const entry of workspaces) {
		try {
			const flagged = new Set(await git.listSkipWorktree(join(repoRoot, entry.path)));
			console.log(`${entry.path}:`);
			for (const file of flagged) {
				console.log(`  ${file}`);
			}
			for (const file of entry.keep.filter(keep => !flagged.has(keep))) {
				console.log(`  ${file} (keep file, flag missing)`);
			}
		} catch (error) {
			reportFailure(`skip list ${entry.path}`, error);
		}
	}
}

/**
 * Registers skip-worktree maintenance commands.
 */
export function registerSkipCommands(program: Command): void {
	const skipCommand = program.command("skip").description("Inspect and repair skip-worktree flags on keep files");

	skipCommand
		.command("apply [path]")
		.description("Set skip-worktree on every keep file")
		.action(async (path: string | undefined) => {
			try {
				await runSkipApply(path);
			} catch (error) {
				reportFailure("skip apply", error);
			}
		});

	skipCommand
		.command("list [path]")
		.description("List files with skip-worktree set")
		.action(async (path: string | undefined) => {
			try {
				await runSkipList(path);
			} catch (error) {
				reportFailure("skip list", error);
			}
		});
}
