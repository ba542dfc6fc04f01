import { createPatchEngine } from "../../keep/PatchEngine";
import { type KeepFileResult, resolveKeepFiles } from "../../keep/KeepFileResolver";
import { createTerminalPrompter, type Prompter } from "../../keep/Prompter";
import type { WorkspaceEntry } from "../../shared/Manifest";
import { type CommandContext, loadCommandContext, reportFailure } from "./context";
import type { Command } from "commander";
import { join } from "node:path";

interface PullOptions {
	yes: boolean;
}

function summarize(results: ReadonlyArray<KeepFileResult>): string {
	const counts = new Map<string, number>();
	for (const result of results) {
		counts.set(result.outcome, (counts.get(result.outcome) ?? 0) + 1);
	}
	return Array.from(counts, ([outcome, count]) => `${count} ${outcome}`).join(", ");
}

/**
 * Pulls one workspace. Returns false when the workspace needs attention
 * (keep files that failed or kept a patch for manual recovery).
 */
async function pullWorkspace(
	context: CommandContext,
	entry: WorkspaceEntry,
	prompter: Prompter,
	options: PullOptions,
): Promise<boolean> {
	const { git, repoRoot, config } = context;
	const workspacePath = join(repoRoot, entry.path);

	if (!(await git.isRepo(workspacePath))) {
		throw new Error(`${workspacePath} is not a git repository`);
	}
	const branch = entry.branch ?? (await git.getCurrentBranch(workspacePath));

	if (!options.yes && !(await prompter.confirm(`Pull ${entry.path} (${branch})?`, true))) {
		console.log(`Skipped ${entry.path}`);
		return true;
	}

	console.log(`Pulling ${entry.path} (${branch})...`);
	await git.fetch(workspacePath);
	const before = await git.getHeadCommit(workspacePath);

	let results: Array<KeepFileResult> = [];
	if (entry.keep.length > 0) {
		results = await resolveKeepFiles(
			{ workspacePath, branch, keepFiles: entry.keep, repoRoot, workspaceRelPath: entry.path },
			{ git, patches: createPatchEngine(config.NEST_PATCH_TOOL), prompter },
		);
	}

	await git.pull(workspacePath);
	const changed = await git.countChangedFiles(workspacePath, before);
	console.log(`Pulled ${entry.path}: ${changed} file(s) changed`);
	if (results.length > 0) {
		console.log(`  Keep files: ${summarize(results)}`);
	}
	return results.every(result => result.outcome !== "failed" && result.outcome !== "retained");
}

async function runPull(path: string | undefined, options: PullOptions): Promise<void> {
	const context = await loadCommandContext(path);
	if (context.workspaces.length === 0) {
		console.log("No workspaces configured.");
		return;
	}

	const prompter = createTerminalPrompter({ pager: context.config.PAGER });
	try {
		for (const entry of context.workspaces) {
			try {
				if (!(await pullWorkspace(context, entry, prompter, options))) {
					process.exitCode = 1;
				}
			} catch (error) {
				reportFailure(`pull ${entry.path}`, error);
			}
		}
	} finally {
		prompter.close();
	}
}

/**
 * Registers the pull command.
 */
export function registerPullCommands(program: Command): void {
	program
		.command("pull [path]")
		.description("Pull workspaces, carrying local changes to keep files over upstream updates")
		.option("-y, --yes", "Do not ask before pulling each workspace", false)
		.action(async (path: string | undefined, options: PullOptions) => {
			try {
				await runPull(path, options);
			} catch (error) {
				reportFailure("pull", error);
			}
		});
}
