import { type ArchiveSummary, runArchiveMaintenance } from "../../backup/Archive";
import { cleanup, createFileBackup, createPatchBackup } from "../../backup/BackupStore";
import { withSkipWorktreeTransaction } from "../../git/SkipWorktree";
import { createPatchEngine, type PatchEngine } from "../../keep/PatchEngine";
import { getBackupRoot, getPatchesRoot, getPatchPath } from "../../shared/Layout";
import type { WorkspaceEntry } from "../../shared/Manifest";
import { type CommandContext, loadCommandContext, reportFailure } from "./context";
import { type Command, InvalidArgumentError } from "commander";
import { join } from "node:path";

interface ArchiveCommandOptions {
	force: boolean;
}

interface CleanupOptions {
	days?: number;
}

function parsePositiveInt(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new InvalidArgumentError("Expected a positive whole number.");
	}
	return parsed;
}

function printArchiveSummary(summary: ArchiveSummary): void {
	for (const path of summary.archived) {
		console.log(`Archived ${path}`);
	}
	for (const path of summary.existing) {
		console.log(`Already archived: ${path} (bucket left in place)`);
	}
	for (const failure of summary.failures) {
		reportFailure("archive", failure);
	}
	if (summary.archived.length === 0 && summary.existing.length === 0 && summary.failures.length === 0) {
		console.log("Nothing to archive.");
	}
}

/**
 * Backs up every keep file of one workspace that differs from HEAD, then writes its
 * patch and a backup of that patch. A patch already at the destination is backed up
 * before it is replaced.
 */
async function snapshotWorkspace(context: CommandContext, entry: WorkspaceEntry, patches: PatchEngine): Promise<number> {
	const { git, repoRoot } = context;
	const workspacePath = join(repoRoot, entry.path);
	const backupRoot = getBackupRoot(repoRoot);
	const patchesRoot = getPatchesRoot(repoRoot);

	const tracked = await git.filterTracked(workspacePath, entry.keep);
	for (const file of entry.keep.filter(keep => !tracked.includes(keep))) {
		console.log(`  ${entry.path}/${file}: not tracked, skipped`);
	}

	return withSkipWorktreeTransaction(git, workspacePath, tracked, async () => {
		const modified = new Set(await git.getModifiedFiles(workspacePath));
		let saved = 0;
		for (const file of tracked) {
			if (!modified.has(file)) {
				continue;
			}
			try {
				const backup = await createFileBackup(join(workspacePath, file), backupRoot, repoRoot);
				const patchPath = getPatchPath(repoRoot, entry.path, file);
				await createPatchBackup(patchPath, backupRoot, { patchesRoot });
				await patches.createPatch(workspacePath, file, patchPath);
				await createPatchBackup(patchPath, backupRoot, { patchesRoot });
				const location = backup.status === "missing" ? "file missing" : backup.path;
				console.log(`  ${entry.path}/${file}: ${location}`);
				saved++;
			} catch (error) {
				reportFailure(`snapshot ${entry.path}/${file}`, error);
			}
		}
		return saved;
	});
}

async function runSnapshot(path: string | undefined): Promise<void> {
	const context = await loadCommandContext(path);
	const patches = createPatchEngine(context.config.NEST_PATCH_TOOL);

	for (const entry of context.workspaces) {
		if (entry.keep.length === 0) {
			continue;
		}
		try {
			const saved = await snapshotWorkspace(context, entry, patches);
			console.log(`Snapshot of ${entry.path}: ${saved} modified keep file(s) backed up`);
		} catch (error) {
			reportFailure(`snapshot ${entry.path}`, error);
		}
	}

	const maintenance = await runArchiveMaintenance(context.repoRoot, {
		intervalHours: context.config.NEST_ARCHIVE_INTERVAL_HOURS,
	});
	if (maintenance.summary) {
		printArchiveSummary(maintenance.summary);
	}
}

async function runArchive(options: ArchiveCommandOptions): Promise<void> {
	const context = await loadCommandContext();
	const result = await runArchiveMaintenance(context.repoRoot, {
		force: options.force,
		intervalHours: context.config.NEST_ARCHIVE_INTERVAL_HOURS,
	});
	if (!result.summary) {
		console.log("Backups were checked recently. Use --force to archive now.");
		return;
	}
	printArchiveSummary(result.summary);
}

async function runCleanup(options: CleanupOptions): Promise<void> {
	const context = await loadCommandContext();
	const days = options.days ?? context.config.NEST_BACKUP_RETENTION_DAYS;
	const removed = await cleanup(getBackupRoot(context.repoRoot), days);
	console.log(`Removed ${removed} backup(s) older than ${days} day(s).`);
}

/**
 * Registers backup management commands.
 */
export function registerBackupCommands(program: Command): void {
	const backupCommand = program.command("backup").description("Back up, archive and prune keep-file backups");

	backupCommand
		.command("snapshot [path]")
		.description("Back up modified keep files and their patches")
		.action(async (path: string | undefined) => {
			try {
				await runSnapshot(path);
			} catch (error) {
				reportFailure("backup snapshot", error);
			}
		});

	backupCommand
		.command("archive")
		.description("Compress past months of backups into tar.gz archives")
		.option("-f, --force", "Run even if backups were checked recently", false)
		.action(async (options: ArchiveCommandOptions) => {
			try {
				await runArchive(options);
			} catch (error) {
				reportFailure("backup archive", error);
			}
		});

	backupCommand
		.command("cleanup")
		.description("Delete backups older than the retention period")
		.option("-d, --days <days>", "Retention in days (default: NEST_BACKUP_RETENTION_DAYS)", parsePositiveInt)
		.action(async (options: CleanupOptions) => {
			try {
				await runCleanup(options);
			} catch (error) {
				reportFailure("backup cleanup", error);
			}
		});
}
