/**
 * Backup Store
 *
 * Timestamped, content-deduplicated copies of keep files and their patches:
 *
 *   <backupRoot>/modified/<yyyy>/<mm>/<dd>/<relDir>/<name>.<yyyymmdd_hhmmss><ext>
 *   <backupRoot>/patched/<yyyy>/<mm>/<dd>/<relDir>/<name>.<yyyymmdd_hhmmss><ext>
 *
 * A backup is skipped when the newest backup of the same logical path in today's bucket
 * has the same SHA-256 digest. Existing backups are never overwritten.
 */

import { BackupError, errorMessage } from "../shared/errors";
import { type BackupKind, relativeToPatchesRoot } from "../shared/Layout";
import { getLog } from "../shared/logger";
import { filesIdentical } from "./Hasher";
import type { Dirent } from "node:fs";
import { type FileHandle, mkdir, open, readdir, readFile, rm, stat } from "node:fs/promises";
import { basename, dirname, extname, isAbsolute, join, relative, sep } from "node:path";

const logger = getLog(import.meta);

const MAX_SAME_SECOND_BACKUPS = 100;

export type BackupResult =
	| { readonly status: "created"; readonly path: string }
	| { readonly status: "unchanged"; readonly path: string }
	| { readonly status: "missing" };

export interface BackupOptions {
	/** Clock used for the day bucket and the timestamp (defaults to the current time). */
	readonly now?: () => Date;
}

export interface PatchBackupOptions extends BackupOptions {
	/** Root the patch's logical path is computed against (defaults to `.workspaces/patches/`). */
	readonly patchesRoot?: string;
}

const pad = (n: number, width = 2) => n.toString().padStart(width, "0");

/** `yyyymmdd_hhmmss` in local time. */
export function formatBackupTimestamp(date: Date): string {
	return (
		`${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
		`_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
	);
}

/** `<kind>/<yyyy>/<mm>/<dd>` under the backup root. */
export function getDayBucket(backupRoot: string, kind: BackupKind, date: Date): string {
	return join(backupRoot, kind, pad(date.getFullYear(), 4), pad(date.getMonth() + 1), pad(date.getDate()));
}

function splitName(fileName: string): { name: string; ext: string } {
	const ext = extname(fileName);
	return { name: fileName.slice(0, fileName.length - ext.length), ext };
}

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function escapesRoot(relPath: string): boolean {
	return relPath === ".." || relPath.startsWith(`..${sep}`) || isAbsolute(relPath);
}

function isErrnoCode(err: unknown, code: string): boolean {
	return err instanceof Error && "code" in err && err.code === code;
}

/**
 * Newest backup of `relPath` inside `dayDir`, or undefined when there is none.
 * Timestamps are fixed-width, so the lexicographic maximum is the newest.
 */
export async function findLatestBackup(dayDir: string, relPath: string): Promise<string | undefined> {
	const targetDir = join(dayDir, dirname(relPath));
	const { name, ext } = splitName(basename(relPath));
	const pattern = new RegExp(`^${escapeRegExp(name)}\\.\\d{8}_\\d{6}(?:_\\d{2})?${escapeRegExp(ext)}$`);

	let entries: Array<string>;
	try {
		const dirents = await readdir(targetDir, { withFileTypes: true });
		entries = dirents.filter(entry => entry.isFile()).map(entry => entry.name);
	} catch (err) {
		if (isErrnoCode(err, "ENOENT") || isErrnoCode(err, "ENOTDIR")) {
			return;
		}
		throw err;
	}

	let latest: string | undefined;
	for (const entry of entries) {
		if (pattern.test(entry) && (latest === undefined || entry > latest)) {
			latest = entry;
		}
	}
	return latest === undefined ? undefined : join(targetDir, latest);
}

async function writeExclusive(sourcePath: string, targetPath: string): Promise<boolean> {
	const data = await readFile(sourcePath);
	let handle: FileHandle;
	try {
		handle = await open(targetPath, "wx");
	} catch (err) {
		if (isErrnoCode(err, "EEXIST")) {
			return false;
		}
		throw err;
	}
	try {
		await handle.writeFile(data);
		await handle.sync();
	} finally {
		await handle.close();
	}
	return true;
}

async function createBackup(
	sourcePath: string,
	relPath: string,
	backupRoot: string,
	kind: BackupKind,
	now: Date,
): Promise<BackupResult> {
	try {
		await stat(sourcePath);
	} catch (err) {
		if (isErrnoCode(err, "ENOENT")) {
			return { status: "missing" };
		}
		throw new BackupError(sourcePath, errorMessage(err), { cause: err });
	}

	const dayDir = getDayBucket(backupRoot, kind, now);
	try {
		const latest = await findLatestBackup(dayDir, relPath);
		if (latest && (await filesIdentical(sourcePath, latest))) {
			logger.debug(`Backup of ${relPath} unchanged since ${latest}`);
			return { status: "unchanged", path: latest };
		}
	} catch (err) {
		logger.warn(`Could not compare ${relPath} with today's backups, writing a new one: ${errorMessage(err)}`);
	}

	const targetDir = join(dayDir, dirname(relPath));
	const { name, ext } = splitName(basename(relPath));
	const timestamp = formatBackupTimestamp(now);

	try {
		await mkdir(targetDir, { recursive: true });
		for (let counter = 0; counter < MAX_SAME_SECOND_BACKUPS; counter++) {
			const suffix = counter === 0 ? "" : `_${pad(counter)}`;
			const targetPath = join(targetDir, `${name}.${timestamp}${suffix}${ext}`);
			if (await writeExclusive(sourcePath, targetPath)) {
				logger.info(`Backed up ${sourcePath} to ${targetPath}`);
				return { status: "created", path: targetPath };
			}
		}
	} catch (err) {
		throw new BackupError(sourcePath, errorMessage(err), { cause: err });
	}
	throw new BackupError(sourcePath, `too many backups within ${timestamp}`);
}

/**
 * Backs up a keep file under `modified/`. The logical path is `filePath` relative to
 * `repoRoot` when absolute, `filePath` itself otherwise. A missing file is not an error.
 */
export function createFileBackup(
	filePath: string,
	backupRoot: string,
	repoRoot: string,
	options: BackupOptions = {},
): Promise<BackupResult> {
	let relPath = filePath;
	if (isAbsolute(filePath)) {
		relPath = relative(repoRoot, filePath);
		if (escapesRoot(relPath)) {
			return Promise.reject(new BackupError(filePath, `not inside ${repoRoot}`));
		}
	}
	const now = (options.now ?? (() => new Date()))();
	return createBackup(filePath, relPath, backupRoot, "modified", now);
}

/**
 * Backs up a patch under `patched/`. The logical path is the patch path relative to the
 * patch storage root; a patch stored elsewhere is kept under its file name.
 */
export function createPatchBackup(
	patchPath: string,
	backupRoot: string,
	options: PatchBackupOptions = {},
): Promise<BackupResult> {
	let relPath = options.patchesRoot ? relative(options.patchesRoot, patchPath) : relativeToPatchesRoot(patchPath);
	if (!relPath || escapesRoot(relPath)) {
		relPath = basename(patchPath);
	}
	const now = (options.now ?? (() => new Date()))();
	return createBackup(patchPath, relPath, backupRoot, "patched", now);
}

/**
 * Deletes every backup file whose modification time is older than `retentionDays` days.
 * Directories are left in place. Returns the number of files removed.
 */
export async function cleanup(backupRoot: string, retentionDays: number, options: BackupOptions = {}): Promise<number> {
	if (!Number.isFinite(retentionDays) || retentionDays <= 0) {
		throw new Error(`Retention must be a positive number of days, got ${retentionDays}`);
	}
	const now = (options.now ?? (() => new Date()))();
	const cutoff = now.getTime() - retentionDays * 24 * 60 * 60 * 1000;

	let removed = 0;
	async function walk(dir: string): Promise<void> {
		let entries: Array<Dirent>;
		try {
			entries = await readdir(dir, { withFileTypes: true });
		} catch (err) {
			if (dir === backupRoot && isErrnoCode(err, "ENOENT")) {
				return;
			}
			throw err;
		}
		for (const entry of entries) {
			const entryPath = join(dir, entry.name);
			if (entry.isDirectory()) {
				await walk(entryPath);
				continue;
			}
			const stats = await stat(entryPath);
			if (stats.mtimeMs < cutoff) {
				await rm(entryPath, { force: true });
				logger.info(`Removed old backup ${entryPath}`);
				removed += 1;
			}
		}
	}

	await walk(backupRoot);
	return removed;
}
