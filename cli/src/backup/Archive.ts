/**
 * Archival Engine
 *
 * Packs month buckets of backups that are older than the current month into
 * `archived/<yyyy>-<mm>-<kind>.tar.gz`, verifies each archive by reading it back,
 * and only then removes the bucket. Runs are throttled by a marker file.
 */

import { ArchiveIOError, ArchiveVerifyError, errorMessage, type NestError } from "../shared/errors";
import {
	ARCHIVE_CHECK_FILE,
	ARCHIVED_DIR,
	BACKUP_KINDS,
	type BackupKind,
	getBackupRoot,
	getStateDir,
} from "../shared/Layout";
import { getLog } from "../shared/logger";
import { extract, pack, type TarEntry } from "./Tar";
import type { Dirent } from "node:fs";
import { mkdir, readdir, readFile, rm, rmdir, stat, writeFile } from "node:fs/promises";
import { join, posix } from "node:path";
import { promisify } from "node:util";
import { gunzip, gzip } from "node:zlib";

const logger = getLog(import.meta);

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

const YEAR_PATTERN = /^\d{4}$/;
const MONTH_PATTERN = /^\d{2}$/;
const DEFAULT_INTERVAL_HOURS = 24;

export interface ArchiveOptions {
	readonly now?: () => Date;
}

export interface ArchiveSummary {
	/** Archives written, verified and whose bucket was removed. */
	readonly archived: Array<string>;
	/** Archives that already existed; their buckets were left alone. */
	readonly existing: Array<string>;
	readonly failures: Array<NestError>;
}

export interface ThrottleOptions extends ArchiveOptions {
	readonly intervalHours?: number;
}

export interface MaintenanceOptions extends ThrottleOptions {
	/** Ignore the throttle marker. */
	readonly force?: boolean;
}

export interface MaintenanceResult {
	readonly ran: boolean;
	readonly summary?: ArchiveSummary;
}

interface Bucket {
	readonly kind: BackupKind;
	readonly year: string;
	readonly month: string;
}

function isErrnoCode(err: unknown, code: string): boolean {
	return err instanceof Error && "code" in err && err.code === code;
}

async function readDirs(dir: string): Promise<Array<string>> {
	let entries: Array<Dirent>;
	try {
		entries = await readdir(dir, { withFileTypes: true });
	} catch (err) {
		if (isErrnoCode(err, "ENOENT")) {
			return [];
		}
		throw err;
	}
	return entries
		.filter(entry => entry.isDirectory())
		.map(entry => entry.name)
		.sort();
}

async function pathExists(path: string): Promise<boolean> {
	try {
		await stat(path);
		return true;
	} catch (err) {
		if (isErrnoCode(err, "ENOENT")) {
			return false;
		}
		throw err;
	}
}

/**
 * Collects every directory and file under `<typeDir>/<year>/<month>` as tar entries
 * named relative to `typeDir` (`yyyy/mm/dd/...`).
 */
async function collectEntries(typeDir: string, bucket: Bucket): Promise<Array<TarEntry>> {
	const entries: Array<TarEntry> = [];

	async function walk(relDir: string): Promise<void> {
		const absDir = join(typeDir, ...relDir.split("/"));
		const dirStats = await stat(absDir);
		entries.push({
			name: relDir,
			type: "directory",
			data: Buffer.alloc(0),
			mtime: Math.floor(dirStats.mtimeMs / 1000),
			mode: dirStats.mode,
		});

		const children = await readdir(absDir, { withFileTypes: true });
		children.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
		for (const child of children) {
			const relPath = posix.join(relDir, child.name);
			if (child.isDirectory()) {
				await walk(relPath);
			} else if (child.isFile()) {
				const absPath = join(absDir, child.name);
				const fileStats = await stat(absPath);
				entries.push({
					name: relPath,
					type: "file",
					data: await readFile(absPath),
					mtime: Math.floor(fileStats.mtimeMs / 1000),
					mode: fileStats.mode,
				});
			}
		}
	}

	await walk(`${bucket.year}/${bucket.month}`);
	return entries;
}

/**
 * Reads an archive back end to end: decompresses it, parses every header and entry
 * and returns the entries. Fails for an unreadable, corrupt or empty archive.
 */
export async function verifyArchive(archivePath: string): Promise<Array<TarEntry>> {
	let entries: Array<TarEntry>;
	try {
		const compressed = await readFile(archivePath);
		entries = extract(await gunzipAsync(compressed));
	} catch (err) {
		throw new ArchiveVerifyError(archivePath, errorMessage(err), { cause: err });
	}
	if (entries.length === 0) {
		throw new ArchiveVerifyError(archivePath, "archive is empty");
	}
	return entries;
}

async function archiveBucket(backupRoot: string, bucket: Bucket, summary: ArchiveSummary): Promise<void> {
	const { kind, year, month } = bucket;
	const label = `${kind}/${year}/${month}`;
	const typeDir = join(backupRoot, kind);
	const archivedDir = join(backupRoot, ARCHIVED_DIR);
	const archivePath = join(archivedDir, `${year}-${month}-${kind}.tar.gz`);

	if (await pathExists(archivePath)) {
		logger.info(`Archive already exists: ${archivePath}`);
		summary.existing.push(archivePath);
		return;
	}

	let fileCount: number;
	try {
		await mkdir(archivedDir, { recursive: true });
		const entries = await collectEntries(typeDir, bucket);
		fileCount = entries.filter(entry => entry.type === "file").length;
		const compressed = await gzipAsync(pack(entries));
		await writeFile(archivePath, compressed, { flag: "wx" });
	} catch (err) {
		if (!isErrnoCode(err, "EEXIST")) {
			await rm(archivePath, { force: true });
		}
		throw new ArchiveIOError(label, errorMessage(err), { cause: err });
	}

	try {
		const verified = await verifyArchive(archivePath);
		const verifiedFiles = verified.filter(entry => entry.type === "file").length;
		if (verifiedFiles !== fileCount) {
			throw new ArchiveVerifyError(archivePath, `expected ${fileCount} file(s), found ${verifiedFiles}`);
		}
	} catch (err) {
		await rm(archivePath, { force: true });
		throw err;
	}
	logger.info(`Verified ${archivePath}`);

	try {
		await rm(join(typeDir, year, month), { recursive: true });
	} catch (err) {
		throw new ArchiveIOError(label, `archived to ${archivePath} but removing the bucket failed: ${errorMessage(err)}`, {
			cause: err,
		});
	}
	summary.archived.push(archivePath);

	const remaining = await readdir(join(typeDir, year));
	if (remaining.length === 0) {
		await rmdir(join(typeDir, year));
	}
}

/**
 * Archives every `<kind>/<yyyy>/<mm>` bucket strictly older than the current month.
 * Failures are isolated per bucket and reported in the summary.
 */
export async function archiveOldBackups(backupRoot: string, options: ArchiveOptions = {}): Promise<ArchiveSummary> {
	const now = (options.now ?? (() => new Date()))();
	const current = `${now.getFullYear().toString().padStart(4, "0")}-${(now.getMonth() + 1).toString().padStart(2, "0")}`;
	const summary: ArchiveSummary = { archived: [], existing: [], failures: [] };

	for (const kind of BACKUP_KINDS) {
		const typeDir = join(backupRoot, kind);
		for (const year of await readDirs(typeDir)) {
			if (!YEAR_PATTERN.test(year)) {
				continue;
			}
			for (const month of await readDirs(join(typeDir, year))) {
				if (!MONTH_PATTERN.test(month)) {
					continue;
				}
				if (`${year}-${month}` >= current) {
					logger.debug(`Skipping ${kind}/${year}/${month}: not older than ${current}`);
					continue;
				}
				try {
					await archiveBucket(backupRoot, { kind, year, month }, summary);
				} catch (err) {
					const failure =
						err instanceof ArchiveVerifyError || err instanceof ArchiveIOError
							? err
							: new ArchiveIOError(`${kind}/${year}/${month}`, errorMessage(err), { cause: err });
					logger.warn(failure.message);
					summary.failures.push(failure);
				}
			}
		}
	}

	return summary;
}

/**
 * True when the marker is missing, unreadable, or older than the interval.
 * The marker's timestamp is preferred; its modification time is the fallback.
 */
export async function shouldRunArchive(workspacesDir: string, options: ThrottleOptions = {}): Promise<boolean> {
	const markerPath = join(workspacesDir, ARCHIVE_CHECK_FILE);
	const now = (options.now ?? (() => new Date()))();
	const intervalMs = (options.intervalHours ?? DEFAULT_INTERVAL_HOURS) * 60 * 60 * 1000;

	let lastCheck: number;
	try {
		lastCheck = Date.parse((await readFile(markerPath, "utf8")).trim());
		if (Number.isNaN(lastCheck)) {
			lastCheck = (await stat(markerPath)).mtimeMs;
		}
	} catch (err) {
		if (!isErrnoCode(err, "ENOENT")) {
			logger.warn(`Could not read ${markerPath}: ${errorMessage(err)}`);
		}
		return true;
	}

	const elapsed = now.getTime() - lastCheck;
	// A marker from the future means the clock moved back
	return elapsed < 0 || elapsed >= intervalMs;
}

/** Writes the current time as one RFC 3339 line to the marker file. */
export async function updateArchiveCheck(workspacesDir: string, options: ArchiveOptions = {}): Promise<void> {
	const now = (options.now ?? (() => new Date()))();
	await mkdir(workspacesDir, { recursive: true });
	const timestamp = now.toISOString().replace(/\.\d{3}Z$/, "Z");
	await writeFile(join(workspacesDir, ARCHIVE_CHECK_FILE), `${timestamp}\n`, "utf8");
}

/**
 * Gated archive run for a parent repository. The marker is only refreshed when every
 * bucket succeeded, so failed buckets are retried on the next invocation.
 */
export async function runArchiveMaintenance(
	repoRoot: string,
	options: MaintenanceOptions = {},
): Promise<MaintenanceResult> {
	const workspacesDir = getStateDir(repoRoot);
	if (!options.force && !(await shouldRunArchive(workspacesDir, options))) {
		logger.debug("Archive check ran recently, skipping");
		return { ran: false };
	}

	const summary = await archiveOldBackups(getBackupRoot(repoRoot), options);
	if (summary.failures.length === 0) {
		await updateArchiveCheck(workspacesDir, options);
	}
	return { ran: true, summary };
}
