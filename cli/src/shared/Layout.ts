// On-disk layout of git-nest state under the parent repository root.

import { basename, join, normalize, sep } from "node:path";

export const MANIFEST_FILE = ".workspaces.yml";
export const STATE_DIR = ".workspaces";
export const PATCHES_DIR = "patches";
export const BACKUP_DIR = "backup";
export const ARCHIVE_CHECK_FILE = ".last-archive-check";

export type BackupKind = "modified" | "patched";
export const BACKUP_KINDS: ReadonlyArray<BackupKind> = ["modified", "patched"];
export const ARCHIVED_DIR = "archived";

export function getStateDir(repoRoot: string): string {
	return join(repoRoot, STATE_DIR);
}

export function getBackupRoot(repoRoot: string): string {
	return join(repoRoot, STATE_DIR, BACKUP_DIR);
}

export function getPatchesRoot(repoRoot: string): string {
	return join(repoRoot, STATE_DIR, PATCHES_DIR);
}

/**
 * Where the patch of one keep file lives while its local changes are being carried over:
 * `.workspaces/patches/<workspace>/<basename(file)>.patch`.
 */
export function getPatchPath(repoRoot: string, workspaceRelPath: string, file: string): string {
	return join(getPatchesRoot(repoRoot), workspaceRelPath, `${basename(file)}.patch`);
}

/**
 * Path of a patch relative to the patch storage root, or undefined when the patch
 * lives elsewhere.
 */
export function relativeToPatchesRoot(patchPath: string): string | undefined {
	const marker = `${sep}${STATE_DIR}${sep}${PATCHES_DIR}${sep}`;
	const normalized = normalize(patchPath);
	const index = normalized.lastIndexOf(marker);
	if (index < 0) {
		return;
	}
	const rel = normalized.slice(index + marker.length);
	return rel.length > 0 ? rel : undefined;
}
