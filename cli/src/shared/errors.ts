/**
 * Error taxonomy for keep-file resolution and backup maintenance.
 *
 * Every error carries a machine-readable `code`. Errors that leave an artifact behind
 * expose its on-disk location so callers can tell the user where to recover from.
 */

export type NestErrorCode =
	| "remote_check"
	| "diff"
	| "patch_tool"
	| "apply"
	| "backup"
	| "archive_verify"
	| "archive_io"
	| "skip_worktree"
	| "manifest"
	| "git";

export class NestError extends Error {
	readonly code: NestErrorCode;

	constructor(code: NestErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "NestError";
		this.code = code;
	}
}

/** Failed to compare a keep file against its upstream version. */
export class RemoteCheckError extends NestError {
	readonly file: string;

	constructor(file: string, message: string, options?: { cause?: unknown }) {
		super("remote_check", `Failed to check remote changes for ${file}: ${message}`, options);
		this.name = "RemoteCheckError";
		this.file = file;
	}
}

/** The diff command itself failed (an empty diff is not an error). */
export class DiffError extends NestError {
	readonly output: string;

	constructor(message: string, output: string) {
		super("diff", output ? `${message}\n${output}` : message);
		this.name = "DiffError";
		this.output = output;
	}
}

/** The patch tool failed for a reason other than a hunk conflict. */
export class PatchToolError extends NestError {
	readonly patchPath: string;
	readonly output: string;

	constructor(patchPath: string, message: string, output: string) {
		super("patch_tool", output ? `${message}\n${output}` : message);
		this.name = "PatchToolError";
		this.patchPath = patchPath;
		this.output = output;
	}
}

/** Applying a patch for real exited non-zero. */
export class ApplyError extends NestError {
	readonly patchPath: string;
	readonly output: string;

	constructor(patchPath: string, output: string) {
		super("apply", `Failed to apply ${patchPath}${output ? `\n${output}` : ""}`);
		this.name = "ApplyError";
		this.patchPath = patchPath;
		this.output = output;
	}
}

/** A backup could not be written; nothing downstream may run without it. */
export class BackupError extends NestError {
	readonly sourcePath: string;

	constructor(sourcePath: string, message: string, options?: { cause?: unknown }) {
		super("backup", `Failed to back up ${sourcePath}: ${message}`, options);
		this.name = "BackupError";
		this.sourcePath = sourcePath;
	}
}

/** A freshly written archive did not read back; it has been discarded. */
export class ArchiveVerifyError extends NestError {
	readonly archivePath: string;

	constructor(archivePath: string, message: string, options?: { cause?: unknown }) {
		super("archive_verify", `Archive verification failed for ${archivePath}: ${message}`, options);
		this.name = "ArchiveVerifyError";
		this.archivePath = archivePath;
	}
}

/** Creating the archive directory or compressing a bucket failed. */
export class ArchiveIOError extends NestError {
	readonly bucket: string;

	constructor(bucket: string, message: string, options?: { cause?: unknown }) {
		super("archive_io", `Failed to archive ${bucket}: ${message}`, options);
		this.name = "ArchiveIOError";
		this.bucket = bucket;
	}
}

/** One or more files could not have their skip-worktree flag changed. */
export class SkipWorktreeError extends NestError {
	readonly files: ReadonlyArray<string>;

	constructor(action: "set" | "clear", failures: ReadonlyArray<{ file: string; output: string }>) {
		const details = failures.map(f => `${f.file} (${f.output || "unknown error"})`).join("\n  - ");
		super("skip_worktree", `Failed to ${action} skip-worktree on ${failures.length} file(s):\n  - ${details}`);
		this.name = "SkipWorktreeError";
		this.files = failures.map(f => f.file);
	}
}

export class ManifestError extends NestError {
	readonly manifestPath: string;

	constructor(manifestPath: string, message: string, options?: { cause?: unknown }) {
		super("manifest", `Invalid manifest ${manifestPath}: ${message}`, options);
		this.name = "ManifestError";
		this.manifestPath = manifestPath;
	}
}

export class GitCommandError extends NestError {
	readonly args: ReadonlyArray<string>;
	readonly exitCode: number;
	readonly output: string;

	constructor(args: ReadonlyArray<string>, exitCode: number, output: string) {
		super("git", `git ${args.join(" ")} failed (exit ${exitCode})${output ? `: ${output}` : ""}`);
		this.name = "GitCommandError";
		this.args = args;
		this.exitCode = exitCode;
		this.output = output;
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
