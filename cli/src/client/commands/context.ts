// Shared setup for workspace commands: parent root, manifest and git client.

import { createGitClient, type GitClient } from "../../git/Git";
import { type Config, getConfig } from "../../shared/config";
import { errorMessage } from "../../shared/errors";
import { MANIFEST_FILE } from "../../shared/Layout";
import { getLog, logError } from "../../shared/logger";
import { loadManifest, selectWorkspaces, type WorkspaceEntry } from "../../shared/Manifest";
import { requireProjectRoot } from "../../shared/ProjectRoot";
import { isAbsolute, relative } from "node:path";

const logger = getLog(import.meta);

export interface CommandContext {
	readonly config: Config;
	readonly git: GitClient;
	/** Parent repository root. */
	readonly repoRoot: string;
	readonly workspaces: ReadonlyArray<WorkspaceEntry>;
}

/**
 * Resolves the parent root and the workspaces a command operates on. A relative
 * `filter` is taken relative to the parent root, like the manifest's own paths.
 */
export async function loadCommandContext(filter?: string): Promise<CommandContext> {
	const config = getConfig();
	const git = createGitClient({ upstreamRemote: config.NEST_UPSTREAM_REMOTE });
	const repoRoot = await requireProjectRoot(undefined, dir => git.getRepoRoot(dir));
	const manifest = await loadManifest(repoRoot);

	const wanted = filter && isAbsolute(filter) ? relative(repoRoot, filter) : filter;
	const workspaces = selectWorkspaces(manifest, wanted);
	if (filter && workspaces.length === 0) {
		throw new Error(`No workspace at ${filter} in ${MANIFEST_FILE}`);
	}
	return { config, git, repoRoot, workspaces };
}

/**
 * Prints a failure, logs it with its stack and marks the process as failed
 * without stopping the remaining work.
 */
export function reportFailure(label: string, err: unknown): void {
	console.error(`Error: ${label}: ${errorMessage(err)}`);
	logError(logger, err, label);
	process.exitCode = 1;
}
