/**
 * Project Root Discovery
 *
 * Walks up the directory tree from cwd (or a given start directory) looking for a
 * `.workspaces.yml` manifest, the way git looks for `.git`. The directory holding the
 * manifest is the parent repository root; backups and patches live beside it.
 */

import { errorMessage } from "./errors";
import { MANIFEST_FILE } from "./Layout";
import { stat } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";

/**
 * Returns the absolute path of the nearest directory at or above `startDir`
 * (defaults to `process.cwd()`) that contains a manifest file, or `null`.
 */
export async function findProjectRoot(startDir?: string): Promise<string | null> {
	let current = resolve(startDir ?? process.cwd());

	while (true) {
		try {
			const stats = await stat(join(current, MANIFEST_FILE));
			if (stats.isFile()) {
				return current;
			}
		} catch {
			// Not here, keep walking up
		}

		const parent = dirname(current);
		if (parent === current) {
			return null;
		}
		current = parent;
	}
}

/**
 * Like `findProjectRoot`, but falls back to `fallback` (typically the enclosing git
 * repository's top level) and throws when neither finds a root.
 */
export async function requireProjectRoot(
	startDir?: string,
	fallback?: (dir: string) => Promise<string>,
): Promise<string> {
	const dir = resolve(startDir ?? process.cwd());
	const root = await findProjectRoot(dir);
	if (root) {
		return root;
	}
	if (fallback) {
		try {
			return await fallback(dir);
		} catch (err) {
			throw new Error(`No ${MANIFEST_FILE} found and ${dir} is not inside a repository: ${errorMessage(err)}`, {
				cause: err,
			});
		}
	}
	throw new Error(`No ${MANIFEST_FILE} found in this directory or any parent.`);
}
