/**
 * Workspace manifest (`.workspaces.yml` at the parent repository root).
 *
 * ```yaml
 * workspaces:
 *   - path: services/api
 *     repo: git@example.com:team/api.git
 *     branch: main
 *     keep:
 *       - config/local.yml
 * ```
 */

import { errorMessage, ManifestError } from "./errors";
import { MANIFEST_FILE } from "./Layout";
import { readFile } from "node:fs/promises";
import { join, normalize } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const workspaceSchema = z.object({
	path: z.string().trim().min(1),
	repo: z.string().trim().min(1),
	branch: z.string().trim().min(1).optional(),
	keep: z.array(z.string().trim().min(1)).default([]),
});

const manifestSchema = z.object({
	workspaces: z.array(workspaceSchema).default([]),
});

export interface WorkspaceEntry {
	/** Workspace directory relative to the parent root. */
	readonly path: string;
	readonly repo: string;
	readonly branch?: string;
	/** Keep files relative to the workspace, in manifest order without duplicates. */
	readonly keep: ReadonlyArray<string>;
}

export interface Manifest {
	readonly workspaces: ReadonlyArray<WorkspaceEntry>;
}

function normalizeRelPath(path: string): string {
	return normalize(path).replace(/\\/g, "/").replace(/\/+$/, "");
}

function formatIssues(error: z.ZodError): string {
	return error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/**
 * Parses manifest text. Empty text is an empty manifest.
 */
export function parseManifest(content: string, manifestPath: string): Manifest {
	let raw: unknown;
	try {
		raw = parseYaml(content);
	} catch (err) {
		throw new ManifestError(manifestPath, errorMessage(err), { cause: err });
	}

	const parsed = manifestSchema.safeParse(raw ?? {});
	if (!parsed.success) {
		throw new ManifestError(manifestPath, formatIssues(parsed.error));
	}

	return {
		workspaces: parsed.data.workspaces.map(entry => ({
			path: normalizeRelPath(entry.path),
			repo: entry.repo,
			...(entry.branch ? { branch: entry.branch } : {}),
			keep: [...new Set(entry.keep.map(normalizeRelPath))],
		})),
	};
}

/**
 * Loads the manifest of a parent root. A missing file means no workspaces.
 */
export async function loadManifest(repoRoot: string): Promise<Manifest> {
	const manifestPath = join(repoRoot, MANIFEST_FILE);
	let content: string;
	try {
		content = await readFile(manifestPath, "utf-8");
	} catch (err) {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") {
			return { workspaces: [] };
		}
		throw new ManifestError(manifestPath, errorMessage(err), { cause: err });
	}
	return parseManifest(content, manifestPath);
}

/**
 * Workspaces matching an optional path argument (relative to the parent root).
 * Without a filter every workspace is returned.
 */
export function selectWorkspaces(manifest: Manifest, filter?: string): Array<WorkspaceEntry> {
	if (!filter) {
		return [...manifest.workspaces];
	}
	const wanted = normalizeRelPath(filter);
	return manifest.workspaces.filter(ws => ws.path === wanted);
}
