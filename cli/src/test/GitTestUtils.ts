import { combinedOutput, runProcess } from "../git/Exec";
import { mkdir, mkdtemp, realpath, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

const IDENTITY = ["-c", "user.name=Test User", "-c", "user.email=test@example.com", "-c", "commit.gpgsign=false"];

/** Runs git with a fixed identity and fails the test on a non-zero exit. */
export async function git(cwd: string, ...args: Array<string>): Promise<string> {
	const result = await runProcess("git", [...IDENTITY, ...args], { cwd });
	if (result.exitCode !== 0) {
		throw new Error(`git ${args.join(" ")} failed in ${cwd}: ${combinedOutput(result)}`);
	}
	return result.stdout;
}

export async function writeFiles(dir: string, files: Record<string, string>): Promise<void> {
	for (const [name, content] of Object.entries(files)) {
		const path = join(dir, name);
		await mkdir(dirname(path), { recursive: true });
		await writeFile(path, content);
	}
}

export interface GitFixture {
	/** Parent repository root holding `.workspaces.yml` and `.workspaces/`. */
	readonly root: string;
	/** Bare repository acting as the workspace's upstream. */
	readonly remote: string;
	/** Workspace clone at `<root>/ws`, tracking `origin/main`. */
	readonly workspace: string;
	/** Second clone used to publish upstream changes. */
	readonly publisher: string;
	cleanup(): Promise<void>;
}

/**
 * Creates a bare upstream seeded with `files`, and a workspace clone of it inside a
 * parent directory.
 */
export async function createGitFixture(files: Record<string, string>): Promise<GitFixture> {
	const base = await realpath(await mkdtemp(join(tmpdir(), "git-nest-git-")));
	const remote = join(base, "remote.git");
	const publisher = join(base, "publisher");
	const root = join(base, "parent");
	const workspace = join(root, "ws");

	await mkdir(remote);
	await git(remote, "init", "--quiet", "--bare", "-b", "main");
	await mkdir(publisher);
	await git(publisher, "init", "--quiet", "-b", "main");
	await writeFiles(publisher, files);
	await git(publisher, "add", "-A");
	await git(publisher, "commit", "--quiet", "-m", "initial");
	await git(publisher, "remote", "add", "origin", remote);
	await git(publisher, "push", "--quiet", "-u", "origin", "main");

	await mkdir(root);
	await git(root, "clone", "--quiet", remote, "ws");

	return {
		root,
		remote,
		workspace,
		publisher,
		cleanup: () => rm(base, { recursive: true, force: true }),
	};
}

/** Commits `files` in the publisher clone, pushes them and fetches into the workspace. */
export async function publishUpstream(fixture: GitFixture, files: Record<string, string>): Promise<void> {
	await writeFiles(fixture.publisher, files);
	await git(fixture.publisher, "add", "-A");
	await git(fixture.publisher, "commit", "--quiet", "-m", "upstream change");
	await git(fixture.publisher, "push", "--quiet", "origin", "main");
	await git(fixture.workspace, "fetch", "--quiet");
}
