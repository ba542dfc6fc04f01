import { SkipWorktreeError } from "../shared/errors";
import { createGitFixture, type GitFixture, git, publishUpstream } from "../test/GitTestUtils";
import { createGitClient } from "./Git";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

describe("GitClient", () => {
	let fixture: GitFixture;
	const client = createGitClient();

	beforeEach(async () => {
		fixture = await createGitFixture({
			"config.yml": "version: 1.0\nlocal: false\n",
			"docs/readme.md": "# ws\n",
		});
	});

	afterEach(async () => {
		await fixture.cleanup();
	});

	test("isRepo distinguishes repositories from plain directories", async () => {
		const plain = await mkdtemp(join(tmpdir(), "git-nest-plain-"));
		try {
			expect(await client.isRepo(fixture.workspace)).toBe(true);
			expect(await client.isRepo(plain)).toBe(false);
		} finally {
			await rm(plain, { recursive: true, force: true });
		}
	});

	test("getRepoRoot and getCurrentBranch", async () => {
		expect(await client.getRepoRoot(join(fixture.workspace, "docs"))).toBe(fixture.workspace);
		expect(await client.getCurrentBranch(fixture.workspace)).toBe("main");
	});

	describe("resolveUpstreamRef", () => {
		test("uses the branch's tracking reference", async () => {
			expect(await client.resolveUpstreamRef(fixture.workspace, "main")).toBe("origin/main");
		});

		test("falls back to origin/<branch> without tracking", async () => {
			await git(fixture.workspace, "branch", "--quiet", "feature");
			expect(await client.resolveUpstreamRef(fixture.workspace, "feature")).toBe("origin/feature");
		});

		test("uses the configured remote when set", async () => {
			const custom = createGitClient({ upstreamRemote: "upstream" });
			expect(await custom.resolveUpstreamRef(fixture.workspace, "main")).toBe("upstream/main");
		});
	});

	describe("remote comparison", () => {
		test("reports no changes while upstream matches HEAD", async () => {
			expect(await client.hasRemoteChanges(fixture.workspace, "config.yml", "main")).toBe(false);
		});

		test("detects upstream changes per file", async () => {
			await publishUpstream(fixture, { "config.yml": "version: 2.0\nlocal: false\n" });

			expect(await client.hasRemoteChanges(fixture.workspace, "config.yml", "main")).toBe(true);
			expect(await client.hasRemoteChanges(fixture.workspace, "docs/readme.md", "main")).toBe(false);
			expect(await client.getFileDiff(fixture.workspace, "config.yml", "main")).toContain("+version: 2.0");
		});

		test("treats a missing upstream reference as no changes", async () => {
			const custom = createGitClient({ upstreamRemote: "nowhere" });
			expect(await custom.hasRemoteChanges(fixture.workspace, "config.yml", "main")).toBe(false);
		});

		test("resetFile writes the upstream version into the working tree", async () => {
			await publishUpstream(fixture, { "config.yml": "version: 2.0\nlocal: false\n" });
			await writeFile(join(fixture.workspace, "config.yml"), "version: 1.0\nlocal: true\n");

			await client.resetFile(fixture.workspace, "config.yml", "main");

			expect(await readFile(join(fixture.workspace, "config.yml"), "utf8")).toBe("version: 2.0\nlocal: false\n");
		});
	});

	describe("skip-worktree", () => {
		test("sets, lists and clears the flag", async () => {
			await client.setSkipWorktree(fixture.workspace, ["config.yml"]);
			expect(await client.listSkipWorktree(fixture.workspace)).toEqual(["config.yml"]);

			await client.clearSkipWorktree(fixture.workspace, ["config.yml"]);
			expect(await client.listSkipWorktree(fixture.workspace)).toEqual([]);
		});

		test("hides local edits from diff while set", async () => {
			await writeFile(join(fixture.workspace, "config.yml"), "version: 1.0\nlocal: true\n");
			await client.setSkipWorktree(fixture.workspace, ["config.yml"]);

			expect(await client.getModifiedFiles(fixture.workspace)).toEqual([]);

			await client.clearSkipWorktree(fixture.workspace, ["config.yml"]);
			expect(await client.getModifiedFiles(fixture.workspace)).toEqual(["config.yml"]);
		});

		test("reports untracked files it could not flag", async () => {
			const error = await client
				.setSkipWorktree(fixture.workspace, ["config.yml", "untracked.yml"])
				.catch((err: unknown) => err);

			expect(error).toBeInstanceOf(SkipWorktreeError);
			expect(error).toMatchObject({ files: ["untracked.yml"], code: "skip_worktree" });
			expect(await client.listSkipWorktree(fixture.workspace)).toEqual(["config.yml"]);
		});
	});

	test("filterTracked keeps only files in the index, in order", async () => {
		await writeFile(join(fixture.workspace, ".env"), "TOKEN=test-secret\n");

		expect(await client.filterTracked(fixture.workspace, [".env", "config.yml", "missing.yml"])).toEqual([
			"config.yml",
		]);
		expect(await client.filterTracked(fixture.workspace, [])).toEqual([]);
	});

	test("countChangedFiles counts files changed by a pull", async () => {
		await publishUpstream(fixture, { "config.yml": "version: 2.0\n", "new.txt": "n\n" });
		const before = await client.getHeadCommit(fixture.workspace);

		await client.pull(fixture.workspace);

		expect(await client.countChangedFiles(fixture.workspace, before)).toBe(2);
	});
});
