import { createGitClient } from "../../git/Git";
import { createGitFixture, type GitFixture } from "../../test/GitTestUtils";
import { registerSkipCommands } from "./skip";
import { Command } from "commander";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

const mocks = vi.hoisted(() => ({
	loadCommandContext: vi.fn(),
}));

vi.mock("./context", async importOriginal => ({
	...(await importOriginal<typeof import("./context")>()),
	loadCommandContext: mocks.loadCommandContext,
}));

async function runCommand(args: Array<string>): Promise<void> {
	const program = new Command();
	registerSkipCommands(program);
	await program.parseAsync(args, { from: "user" });
}

describe("skip commands", () => {
	let fixture: GitFixture;
	let logged: Array<string>;
	const git = createGitClient();

	beforeEach(async () => {
		fixture = await createGitFixture({ "config.yml": "a: 1\n", "other.yml": "b: 1\n", "README.md": "# ws\n" });
		logged = [];
		vi.spyOn(console, "log").mockImplementation((line: string) => {
			logged.push(line);
		});
		mocks.loadCommandContext.mockResolvedValue({
			config: {},
			git,
			repoRoot: fixture.root,
			workspaces: [{ path: "ws", repo: fixture.remote, keep: ["config.yml", "other.yml"] }],
		});
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		process.exitCode = undefined;
		await fixture.cleanup();
	});

	test("apply sets the flag on every keep file", async () => {
		await runCommand(["skip", "apply"]);

		expect(await git.listSkipWorktree(fixture.workspace)).toEqual(["config.yml", "other.yml"]);
		expect(logged).toEqual(["ws: skip-worktree set on 2 keep file(s)"]);
	});

	test("apply skips keep files that are not tracked", async () => {
		await writeFile(join(fixture.workspace, ".env"), "TOKEN=test-secret\n");
		mocks.loadCommandContext.mockResolvedValue({
			config: {},
			git,
			repoRoot: fixture.root,
			workspaces: [{ path: "ws", repo: fixture.remote, keep: ["config.yml", ".env"] }],
		});

		await runCommand(["skip", "apply"]);

		expect(await git.listSkipWorktree(fixture.workspace)).toEqual(["config.yml"]);
		expect(logged).toEqual(["ws: skip-worktree set on 1 keep file(s)", "  .env: not tracked, skipped"]);
		expect(process.exitCode).toBeUndefined();
	});

	test("list marks keep files whose flag is missing", async () => {
		await git.setSkipWorktree(fixture.workspace, ["config.yml"]);

		await runCommand(["skip", "list"]);

		expect(logged).toEqual(["ws:", "  config.yml", "  other.yml (keep file, flag missing)"]);
	});
});
