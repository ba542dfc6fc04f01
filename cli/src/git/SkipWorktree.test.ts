import { SkipWorktreeError } from "../shared/errors";
import { type SkipWorktreeGit, withSkipWorktreeTransaction } from "./SkipWorktree";
import { describe, expect, test, vi } from "vitest";

function createFakeGit(): SkipWorktreeGit & { calls: Array<string> } {
	const calls: Array<string> = [];
	return {
		calls,
		clearSkipWorktree: vi.fn(async (_path: string, files: ReadonlyArray<string>) => {
			calls.push(`clear ${files.join(",")}`);
		}),
		setSkipWorktree: vi.fn(async (_path: string, files: ReadonlyArray<string>) => {
			calls.push(`set ${files.join(",")}`);
		}),
	};
}

describe("withSkipWorktreeTransaction", () => {
	test("clears, runs the work, then sets the flag again and returns the result", async () => {
		const git = createFakeGit();

		const result = await withSkipWorktreeTransaction(git, "/ws", ["a.yml", "b.env"], async () => {
			git.calls.push("work");
			return 42;
		});

		expect(result).toBe(42);
		expect(git.calls).toEqual(["clear a.yml,b.env", "work", "set a.yml,b.env"]);
	});

	test("sets the flag again when the work fails and rethrows the work error", async () => {
		const git = createFakeGit();
		const failure = new Error("resolver failed");

		await expect(
			withSkipWorktreeTransaction(git, "/ws", ["a.yml"], async () => {
				throw failure;
			}),
		).rejects.toBe(failure);

		expect(git.calls).toEqual(["clear a.yml", "set a.yml"]);
	});

	test("restores exactly the files it was given even if the caller mutates its list", async () => {
		const git = createFakeGit();
		const files = ["a.yml"];

		await withSkipWorktreeTransaction(git, "/ws", files, async () => {
			files.push("c.yml");
		});

		expect(git.calls).toEqual(["clear a.yml", "set a.yml"]);
	});

	test("still runs the work when clearing fails", async () => {
		const git = createFakeGit();
		vi.mocked(git.clearSkipWorktree).mockRejectedValueOnce(
			new SkipWorktreeError("clear", [{ file: "a.yml", output: "fatal: Unable to mark file a.yml" }]),
		);
		const work = vi.fn(async () => "done");

		expect(await withSkipWorktreeTransaction(git, "/ws", ["a.yml"], work)).toBe("done");
		expect(work).toHaveBeenCalledOnce();
		expect(git.setSkipWorktree).toHaveBeenCalledWith("/ws", ["a.yml"]);
	});

	test("surfaces a restore failure after successful work", async () => {
		const git = createFakeGit();
		const restoreError = new SkipWorktreeError("set", [{ file: "a.yml", output: "" }]);
		vi.mocked(git.setSkipWorktree).mockRejectedValueOnce(restoreError);

		await expect(withSkipWorktreeTransaction(git, "/ws", ["a.yml"], async () => 1)).rejects.toBe(restoreError);
	});

	test("prefers the work error over a restore failure", async () => {
		const git = createFakeGit();
		vi.mocked(git.setSkipWorktree).mockRejectedValueOnce(new Error("index.lock exists"));
		const failure = new Error("prompt closed");

		await expect(
			withSkipWorktreeTransaction(git, "/ws", ["a.yml"], async () => {
				throw failure;
			}),
		).rejects.toBe(failure);
	});

	test("does not touch git for an empty file list", async () => {
		const git = createFakeGit();

		expect(await withSkipWorktreeTransaction(git, "/ws", [], async () => "x")).toBe("x");
		expect(git.calls).toEqual([]);
	});
});
