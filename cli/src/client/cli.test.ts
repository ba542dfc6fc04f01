import { createProgram } from "./cli";
import { describe, expect, test } from "vitest";

describe("createProgram", () => {
	test("registers every command group", () => {
		const program = createProgram();

		expect(program.name()).toBe("git-nest");
		expect(program.commands.map(command => command.name())).toEqual(["pull", "backup", "skip"]);
	});

	test("groups backup and skip subcommands", () => {
		const program = createProgram();
		const subcommands = (name: string) =>
			program.commands.find(command => command.name() === name)?.commands.map(command => command.name());

		expect(subcommands("backup")).toEqual(["snapshot", "archive", "cleanup"]);
		expect(subcommands("skip")).toEqual(["apply", "list"]);
	});
});
