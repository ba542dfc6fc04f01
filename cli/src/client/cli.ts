// git-nest CLI
// Usage: git-nest <command> [options]

import { registerBackupCommands, registerPullCommands, registerSkipCommands } from "./commands";
import { Command } from "commander";

/**
 * Builds the command-line program with every command group registered.
 */
export function createProgram(): Command {
	const program = new Command();
	program
		.name("git-nest")
		.description("Nested workspace repositories with preserved local overrides")
		.version("0.1.0");

	registerPullCommands(program);
	registerBackupCommands(program);
	registerSkipCommands(program);

	return program;
}
