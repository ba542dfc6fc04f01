/**
 * Interactive choices for keep-file resolution.
 *
 * The resolver only depends on the {@link Prompter} interface; the terminal
 * implementation uses node:readline, tests use {@link createScriptedPrompter}.
 */

import { errorMessage } from "../shared/errors";
import { getLog } from "../shared/logger";
import { spawn } from "node:child_process";
import readline from "node:readline";

const logger = getLog(import.meta);

export type KeepFileChoice = "reapply" | "discard" | "skip" | "show-diff";

export interface MenuOption<T extends string> {
	readonly value: T;
	readonly label: string;
}

export const KEEP_FILE_MENU: ReadonlyArray<MenuOption<KeepFileChoice>> = [
	{ value: "reapply", label: "Update to remote and reapply local changes (recommended)" },
	{ value: "discard", label: "Update to remote only (discard local changes)" },
	{ value: "skip", label: "Skip (keep current state)" },
	{ value: "show-diff", label: "Show diff" },
];

export interface Prompter {
	/** Asks what to do with a keep file that changed upstream. */
	chooseKeepFileAction(file: string): Promise<KeepFileChoice>;
	/** Yes/no question; Enter answers `defaultYes`. */
	confirm(message: string, defaultYes: boolean): Promise<boolean>;
	showDiff(diff: string): Promise<void>;
	/** Releases the terminal. */
	close(): void;
}

export interface TerminalPrompterOptions {
	readonly input?: NodeJS.ReadableStream;
	readonly output?: NodeJS.WritableStream;
	/** Command that receives diffs on stdin; the diff is printed when unset. */
	readonly pager?: string;
}

/**
 * Parses a 1-based menu answer. Empty input selects the first option.
 */
export function parseMenuAnswer<T extends string>(
	answer: string,
	options: ReadonlyArray<MenuOption<T>>,
): T | undefined {
	const trimmed = answer.trim();
	if (trimmed === "") {
		return options[0]?.value;
	}
	if (!/^\d+$/.test(trimmed)) {
		return;
	}
	return options[Number.parseInt(trimmed, 10) - 1]?.value;
}

export function parseConfirmAnswer(answer: string, defaultYes: boolean): boolean | undefined {
	const normalized = answer.trim().toLowerCase();
	if (normalized === "") {
		return defaultYes;
	}
	if (normalized === "y" || normalized === "yes") {
		return true;
	}
	if (normalized === "n" || normalized === "no") {
		return false;
	}
	return;
}

function pipeToPager(pager: string, diff: string): Promise<void> {
	const [command, ...args] = pager.split(/\s+/).filter(Boolean);
	if (!command) {
		return Promise.reject(new Error("empty pager command"));
	}
	return new Promise((resolve, reject) => {
		const proc = spawn(command, args, { stdio: ["pipe", "inherit", "inherit"] });
		proc.on("error", reject);
		proc.on("close", () => resolve());
		proc.stdin.end(diff);
	});
}

/**
 * Reads answers line by line from a terminal. Invalid answers repeat the question;
 * input that ends before an answer rejects.
 */
export function createTerminalPrompter(options: TerminalPrompterOptions = {}): Prompter {
	const input = options.input ?? process.stdin;
	const output = options.output ?? process.stdout;

	let rl: readline.Interface | undefined;
	let ended = false;
	const buffered: Array<string> = [];
	const waiting: Array<{ resolve: (line: string) => void; reject: (err: Error) => void }> = [];

	function open(): void {
		if (rl) {
			return;
		}
		rl = readline.createInterface({ input, terminal: false });
		rl.on("line", line => {
			const next = waiting.shift();
			if (next) {
				next.resolve(line);
			} else {
				buffered.push(line);
			}
		});
		rl.on("close", () => {
			ended = true;
			for (const pending of waiting.splice(0)) {
				pending.reject(new Error("Input closed before an answer was given"));
			}
		});
	}

	function ask(question: string): Promise<string> {
		output.write(question);
		open();
		const line = buffered.shift();
		if (line !== undefined) {
			return Promise.resolve(line);
		}
		if (ended) {
			return Promise.reject(new Error("Input closed before an answer was given"));
		}
		return new Promise((resolve, reject) => {
			waiting.push({ resolve, reject });
		});
	}

	return {
		async chooseKeepFileAction(file) {
			output.write(`\n${file} has changed upstream. Choose an action:\n`);
			KEEP_FILE_MENU.forEach((option, index) => {
				const suffix = index === 0 ? " (default)" : "";
				output.write(`  ${index + 1}. ${option.label}${suffix}\n`);
			});
			while (true) {
				const answer = await ask("Action [1]: ");
				const choice = parseMenuAnswer(answer, KEEP_FILE_MENU);
				if (choice) {
					return choice;
				}
				output.write(
					`Invalid selection: "${answer.trim()}". Expected a number between 1 and ${KEEP_FILE_MENU.length}.\n`,
				);
			}
		},

		async confirm(message, defaultYes) {
			const hint = defaultYes ? "[Y/n]" : "[y/N]";
			while (true) {
				const answer = parseConfirmAnswer(await ask(`${message} ${hint} `), defaultYes);
				if (answer !== undefined) {
					return answer;
				}
			}
		},

		async showDiff(diff) {
			if (!options.pager) {
				output.write(diff.endsWith("\n") || diff === "" ? diff : `${diff}\n`);
				return;
			}
			try {
				await pipeToPager(options.pager, diff);
			} catch (err) {
				logger.warn(`Pager "${options.pager}" failed, printing diff instead: ${errorMessage(err)}`);
				output.write(diff);
			}
		},

		close() {
			rl?.close();
		},
	};
}

/**
 * Prompter that replays fixed answers in order and records what it was asked.
 * Running out of answers rejects, like a closed terminal.
 */
export function createScriptedPrompter(
	answers: { choices?: Array<KeepFileChoice>; confirmations?: Array<boolean> } = {},
): Prompter & { readonly asked: Array<string>; readonly diffs: Array<string> } {
	const choices = [...(answers.choices ?? [])];
	const confirmations = [...(answers.confirmations ?? [])];
	const asked: Array<string> = [];
	const diffs: Array<string> = [];

	return {
		asked,
		diffs,
		chooseKeepFileAction(file) {
			asked.push(file);
			const next = choices.shift();
			return next ? Promise.resolve(next) : Promise.reject(new Error(`No scripted answer for ${file}`));
		},
		confirm(message) {
			asked.push(message);
			const next = confirmations.shift();
			return next === undefined
				? Promise.reject(new Error(`No scripted confirmation for "${message}"`))
				: Promise.resolve(next);
		},
		showDiff(diff) {
			diffs.push(diff);
			return Promise.resolve();
		},
		close() {},
	};
}
