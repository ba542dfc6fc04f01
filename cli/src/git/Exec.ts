import { spawn } from "node:child_process";

export interface ProcessResult {
	readonly exitCode: number;
	readonly stdout: string;
	readonly stderr: string;
}

export interface RunOptions {
	readonly cwd?: string;
	readonly env?: NodeJS.ProcessEnv;
}

/**
 * Runs a command to completion and captures its output.
 * Resolves for any exit code; rejects only when the process cannot be started.
 */
export function runProcess(command: string, args: ReadonlyArray<string>, options: RunOptions = {}): Promise<ProcessResult> {
	return new Promise((resolve, reject) => {
		const proc = spawn(command, [...args], {
			cwd: options.cwd,
			env: options.env ?? process.env,
			stdio: ["ignore", "pipe", "pipe"],
		});
		const stdout: Array<Buffer> = [];
		const stderr: Array<Buffer> = [];
		proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
		proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
		proc.on("error", reject);
		proc.on("close", code => {
			resolve({
				exitCode: code ?? 1,
				stdout: Buffer.concat(stdout).toString("utf8"),
				stderr: Buffer.concat(stderr).toString("utf8"),
			});
		});
	});
}

/** Combined stdout and stderr, trimmed, for error messages. */
export function combinedOutput(result: ProcessResult): string {
	return [result.stdout.trim(), result.stderr.trim()].filter(Boolean).join("\n");
}

export async function commandExists(command: string): Promise<boolean> {
	try {
		await runProcess(command, ["--version"]);
		return true;
	} catch {
		return false;
	}
}
