import { resetConfig } from "./config";
import { formatLogLine, getLog, getModuleName, logError, resetLogger } from "./logger";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

describe("getModuleName", () => {
	test("strips directory and extension from a module url", () => {
		expect(getModuleName("file:///repo/cli/src/backup/BackupStore.ts")).toBe("BackupStore");
	});

	test("keeps inner dots of the file name", () => {
		expect(getModuleName("/repo/src/shared/sync.options.test.ts")).toBe("sync.options.test");
	});

	test("returns a bare name unchanged", () => {
		expect(getModuleName("archive")).toBe("archive");
	});
});

describe("formatLogLine", () => {
	test("renders level, module and message", () => {
		const time = new Date(2026, 0, 5, 9, 7, 3).getTime();
		const line = formatLogLine(JSON.stringify({ time, level: 40, module: "Archive", msg: "bucket failed" }));
		expect(line).toBe("\x1b[33m[2026-01-05 09:07:03] WARN\x1b[0m Archive - bucket failed\n");
	});

	test("passes through lines that are not JSON", () => {
		expect(formatLogLine("plain text\n")).toBe("plain text\n");
	});

	test("passes through JSON that is not a log record", () => {
		expect(formatLogLine('{"hello":"world"}')).toBe('{"hello":"world"}');
	});
});

describe("getLog", () => {
	beforeEach(() => {
		resetConfig();
		resetLogger();
		process.env.LOG_LEVEL = "info";
	});

	afterEach(() => {
		delete process.env.LOG_LEVEL;
		resetConfig();
		resetLogger();
		vi.restoreAllMocks();
	});

	test("writes formatted lines to stderr with the module name", () => {
		const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

		getLog("KeepFileResolver").info("resolved");

		expect(write).toHaveBeenCalledTimes(1);
		expect(String(write.mock.calls[0][0])).toContain("INFO\x1b[0m KeepFileResolver - resolved");
	});

	test("logError logs non-Error values", () => {
		const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

		logError(getLog("cli"), "boom", "command failed");

		expect(String(write.mock.calls[0][0])).toContain("ERROR\x1b[0m cli - command failed");
	});
});
