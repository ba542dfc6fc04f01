import { extract, pack, type TarEntry, TarFormatError } from "./Tar";
import { describe, expect, test } from "vitest";

function file(name: string, content: string): TarEntry {
	return { name, type: "file", data: Buffer.from(content), mtime: 1_790_000_000, mode: 0o644 };
}

describe("Tar", () => {
	test("packs and extracts files and directories", () => {
		const tar = pack([
			{ name: "2026/09", type: "directory", data: Buffer.alloc(0), mtime: 1_790_000_000, mode: 0o755 },
			file("2026/09/19/ws/config.20260919_101010.yml", "version: 1.0\nlocal: true\n"),
		]);

		// header + dir, header + 1 data block, two terminator blocks
		expect(tar.length).toBe(512 * 5);

		const entries = extract(tar);
		expect(entries.map(e => [e.name, e.type, e.mode])).toEqual([
			["2026/09/", "directory", 0o755],
			["2026/09/19/ws/config.20260919_101010.yml", "file", 0o644],
		]);
		expect(entries[1]?.data.toString("utf8")).toBe("version: 1.0\nlocal: true\n");
		expect(entries[1]?.mtime).toBe(1_790_000_000);
	});

	test("stores names longer than 100 bytes using the prefix field", () => {
		const longName = `2026/09/19/${"nested/".repeat(14)}settings.20260919_101010.json`;
		expect(longName.length).toBeGreaterThan(100);

		const [entry] = extract(pack([file(longName, "{}")]));

		expect(entry?.name).toBe(longName);
		expect(entry?.data.toString("utf8")).toBe("{}");
	});

	test("stores a long last path component in a PAX extended header", () => {
		const longName = `2026/09/01/ws/${"x".repeat(85)}.20260901_101010.yml`;
		const tar = pack([file(longName, "local: true\n"), file("2026/09/01/ws/b.yml", "b")]);

		// PAX header + record block, entry header + data, short entry header + data, terminator
		expect(tar.length).toBe(512 * 8);
		expect(tar.subarray(512, 512 + 10).toString("utf8")).toBe("129 path=2");

		const entries = extract(tar);
		expect(entries.map(e => [e.name, e.type])).toEqual([
			[longName, "file"],
			["2026/09/01/ws/b.yml", "file"],
		]);
		expect(entries[0]?.data.toString("utf8")).toBe("local: true\n");
		expect(entries[0]?.mtime).toBe(1_790_000_000);
	});

	test("stores names that do not fit the prefix field in a PAX extended header", () => {
		const longName = `${"d/".repeat(445)}${"f".repeat(101)}`;
		expect(Buffer.byteLength(longName)).toBe(991);

		const tar = pack([file(longName, "{}"), { ...file(`${"d/".repeat(200)}sub`, ""), type: "directory" }]);

		// the record length counts its own four digits
		expect(tar.subarray(512, 512 + 5).toString("utf8")).toBe("1002 ");
		expect(extract(tar).map(e => [e.name, e.type])).toEqual([
			[longName, "file"],
			[`${"d/".repeat(200)}sub/`, "directory"],
		]);
	});

	test("rejects a malformed extended header record", () => {
		const tar = pack([file(`${"x".repeat(120)}.yml`, "a")]);
		tar.write("999", 512, 3, "utf8");
		expect(() => extract(tar)).toThrow(TarFormatError);
	});

	test("detects a corrupted header", () => {
		const tar = pack([file("a.yml", "a")]);
		tar[0] = "b".charCodeAt(0);
		expect(() => extract(tar)).toThrow("Bad header checksum at offset 0");
	});

	test("detects truncated entry data", () => {
		const tar = pack([file("a.yml", "x".repeat(600))]);
		expect(() => extract(tar.subarray(0, 512 + 100))).toThrow("Truncated data for a.yml: expected 600 bytes");
	});

	test("detects a missing end-of-archive marker", () => {
		const tar = pack([file("a.yml", "a")]);
		expect(() => extract(tar.subarray(0, 1024))).toThrow("Missing end-of-archive marker");
	});

	test("an empty archive has no entries", () => {
		expect(extract(pack([]))).toEqual([]);
	});
});
