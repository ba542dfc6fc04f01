/**
 * Minimal POSIX ustar pack/extract for backup archives.
 * Supports regular files and directories. Names longer than 100 bytes use the 155-byte
 * prefix field, or a PAX extended header (`path=` record) when no split fits.
 */

const BLOCK = 512;
const NAME_LENGTH = 100;
const PREFIX_LENGTH = 155;
const TYPE_FILE = 0x30; // '0'
const TYPE_DIRECTORY = 0x35; // '5'
const TYPE_PAX = 0x78; // 'x'
const TYPE_PAX_GLOBAL = 0x67; // 'g'
const PAX_HEADER_NAME = "././@PaxHeader";

export interface TarEntry {
	readonly name: string;
	readonly type: "file" | "directory";
	readonly data: Buffer;
	/** Seconds since the epoch. */
	readonly mtime: number;
	readonly mode: number;
}

export class TarFormatError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "TarFormatError";
	}
}

function padOctal(n: number, len: number): string {
	return `${n.toString(8).padStart(len - 1, "0")}\0`;
}

function headerChecksum(header: Buffer): number {
	let sum = 0;
	for (let i = 0; i < BLOCK; i++) {
		// Checksum field (148-155) counts as spaces
		sum += i >= 148 && i < 156 ? 32 : (header[i] ?? 0);
	}
	return sum;
}

function splitName(name: string): { prefix: string; name: string } | undefined {
	if (Buffer.byteLength(name) <= NAME_LENGTH) {
		return { prefix: "", name };
	}
	// Split at a '/' so that prefix <= 155 bytes and name <= 100 bytes
	for (let i = name.indexOf("/"); i >= 0; i = name.indexOf("/", i + 1)) {
		const prefix = name.slice(0, i);
		const rest = name.slice(i + 1);
		if (Buffer.byteLength(prefix) <= PREFIX_LENGTH && Buffer.byteLength(rest) <= NAME_LENGTH && rest.length > 0) {
			return { prefix, name: rest };
		}
	}
	return;
}

/** One `<length> <key>=<value>\n` record; the length counts its own digits. */
function paxRecord(key: string, value: string): string {
	const body = ` ${key}=${value}\n`;
	const bodyLength = Buffer.byteLength(body);
	let digits = String(bodyLength).length;
	while (String(bodyLength + digits).length > digits) {
		digits++;
	}
	return `${bodyLength + digits}${body}`;
}

function parsePaxPath(data: Buffer, offset: number): string | undefined {
	let path: string | undefined;
	let pos = 0;
	while (pos < data.length) {
		const space = data.indexOf(0x20, pos);
		const length = space > pos ? Number.parseInt(data.subarray(pos, space).toString("ascii"), 10) : Number.NaN;
		if (Number.isNaN(length) || length <= space - pos || pos + length > data.length) {
			throw new TarFormatError(`Bad extended header at offset ${offset}`);
		}
		const record = data.subarray(space + 1, pos + length - 1).toString("utf8");
		const eq = record.indexOf("=");
		if (eq > 0 && record.slice(0, eq) === "path") {
			path = record.slice(eq + 1);
		}
		pos += length;
	}
	return path;
}

interface HeaderFields {
	readonly name: string;
	readonly prefix: string;
	readonly typeflag: number;
	readonly size: number;
	readonly mtime: number;
	readonly mode: number;
}

function createHeader(fields: HeaderFields): Buffer {
	const header = Buffer.alloc(BLOCK, 0);

	header.write(fields.name, 0, NAME_LENGTH, "utf8");
	header.write(padOctal(fields.mode & 0o7777, 8), 100, 8, "utf8");
	header.write(padOctal(0, 8), 108, 8, "utf8");
	header.write(padOctal(0, 8), 116, 8, "utf8");
	header.write(padOctal(fields.size, 12), 124, 12, "utf8");
	header.write(padOctal(Math.max(0, Math.floor(fields.mtime)), 12), 136, 12, "utf8");
	header[156] = fields.typeflag;
	header.write("ustar\0", 257, 6, "utf8");
	header.write("00", 263, 2, "utf8");
	header.write(fields.prefix, 345, PREFIX_LENGTH, "utf8");

	header.write(padOctal(headerChecksum(header), 7), 148, 7, "utf8");
	header[155] = 0x20;
	return header;
}

/**
 * Packs entries into an uncompressed tar buffer terminated by two zero blocks.
 */
export function pack(entries: ReadonlyArray<TarEntry>): Buffer {
	const blocks: Array<Buffer> = [];
	const pushData = (data: Buffer) => {
		blocks.push(data);
		const remainder = data.length % BLOCK;
		if (remainder > 0) {
			blocks.push(Buffer.alloc(BLOCK - remainder, 0));
		}
	};

	for (const entry of entries) {
		const entryName = entry.type === "directory" && !entry.name.endsWith("/") ? `${entry.name}/` : entry.name;
		let split = splitName(entryName);
		if (!split) {
			const pax = Buffer.from(paxRecord("path", entryName), "utf8");
			blocks.push(
				createHeader({
					name: PAX_HEADER_NAME,
					prefix: "",
					typeflag: TYPE_PAX,
					size: pax.length,
					mtime: entry.mtime,
					mode: 0o644,
				}),
			);
			pushData(pax);
			// Readers without PAX support see the name cut to the field width
			split = { prefix: "", name: entryName };
		}

		blocks.push(
			createHeader({
				name: split.name,
				prefix: split.prefix,
				typeflag: entry.type === "directory" ? TYPE_DIRECTORY : TYPE_FILE,
				size: entry.type === "directory" ? 0 : entry.data.length,
				mtime: entry.mtime,
				mode: entry.mode,
			}),
		);
		if (entry.type === "file") {
			pushData(entry.data);
		}
	}
	blocks.push(Buffer.alloc(BLOCK * 2, 0));
	return Buffer.concat(blocks);
}

function readString(block: Buffer, offset: number, length: number): string {
	const field = block.subarray(offset, offset + length);
	const end = field.indexOf(0);
	return field.subarray(0, end >= 0 ? end : field.length).toString("utf8");
}

function readOctal(block: Buffer, offset: number, length: number): number {
	const text = readString(block, offset, length).trim();
	if (!/^[0-7]+$/.test(text)) {
		return Number.NaN;
	}
	return Number.parseInt(text, 8);
}

/**
 * Extracts every entry of a tar buffer, validating each header checksum and that
 * every entry's data is present in full. Throws {@link TarFormatError} otherwise.
 */
export function extract(tar: Buffer): Array<TarEntry> {
	const entries: Array<TarEntry> = [];
	let offset = 0;
	let paxPath: string | undefined;

	while (offset + BLOCK <= tar.length) {
		const header = tar.subarray(offset, offset + BLOCK);
		if (header.every(b => b === 0)) {
			return entries;
		}

		const stored = readOctal(header, 148, 8);
		if (Number.isNaN(stored) || stored !== headerChecksum(header)) {
			throw new TarFormatError(`Bad header checksum at offset ${offset}`);
		}

		const name = readString(header, 0, NAME_LENGTH);
		const prefix = readString(header, 345, PREFIX_LENGTH);
		const fullName = prefix ? `${prefix}/${name}` : name;
		const size = readOctal(header, 124, 12);
		if (Number.isNaN(size)) {
			throw new TarFormatError(`Bad size field for ${fullName}`);
		}

		offset += BLOCK;
		if (offset + size > tar.length) {
			throw new TarFormatError(`Truncated data for ${fullName}: expected ${size} bytes`);
		}

		const typeflag = header[156];
		const data = Buffer.from(tar.subarray(offset, offset + size));
		const headerOffset = offset - BLOCK;
		offset += size;
		const remainder = size % BLOCK;
		if (remainder > 0) {
			offset += BLOCK - remainder;
		}

		if (typeflag === TYPE_PAX) {
			paxPath = parsePaxPath(data, headerOffset) ?? paxPath;
			continue;
		}
		if (typeflag === TYPE_PAX_GLOBAL) {
			continue;
		}

		const entryName = paxPath ?? fullName;
		paxPath = undefined;
		const isDirectory = typeflag === TYPE_DIRECTORY || entryName.endsWith("/");
		entries.push({
			name: entryName,
			type: isDirectory ? "directory" : "file",
			data,
			mtime: readOctal(header, 136, 12) || 0,
			mode: readOctal(header, 100, 8) || 0,
		});
	}

	throw new TarFormatError("Missing end-of-archive marker");
}
