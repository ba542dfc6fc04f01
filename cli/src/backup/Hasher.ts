import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

/** Streams the file through SHA-256 and returns the lowercase hex digest. */
export function sha256File(path: string): Promise<string> {
	return new Promise((resolve, reject) => {
		const hash = createHash("sha256");
		const stream = createReadStream(path);
		stream.on("error", reject);
		stream.on("data", chunk => hash.update(chunk));
		stream.on("end", () => resolve(hash.digest("hex")));
	});
}

/** Content equality by digest; modification times are never consulted. */
export async function filesIdentical(a: string, b: string): Promise<boolean> {
	const [digestA, digestB] = await Promise.all([sha256File(a), sha256File(b)]);
	return digestA === digestB;
}
