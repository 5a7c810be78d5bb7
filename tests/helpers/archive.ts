import * as fs from "node:fs/promises";
import * as path from "node:path";
import lzma from "lzma-native";
import { buildTar, type TestEntry } from "./tar";

/** Compresses bytes into a single xz stream. */
export async function xz(data: Uint8Array): Promise<Buffer> {
	const compressor = lzma.createCompressor();
	compressor.end(Buffer.from(data));

	const chunks: Buffer[] = [];
	for await (const chunk of compressor) {
		chunks.push(Buffer.from(chunk));
	}
	return Buffer.concat(chunks);
}

/** Writes `entries` as a `.tar.xz` file in `dir` and returns its path. */
export async function writeArchive(
	dir: string,
	name: string,
	entries: TestEntry[],
): Promise<string> {
	const archivePath = path.join(dir, name);
	await fs.writeFile(archivePath, await xz(buildTar(entries)));
	return archivePath;
}

export const VALID_METADATA_V1 = {
	name: "hello",
	version: "1.0.0",
	architecture: "x86_64",
	description: "Prints a friendly greeting",
	maintainer: "Test Maintainer <maintainer@example.com>",
	license: "MIT",
	homepage: "https://example.com/hello",
	dependencies: [],
	conflicts: [],
	provides: [],
	replaces: [],
};

export const VALID_METADATA_V2 = {
	...VALID_METADATA_V1,
	type: "binary",
	tags: ["cli"],
	conf: [],
};

/** Entries of a well-formed package with the given `metadata.json` contents. */
export function packageEntries(metadata: unknown): TestEntry[] {
	return [
		{ name: "data/", mode: 0o755 },
		{ name: "data/usr/", mode: 0o755 },
		{ name: "data/usr/bin/", mode: 0o755 },
		{
			name: "data/usr/bin/hello",
			mode: 0o755,
			content: "#!/bin/sh\necho hello\n",
		},
		{
			name: "md5sums",
			content: "0123456789abcdef0123456789abcdef  usr/bin/hello\n",
		},
		{
			name: "metadata.json",
			content:
				typeof metadata === "string" ? metadata : JSON.stringify(metadata, null, 2),
		},
	];
}

/** Deterministic bytes, enough of them to span several decompressed chunks. */
export function payload(size: number): Uint8Array {
	const bytes = new Uint8Array(size);
	for (let i = 0; i < size; i++) {
		bytes[i] = (i * 31 + (i >> 9)) & 0xff;
	}
	return bytes;
}

export const PAYLOAD_SIZE = 300 * 1024;

/** {@link packageEntries} plus a {@link PAYLOAD_SIZE} byte file under `data/`. */
export function largePackageEntries(metadata: unknown): TestEntry[] {
	return [
		...packageEntries(metadata),
		{ name: "data/usr/share/blob", content: payload(PAYLOAD_SIZE) },
	];
}
