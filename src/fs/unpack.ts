import { createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Readable, Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { type ReadableStream, TransformStream } from "node:stream/web";
import { ExtractError, toIoError } from "../errors";
import { createTarDecoder, type ParsedTarEntry, streamToBuffer } from "../tar";
import {
	DEFAULT_DIR_MODE,
	DEFAULT_EXTRACT_LIMITS,
	DEFAULT_FILE_MODE,
	MODE_MASK,
} from "./limits";
import { resolveTarget, sanitizeEntryName } from "./path";
import type { ExtractOptions, ExtractProgress } from "./types";

// Files up to this size are buffered and written in one call.
const SMALL_FILE_SIZE = 32 * 1024;

const toError = (err: unknown): Error =>
	err instanceof Error ? err : new Error(String(err));

/**
 * Extract a tar archive to a directory.
 *
 * Returns a Node.js [`Writable`](https://nodejs.org/api/stream.html#class-streamwritable)
 * stream to pipe uncompressed tar bytes into. Only directories and regular
 * files are written; links are rejected and every other entry type is skipped
 * with a warning recorded on `progress`.
 *
 * The first failure stops the stream: the writable errors with the
 * {@link ExtractError} that caused it. Nothing already written is removed.
 *
 * @param directoryPath - Path to directory where files will be extracted
 * @param options - Optional extraction configuration
 * @param progress - Receives the entry count and warnings
 * @returns Node.js [`Writable`](https://nodejs.org/api/stream.html#class-streamwritable) stream to pipe tar archive bytes into
 *
 * @example
 * ```typescript
 * import { createReadStream } from 'node:fs';
 * import { pipeline } from 'node:stream/promises';
 *
 * const progress = { entries: 0, warnings: [] };
 * await pipeline(
 *   createReadStream('package.tar'),
 *   unpackTar('/output/directory', { maxFileSize: 1024 * 1024 }, progress),
 * );
 * ```
 */
export function unpackTar(
	directoryPath: string,
	options: ExtractOptions = {},
	progress: ExtractProgress = { entries: 0, warnings: [] },
): Writable {
	const maxFileSize = options.maxFileSize ?? DEFAULT_EXTRACT_LIMITS.maxFileSize;
	const maxTotalSize =
		options.maxTotalSize ?? DEFAULT_EXTRACT_LIMITS.maxTotalSize;
	const maxNameLength =
		options.maxNameLength ?? DEFAULT_EXTRACT_LIMITS.maxNameLength;
	const fileMode = (options.fmode ?? DEFAULT_FILE_MODE) & MODE_MASK;

	// Create a stream pair for proper backpressure handling.
	const { readable, writable: webWritable } = new TransformStream<
		Uint8Array,
		Uint8Array
	>();

	// Aborting errors the body of the entry being read, so a consumer waiting
	// on it wakes up.
	const abort = new AbortController();
	const entryStream = readable.pipeThrough(
		createTarDecoder({ strict: true }, abort.signal),
	);

	const processingPromise = (async () => {
		const reader = entryStream.getReader();
		try {
			await fs
				.mkdir(directoryPath, { recursive: true })
				.catch((err: unknown) => {
					throw toIoError(`Cannot create destination "${directoryPath}"`, err);
				});
			const root = await fs
				.realpath(path.resolve(directoryPath))
				.catch((err: unknown) => {
					throw toIoError(
						`Cannot get absolute path of destination "${directoryPath}"`,
						err,
					);
				});

			const validatedDirs = new Set<string>([root]);
			let totalSize = 0;

			const extractEntry = async ({ header, body }: ParsedTarEntry) => {
				const cleanedName = sanitizeEntryName(header.name, maxNameLength);
				const target = await resolveTarget(
					root,
					cleanedName,
					validatedDirs,
					header.name,
				);

				switch (header.type) {
					case "directory": {
						// The owner keeps rwx so the tree can be written and removed.
						const mode = ((options.dmode ?? header.mode) & MODE_MASK) | 0o700;
						try {
							await fs.mkdir(target, { recursive: true, mode });
						} catch (err) {
							throw toIoError(
								`Failed to create folder "${header.name}"`,
								err,
								header.name,
							);
						}

						validatedDirs.add(target);
						break;
					}

					case "file": {
						if (header.size > maxFileSize) {
							throw new ExtractError(
								"SIZE_LIMIT",
								`File too large: "${header.name}" (${header.size} bytes, limit ${maxFileSize} bytes).`,
								{ entryName: header.name },
							);
						}

						totalSize += header.size;
						if (totalSize > maxTotalSize) {
							throw new ExtractError(
								"SIZE_LIMIT",
								`Archive exceeds the total size limit of ${maxTotalSize} bytes at "${header.name}".`,
								{ entryName: header.name },
							);
						}

						try {
							await fs.mkdir(path.dirname(target), {
								recursive: true,
								mode: DEFAULT_DIR_MODE,
							});
							await writeEntryFile(target, body, header.size, fileMode);
						} catch (err) {
							throw toIoError(
								`Failed to write file "${header.name}"`,
								err,
								header.name,
							);
						}
						break;
					}

					case "symlink":
					case "link":
						throw new ExtractError(
							"PATH_SECURITY",
							`Symbolic and hard links are not allowed in the archive: "${header.name}".`,
							{ entryName: header.name },
						);

					default: {
						// Unsupported type, skip it. Handles "character-device", "block-device", "fifo", etc.
						await body.cancel();
						progress.warnings.push({
							code: "ENTRY_SKIPPED",
							entryName: header.name,
							type: header.type,
							message:
								header.type === "unknown"
									? `skipped entry "${header.name}" with unknown type flag "${header.typeflag}"`
									: `skipped ${header.type} entry "${header.name}"`,
						});
						break;
					}
				}
			};

			while (true) {
				const { done, value: entry } = await reader.read();
				if (done) break;

				await extractEntry(entry);
				progress.entries++;
			}
		} catch (err) {
			abort.abort(err);
			await reader.cancel(err);
			throw err;
		} finally {
			reader.releaseLock();
		}
	})();

	// Settled once, so the failure is reported through the writable only.
	const settled: Promise<Error | undefined> = processingPromise.then(
		() => undefined,
		toError,
	);

	// Get the writer for the web writable stream
	const webWriter = webWritable.getWriter();

	// Create the Node Writable stream with proper backpressure
	return new Writable({
		async write(chunk: Uint8Array, _encoding, callback) {
			try {
				// This await is important for backpressure. It will not resolve
				// until the web stream is ready for more data AND the processing
				// pipeline can handle it.
				await webWriter.write(chunk);
				callback();
			} catch (err) {
				callback((await settled) ?? toError(err));
			}
		},

		async final(callback) {
			try {
				await webWriter.close();
			} catch (err) {
				callback((await settled) ?? toError(err));
				return;
			}

			// Wait for all processing to complete
			callback(await settled);
		},

		destroy(err, callback) {
			abort.abort(err ?? new Error("Extraction was interrupted."));

			// An errored writer rejects the abort; processing holds that error.
			void webWriter
				.abort(err)
				.then(
					() => settled,
					() => settled,
				)
				.then(() => callback(err));
		},
	});
}

async function writeEntryFile(
	target: string,
	body: ReadableStream<Uint8Array>,
	size: number,
	mode: number,
): Promise<void> {
	// For small files, buffer the content and use writeFile to avoid overhead of creating a stream.
	if (size <= SMALL_FILE_SIZE) {
		await fs.writeFile(target, await streamToBuffer(body), { mode });
		return;
	}

	await pipeline(Readable.fromWeb(body), createWriteStream(target, { mode }));
}
