import {
	ReadableStream,
	type ReadableStreamDefaultController,
	TransformStream,
} from "node:stream/web";
import { ExtractError } from "../errors";
import { validateChecksum } from "./checksum";
import {
	BLOCK_SIZE,
	BLOCK_SIZE_MASK,
	FLAGTYPE,
	META_FLAGTYPE,
	USTAR,
} from "./constants";
import type {
	DecoderOptions,
	ParsedTarEntry,
	TarEntryType,
	TarHeader,
} from "./types";
import { decoder, readNumeric, readOctal, readString } from "./utils";

/** Upper bound for PAX and GNU long-name records, which are buffered whole. */
const MAX_META_ENTRY_SIZE = 1024 * 1024;

/** Entry types whose size field never describes a data region. */
const HEADER_ONLY_TYPES: ReadonlySet<TarEntryType> = new Set([
	"link",
	"symlink",
	"character-device",
	"block-device",
	"directory",
	"fifo",
]);

interface InternalTarHeader extends TarHeader {
	magic: string;
	prefix: string;
}

type HeaderOverrides = {
	name?: string;
	linkname?: string;
	size?: number;
	// PAX mtime is a float, handle it as a number before converting to Date
	mtime?: number;
	uid?: number;
	gid?: number;
	uname?: string;
	gname?: string;
	pax?: Record<string, string>;
};

interface EntryState {
	header: TarHeader;
	bytesLeft: number;
	padding: number;
	controller: ReadableStreamDefaultController<Uint8Array>;
	/** Set when the body was cancelled or errored; remaining bytes are discarded. */
	cancelled: boolean;
	/** Resolves a pending wait for the consumer to pull more of the body. */
	resume: (() => void) | null;
}

const formatError = (message: string, entryName?: string) =>
	new ExtractError("ARCHIVE_FORMAT", message, { entryName });

/**
 * Create a transform stream that parses tar bytes into entries.
 *
 * Entry bodies are forwarded as they arrive, so memory use is bounded by the
 * size of the incoming chunks, not by the size of the entries.
 *
 * @param options - Optional configuration for the decoder using {@link DecoderOptions}.
 * @param signal - Aborting errors the body stream of the entry being read.
 * @returns `TransformStream` that converts tar archive bytes to {@link ParsedTarEntry} objects.
 * @example
 * ```typescript
 * const entries = tarBytes.pipeThrough(createTarDecoder({ strict: true }));
 *
 * for await (const entry of entries) {
 *   console.log(`Entry: ${entry.header.name}`);
 *   await entry.body.cancel();
 * }
 * ```
 */
export function createTarDecoder(
	options: DecoderOptions = {},
	signal?: AbortSignal,
): TransformStream<Uint8Array, ParsedTarEntry> {
	const strict = options.strict ?? false;

	// Chunk queue
	const chunks: Uint8Array[] = [];
	let totalLength = 0;
	let offset = 0; // Read offset within the first chunk only

	let currentEntry: EntryState | null = null;
	let paxGlobals: HeaderOverrides = {};
	let nextEntryOverrides: HeaderOverrides = {};
	// Set once the end-of-archive marker has been read; trailing bytes are ignored.
	let ended = false;

	signal?.addEventListener(
		"abort",
		() => {
			if (!currentEntry) return;
			if (!currentEntry.cancelled) currentEntry.controller.error(signal.reason);
			currentEntry.cancelled = true;
			currentEntry.resume?.();
		},
		{ once: true },
	);

	/**
	 * Reads and consumes a specific number of bytes from the chunk queue.
	 * Returns a single Uint8Array with the data, or null if not enough data is available.
	 */
	function consume(size: number): Uint8Array | null {
		if (totalLength < size) {
			return null;
		}
		if (size === 0) {
			return new Uint8Array(0);
		}

		totalLength -= size;

		const firstChunk = chunks[0];

		// Fast path: The entire data block is within the first chunk.
		if (firstChunk.length - offset >= size) {
			const data = firstChunk.slice(offset, offset + size);
			offset += size;

			if (offset === firstChunk.length) {
				chunks.shift();
				offset = 0;
			}

			return data;
		}

		// Slow path: The data spans multiple chunks.
		const data = new Uint8Array(size);
		let bytesCopied = 0;

		while (bytesCopied < size) {
			const chunk = chunks[0];
			const bytesToCopy = Math.min(size - bytesCopied, chunk.length - offset);

			data.set(chunk.subarray(offset, offset + bytesToCopy), bytesCopied);
			bytesCopied += bytesToCopy;
			offset += bytesToCopy;

			if (offset === chunk.length) {
				chunks.shift();
				offset = 0;
			}
		}

		return data;
	}

	/**
	 * Forwards up to `entry.bytesLeft` bytes from the chunk queue to the entry's body,
	 * waiting for the consumer whenever the body's queue is full.
	 * Bytes of a cancelled body are dropped.
	 */
	async function forward(entry: EntryState): Promise<void> {
		while (entry.bytesLeft > 0 && totalLength > 0) {
			const firstChunk = chunks[0];
			const bytesToSend = Math.min(entry.bytesLeft, firstChunk.length - offset);
			const data = firstChunk.subarray(offset, offset + bytesToSend);

			totalLength -= bytesToSend;
			entry.bytesLeft -= bytesToSend;
			offset += bytesToSend;

			if (offset === firstChunk.length) {
				chunks.shift();
				offset = 0;
			}

			if (entry.cancelled) continue;

			entry.controller.enqueue(data);
			if ((entry.controller.desiredSize ?? 0) <= 0) {
				await new Promise<void>((resolve) => {
					entry.resume = resolve;
				});
				entry.resume = null;
			}
		}
	}

	/**
	 * Un-consume data by putting it back at the front of the chunk queue.
	 */
	function unshift(data: Uint8Array): void {
		if (offset > 0) {
			chunks[0] = chunks[0].subarray(offset);
			offset = 0;
		}
		chunks.unshift(data);
		totalLength += data.length;
	}

	function openEntry(
		header: TarHeader,
		dataSize: number,
	): { body: ReadableStream<Uint8Array>; state: EntryState } {
		const holder: {
			controller?: ReadableStreamDefaultController<Uint8Array>;
			state?: EntryState;
		} = {};

		const body = new ReadableStream<Uint8Array>({
			start(controller) {
				holder.controller = controller;
			},
			pull() {
				holder.state?.resume?.();
			},
			cancel() {
				if (!holder.state) return;
				holder.state.cancelled = true;
				holder.state.resume?.();
			},
		});

		if (!holder.controller) {
			throw new Error("Entry body stream did not start synchronously.");
		}

		const state: EntryState = {
			header,
			bytesLeft: dataSize,
			padding: -dataSize & BLOCK_SIZE_MASK,
			controller: holder.controller,
			cancelled: false,
			resume: null,
		};
		holder.state = state;

		return { body, state };
	}

	return new TransformStream<Uint8Array, ParsedTarEntry>(
		{
			async transform(chunk, controller) {
				if (ended) return;

				chunks.push(chunk);
				totalLength += chunk.length;

				while (true) {
					// Read an entry's body.
					if (currentEntry) {
						await forward(currentEntry);
						if (currentEntry.bytesLeft > 0) break;

						// consume() and discard the result to skip padding
						if (consume(currentEntry.padding) === null) break;

						if (!currentEntry.cancelled) currentEntry.controller.close();
						currentEntry = null;
					}

					// Read the next header block.
					const headerBlock = consume(BLOCK_SIZE);
					if (headerBlock === null) {
						break; // Not enough data for a header.
					}

					// A zero block followed by another zero block (or by the end of the
					// stream, see flush) marks the end of the archive.
					if (headerBlock.every((b) => b === 0)) {
						const nextBlock = consume(BLOCK_SIZE);
						if (nextBlock === null) {
							unshift(headerBlock);
							break;
						}

						if (nextBlock.every((b) => b === 0)) {
							ended = true;
							chunks.length = 0;
							totalLength = 0;
							offset = 0;
							return;
						}

						throw formatError("Invalid tar header: data after a zero block.");
					}

					const header = parseUstarHeader(headerBlock, strict);

					// Meta entries (PAX, GNU) modify the next regular entry.
					const metaType = META_FLAGTYPE[header.typeflag];
					if (metaType) {
						if (header.size > MAX_META_ENTRY_SIZE) {
							throw formatError(
								`Tar ${metaType} record of ${header.size} bytes exceeds the limit of ${MAX_META_ENTRY_SIZE} bytes.`,
							);
						}

						const dataBlocksSize =
							(header.size + BLOCK_SIZE_MASK) & ~BLOCK_SIZE_MASK;
						const block = consume(dataBlocksSize);
						if (block === null) {
							// Not enough data for the meta content, put header back.
							unshift(headerBlock);
							break;
						}

						const data = block.subarray(0, header.size);
						if (metaType === "pax-global-header") {
							paxGlobals = { ...paxGlobals, ...parsePax(data, strict) };
						} else if (metaType === "pax-header") {
							nextEntryOverrides = {
								...nextEntryOverrides,
								...parsePax(data, strict),
							};
						} else if (metaType === "gnu-long-name") {
							nextEntryOverrides = {
								...nextEntryOverrides,
								name: readString(data, 0, data.length),
							};
						} else {
							nextEntryOverrides = {
								...nextEntryOverrides,
								linkname: readString(data, 0, data.length),
							};
						}

						continue;
					}

					const finalHeader = toTarHeader(header);

					applyOverrides(finalHeader, paxGlobals);
					applyOverrides(finalHeader, nextEntryOverrides);

					// Only apply if name wasn't already overridden by PAX/GNU.
					if (
						header.prefix &&
						header.magic === "ustar" &&
						nextEntryOverrides.name === undefined &&
						paxGlobals.name === undefined
					) {
						finalHeader.name = `${header.prefix}/${finalHeader.name}`;
					}

					// The legacy NUL flag marks a directory by a trailing slash.
					if (finalHeader.typeflag === "" && finalHeader.name.endsWith("/")) {
						finalHeader.type = "directory";
					}

					nextEntryOverrides = {};

					const dataSize = HEADER_ONLY_TYPES.has(finalHeader.type)
						? 0
						: finalHeader.size;
					const { body, state } = openEntry(finalHeader, dataSize);

					controller.enqueue({ header: finalHeader, body });

					if (dataSize > 0) {
						currentEntry = state;
					} else {
						state.controller.close();
					}
				}
			},

			flush(controller) {
				if (ended) return;

				// If we were in the middle of reading an entry, the archive is cut short.
				if (currentEntry) {
					if (strict) {
						const error = formatError(
							"Tar archive is truncated.",
							currentEntry.header.name,
						);
						if (!currentEntry.cancelled) currentEntry.controller.error(error);
						controller.error(error);
						return;
					}

					if (!currentEntry.cancelled) currentEntry.controller.close();
					currentEntry = null;
				}

				// Any leftover data must be zeroes: a lone zero block is a valid end.
				if (strict) {
					const leftover = chunks.some((chunk, i) =>
						chunk.subarray(i === 0 ? offset : 0).some((b) => b !== 0),
					);
					if (leftover) controller.error(formatError("Tar archive is truncated."));
				}
			},
		},
		undefined,
		// The consumer holds the current entry while it drains the body; with
		// room for one entry the decoder keeps accepting input meanwhile.
		{ highWaterMark: 1 },
	);
}

function resolveType(typeflag: string): TarEntryType {
	if (typeflag === "") return "file";
	return FLAGTYPE[typeflag] ?? "unknown";
}

// Parses a 512-byte block into a USTAR header object.
function parseUstarHeader(
	block: Uint8Array,
	strict: boolean,
): InternalTarHeader {
	if (strict && !validateChecksum(block)) {
		throw formatError("Invalid tar header checksum.");
	}

	const name = readString(block, USTAR.name.offset, USTAR.name.size);
	const size = readNumeric(block, USTAR.size.offset, USTAR.size.size);
	if (!Number.isSafeInteger(size) || size < 0) {
		throw formatError(`Invalid size field in tar header for "${name}".`, name);
	}

	const typeflag = readString(
		block,
		USTAR.typeflag.offset,
		USTAR.typeflag.size,
	);

	return {
		name,
		size,
		type: resolveType(typeflag),
		typeflag,
		mode: readOctal(block, USTAR.mode.offset, USTAR.mode.size),
		uid: readNumeric(block, USTAR.uid.offset, USTAR.uid.size),
		gid: readNumeric(block, USTAR.gid.offset, USTAR.gid.size),
		mtime: new Date(
			readNumeric(block, USTAR.mtime.offset, USTAR.mtime.size) * 1000,
		),
		linkname: readString(block, USTAR.linkname.offset, USTAR.linkname.size),
		magic: readString(block, USTAR.magic.offset, USTAR.magic.size),
		uname: readString(block, USTAR.uname.offset, USTAR.uname.size),
		gname: readString(block, USTAR.gname.offset, USTAR.gname.size),
		prefix: readString(block, USTAR.prefix.offset, USTAR.prefix.size),
	};
}

function toTarHeader({
	magic: _magic,
	prefix: _prefix,
	...header
}: InternalTarHeader): TarHeader {
	return header;
}

// Parses PAX record data ("<length> <key>=<value>\n" records) into overrides.
function parsePax(buffer: Uint8Array, strict: boolean): HeaderOverrides {
	const overrides: HeaderOverrides = {};
	const pax: Record<string, string> = {};
	let offset = 0;

	while (offset < buffer.length) {
		const spaceIndex = buffer.indexOf(32, offset);
		const length =
			spaceIndex === -1
				? Number.NaN
				: Number.parseInt(
						decoder.decode(buffer.subarray(offset, spaceIndex)),
						10,
					);
		const recordEnd = offset + length;

		if (
			!Number.isSafeInteger(length) ||
			length <= 0 ||
			recordEnd > buffer.length ||
			buffer[recordEnd - 1] !== 10
		) {
			if (strict) throw formatError("Invalid PAX extended header record.");
			break;
		}

		const record = decoder.decode(
			buffer.subarray(spaceIndex + 1, recordEnd - 1),
		);
		const separator = record.indexOf("=");
		if (separator > 0) {
			const key = record.slice(0, separator);
			const value = record.slice(separator + 1);
			pax[key] = value;

			switch (key) {
				case "path":
					overrides.name = value;
					break;
				case "linkpath":
					overrides.linkname = value;
					break;
				case "size": {
					const size = Number(value);
					if (!Number.isSafeInteger(size) || size < 0) {
						throw formatError(`Invalid PAX size "${value}".`);
					}
					overrides.size = size;
					break;
				}
				case "mtime":
					overrides.mtime = Number.parseFloat(value);
					break;
				case "uid":
					overrides.uid = Number.parseInt(value, 10);
					break;
				case "gid":
					overrides.gid = Number.parseInt(value, 10);
					break;
				case "uname":
					overrides.uname = value;
					break;
				case "gname":
					overrides.gname = value;
					break;
			}
		}

		offset = recordEnd;
	}

	if (Object.keys(pax).length > 0) overrides.pax = pax;

	return overrides;
}

// Applies header extension overrides to a parsed USTAR header.
function applyOverrides(header: TarHeader, overrides: HeaderOverrides) {
	if (overrides.name !== undefined) header.name = overrides.name;
	if (overrides.linkname !== undefined) header.linkname = overrides.linkname;
	if (overrides.size !== undefined) header.size = overrides.size;
	if (overrides.mtime !== undefined)
		header.mtime = new Date(overrides.mtime * 1000);
	if (overrides.uid !== undefined) header.uid = overrides.uid;
	if (overrides.gid !== undefined) header.gid = overrides.gid;
	if (overrides.uname !== undefined) header.uname = overrides.uname;
	if (overrides.gname !== undefined) header.gname = overrides.gname;
	if (overrides.pax)
		header.pax = { ...(header.pax ?? {}), ...overrides.pax };
}
