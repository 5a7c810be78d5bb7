import type { ReadableStream } from "node:stream/web";

/** Kind of filesystem object a tar entry describes. */
export type TarEntryType =
	| "file"
	| "directory"
	| "symlink"
	| "link"
	| "character-device"
	| "block-device"
	| "fifo"
	| "contiguous"
	| "unknown";

/**
 * Header information for a tar entry, after GNU and PAX extension records
 * have been applied.
 */
export interface TarHeader {
	/** Entry name/path as stored in the archive. Untrusted. */
	name: string;
	/** Size of the entry data in bytes. */
	size: number;
	/** Decoded entry type. */
	type: TarEntryType;
	/** Raw type flag character ("" for the legacy NUL flag). */
	typeflag: string;
	/** Unix file permissions as stored in the header. */
	mode: number;
	/** Modification time. */
	mtime: Date;
	uid: number;
	gid: number;
	uname: string;
	gname: string;
	/** Target path for symlinks and hard links. */
	linkname: string;
	/** PAX extended attributes as key-value pairs. */
	pax?: Record<string, string>;
}

/**
 * Represents an entry parsed from a tar archive stream.
 *
 * The body must be consumed (or cancelled) before the next entry is read.
 */
export interface ParsedTarEntry {
	header: TarHeader;
	body: ReadableStream<Uint8Array>;
}

/** Options for {@link createTarDecoder}. */
export interface DecoderOptions {
	/**
	 * Verify header checksums and reject truncated archives.
	 * @default false
	 */
	strict?: boolean;
}
