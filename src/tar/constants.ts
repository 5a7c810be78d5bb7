import type { TarEntryType } from "./types";

/** Size of a TAR block in bytes. */
export const BLOCK_SIZE = 512;

/** Mask for rounding sizes up to a whole block. */
export const BLOCK_SIZE_MASK = 511;

/** Offsets and sizes of fields in a USTAR header block.
 *
 * @see https://www.gnu.org/software/tar/manual/html_node/Standard.html
 */
export const USTAR = {
	name: { offset: 0, size: 100 },
	mode: { offset: 100, size: 8 },
	uid: { offset: 108, size: 8 },
	gid: { offset: 116, size: 8 },
	size: { offset: 124, size: 12 },
	mtime: { offset: 136, size: 12 },
	checksum: { offset: 148, size: 8 },
	typeflag: { offset: 156, size: 1 },
	linkname: { offset: 157, size: 100 },
	magic: { offset: 257, size: 6 },
	version: { offset: 263, size: 2 },
	uname: { offset: 265, size: 32 },
	gname: { offset: 297, size: 32 },
	prefix: { offset: 345, size: 155 },
} as const;

/** Type flags of entries that describe filesystem objects. */
export const FLAGTYPE: Readonly<Record<string, TarEntryType | undefined>> = {
	"0": "file",
	"1": "link",
	"2": "symlink",
	"3": "character-device",
	"4": "block-device",
	"5": "directory",
	"6": "fifo",
	"7": "contiguous",
};

/** Kinds of meta entries that modify the entry after them. */
export type MetaEntryType =
	| "pax-header"
	| "pax-global-header"
	| "gnu-long-name"
	| "gnu-long-link-name";

/** Type flags of meta entries. */
export const META_FLAGTYPE: Readonly<Record<string, MetaEntryType | undefined>> = {
	// POSIX.1-2001 extensions
	x: "pax-header",
	g: "pax-global-header",
	// GNU extensions
	L: "gnu-long-name",
	K: "gnu-long-link-name",
};
