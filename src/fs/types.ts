import type { ExtractError, ExtractWarning } from "../errors";

/**
 * Configuration for {@link extract}.
 */
export interface ExtractOptions {
	/**
	 * Largest declared size of a single regular file, in bytes.
	 * @default 524288000 (500 MiB)
	 */
	maxFileSize?: number;
	/**
	 * Budget over the declared sizes of all regular files, in bytes.
	 * @default Infinity
	 */
	maxTotalSize?: number;
	/**
	 * Longest cleaned entry name, in characters.
	 * @default 255
	 */
	maxNameLength?: number;
	/** Mode for extracted directories. Defaults to the entry's mode. Masked to `0o755`. */
	dmode?: number;
	/**
	 * Mode for extracted files. Masked to `0o755`.
	 * @default 0o644
	 */
	fmode?: number;
}

/** Result of {@link extract}. Failures carry the first error that stopped the stream. */
export type ExtractionOutcome =
	| { ok: true; entries: number; warnings: ExtractWarning[] }
	| { ok: false; error: ExtractError; warnings: ExtractWarning[] };

/** Counters the extraction sink fills in while it runs. */
export interface ExtractProgress {
	/** Entries processed, skipped ones included. */
	entries: number;
	warnings: ExtractWarning[];
}
