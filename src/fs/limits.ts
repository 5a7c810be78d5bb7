/**
 * Default extraction ceilings.
 *
 * `maxTotalSize` is off unless a caller opts in; an archive is otherwise only
 * bounded per entry.
 */
export const DEFAULT_EXTRACT_LIMITS = Object.freeze({
	/** Largest declared size of a single regular file, in bytes (500 MiB). */
	maxFileSize: 500 * 1024 * 1024,
	/** Budget over the declared sizes of all regular files, in bytes. */
	maxTotalSize: Number.POSITIVE_INFINITY,
	/** Longest cleaned entry name, in characters. */
	maxNameLength: 255,
});

/** Mode bits an extracted file or directory may carry. */
export const MODE_MASK = 0o755;

/** Mode for regular files when neither the caller nor the archive decides. */
export const DEFAULT_FILE_MODE = 0o644;

/** Mode for parent directories created on the way to a file. */
export const DEFAULT_DIR_MODE = 0o755;
