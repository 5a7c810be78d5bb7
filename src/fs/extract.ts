import type { FileHandle } from "node:fs/promises";
import * as fs from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import { ExtractError, errorMessage, isErrnoException } from "../errors";
import { createXzDecoder } from "./compression";
import type { ExtractionOutcome, ExtractOptions, ExtractProgress } from "./types";
import { unpackTar } from "./unpack";

/**
 * Safely extracts an xz-compressed tar archive into `destinationRoot`.
 *
 * The destination is created when missing. Entries are processed in stream
 * order and the first failure stops the extraction; what was written before it
 * stays on disk.
 *
 * @example
 * ```typescript
 * const outcome = await extract("hello-1.0.apg", "/tmp/scratch");
 * if (!outcome.ok) {
 *   console.error(`${outcome.error.code}: ${outcome.error.message}`);
 * }
 * ```
 */
export async function extract(
	archivePath: string,
	destinationRoot: string,
	options: ExtractOptions = {},
): Promise<ExtractionOutcome> {
	const progress: ExtractProgress = { entries: 0, warnings: [] };

	let handle: FileHandle;
	try {
		handle = await fs.open(archivePath, "r");
	} catch (err) {
		return {
			ok: false,
			error: new ExtractError(
				"IO_ERROR",
				`Cannot open archive: ${errorMessage(err)}`,
				{ cause: err },
			),
			warnings: progress.warnings,
		};
	}

	const decompressor = createXzDecoder();
	let decompressorError: unknown;
	decompressor.on("error", (err: unknown) => {
		decompressorError ??= err;
	});

	try {
		// The read stream closes the handle when it ends or is destroyed.
		await pipeline(
			handle.createReadStream(),
			decompressor,
			unpackTar(destinationRoot, options, progress),
		);
	} catch (err) {
		return {
			ok: false,
			error: classifyError(err, decompressorError),
			warnings: progress.warnings,
		};
	}

	return { ok: true, entries: progress.entries, warnings: progress.warnings };
}

function classifyError(err: unknown, decompressorError: unknown): ExtractError {
	if (err instanceof ExtractError) return err;

	if (isErrnoException(err)) {
		return new ExtractError(
			"IO_ERROR",
			`Error during reading archive: ${err.message}`,
			{ cause: err },
		);
	}

	if (err === decompressorError) {
		return new ExtractError(
			"ARCHIVE_FORMAT",
			`Cannot decompress archive: ${errorMessage(err)}`,
			{ cause: err },
		);
	}

	return new ExtractError(
		"IO_ERROR",
		`Error during reading archive: ${errorMessage(err)}`,
		{ cause: err },
	);
}
