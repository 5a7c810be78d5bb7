import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { ExtractError, errorMessage } from "./errors";
import { extract } from "./fs/extract";
import type { ExtractionOutcome, ExtractOptions } from "./fs/types";
import type { FormatVersion } from "./validate/schema";
import type { ValidateOptions, ValidationResult } from "./validate/types";
import { validate } from "./validate/validate";

const SCRATCH_PREFIX = "apg-verify-";

export interface CheckOptions extends ExtractOptions, ValidateOptions {
	/**
	 * Metadata format version to validate against.
	 * @default 1
	 */
	formatVersion?: FormatVersion;
	/**
	 * Parent of the scratch directory.
	 * @default os.tmpdir()
	 */
	tmpDir?: string;
}

/** Everything one archive check found out. */
export interface CheckReport {
	/** True only when extraction and validation both succeeded. */
	readonly ok: boolean;
	readonly archivePath: string;
	readonly formatVersion: FormatVersion;
	/** Scratch directory the archive was extracted into, when one was created. */
	readonly scratchDir?: string;
	readonly extraction: ExtractionOutcome;
	/** Absent when extraction failed. */
	readonly validation?: ValidationResult;
	/** Set when the scratch directory could not be removed. Does not affect `ok`. */
	readonly cleanupError?: Error;
}

/**
 * Extracts an archive into a fresh scratch directory, validates the result and
 * removes the directory again, whatever happened.
 */
export async function checkArchive(
	archivePath: string,
	options: CheckOptions = {},
): Promise<CheckReport> {
	const formatVersion = options.formatVersion ?? 1;
	const parent = options.tmpDir ?? os.tmpdir();

	let scratchDir: string;
	try {
		scratchDir = await fs.mkdtemp(path.join(parent, SCRATCH_PREFIX));
	} catch (err) {
		const error = new ExtractError(
			"IO_ERROR",
			`Cannot create scratch directory in "${parent}": ${errorMessage(err)}`,
			{ cause: err },
		);
		return Object.freeze<CheckReport>({
			ok: false,
			archivePath,
			formatVersion,
			extraction: { ok: false, error, warnings: [] },
		});
	}

	let cleanupError: Error | undefined;
	const { extraction, validation } = await extractAndValidate(
		archivePath,
		scratchDir,
		formatVersion,
		options,
	).finally(async () => {
		cleanupError = await removeScratchDir(scratchDir);
	});

	return Object.freeze({
		ok: extraction.ok && validation?.status === "good",
		archivePath,
		formatVersion,
		scratchDir,
		extraction,
		validation,
		cleanupError,
	});
}

async function extractAndValidate(
	archivePath: string,
	scratchDir: string,
	formatVersion: FormatVersion,
	options: CheckOptions,
): Promise<{ extraction: ExtractionOutcome; validation?: ValidationResult }> {
	const extraction = await extract(archivePath, scratchDir, options);
	if (!extraction.ok) return { extraction };

	return {
		extraction,
		validation: await validate(scratchDir, formatVersion, options),
	};
}

async function removeScratchDir(scratchDir: string): Promise<Error | undefined> {
	try {
		await fs.rm(scratchDir, { recursive: true, force: true });
		return undefined;
	} catch (err) {
		return err instanceof Error ? err : new Error(String(err));
	}
}
