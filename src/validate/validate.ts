import * as fs from "node:fs/promises";
import * as path from "node:path";
import { errorMessage, SchemaValidationError } from "../errors";
import { DEFAULT_EXTRACT_LIMITS } from "../fs/limits";
import { findMissingFields, parseMetadata } from "./metadata";
import { type FormatVersion, getMetadataSchema } from "./schema";
import { checkLayout } from "./structure";
import type { ValidateOptions, ValidationResult } from "./types";

const METADATA_FILE = "metadata.json";

const freeze = (result: ValidationResult): ValidationResult =>
	Object.freeze(result);

const GOOD = freeze({ status: "good" });

/**
 * Validates an extracted package tree: the top-level layout first, then
 * `metadata.json` against the schema of `formatVersion`.
 *
 * Expected failures are returned, not thrown.
 *
 * @example
 * ```typescript
 * const result = await validate("/tmp/scratch", 2);
 * if (result.status === "bad") {
 *   console.error(result.structuralError?.message ?? result.schemaError?.message);
 * }
 * ```
 */
export async function validate(
	destinationRoot: string,
	formatVersion: FormatVersion = 1,
	options: ValidateOptions = {},
): Promise<ValidationResult> {
	const structuralError = await checkLayout(destinationRoot);
	if (structuralError) {
		return freeze({ status: "bad", structuralError });
	}

	try {
		const text = await readMetadata(
			path.join(destinationRoot, METADATA_FILE),
			options.maxMetadataBytes ?? DEFAULT_EXTRACT_LIMITS.maxFileSize,
		);

		const fields = getMetadataSchema(formatVersion);
		const missing = findMissingFields(parseMetadata(text, fields), fields);
		if (missing.length > 0) {
			throw new SchemaValidationError(
				"fields",
				`Missing or empty fields in metadata: ${missing.join(", ")}`,
				{ fields: missing },
			);
		}
	} catch (err) {
		if (err instanceof SchemaValidationError) {
			return freeze({ status: "bad", schemaError: err });
		}
		throw err;
	}

	return GOOD;
}

async function readMetadata(filePath: string, maxBytes: number): Promise<string> {
	let handle: fs.FileHandle;
	try {
		handle = await fs.open(filePath, "r");
	} catch (err) {
		throw new SchemaValidationError(
			"read",
			`Failed to read metadata: ${errorMessage(err)}`,
			{ cause: err },
		);
	}

	try {
		const { size } = await handle.stat();
		if (size > maxBytes) {
			throw new SchemaValidationError(
				"too-large",
				`Metadata file is too large: ${size} bytes, limit ${maxBytes} bytes.`,
			);
		}

		return await handle.readFile("utf8");
	} catch (err) {
		if (err instanceof SchemaValidationError) throw err;
		throw new SchemaValidationError(
			"read",
			`Failed to read metadata: ${errorMessage(err)}`,
			{ cause: err },
		);
	} finally {
		await handle.close();
	}
}
