import type { SchemaValidationError, StructuralValidationError } from "../errors";

export interface ValidateOptions {
	/**
	 * Largest `metadata.json` that is read, in bytes.
	 * @default 524288000 (500 MiB)
	 */
	maxMetadataBytes?: number;
}

/**
 * Verdict on an extracted package tree. A `bad` result carries exactly one of
 * the two errors.
 */
export interface ValidationResult {
	readonly status: "good" | "bad";
	readonly structuralError?: StructuralValidationError;
	readonly schemaError?: SchemaValidationError;
}
