/** Stable extraction error codes. */
export type ExtractErrorCode =
	| "IO_ERROR"
	| "ARCHIVE_FORMAT"
	| "PATH_SECURITY"
	| "SIZE_LIMIT";

/** Error thrown for extraction failures and safety violations. */
export class ExtractError extends Error {
	/** Machine-readable error code. */
	readonly code: ExtractErrorCode;
	/** Raw name of the archive entry that caused the failure, if any. */
	readonly entryName?: string | undefined;
	/** Underlying cause, if available. */
	override readonly cause?: unknown;

	constructor(
		code: ExtractErrorCode,
		message: string,
		options?: { entryName?: string | undefined; cause?: unknown },
	) {
		super(message, options?.cause ? { cause: options.cause } : undefined);
		this.name = "ExtractError";
		this.code = code;
		this.entryName = options?.entryName;
		this.cause = options?.cause;
	}
}

/** Non-fatal condition recorded while extracting. */
export interface ExtractWarning {
	code: "ENTRY_SKIPPED";
	/** Raw name of the skipped entry. */
	entryName: string;
	/** Decoded entry type, e.g. `"fifo"` or `"character-device"`. */
	type: string;
	message: string;
}

/** Top-level paths every package archive must contain. */
export type RequiredPath = "data" | "md5sums" | "metadata.json";

/** A mandatory top-level path is absent or has the wrong file type. */
export class StructuralValidationError extends Error {
	readonly path: RequiredPath;
	readonly reason: "missing" | "wrong-type";
	override readonly cause?: unknown;

	constructor(
		path: RequiredPath,
		reason: "missing" | "wrong-type",
		options?: { cause?: unknown },
	) {
		super(
			reason === "missing"
				? `a required file or folder is missing: ${path}`
				: `a required path has the wrong type: ${path} must be a ${path === "data" ? "directory" : "regular file"}`,
			options?.cause ? { cause: options.cause } : undefined,
		);
		this.name = "StructuralValidationError";
		this.path = path;
		this.reason = reason;
		this.cause = options?.cause;
	}
}

/**
 * Why `metadata.json` was rejected.
 *
 * - `read`: the file could not be read.
 * - `too-large`: the file exceeds the metadata size ceiling.
 * - `parse`: invalid JSON, a non-object document, or a field of the wrong type.
 * - `fields`: one or more required fields are missing or empty.
 */
export type SchemaErrorReason = "read" | "too-large" | "parse" | "fields";

/** `metadata.json` could not be parsed or lacks required fields. */
export class SchemaValidationError extends Error {
	readonly reason: SchemaErrorReason;
	/** Offending field names, in schema order. Empty when no field is to blame. */
	readonly fields: readonly string[];
	override readonly cause?: unknown;

	constructor(
		reason: SchemaErrorReason,
		message: string,
		options?: { fields?: readonly string[]; cause?: unknown },
	) {
		super(message, options?.cause ? { cause: options.cause } : undefined);
		this.name = "SchemaValidationError";
		this.reason = reason;
		this.fields = Object.freeze([...(options?.fields ?? [])]);
		this.cause = options?.cause;
	}
}

/** Narrows an unknown rejection to a Node.js system error carrying an errno code. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return (
		err instanceof Error &&
		"code" in err &&
		typeof err.code === "string" &&
		err.code.startsWith("E")
	);
}

/** Message of an unknown rejection value. */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/** Wraps a low-level failure as an `IO_ERROR`, keeping extraction errors as they are. */
export function toIoError(
	message: string,
	err: unknown,
	entryName?: string,
): ExtractError {
	if (err instanceof ExtractError) return err;

	return new ExtractError("IO_ERROR", `${message}: ${errorMessage(err)}`, {
		entryName,
		cause: err,
	});
}
