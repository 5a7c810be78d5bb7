import { z } from "zod";
import { errorMessage, SchemaValidationError } from "../errors";
import type { FieldKind, MetadataField } from "./schema";

/** A field value after type checking. Absent fields are `undefined`. */
export type MetadataValue = string | readonly string[] | null | undefined;

/** Known fields of a parsed `metadata.json`. Unknown fields are dropped. */
export type MetadataRecord = Readonly<Record<string, MetadataValue>>;

const FIELD_PARSERS: Readonly<Record<FieldKind, z.ZodType<MetadataValue>>> = {
	scalar: z.string().nullish(),
	list: z.array(z.string()).nullish(),
};

// `null` is accepted at the top level and read as a document with no fields.
const documentSchema = z.record(z.string(), z.unknown()).nullable();

/**
 * Parses `metadata.json` text and type-checks the fields the schema knows.
 *
 * @throws {SchemaValidationError} with reason `parse` on invalid JSON, a
 * top level that is not an object, or known fields of the wrong type.
 */
export function parseMetadata(
	text: string,
	fields: readonly MetadataField[],
): MetadataRecord {
	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch (err) {
		throw new SchemaValidationError(
			"parse",
			`Metadata invalid JSON: ${errorMessage(err)}`,
			{ cause: err },
		);
	}

	const document = documentSchema.safeParse(json);
	if (!document.success) {
		throw new SchemaValidationError(
			"parse",
			"Metadata invalid JSON: the top level must be an object.",
			{ cause: document.error },
		);
	}

	const values = document.data ?? {};
	const record: Record<string, MetadataValue> = {};
	const wrongType: string[] = [];

	for (const { name, kind } of fields) {
		if (!Object.hasOwn(values, name)) continue;

		const parsed = FIELD_PARSERS[kind].safeParse(values[name]);
		if (parsed.success) {
			record[name] = parsed.data;
		} else {
			wrongType.push(name);
		}
	}

	if (wrongType.length > 0) {
		throw new SchemaValidationError(
			"parse",
			`Metadata has fields of the wrong type: ${wrongType.join(", ")}`,
			{ fields: wrongType },
		);
	}

	return record;
}

/**
 * Lists required fields that are missing, in schema order.
 *
 * A scalar is missing when absent, `null` or empty. A list is missing when
 * absent or `null`; an empty list counts as present.
 */
export function findMissingFields(
	record: MetadataRecord,
	fields: readonly MetadataField[],
): string[] {
	return fields
		.filter(({ name, kind, required }) => {
			if (!required) return false;
			const value = record[name];
			if (value === undefined || value === null) return true;
			return kind === "scalar" && value === "";
		})
		.map(({ name }) => name);
}
