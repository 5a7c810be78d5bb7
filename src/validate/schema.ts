/** Supported `metadata.json` format versions. */
export type FormatVersion = 1 | 2;

export type FieldKind = "scalar" | "list";

/** One field of a metadata schema. */
export interface MetadataField {
	readonly name: string;
	/** Scalars hold a string, lists an array of strings. */
	readonly kind: FieldKind;
	readonly required: boolean;
}

const field = (
	name: string,
	kind: FieldKind,
	required = true,
): MetadataField => Object.freeze({ name, kind, required });

const V1_FIELDS: readonly MetadataField[] = [
	field("name", "scalar"),
	field("version", "scalar"),
	field("architecture", "scalar", false),
	field("description", "scalar"),
	field("maintainer", "scalar"),
	field("license", "scalar", false),
	field("homepage", "scalar"),
	field("dependencies", "list"),
	field("conflicts", "list"),
	field("provides", "list"),
	field("replaces", "list"),
];

const V2_FIELDS: readonly MetadataField[] = [
	...V1_FIELDS,
	field("type", "scalar"),
	field("tags", "list"),
	field("conf", "list"),
];

/** Field descriptors per format version, in reporting order. */
export const METADATA_SCHEMAS: Readonly<
	Record<FormatVersion, readonly MetadataField[]>
> = Object.freeze({
	1: Object.freeze(V1_FIELDS),
	2: Object.freeze(V2_FIELDS),
});

export const FORMAT_VERSIONS: readonly FormatVersion[] = Object.freeze([1, 2]);

export function isFormatVersion(value: unknown): value is FormatVersion {
	return FORMAT_VERSIONS.some((version) => version === value);
}

export function getMetadataSchema(
	version: FormatVersion,
): readonly MetadataField[] {
	return METADATA_SCHEMAS[version];
}
