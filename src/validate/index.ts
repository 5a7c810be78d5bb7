export {
	findMissingFields,
	type MetadataRecord,
	type MetadataValue,
	parseMetadata,
} from "./metadata";
export {
	FORMAT_VERSIONS,
	type FieldKind,
	type FormatVersion,
	getMetadataSchema,
	isFormatVersion,
	METADATA_SCHEMAS,
	type MetadataField,
} from "./schema";
export { checkLayout } from "./structure";
export type { ValidateOptions, ValidationResult } from "./types";
export { validate } from "./validate";
