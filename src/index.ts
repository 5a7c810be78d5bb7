export { type CheckOptions, type CheckReport, checkArchive } from "./check";
export {
	ExtractError,
	type ExtractErrorCode,
	type ExtractWarning,
	type RequiredPath,
	type SchemaErrorReason,
	SchemaValidationError,
	StructuralValidationError,
} from "./errors";
export * from "./fs/index";
export * from "./tar/index";
export * from "./validate/index";
