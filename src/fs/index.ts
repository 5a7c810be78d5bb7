export { createXzDecoder } from "./compression";
export { extract } from "./extract";
export { DEFAULT_EXTRACT_LIMITS } from "./limits";
export { cleanEntryName, sanitizeEntryName } from "./path";
export type { ExtractionOutcome, ExtractOptions, ExtractProgress } from "./types";
export { unpackTar } from "./unpack";
