export { computeChecksum, validateChecksum } from "./checksum";
export { BLOCK_SIZE, FLAGTYPE, META_FLAGTYPE, USTAR } from "./constants";
export type { MetaEntryType } from "./constants";
export { createTarDecoder } from "./decoder";
export type {
	DecoderOptions,
	ParsedTarEntry,
	TarEntryType,
	TarHeader,
} from "./types";
export { streamToBuffer } from "./utils";
