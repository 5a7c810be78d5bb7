import type { Duplex } from "node:stream";
import lzma from "lzma-native";

/**
 * Creates a streaming xz decompressor.
 *
 * Input that is not xz-compressed makes the stream emit an error.
 */
export function createXzDecoder(): Duplex {
	return lzma.createDecompressor();
}
