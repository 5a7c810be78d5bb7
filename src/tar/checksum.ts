import { USTAR } from "./constants";
import { readOctal } from "./utils";

// ASCII code for a space character.
const CHECKSUM_SPACE = 32;

/**
 * Sums a header block with the checksum field counted as spaces.
 *
 * Returns both the POSIX unsigned sum and the signed sum some historic
 * implementations wrote.
 */
export function computeChecksum(block: Uint8Array): {
	unsigned: number;
	signed: number;
} {
	const checksumStart = USTAR.checksum.offset;
	const checksumEnd = checksumStart + USTAR.checksum.size;

	let unsigned = 0;
	let signed = 0;

	for (let i = 0; i < block.length; i++) {
		const byte =
			i >= checksumStart && i < checksumEnd ? CHECKSUM_SPACE : block[i];
		unsigned += byte;
		signed += byte > 127 ? byte - 256 : byte;
	}

	return { unsigned, signed };
}

/**
 * Validates the checksum of a tar header block.
 */
export function validateChecksum(block: Uint8Array): boolean {
	const storedChecksum = readOctal(
		block,
		USTAR.checksum.offset,
		USTAR.checksum.size,
	);
	if (Number.isNaN(storedChecksum)) return false;

	const { unsigned, signed } = computeChecksum(block);
	return storedChecksum === unsigned || storedChecksum === signed;
}
