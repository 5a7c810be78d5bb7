import type { ReadableStream } from "node:stream/web";

export const decoder = new TextDecoder();

/**
 * Reads a NUL-terminated string from the view.
 */
export function readString(
	view: Uint8Array,
	offset: number,
	size: number,
): string {
	const field = view.subarray(offset, offset + size);
	const end = field.indexOf(0);

	return decoder.decode(end === -1 ? field : field.subarray(0, end));
}

/**
 * Reads an octal number from the view.
 *
 * Leading spaces are skipped and the number ends at the first NUL or space.
 * Returns `NaN` when a non-octal digit is found.
 */
export function readOctal(
	view: Uint8Array,
	offset: number,
	size: number,
): number {
	let value = 0;
	let i = offset;
	const end = offset + size;

	while (i < end && view[i] === 32) i++;

	for (; i < end; i++) {
		const charCode = view[i];
		if (charCode === 0 || charCode === 32) break;
		if (charCode < 48 || charCode > 55) return Number.NaN;
		// Multiply rather than shift: sizes can exceed 32 bits.
		value = value * 8 + (charCode - 48);
	}

	return value;
}

/**
 * Reads a numeric field that can be octal or POSIX base-256.
 * This implementation handles positive integers, such as uid, gid, and size.
 */
export function readNumeric(
	view: Uint8Array,
	offset: number,
	size: number,
): number {
	if (view[offset] & 0x80) {
		// The first byte carries the marker bit; the rest is big-endian.
		let result = view[offset] & 0x7f;
		for (let i = 1; i < size; i++) {
			result = result * 256 + view[offset + i];
		}
		return result;
	}
	return readOctal(view, offset, size);
}

/**
 * Reads an entire ReadableStream of Uint8Arrays into a single, combined Uint8Array.
 */
export async function streamToBuffer(
	stream: ReadableStream<Uint8Array>,
): Promise<Uint8Array> {
	const chunks: Uint8Array[] = [];
	const reader = stream.getReader();
	let totalLength = 0;

	try {
		while (true) {
			const { done, value } = await reader.read();
			if (done) break;

			chunks.push(value);
			totalLength += value.length;
		}

		// Pre-allocate the final buffer.
		const result = new Uint8Array(totalLength);
		let offset = 0;

		for (const chunk of chunks) {
			result.set(chunk, offset);
			offset += chunk.length;
		}

		return result;
	} finally {
		reader.releaseLock();
	}
}
