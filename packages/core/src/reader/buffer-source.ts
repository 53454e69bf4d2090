/**
 * In-memory implementation of SeekableSource over a byte array.
 * Useful for tests and for input that is already fully loaded.
 */

import { Either } from "effect";
import { SourceError, UnexpectedEofError } from "../errors/source-errors.js";
import type { SeekableSource } from "./seekable-source.js";

export interface BufferSource extends SeekableSource {
	readonly position: number;
}

export const makeBufferSource = (bytes: Uint8Array): BufferSource => {
	let position = 0;

	return {
		get position() {
			return position;
		},

		seek: (offset) => {
			if (!Number.isSafeInteger(offset) || offset < 0) {
				return Either.left(
					new SourceError({
						operation: "seek",
						offset,
						message: `Invalid seek offset ${offset}`,
					}),
				);
			}
			position = offset;
			return Either.right(undefined);
		},

		readExact: (length) => {
			const start = position;
			if (!Number.isSafeInteger(length) || length < 0) {
				return Either.left(
					new SourceError({
						operation: "read",
						offset: start,
						message: `Invalid read length ${length}`,
					}),
				);
			}
			const available = Math.max(bytes.length - start, 0);
			if (available < length) {
				// A short read consumes whatever was left
				position = Math.max(bytes.length, start);
				return Either.left(
					new UnexpectedEofError({
						offset: start,
						expected: length,
						actual: available,
						message: `Expected ${length} bytes at offset ${start}, only ${available} available`,
					}),
				);
			}
			position = start + length;
			return Either.right(bytes.subarray(start, start + length));
		},
	};
};
