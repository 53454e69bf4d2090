/**
 * Node.js file descriptor implementation of SeekableSource.
 * Reads are positioned `readSync` calls; the descriptor itself is never moved.
 */

import { readSync } from "node:fs";
import {
	type SeekableSource,
	SourceError,
	UnexpectedEofError,
} from "@plistream/core";
import { Either } from "effect";

// ============================================================================
// Helpers
// ============================================================================

export const toSourceError = (
	operation: SourceError["operation"],
	offset: number,
	error: unknown,
): SourceError =>
	new SourceError({
		operation,
		offset,
		message:
			error instanceof Error ? error.message : `Unknown ${operation} error`,
		cause: error,
	});

// ============================================================================
// File source
// ============================================================================

export const makeFileSource = (fd: number): SeekableSource => {
	let position = 0;

	return {
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
			const buffer = new Uint8Array(length);
			let filled = 0;

			// readSync may return fewer bytes than asked for; 0 means end of file
			while (filled < length) {
				const read = Either.try({
					try: () => readSync(fd, buffer, filled, length - filled, position),
					catch: (error) => toSourceError("read", position, error),
				});
				if (Either.isLeft(read)) {
					return Either.left(read.left);
				}
				if (read.right === 0) {
					return Either.left(
						new UnexpectedEofError({
							offset: start,
							expected: length,
							actual: filled,
							message: `Expected ${length} bytes at offset ${start}, file ended after ${filled}`,
						}),
					);
				}
				filled += read.right;
				position += read.right;
			}

			return Either.right(buffer);
		},
	};
};
