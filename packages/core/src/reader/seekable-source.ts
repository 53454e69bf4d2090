import type { Either } from "effect";
import type { SourceFailure } from "../errors/source-errors.js";

// ============================================================================
// SeekableSource — the byte input a reader is built over
// ============================================================================

/**
 * Random-access byte input. Both operations are synchronous and either
 * complete fully or fail; a failed `readExact` leaves the position
 * unspecified.
 */
export interface SeekableSource {
	/** Moves to an absolute byte offset. */
	readonly seek: (offset: number) => Either.Either<void, SourceFailure>;
	/** Reads exactly `length` bytes from the current position. */
	readonly readExact: (
		length: number,
	) => Either.Either<Uint8Array, SourceFailure>;
}
