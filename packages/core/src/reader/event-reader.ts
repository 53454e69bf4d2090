import type { Either } from "effect";
import type { ReadError } from "../errors/format-errors.js";
import type { Event } from "../types/event-types.js";

// ============================================================================
// EventReader — the pull interface every encoding exposes
// ============================================================================

export type ReadResult = Either.Either<Event, ReadError>;

/**
 * Pull-based source of events. Each `next()` yields one event or one error;
 * `done` marks the end of the stream and must be returned again on every
 * later call. Pulling again after an error is unspecified.
 */
export interface EventReader {
	readonly next: () => IteratorResult<ReadResult, undefined>;
}
