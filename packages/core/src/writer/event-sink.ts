import { Either } from "effect";
import { intoEvents } from "../events/flatten.js";
import type { Event } from "../types/event-types.js";
import type { Value } from "../types/value-types.js";

// ============================================================================
// EventSink — the push interface every encoder implements
// ============================================================================

/**
 * Consumes events one at a time. The stream is flat, so a sink keeps its own
 * nesting state between calls. Flushing and finalizing are up to each
 * implementation.
 */
export interface EventSink<E> {
	readonly write: (event: Event) => Either.Either<void, E>;
}

/**
 * Pushes every event into `sink`, stopping at the first failure.
 */
export const writeEvents = <E>(
	events: Iterable<Event>,
	sink: EventSink<E>,
): Either.Either<void, E> => {
	for (const event of events) {
		const written = sink.write(event);
		if (Either.isLeft(written)) {
			return written;
		}
	}
	return Either.right(undefined);
};

export const writeValue = <E>(
	value: Value,
	sink: EventSink<E>,
): Either.Either<void, E> => writeEvents(intoEvents(value), sink);
