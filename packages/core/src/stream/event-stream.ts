import { Effect, Either, Option, Stream } from "effect";
import type { EventStreamError, ReadError } from "../errors/format-errors.js";
import type { EventReader } from "../reader/event-reader.js";
import { makePlistReader, type PlistReader } from "../reader/plist-reader.js";
import { ReaderFormats } from "../reader/reader-formats.js";
import { readValue } from "../reader/read-value.js";
import type { SeekableSource } from "../reader/seekable-source.js";
import type { Event } from "../types/event-types.js";
import type { Value } from "../types/value-types.js";

// ============================================================================
// Effect adapters over the synchronous pull interface
// ============================================================================

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
	Either.isRight(either)
		? Effect.succeed(either.right)
		: Effect.fail(either.left);

/**
 * Exposes a reader as a Stream. Each element is one pull; the stream fails on
 * the first error and never pulls after it.
 */
export const eventStream = (
	reader: EventReader,
): Stream.Stream<Event, ReadError> =>
	Stream.repeatEffectOption(
		Effect.suspend((): Effect.Effect<Event, Option.Option<ReadError>> => {
			const result = reader.next();
			if (result.done) {
				return Effect.fail(Option.none());
			}
			return Either.isRight(result.value)
				? Effect.succeed(result.value.right)
				: Effect.fail(Option.some(result.value.left));
		}),
	);

/**
 * Decodes one value from a reader, failing with the first read or structure
 * error.
 */
export const decodeValue = (
	reader: EventReader,
): Effect.Effect<Value, ReadError | EventStreamError> =>
	Effect.suspend(() => fromEither(readValue(reader)));

/**
 * Wraps a source in a PlistReader using the ReaderFormats in context.
 *
 * @example
 * ```ts
 * const program = openReader(makeBufferSource(bytes)).pipe(
 *   Effect.flatMap(decodeValue),
 *   Effect.provide(makeReaderFormatsLayer({ binary, markup })),
 * )
 * ```
 */
export const openReader = (
	source: SeekableSource,
): Effect.Effect<PlistReader, never, ReaderFormats> =>
	Effect.map(ReaderFormats, (formats) => makePlistReader(source, formats));
