import { Either, Option } from "effect";
import type { SourceFailure } from "../errors/source-errors.js";
import type { Encoding } from "../types/event-types.js";
import type { EventReader, ReadResult } from "./event-reader.js";
import type { ReaderFormatsShape } from "./reader-formats.js";
import type { SeekableSource } from "./seekable-source.js";

// ============================================================================
// PlistReader — sniffs the encoding once, then delegates every pull
// ============================================================================

/**
 * ASCII `bplist00`, found at offset 0 of every binary property list.
 */
export const BINARY_SIGNATURE: Uint8Array = Uint8Array.of(
	0x62, 0x70, 0x6c, 0x69, 0x73, 0x74, 0x30, 0x30,
);

export interface PlistReader
	extends EventReader,
		IterableIterator<ReadResult> {
	readonly next: () => IteratorResult<ReadResult, undefined>;
	/** The bound encoding, `None` until the first successful pull. */
	readonly encoding: Option.Option<Encoding>;
}

type ReaderState =
	| { readonly _tag: "Uninitialized"; readonly source: SeekableSource }
	| {
			readonly _tag: "Bound";
			readonly encoding: Encoding;
			readonly reader: EventReader;
	  };

const sameBytes = (a: Uint8Array, b: Uint8Array): boolean =>
	a.length === b.length && a.every((byte, index) => byte === b[index]);

/**
 * Reads the signature window and rewinds. Every attempt starts with an absolute
 * seek, so an attempt retried after a failed one starts from offset 0 too.
 */
const detectEncoding = (
	source: SeekableSource,
): Either.Either<Encoding, SourceFailure> => {
	const start = source.seek(0);
	if (Either.isLeft(start)) {
		return Either.left(start.left);
	}
	const magic = source.readExact(BINARY_SIGNATURE.length);
	if (Either.isLeft(magic)) {
		return Either.left(magic.left);
	}
	const rewind = source.seek(0);
	if (Either.isLeft(rewind)) {
		return Either.left(rewind.left);
	}
	return Either.right(
		sameBytes(magic.right, BINARY_SIGNATURE) ? "binary" : "markup",
	);
};

/**
 * Wraps a source whose encoding is not yet known.
 *
 * Nothing is read until the first `next()`. That call inspects the first 8
 * bytes: a `bplist00` prefix binds the reader to `formats.binary`, anything
 * else to `formats.markup`. Once bound, pulls are forwarded to the sub-reader
 * untouched and the binding never changes. A failed detection is returned as the
 * result of that pull and the reader stays unbound, holding the same source.
 *
 * @example
 * ```ts
 * const reader = makePlistReader(makeBufferSource(bytes), formats)
 * for (const result of reader) {
 *   if (Either.isLeft(result)) throw result.left
 *   console.log(result.right._tag)
 * }
 * ```
 */
export const makePlistReader = (
	source: SeekableSource,
	formats: ReaderFormatsShape,
): PlistReader => {
	let state: ReaderState = { _tag: "Uninitialized", source };

	const next = (): IteratorResult<ReadResult, undefined> => {
		// Resolve the binding at most once, then serve the pull from it
		for (;;) {
			if (state._tag === "Bound") {
				return state.reader.next();
			}

			const held = state.source;
			const detected = detectEncoding(held);
			if (Either.isLeft(detected)) {
				state = { _tag: "Uninitialized", source: held };
				return { done: false, value: Either.left(detected.left) };
			}

			const encoding = detected.right;
			state = {
				_tag: "Bound",
				encoding,
				reader:
					encoding === "binary" ? formats.binary(held) : formats.markup(held),
			};
		}
	};

	const reader: PlistReader = {
		next,
		get encoding() {
			return state._tag === "Bound"
				? Option.some(state.encoding)
				: Option.none();
		},
		[Symbol.iterator]() {
			return reader;
		},
	};

	return reader;
};
