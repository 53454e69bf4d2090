/**
 * Stand-in sub-readers for exercising PlistReader without a real decoder.
 */

import { Either } from "effect";
import type { ReadError } from "../../src/errors/format-errors.js";
import type { EventReader, ReadResult } from "../../src/reader/event-reader.js";
import type { ReaderFormatsShape } from "../../src/reader/reader-formats.js";
import type { SeekableSource } from "../../src/reader/seekable-source.js";
import type { Encoding, Event } from "../../src/types/event-types.js";

/**
 * Serves the given results in order, then reports `done` forever.
 */
export const scriptedReader = (
	results: ReadonlyArray<ReadResult>,
): EventReader => {
	let index = 0;
	return {
		next: () => {
			if (index >= results.length) {
				return { done: true, value: undefined };
			}
			const value = results[index];
			index += 1;
			return { done: false, value };
		},
	};
};

export const succeedWith = (events: ReadonlyArray<Event>): Array<ReadResult> =>
	events.map((event) => Either.right(event));

export interface BindRecord {
	readonly encoding: Encoding;
	/** The first bytes the sub-reader saw from its source. */
	readonly head: Either.Either<Uint8Array, ReadError>;
}

/**
 * Formats that record every bind, reading `peek` bytes from the source the
 * way a real decoder would read its header.
 */
export const makeRecordingFormats = (
	script: {
		readonly binary?: ReadonlyArray<ReadResult>;
		readonly markup?: ReadonlyArray<ReadResult>;
	},
	peek = 8,
): { readonly formats: ReaderFormatsShape; readonly binds: Array<BindRecord> } => {
	const binds: Array<BindRecord> = [];

	const bind =
		(encoding: Encoding, results: ReadonlyArray<ReadResult>) =>
		(source: SeekableSource): EventReader => {
			binds.push({ encoding, head: source.readExact(peek) });
			return scriptedReader(results);
		};

	return {
		formats: {
			binary: bind("binary", script.binary ?? []),
			markup: bind("markup", script.markup ?? []),
		},
		binds,
	};
};

export const ascii = (text: string): Uint8Array => new TextEncoder().encode(text);
