import { Context, Layer } from "effect";
import type { EventReader } from "./event-reader.js";
import type { SeekableSource } from "./seekable-source.js";

// ============================================================================
// ReaderFormats — plugin point for format-specific sub-readers
// ============================================================================

/**
 * Builds a sub-reader over a source positioned at offset 0. The sub-reader
 * owns the source from then on.
 */
export type SubReaderFactory = (source: SeekableSource) => EventReader;

/**
 * The two decoders a PlistReader chooses between: `binary` for input that
 * starts with the `bplist00` signature, `markup` for everything else.
 */
export interface ReaderFormatsShape {
	readonly binary: SubReaderFactory;
	readonly markup: SubReaderFactory;
}

export class ReaderFormats extends Context.Tag("ReaderFormats")<
	ReaderFormats,
	ReaderFormatsShape
>() {}

export const makeReaderFormatsLayer = (
	formats: ReaderFormatsShape,
): Layer.Layer<ReaderFormats> => Layer.succeed(ReaderFormats, formats);
