/**
 * Main entry point for @plistream/core.
 *
 * A property list as a flat stream of events: the event and value types,
 * the flattening producer, the encoding-sniffing reader, the sink contract
 * and the Effect adapters built on them.
 */

// ============================================================================
// Event and Value Types
// ============================================================================

export type {
	BooleanValueEvent,
	DataValueEvent,
	DateValueEvent,
	Encoding,
	EndArrayEvent,
	EndDictionaryEvent,
	Event,
	EventTag,
	IntegerValueEvent,
	RealValueEvent,
	StartArrayEvent,
	StartDictionaryEvent,
	StringValueEvent,
} from "./types/event-types.js";

export type {
	ArrayValue,
	BooleanValue,
	DataValue,
	DateValue,
	DictionaryValue,
	IntegerValue,
	RealValue,
	StringValue,
	Value,
	ValueTag,
} from "./types/value-types.js";

export * as Events from "./events/event.js";
export * as Values from "./value/value.js";
export { INT64_MAX, INT64_MIN } from "./value/int64.js";

// ============================================================================
// Flattening
// ============================================================================

export { flatten, intoEvents } from "./events/flatten.js";

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export type { ReadError, SourceFailure } from "./errors/index.js";
export {
	EventStreamError,
	PlistFormatError,
	SourceError,
	UnexpectedEofError,
} from "./errors/index.js";

// ============================================================================
// Reading
// ============================================================================

export type { SeekableSource } from "./reader/seekable-source.js";
export type { BufferSource } from "./reader/buffer-source.js";
export { makeBufferSource } from "./reader/buffer-source.js";
export type { EventReader, ReadResult } from "./reader/event-reader.js";
export type {
	ReaderFormatsShape,
	SubReaderFactory,
} from "./reader/reader-formats.js";
export {
	makeReaderFormatsLayer,
	ReaderFormats,
} from "./reader/reader-formats.js";
export type { PlistReader } from "./reader/plist-reader.js";
export { BINARY_SIGNATURE, makePlistReader } from "./reader/plist-reader.js";
export { readValue } from "./reader/read-value.js";

// ============================================================================
// Writing
// ============================================================================

export type { EventSink } from "./writer/event-sink.js";
export { writeEvents, writeValue } from "./writer/event-sink.js";
export type { ValueBuilder } from "./writer/value-builder.js";
export { buildValue, makeValueBuilder } from "./writer/value-builder.js";

// ============================================================================
// Effect Adapters
// ============================================================================

export { decodeValue, eventStream, openReader } from "./stream/event-stream.js";
