import type { Option } from "effect";

// ============================================================================
// Event — a property list flattened into a linear sequence
// ============================================================================

/**
 * Opens an array. `length` is the number of direct children when the producer
 * knows it; consumers may preallocate with it but must stop at `EndArray`.
 */
export interface StartArrayEvent {
	readonly _tag: "StartArray";
	readonly length: Option.Option<number>;
}

export interface EndArrayEvent {
	readonly _tag: "EndArray";
}

/**
 * Opens a dictionary. `length` counts key/value pairs, not events.
 */
export interface StartDictionaryEvent {
	readonly _tag: "StartDictionary";
	readonly length: Option.Option<number>;
}

export interface EndDictionaryEvent {
	readonly _tag: "EndDictionary";
}

export interface BooleanValueEvent {
	readonly _tag: "BooleanValue";
	readonly value: boolean;
}

export interface DataValueEvent {
	readonly _tag: "DataValue";
	readonly value: Uint8Array;
}

export interface DateValueEvent {
	readonly _tag: "DateValue";
	readonly value: Date;
}

/**
 * Signed 64-bit integer.
 */
export interface IntegerValueEvent {
	readonly _tag: "IntegerValue";
	readonly value: bigint;
}

export interface RealValueEvent {
	readonly _tag: "RealValue";
	readonly value: number;
}

export interface StringValueEvent {
	readonly _tag: "StringValue";
	readonly value: string;
}

/**
 * One step of a property list event stream.
 *
 * Dictionary contents are alternating key/value pairs, the key always being a
 * `StringValue` directly before the event(s) of its value:
 *
 * ```
 * StartDictionary(Some(2))
 * StringValue("Height")   // key
 * RealValue(181.2)        // value
 * StringValue("Age")      // key
 * IntegerValue(28)        // value
 * EndDictionary
 * ```
 */
export type Event =
	| StartArrayEvent
	| EndArrayEvent
	| StartDictionaryEvent
	| EndDictionaryEvent
	| BooleanValueEvent
	| DataValueEvent
	| DateValueEvent
	| IntegerValueEvent
	| RealValueEvent
	| StringValueEvent;

export type EventTag = Event["_tag"];

/**
 * Physical encodings a reader can bind to.
 */
export type Encoding = "binary" | "markup";
