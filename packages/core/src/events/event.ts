/**
 * Factory functions for creating Event objects.
 *
 * Re-exported from the package root as the `Events` namespace:
 *
 * ```ts
 * Events.startDictionary(Option.some(1))
 * Events.stringValue("Age")
 * Events.integerValue(28n)
 * Events.endDictionary()
 * ```
 */

import { Option } from "effect";
import type {
	BooleanValueEvent,
	DataValueEvent,
	DateValueEvent,
	EndArrayEvent,
	EndDictionaryEvent,
	Event,
	IntegerValueEvent,
	RealValueEvent,
	StartArrayEvent,
	StartDictionaryEvent,
	StringValueEvent,
} from "../types/event-types.js";
import { toInt64 } from "../value/int64.js";

export const startArray = (
	length: Option.Option<number> = Option.none(),
): StartArrayEvent => ({ _tag: "StartArray", length });

export const endArray = (): EndArrayEvent => ({ _tag: "EndArray" });

export const startDictionary = (
	length: Option.Option<number> = Option.none(),
): StartDictionaryEvent => ({ _tag: "StartDictionary", length });

export const endDictionary = (): EndDictionaryEvent => ({
	_tag: "EndDictionary",
});

export const booleanValue = (value: boolean): BooleanValueEvent => ({
	_tag: "BooleanValue",
	value,
});

export const dataValue = (value: Uint8Array): DataValueEvent => ({
	_tag: "DataValue",
	value,
});

export const dateValue = (value: Date): DateValueEvent => ({
	_tag: "DateValue",
	value,
});

/**
 * Throws a RangeError outside the signed 64-bit range.
 */
export const integerValue = (value: bigint): IntegerValueEvent => ({
	_tag: "IntegerValue",
	value: toInt64(value),
});

export const realValue = (value: number): RealValueEvent => ({
	_tag: "RealValue",
	value,
});

export const stringValue = (value: string): StringValueEvent => ({
	_tag: "StringValue",
	value,
});

// ============================================================================
// Predicates
// ============================================================================

export const isStart = (
	event: Event,
): event is StartArrayEvent | StartDictionaryEvent =>
	event._tag === "StartArray" || event._tag === "StartDictionary";

export const isEnd = (
	event: Event,
): event is EndArrayEvent | EndDictionaryEvent =>
	event._tag === "EndArray" || event._tag === "EndDictionary";
