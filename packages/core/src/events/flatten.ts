import { absurd, Option } from "effect";
import type { Event } from "../types/event-types.js";
import type { Value } from "../types/value-types.js";
import {
	booleanValue,
	dataValue,
	dateValue,
	endArray,
	endDictionary,
	integerValue,
	realValue,
	startArray,
	startDictionary,
	stringValue,
} from "./event.js";

/**
 * Pre-order walk appending the events for `value` to `events`.
 * Containers always carry their exact child count as the length hint.
 */
const pushEvents = (value: Value, events: Array<Event>): void => {
	switch (value._tag) {
		case "Array":
			events.push(startArray(Option.some(value.items.length)));
			for (const item of value.items) {
				pushEvents(item, events);
			}
			events.push(endArray());
			return;
		case "Dictionary":
			events.push(startDictionary(Option.some(value.entries.size)));
			for (const [key, item] of value.entries) {
				events.push(stringValue(key));
				pushEvents(item, events);
			}
			events.push(endDictionary());
			return;
		case "Boolean":
			events.push(booleanValue(value.value));
			return;
		case "Data":
			events.push(dataValue(value.value));
			return;
		case "Date":
			events.push(dateValue(value.value));
			return;
		case "Integer":
			events.push(integerValue(value.value));
			return;
		case "Real":
			events.push(realValue(value.value));
			return;
		case "String":
			events.push(stringValue(value.value));
			return;
		default:
			return absurd(value);
	}
};

/**
 * Flattens a value into its complete event sequence.
 *
 * Scalar payloads (byte arrays, dates) are shared with the tree, not copied;
 * the caller hands the value over and should not mutate it afterwards.
 *
 * @example
 * ```ts
 * flatten(Values.dictionary([["Age", Values.integer(28)]]))
 * // [StartDictionary(Some(1)), StringValue("Age"), IntegerValue(28n), EndDictionary]
 * ```
 */
export const flatten = (value: Value): ReadonlyArray<Event> => {
	const events: Array<Event> = [];
	pushEvents(value, events);
	return events;
};

/**
 * Single-pass iterator over the events of `value`. Create a new one to
 * replay.
 */
export const intoEvents = (value: Value): IterableIterator<Event> =>
	flatten(value)[Symbol.iterator]();
