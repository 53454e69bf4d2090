/**
 * Constructors for property list values, re-exported as the `Values` namespace.
 */

import type {
	ArrayValue,
	BooleanValue,
	DataValue,
	DateValue,
	DictionaryValue,
	IntegerValue,
	RealValue,
	StringValue,
	Value,
} from "../types/value-types.js";
import { toInt64 } from "./int64.js";

export const array = (items: ReadonlyArray<Value> = []): ArrayValue => ({
	_tag: "Array",
	items,
});

/**
 * Builds a dictionary from entries in iteration order. A repeated key keeps
 * its first position and its last value, as `Map` does.
 */
export const dictionary = (
	entries: Iterable<readonly [string, Value]> = [],
): DictionaryValue => ({
	_tag: "Dictionary",
	entries: new Map(entries),
});

export const boolean = (value: boolean): BooleanValue => ({
	_tag: "Boolean",
	value,
});

export const data = (value: Uint8Array): DataValue => ({
	_tag: "Data",
	value,
});

export const date = (value: Date): DateValue => ({ _tag: "Date", value });

/**
 * Accepts a `number` for convenience; it must be an integer. Throws a
 * RangeError outside the signed 64-bit range.
 */
export const integer = (value: bigint | number): IntegerValue => ({
	_tag: "Integer",
	value: toInt64(value),
});

export const real = (value: number): RealValue => ({ _tag: "Real", value });

export const string = (value: string): StringValue => ({
	_tag: "String",
	value,
});
