import { Option } from "effect";
import { describe, expect, it } from "vitest";
import * as Events from "../src/events/event.js";
import { flatten, intoEvents } from "../src/events/flatten.js";
import { INT64_MAX, INT64_MIN } from "../src/value/int64.js";
import * as Values from "../src/value/value.js";

describe("flatten", () => {
	it("flattens the empty array to its start and end markers", () => {
		expect(flatten(Values.array())).toEqual([
			Events.startArray(Option.some(0)),
			Events.endArray(),
		]);
	});

	it("flattens the empty dictionary to its start and end markers", () => {
		expect(flatten(Values.dictionary())).toEqual([
			Events.startDictionary(Option.some(0)),
			Events.endDictionary(),
		]);
	});

	it("emits the key as a string event before its value", () => {
		const value = Values.dictionary([["Age", Values.integer(28)]]);

		expect(flatten(value)).toEqual([
			Events.startDictionary(Option.some(1)),
			Events.stringValue("Age"),
			Events.integerValue(28n),
			Events.endDictionary(),
		]);
	});

	it("keeps dictionary insertion order", () => {
		const value = Values.dictionary([
			["Height", Values.real(181.2)],
			["Age", Values.integer(28)],
			["Name", Values.string("Ada")],
		]);

		const keys = flatten(value)
			.slice(1, -1)
			.filter((_, index) => index % 2 === 0)
			.map((event) => (event._tag === "StringValue" ? event.value : null));

		expect(keys).toEqual(["Height", "Age", "Name"]);
	});

	it("maps each scalar to its single value event", () => {
		const bytes = Uint8Array.of(0xde, 0xad);
		const when = new Date("2020-02-29T12:00:00Z");

		expect(flatten(Values.boolean(true))).toEqual([Events.booleanValue(true)]);
		expect(flatten(Values.data(bytes))).toEqual([Events.dataValue(bytes)]);
		expect(flatten(Values.date(when))).toEqual([Events.dateValue(when)]);
		expect(flatten(Values.integer(-9223372036854775808n))).toEqual([
			Events.integerValue(-9223372036854775808n),
		]);
		expect(flatten(Values.real(-0.5))).toEqual([Events.realValue(-0.5)]);
		expect(flatten(Values.string(""))).toEqual([Events.stringValue("")]);
	});

	it("walks nested containers depth first", () => {
		const value = Values.array([
			Values.dictionary([
				["list", Values.array([Values.boolean(false), Values.array()])],
			]),
			Values.string("tail"),
		]);

		expect(flatten(value)).toEqual([
			Events.startArray(Option.some(2)),
			Events.startDictionary(Option.some(1)),
			Events.stringValue("list"),
			Events.startArray(Option.some(2)),
			Events.booleanValue(false),
			Events.startArray(Option.some(0)),
			Events.endArray(),
			Events.endArray(),
			Events.endDictionary(),
			Events.stringValue("tail"),
			Events.endArray(),
		]);
	});

	it("shares byte payloads instead of copying them", () => {
		const bytes = Uint8Array.of(1, 2, 3);
		const [event] = flatten(Values.data(bytes));

		expect(event?._tag === "DataValue" && event.value).toBe(bytes);
	});
});

describe("intoEvents", () => {
	it("yields the flattened events once, then stays exhausted", () => {
		const events = intoEvents(Values.array([Values.integer(1)]));

		expect([...events]).toEqual([
			Events.startArray(Option.some(1)),
			Events.integerValue(1n),
			Events.endArray(),
		]);
		expect(events.next().done).toBe(true);
		expect(events.next().done).toBe(true);
	});
});

describe("event predicates", () => {
	it("recognises container boundaries", () => {
		expect(Events.isStart(Events.startArray())).toBe(true);
		expect(Events.isStart(Events.startDictionary())).toBe(true);
		expect(Events.isStart(Events.stringValue("x"))).toBe(false);
		expect(Events.isEnd(Events.endArray())).toBe(true);
		expect(Events.isEnd(Events.endDictionary())).toBe(true);
		expect(Events.isEnd(Events.booleanValue(true))).toBe(false);
	});

	it("defaults the length hint to none", () => {
		expect(Events.startArray().length).toEqual(Option.none());
		expect(Events.startDictionary().length).toEqual(Option.none());
	});
});

describe("signed 64-bit integers", () => {
	it("accepts both ends of the range", () => {
		expect(flatten(Values.integer(INT64_MIN))).toEqual([
			Events.integerValue(-9223372036854775808n),
		]);
		expect(flatten(Values.integer(INT64_MAX))).toEqual([
			Events.integerValue(9223372036854775807n),
		]);
	});

	it("rejects values one past either end", () => {
		expect(() => Values.integer(INT64_MIN - 1n)).toThrow(RangeError);
		expect(() => Values.integer(INT64_MAX + 1n)).toThrow(
			"Integer 9223372036854775808 is outside the signed 64-bit range",
		);
		expect(() => Events.integerValue(2n ** 70n)).toThrow(RangeError);
	});
});
