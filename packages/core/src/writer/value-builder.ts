import { Either, Option } from "effect";
import { EventStreamError } from "../errors/format-errors.js";
import type { Event } from "../types/event-types.js";
import type { Value } from "../types/value-types.js";
import * as Values from "../value/value.js";
import type { EventSink } from "./event-sink.js";

// ============================================================================
// ValueBuilder — reconstructs a Value from its event stream
// ============================================================================

export interface ValueBuilder extends EventSink<EventStreamError> {
	/** True once a root value has been closed. */
	readonly isComplete: boolean;
	readonly finish: () => Either.Either<Value, EventStreamError>;
}

type Frame =
	| { readonly kind: "array"; readonly items: Array<Value> }
	| {
			readonly kind: "dictionary";
			readonly entries: Map<string, Value>;
			pendingKey: Option.Option<string>;
	  };

const unexpected = (event: Event, message: string): EventStreamError =>
	new EventStreamError({
		reason: "UnexpectedEvent",
		message,
		event: event._tag,
	});

const toScalar = (event: Event): Option.Option<Value> => {
	switch (event._tag) {
		case "BooleanValue":
			return Option.some(Values.boolean(event.value));
		case "DataValue":
			return Option.some(Values.data(event.value));
		case "DateValue":
			return Option.some(Values.date(event.value));
		case "IntegerValue":
			return Option.some(Values.integer(event.value));
		case "RealValue":
			return Option.some(Values.real(event.value));
		case "StringValue":
			return Option.some(Values.string(event.value));
		default:
			return Option.none();
	}
};

/**
 * A sink that rebuilds exactly one value. Length hints are ignored: containers
 * close on their End marker. Repeated dictionary keys are not rejected; the
 * last value wins.
 */
export const makeValueBuilder = (): ValueBuilder => {
	const stack: Array<Frame> = [];
	let root: Option.Option<Value> = Option.none();

	// Attaches a finished value to the innermost open container, or makes it
	// the root when none is open
	const attach = (value: Value): void => {
		const top: Frame | undefined = stack[stack.length - 1];
		if (top === undefined) {
			root = Option.some(value);
		} else if (top.kind === "array") {
			top.items.push(value);
		} else {
			// write() only attaches into a dictionary once its key has arrived
			top.entries.set(Option.getOrThrow(top.pendingKey), value);
			top.pendingKey = Option.none();
		}
	};

	const write = (event: Event): Either.Either<void, EventStreamError> => {
		if (Option.isSome(root)) {
			return Either.left(
				unexpected(event, `Unexpected ${event._tag} after the root value`),
			);
		}

		const top: Frame | undefined = stack[stack.length - 1];
		if (
			top !== undefined &&
			top.kind === "dictionary" &&
			Option.isNone(top.pendingKey) &&
			event._tag !== "EndDictionary"
		) {
			if (event._tag !== "StringValue") {
				return Either.left(
					unexpected(event, "Dictionary keys must be strings"),
				);
			}
			top.pendingKey = Option.some(event.value);
			return Either.right(undefined);
		}

		switch (event._tag) {
			case "StartArray":
			case "StartDictionary":
				stack.push(
					event._tag === "StartArray"
						? { kind: "array", items: [] }
						: {
								kind: "dictionary",
								entries: new Map(),
								pendingKey: Option.none(),
							},
				);
				return Either.right(undefined);

			case "EndArray": {
				if (top === undefined || top.kind !== "array") {
					return Either.left(
						unexpected(event, "EndArray does not close an open array"),
					);
				}
				stack.pop();
				attach(Values.array(top.items));
				return Either.right(undefined);
			}

			case "EndDictionary": {
				if (top === undefined || top.kind !== "dictionary") {
					return Either.left(
						unexpected(
							event,
							"EndDictionary does not close an open dictionary",
						),
					);
				}
				if (Option.isSome(top.pendingKey)) {
					return Either.left(
						unexpected(
							event,
							`Dictionary key '${top.pendingKey.value}' has no value`,
						),
					);
				}
				stack.pop();
				attach({ _tag: "Dictionary", entries: top.entries });
				return Either.right(undefined);
			}

			default: {
				const scalar = toScalar(event);
				if (Option.isSome(scalar)) {
					attach(scalar.value);
				}
				return Either.right(undefined);
			}
		}
	};

	const finish = (): Either.Either<Value, EventStreamError> => {
		if (Option.isSome(root)) {
			return Either.right(root.value);
		}
		return Either.left(
			new EventStreamError({
				reason: "UnexpectedEnd",
				message:
					stack.length === 0
						? "Event stream ended before any value"
						: `Event stream ended with ${stack.length} unclosed container(s)`,
			}),
		);
	};

	return {
		write,
		finish,
		get isComplete() {
			return Option.isSome(root);
		},
	};
};

/**
 * Replays an event sequence into a fresh builder.
 */
export const buildValue = (
	events: Iterable<Event>,
): Either.Either<Value, EventStreamError> => {
	const builder = makeValueBuilder();
	for (const event of events) {
		const written = builder.write(event);
		if (Either.isLeft(written)) {
			return Either.left(written.left);
		}
	}
	return builder.finish();
};
