import { Either } from "effect";
import type { EventStreamError, ReadError } from "../errors/format-errors.js";
import type { Value } from "../types/value-types.js";
import { makeValueBuilder } from "../writer/value-builder.js";
import type { EventReader } from "./event-reader.js";

/**
 * Pulls events until one complete value has been rebuilt. Nothing past the
 * root value's last event is pulled.
 */
export const readValue = (
	reader: EventReader,
): Either.Either<Value, ReadError | EventStreamError> => {
	const builder = makeValueBuilder();
	while (!builder.isComplete) {
		const result = reader.next();
		if (result.done) {
			break;
		}
		if (Either.isLeft(result.value)) {
			return Either.left(result.value.left);
		}
		const written = builder.write(result.value.right);
		if (Either.isLeft(written)) {
			return Either.left(written.left);
		}
	}
	return builder.finish();
};
