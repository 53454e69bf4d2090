/**
 * Shared constants and generators for property-based testing.
 *
 * - getNumRuns(): reads FC_NUM_RUNS or falls back to DEFAULT_NUM_RUNS
 * - valueArbitrary: finite property list trees, scalars at the leaves
 */

import * as fc from "fast-check";
import type { Value } from "../../src/types/value-types.js";
import { INT64_MAX, INT64_MIN } from "../../src/value/int64.js";
import * as Values from "../../src/value/value.js";

export const DEFAULT_NUM_RUNS = 100;

/**
 * @example
 * // In shell: FC_NUM_RUNS=1000 npm test
 */
export const getNumRuns = (): number => {
	const envValue = process.env.FC_NUM_RUNS;
	if (envValue === undefined || envValue === "") {
		return DEFAULT_NUM_RUNS;
	}
	const parsed = Number.parseInt(envValue, 10);
	if (Number.isNaN(parsed) || parsed <= 0) {
		return DEFAULT_NUM_RUNS;
	}
	return parsed;
};

export const scalarArbitrary: fc.Arbitrary<Value> = fc.oneof(
	fc.boolean().map(Values.boolean),
	fc.uint8Array({ maxLength: 16 }).map(Values.data),
	fc.date({ noInvalidDate: true }).map(Values.date),
	fc.bigInt({ min: INT64_MIN, max: INT64_MAX }).map(Values.integer),
	fc.double().map(Values.real),
	fc.string().map(Values.string),
);

const tree = fc.letrec<{ value: Value }>((tie) => ({
	value: fc.oneof(
		{ maxDepth: 4, depthSize: "small" },
		scalarArbitrary,
		fc.array(tie("value"), { maxLength: 5 }).map((items) => Values.array(items)),
		fc
			.uniqueArray(fc.tuple(fc.string(), tie("value")), {
				maxLength: 5,
				selector: ([key]) => key,
			})
			.map((entries) => Values.dictionary(entries)),
	),
}));

export const valueArbitrary: fc.Arbitrary<Value> = tree.value;
