export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

/**
 * Converts to a bigint, throwing a RangeError outside the signed 64-bit
 * range (and, via BigInt, for non-integer numbers).
 */
export const toInt64 = (value: bigint | number): bigint => {
	const integer = BigInt(value);
	if (integer < INT64_MIN || integer > INT64_MAX) {
		throw new RangeError(
			`Integer ${integer} is outside the signed 64-bit range`,
		);
	}
	return integer;
};
