// ============================================================================
// Value — an in-memory property list tree
// ============================================================================

export interface ArrayValue {
	readonly _tag: "Array";
	readonly items: ReadonlyArray<Value>;
}

/**
 * Entries iterate in insertion order, which is the order keys are emitted in.
 */
export interface DictionaryValue {
	readonly _tag: "Dictionary";
	readonly entries: ReadonlyMap<string, Value>;
}

export interface BooleanValue {
	readonly _tag: "Boolean";
	readonly value: boolean;
}

export interface DataValue {
	readonly _tag: "Data";
	readonly value: Uint8Array;
}

export interface DateValue {
	readonly _tag: "Date";
	readonly value: Date;
}

export interface IntegerValue {
	readonly _tag: "Integer";
	readonly value: bigint;
}

export interface RealValue {
	readonly _tag: "Real";
	readonly value: number;
}

export interface StringValue {
	readonly _tag: "String";
	readonly value: string;
}

export type Value =
	| ArrayValue
	| DictionaryValue
	| BooleanValue
	| DataValue
	| DateValue
	| IntegerValue
	| RealValue
	| StringValue;

export type ValueTag = Value["_tag"];
