import { Data } from "effect";

// ============================================================================
// Effect TaggedError Source Error Types
// ============================================================================

export class SourceError extends Data.TaggedError("SourceError")<{
	readonly operation: "open" | "seek" | "read";
	readonly offset: number;
	readonly message: string;
	readonly cause?: unknown;
}> {}

/**
 * An exact-length read ran out of bytes. `actual` bytes were consumed before
 * the source ended.
 */
export class UnexpectedEofError extends Data.TaggedError("UnexpectedEofError")<{
	readonly offset: number;
	readonly expected: number;
	readonly actual: number;
	readonly message: string;
}> {}

// ============================================================================
// Source Error Union
// ============================================================================

export type SourceFailure = SourceError | UnexpectedEofError;
