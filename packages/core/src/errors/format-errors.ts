import { Data } from "effect";
import type { Encoding, EventTag } from "../types/event-types.js";
import type { SourceFailure } from "./source-errors.js";

// ============================================================================
// Effect TaggedError Format Error Types
// ============================================================================

/**
 * Raised by format-specific sub-readers for input they cannot decode.
 */
export class PlistFormatError extends Data.TaggedError("PlistFormatError")<{
	readonly encoding: Encoding;
	readonly message: string;
	readonly offset?: number;
	readonly cause?: unknown;
}> {}

export class EventStreamError extends Data.TaggedError("EventStreamError")<{
	readonly reason: "UnexpectedEvent" | "UnexpectedEnd";
	readonly message: string;
	readonly event?: EventTag;
}> {}

// ============================================================================
// Read Error Union
// ============================================================================

export type ReadError = SourceFailure | PlistFormatError;
