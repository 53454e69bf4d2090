// ============================================================================
// Source Errors (re-exported from source-errors.ts)
// ============================================================================

export type { SourceFailure } from "./source-errors.js";
export { SourceError, UnexpectedEofError } from "./source-errors.js";

// ============================================================================
// Format Errors (re-exported from format-errors.ts)
// ============================================================================

export type { ReadError } from "./format-errors.js";
export { EventStreamError, PlistFormatError } from "./format-errors.js";
