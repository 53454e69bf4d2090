/**
 * Scoped file access for PlistReader: open with retry, decode, close.
 */

import { closeSync, openSync } from "node:fs";
import {
	decodeValue,
	type EventStreamError,
	makePlistReader,
	type PlistReader,
	type ReadError,
	ReaderFormats,
	type SourceError,
	type Value,
} from "@plistream/core";
import { Effect, Option, Schedule, type Scope } from "effect";
import { makeFileSource, toSourceError } from "./file-source.js";

// ============================================================================
// Configuration
// ============================================================================

export interface NodeReaderConfig {
	readonly maxRetries?: number;
	readonly baseDelay?: number; // milliseconds
}

const defaultConfig: Required<NodeReaderConfig> = {
	maxRetries: 3,
	baseDelay: 100,
};

const retryPolicy = (config: Required<NodeReaderConfig>) =>
	Schedule.intersect(
		Schedule.exponential(config.baseDelay),
		Schedule.recurs(config.maxRetries),
	);

// ============================================================================
// File operations
// ============================================================================

const openFile = (
	path: string,
	config: Required<NodeReaderConfig>,
): Effect.Effect<number, SourceError> =>
	Effect.try({
		try: () => openSync(path, "r"),
		catch: (error) => toSourceError("open", 0, error),
	}).pipe(Effect.retry(retryPolicy(config)));

/**
 * Opens `path` and wraps it in a PlistReader. The file is closed when the
 * enclosing scope closes. Only opening is retried; reads are not.
 */
export const openPlistReader = (
	path: string,
	config: NodeReaderConfig = {},
): Effect.Effect<PlistReader, SourceError, ReaderFormats | Scope.Scope> =>
	Effect.gen(function* () {
		const resolved = { ...defaultConfig, ...config };
		const formats = yield* ReaderFormats;
		const fd = yield* Effect.acquireRelease(openFile(path, resolved), (fd) =>
			Effect.sync(() => closeSync(fd)),
		);
		return makePlistReader(makeFileSource(fd), formats);
	});

/**
 * Reads a single property list value from `path`, binary or markup.
 *
 * @example
 * ```ts
 * const value = await Effect.runPromise(
 *   readPlistFile("Info.plist").pipe(
 *     Effect.provide(makeReaderFormatsLayer({ binary, markup })),
 *   ),
 * )
 * ```
 */
export const readPlistFile = (
	path: string,
	config: NodeReaderConfig = {},
): Effect.Effect<
	Value,
	SourceError | ReadError | EventStreamError,
	ReaderFormats
> =>
	Effect.scoped(
		Effect.gen(function* () {
			const reader = yield* openPlistReader(path, config);
			const value = yield* decodeValue(reader);
			yield* Effect.logDebug("Decoded property list").pipe(
				Effect.annotateLogs({
					path,
					encoding: Option.getOrElse(reader.encoding, () => "unbound"),
				}),
			);
			return value;
		}),
	);
