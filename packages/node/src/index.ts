/**
 * @plistream/node - Node.js file access for plistream
 *
 * Re-exports everything from @plistream/core plus file-backed sources.
 */

// Re-export everything from core
export * from "@plistream/core";
// Export file descriptor source
export { makeFileSource } from "./file-source.js";
// Scoped readers over files
export type { NodeReaderConfig } from "./read-plist-file.js";
export { openPlistReader, readPlistFile } from "./read-plist-file.js";
