// @ferry/core - protocol vocabulary and shared types for ferry
//
// Transport-agnostic pieces: filename guard, command/response vocabulary,
// the ByteStream contract, errors, logging and defaults.

export { isSafeFilename } from "./filename.ts";
export {
  Status,
  ErrorMessage,
  type Command,
  type ClientCommand,
  parseCommand,
  encodeCommand,
  parseSize,
  type EntryKind,
  type ListingEntry,
  formatListing,
  parseListing,
} from "./protocol.ts";
export { type ByteStream } from "./stream.ts";
export { type Transfer } from "./transfer.ts";
export { ConnectionError, TransferError, describeError } from "./errors.ts";
export { type Logger, LOG_NAMESPACE, logger, enableAllLogging } from "./logging.ts";
export { DEFAULT_PORT, CHUNK_SIZE, REAP_THRESHOLD, parsePort } from "./config.ts";
export { readListing, ensureDirectory, writeFully } from "./files.ts";
