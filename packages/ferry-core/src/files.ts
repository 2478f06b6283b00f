// Filesystem helpers for the served directory.

import { mkdir, readdir, type FileHandle } from "node:fs/promises";
import type { Dirent } from "node:fs";
import { type EntryKind, type ListingEntry } from "./protocol.ts";
import { describeError } from "./errors.ts";
import { logger } from "./logging.ts";

const log = logger("fs");

function entryKind(entry: Dirent): EntryKind {
  // Dirent does not follow symlinks, so a link is reported as "other".
  if (entry.isFile()) return "file";
  if (entry.isDirectory()) return "dir";
  return "other";
}

/**
 * Enumerate the immediate entries of `dir`, in whatever order the
 * filesystem returns them.
 */
export async function readListing(dir: string): Promise<ListingEntry[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries.map((entry) => ({ name: entry.name, kind: entryKind(entry) }));
}

/**
 * Create `dir` (and its parents) if needed.
 *
 * Failure is logged and reported through the return value only: a server
 * whose directory cannot be created still starts, and each request then
 * answers with its own error.
 */
export async function ensureDirectory(dir: string): Promise<boolean> {
  try {
    await mkdir(dir, { recursive: true });
    return true;
  } catch (e) {
    log("could not create %s: %s", dir, describeError(e));
    return false;
  }
}

/** Write all of `bytes` at `position`, looping over short writes. */
export async function writeFully(
  handle: FileHandle,
  bytes: Uint8Array,
  position: number,
): Promise<void> {
  let offset = 0;
  while (offset < bytes.length) {
    const { bytesWritten } = await handle.write(
      bytes,
      offset,
      bytes.length - offset,
      position + offset,
    );
    offset += bytesWritten;
  }
}
