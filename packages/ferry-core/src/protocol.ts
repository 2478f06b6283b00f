// Wire vocabulary for the ferry protocol.
//
// Control units are `\n`-terminated ASCII lines. Binary payloads follow a
// decimal byte-count line and are exactly that long:
//
//   client: LIST | GET <name> | PUT <name>\n<size>\n<bytes> | QUIT
//   server: OK\n<size>\n<bytes> (LIST, GET) | OK (PUT) | ERR\n<message>

/** Status tokens opening every response. */
export const Status = {
  OK: "OK",
  ERR: "ERR",
} as const;

export type Status = (typeof Status)[keyof typeof Status];

/** Message lines sent after `ERR`. */
export const ErrorMessage = {
  INVALID_FILENAME: "Invalid filename",
  FILE_NOT_FOUND: "File not found",
  OPEN_FAILED: "Failed to open file",
  LIST_FAILED: "Failed to list directory",
  INVALID_SIZE: "Invalid size header",
  CREATE_FAILED: "Failed to create file",
  TRANSFER_ERROR: "Transfer error",
  UNKNOWN_COMMAND: "Unknown command",
} as const;

export type ErrorMessage = (typeof ErrorMessage)[keyof typeof ErrorMessage];

/** A command line as read off the stream. */
export type Command =
  | { kind: "list" }
  | { kind: "get"; filename: string }
  | { kind: "put"; filename: string }
  | { kind: "quit" }
  | { kind: "unknown"; line: string };

/** Commands a client can put on the wire. */
export type ClientCommand = Exclude<Command, { kind: "unknown" }>;

/**
 * Parse one command line.
 *
 * Matching is by prefix: anything starting with `LIST` or `QUIT` counts as
 * that command, and the filename of `GET `/`PUT ` is the rest of the line,
 * verbatim (it may be empty).
 */
export function parseCommand(line: string): Command {
  if (line.startsWith("LIST")) return { kind: "list" };
  if (line.startsWith("GET ")) return { kind: "get", filename: line.slice(4) };
  if (line.startsWith("PUT ")) return { kind: "put", filename: line.slice(4) };
  if (line.startsWith("QUIT")) return { kind: "quit" };
  return { kind: "unknown", line };
}

/** Render a command as its wire line (without the terminator). */
export function encodeCommand(command: ClientCommand): string {
  switch (command.kind) {
    case "list":
      return "LIST";
    case "get":
      return `GET ${command.filename}`;
    case "put":
      return `PUT ${command.filename}`;
    case "quit":
      return "QUIT";
  }
}

/**
 * Parse a decimal byte-count line.
 *
 * Returns null for anything that is not a plain run of digits, or that does
 * not fit a safe integer.
 */
export function parseSize(line: string): number | null {
  if (!/^[0-9]+$/.test(line)) return null;
  const size = Number(line);
  return Number.isSafeInteger(size) ? size : null;
}

/** Kind column of a listing line. */
export type EntryKind = "file" | "dir" | "other";

export interface ListingEntry {
  name: string;
  kind: EntryKind;
}

/** Build a LIST body: one `<name>\t<kind>\n` line per entry, in the given order. */
export function formatListing(entries: readonly ListingEntry[]): string {
  return entries.map((entry) => `${entry.name}\t${entry.kind}\n`).join("");
}

/** Split a LIST body back into entries. Lines without a known kind are skipped. */
export function parseListing(body: string): ListingEntry[] {
  const entries: ListingEntry[] = [];
  for (const line of body.split("\n")) {
    const tab = line.lastIndexOf("\t");
    if (tab < 0) continue;
    const kind = line.slice(tab + 1);
    if (kind === "file" || kind === "dir" || kind === "other") {
      entries.push({ name: line.slice(0, tab), kind });
    }
  }
  return entries;
}
