// Interactive command loop shared by client and local mode.
//
// Turns typed lines into Transfer calls, one at a time, and reports the
// outcome of each. Input is checked locally first; rejected input never
// reaches the Transfer.

import { type Transfer, ConnectionError, TransferError, describeError } from "@ferry/core";

export const UNKNOWN_INPUT_HINT = "Unknown command. Supported: LIST, GET <file>, PUT <file>, QUIT";

/** One typed line, classified. */
export type ReplInput =
  | { kind: "list" }
  | { kind: "get"; filename: string }
  | { kind: "put"; filename: string }
  | { kind: "quit" }
  | { kind: "blank" }
  | { kind: "rejected"; message: string };

/** Where the loop writes: results to `log`, failures to `error`. */
export interface ReplOutput {
  log(message: string): void;
  error(message: string): void;
  /** Show the prompt before the next line is read. */
  prompt?(): void;
}

/**
 * Classify one typed line.
 *
 * Uses the same prefix rules as the server: `LIST...`, `GET <file>`,
 * `PUT <file>`, `QUIT...`.
 */
export function parseInput(line: string): ReplInput {
  if (line.length === 0) return { kind: "blank" };
  if (line.startsWith("LIST")) return { kind: "list" };
  if (line.startsWith("GET ")) {
    const filename = line.slice(4);
    return filename.length > 0
      ? { kind: "get", filename }
      : { kind: "rejected", message: "Usage: GET <filename>" };
  }
  if (line.startsWith("PUT ")) {
    const filename = line.slice(4);
    return filename.length > 0
      ? { kind: "put", filename }
      : { kind: "rejected", message: "Usage: PUT <filename>" };
  }
  if (line.startsWith("QUIT")) return { kind: "quit" };
  return { kind: "rejected", message: UNKNOWN_INPUT_HINT };
}

/**
 * Execute one classified input.
 *
 * Returns false when the loop should stop: after QUIT, or when the
 * connection is gone.
 */
export async function handleInput(
  transfer: Transfer,
  input: ReplInput,
  out: ReplOutput,
): Promise<boolean> {
  try {
    switch (input.kind) {
      case "blank":
        return true;
      case "rejected":
        out.error(input.message);
        return true;
      case "list": {
        const body = await transfer.list();
        out.log(`Server listing:\n${body}`);
        return true;
      }
      case "get": {
        const size = await transfer.get(input.filename);
        out.log(`Downloaded ${input.filename} (${size} bytes)`);
        return true;
      }
      case "put":
        await transfer.put(input.filename);
        out.log("Upload successful");
        return true;
      case "quit":
        await transfer.quit();
        return false;
    }
  } catch (e) {
    if (e instanceof TransferError) {
      out.error(e.kind === "remote" ? `Server error: ${e.message}` : e.message);
    } else if (e instanceof ConnectionError) {
      out.error(`Connection error: ${e.message}`);
    } else {
      throw e;
    }
    return transfer.isOpen;
  }
}

/**
 * Read lines until QUIT, end of input, or a lost connection, then close the
 * transfer and print `Disconnected.`.
 */
export async function runRepl(
  transfer: Transfer,
  lines: AsyncIterable<string>,
  out: ReplOutput,
): Promise<void> {
  try {
    out.prompt?.();
    for await (const line of lines) {
      const keepGoing = await handleInput(transfer, parseInput(line), out);
      if (!keepGoing) break;
      out.prompt?.();
    }
  } catch (e) {
    out.error(`Error: ${describeError(e)}`);
  } finally {
    transfer.close();
    out.log("Disconnected.");
  }
}
