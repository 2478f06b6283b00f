// Defaults shared by the server, the client and the CLI.

/** TCP port used when none is configured. */
export const DEFAULT_PORT = 12345;

/** Size of each file read/write and each payload read during a transfer. */
export const CHUNK_SIZE = 8192;

/**
 * Number of tracked worker handles above which the acceptor sweeps the
 * finished ones. A cleanup trigger, not a connection limit.
 */
export const REAP_THRESHOLD = 50;

/** Validate a TCP port given as text. Returns null when out of range or not a number. */
export function parsePort(value: string): number | null {
  if (!/^[0-9]+$/.test(value)) return null;
  const port = Number(value);
  return port >= 0 && port <= 65535 ? port : null;
}
