/**
 * What an interactive front end drives: one command at a time against a
 * served directory, remote or local.
 *
 * Implementations:
 * - FileClient (ferry-tcp) over a TCP connection
 * - LocalTransfer (ferry-cli) directly on a directory
 *
 * Failures are thrown as TransferError (the next command may still run) or
 * ConnectionError (check `isOpen` before going on).
 */
export interface Transfer {
  /** False once the session has ended. */
  readonly isOpen: boolean;

  /** Fetch the listing body (`<name>\t<kind>\n` lines). */
  list(): Promise<string>;

  /** Download `filename` into the local directory. Resolves to the byte count. */
  get(filename: string): Promise<number>;

  /** Upload the local file `filename`. Resolves to the byte count. */
  put(filename: string): Promise<number>;

  /** End the session politely. */
  quit(): Promise<void>;

  /** End the session without telling the other side. */
  close(): void;
}
