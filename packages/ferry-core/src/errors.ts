// Error types shared by the server, the client driver and the CLI.

/**
 * Transport-level failure. The connection it happened on is no longer usable.
 */
export class ConnectionError extends Error {
  constructor(
    public kind: "io" | "protocol" | "closed",
    message: string,
  ) {
    super(message);
    this.name = "ConnectionError";
  }

  static io(message: string): ConnectionError {
    return new ConnectionError("io", message);
  }

  /** The peer sent something the protocol does not allow at this point. */
  static protocol(message: string): ConnectionError {
    return new ConnectionError("protocol", message);
  }

  static closed(): ConnectionError {
    return new ConnectionError("closed", "connection closed");
  }
}

/**
 * A single transfer failed; the session it ran in carries on.
 *
 * - `remote`: the server answered `ERR`, `message` is its message line
 * - `local`: a local file could not be read or written
 * - `usage`: the request was rejected before anything was sent
 */
export class TransferError extends Error {
  constructor(
    public kind: "remote" | "local" | "usage",
    message: string,
  ) {
    super(message);
    this.name = "TransferError";
  }

  static remote(message: string): TransferError {
    return new TransferError("remote", message);
  }

  static local(message: string): TransferError {
    return new TransferError("local", message);
  }

  static usage(message: string): TransferError {
    return new TransferError("usage", message);
  }
}

/** Render any thrown value as a single log-friendly line. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
