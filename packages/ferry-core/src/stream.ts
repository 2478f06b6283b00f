/**
 * Byte stream abstraction.
 *
 * This module defines the ByteStream interface that the session engine and
 * the client driver speak through. The protocol interleaves text control
 * lines with raw payloads of declared length, so a stream must offer both a
 * line mode and a fixed-length binary mode over the same bytes.
 *
 * Implementations:
 * - SocketFramed (ferry-tcp) for `node:net` sockets
 */

/**
 * Interface for streams carrying ferry lines and payloads.
 *
 * Failures are reported as `false` / `null` rather than thrown: callers treat
 * them as "peer disconnected", never as protocol input.
 */
export interface ByteStream {
  /** Peer identity as `address:port`. */
  readonly peer: string;

  /** False once the stream has been closed locally or by the peer. */
  readonly isOpen: boolean;

  /**
   * Read up to the next `\n`, dropping the terminator and one trailing `\r`.
   *
   * Returns null if the stream ends or fails before a terminator arrives.
   * Bytes after the terminator stay available to the next read.
   */
  readLine(): Promise<string | null>;

  /** Write `text` followed by `\n`. Resolves to false on a fatal write error. */
  sendLine(text: string): Promise<boolean>;

  /**
   * Read exactly `length` bytes.
   *
   * Returns null if the stream ends before that many bytes arrived.
   */
  recvExact(length: number): Promise<Uint8Array | null>;

  /** Write every byte of `bytes`. Resolves to false on a fatal write error. */
  sendAll(bytes: Uint8Array): Promise<boolean>;

  /** Close the stream. Pending and later reads resolve to null. */
  close(): void;
}
