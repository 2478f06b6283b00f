// Line and fixed-length framing for TCP streams.
//
// The same socket carries `\n`-terminated control lines and raw payloads
// whose length was announced on a previous line, so incoming bytes are kept
// in one buffer that both read modes consume from with exact boundaries.

import net from "node:net";
import { type ByteStream, ConnectionError } from "@ferry/core";

/** Unread bytes above which the socket is paused until a reader catches up. */
const HIGH_WATER_MARK = 64 * 1024;

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

/**
 * A framed TCP connection.
 *
 * Implements the ByteStream interface for use with Session and FileClient.
 * Reads are expected one at a time: the protocol never has two reads in
 * flight on the same connection.
 */
export class SocketFramed implements ByteStream {
  private socket: net.Socket;
  private buf: Buffer = Buffer.alloc(0);
  private waitingResolve: (() => void) | null = null;
  /** No more bytes will arrive (end, error or close). */
  private ended = false;
  /** Writes can no longer succeed. */
  private closed = false;

  readonly peer: string;

  constructor(socket: net.Socket) {
    this.socket = socket;
    this.peer = `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`;

    socket.on("data", (chunk: Buffer) => {
      this.buf = this.buf.length === 0 ? chunk : Buffer.concat([this.buf, chunk]);
      if (this.buf.length >= HIGH_WATER_MARK) {
        socket.pause();
      }
      this.wake();
    });

    socket.on("end", () => {
      this.ended = true;
      this.wake();
    });

    socket.on("error", () => {
      // The close event follows; readers and writers see the failure as
      // null / false.
      this.ended = true;
      this.closed = true;
      this.wake();
    });

    socket.on("close", () => {
      this.ended = true;
      this.closed = true;
      this.wake();
    });
  }

  get isOpen(): boolean {
    return !this.closed && !this.socket.destroyed;
  }

  async readLine(): Promise<string | null> {
    while (true) {
      const idx = this.buf.indexOf(NEWLINE);
      if (idx >= 0) {
        let end = idx;
        if (end > 0 && this.buf[end - 1] === CARRIAGE_RETURN) end--;
        const line = this.buf.toString("utf8", 0, end);
        this.consume(idx + 1);
        return line;
      }
      if (this.ended) return null;
      await this.waitForData();
    }
  }

  async recvExact(length: number): Promise<Uint8Array | null> {
    while (this.buf.length < length) {
      if (this.ended) return null;
      await this.waitForData();
    }
    const bytes = new Uint8Array(this.buf.subarray(0, length));
    this.consume(length);
    return bytes;
  }

  sendLine(text: string): Promise<boolean> {
    return this.sendAll(Buffer.from(`${text}\n`, "utf8"));
  }

  /**
   * Write every byte and wait until the socket has taken them.
   *
   * The socket queues whatever the kernel does not accept at once, so there
   * is no partial write to retry here; the callback reports the outcome of
   * the whole buffer.
   */
  sendAll(bytes: Uint8Array): Promise<boolean> {
    if (!this.isOpen) return Promise.resolve(false);
    return new Promise<boolean>((resolve) => {
      this.socket.write(bytes, (err) => resolve(!err));
    });
  }

  /** Close the connection. */
  close(): void {
    this.closed = true;
    this.ended = true;
    this.socket.destroy();
    this.wake();
  }

  private consume(length: number): void {
    this.buf = this.buf.subarray(length);
    if (this.socket.isPaused() && this.buf.length < HIGH_WATER_MARK) {
      this.socket.resume();
    }
  }

  private waitForData(): Promise<void> {
    // A reader that needs more than the high-water mark must let data in.
    if (this.socket.isPaused()) this.socket.resume();
    return new Promise<void>((resolve) => {
      this.waitingResolve = resolve;
    });
  }

  private wake(): void {
    const resolve = this.waitingResolve;
    this.waitingResolve = null;
    resolve?.();
  }
}

/** Host and port of a ferry server. */
export interface Endpoint {
  host: string;
  port: number;
}

/**
 * Open a TCP connection and wrap it in SocketFramed.
 *
 * Rejects with ConnectionError (kind "io") if the connection cannot be
 * established.
 */
export function connectFramed({ host, port }: Endpoint): Promise<SocketFramed> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });

    const onError = (err: Error) => {
      reject(ConnectionError.io(`connect to ${host}:${port} failed: ${err.message}`));
    };

    socket.once("error", onError);
    socket.once("connect", () => {
      socket.off("error", onError);
      resolve(new SocketFramed(socket));
    });
  });
}
