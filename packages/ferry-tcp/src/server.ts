// TCP server for accepting ferry connections.

import net, { type AddressInfo } from "node:net";
import {
  ConnectionError,
  CHUNK_SIZE,
  DEFAULT_PORT,
  REAP_THRESHOLD,
  describeError,
  logger,
} from "@ferry/core";
import { SocketFramed } from "./framing.ts";
import { Session } from "./session.ts";

const log = logger("server");

/** Configuration for the server. */
export interface ServerConfig {
  /** Port to listen on; 0 picks a free one. */
  port: number;
  /** Address to bind. */
  host: string;
  /** Directory exposed to clients. */
  servedDir: string;
  /** Chunk size for file and payload I/O. */
  chunkSize: number;
  /** Tracked worker count above which finished workers are swept. */
  reapThreshold: number;
}

/** Default server configuration. */
export function defaultServerConfig(): ServerConfig {
  return {
    port: DEFAULT_PORT,
    host: "0.0.0.0",
    servedDir: process.cwd(),
    chunkSize: CHUNK_SIZE,
    reapThreshold: REAP_THRESHOLD,
  };
}

/** Handle on one connection's session, kept until a sweep finds it finished. */
interface Worker {
  done: Promise<void>;
  isFinished(): boolean;
}

/**
 * A TCP server that runs one Session per accepted connection.
 *
 * Sessions run concurrently and share nothing but the served directory
 * path. The list of worker handles is only touched from the accept
 * callback and from `close()`.
 */
export class FileServer {
  private config: ServerConfig;
  private server: net.Server | null = null;
  private workers: Worker[] = [];
  private closing: Promise<void> | null = null;

  constructor(config?: Partial<ServerConfig>) {
    this.config = { ...defaultServerConfig(), ...config };
  }

  /** Number of worker handles currently tracked (finished ones included until swept). */
  get workerCount(): number {
    return this.workers.length;
  }

  /** Bound address, or null when not listening. */
  address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address !== "string" ? address : null;
  }

  /**
   * Bind the listening socket and start accepting.
   *
   * Node sets SO_REUSEADDR on listening TCP sockets, so a restarted server
   * can rebind while old connections sit in TIME_WAIT.
   *
   * Rejects with ConnectionError (kind "io") if the socket cannot be bound.
   */
  listen(): Promise<AddressInfo> {
    if (this.server) {
      return Promise.reject(ConnectionError.io("server is already listening"));
    }

    const { host, port } = this.config;
    return new Promise((resolve, reject) => {
      // Half-open: a peer that shuts down its write side still gets the
      // answers to the commands it sent; Session.run ends the socket.
      const server = net.createServer({ allowHalfOpen: true }, (socket) => this.accept(socket));

      const onStartupError = (err: Error) => {
        reject(ConnectionError.io(`listen on ${host}:${port} failed: ${err.message}`));
      };

      server.once("error", onStartupError);
      server.listen({ host, port }, () => {
        server.off("error", onStartupError);
        server.on("error", (err) => this.onListenerError(err));
        this.server = server;

        const address = this.address();
        if (!address) {
          reject(ConnectionError.io(`listen on ${host}:${port} returned no TCP address`));
          return;
        }
        log("listening on %s:%d, serving %s", address.address, address.port, this.config.servedDir);
        resolve(address);
      });
    });
  }

  /**
   * Stop accepting, wait for every running session to end, then release
   * the listening socket.
   *
   * Sessions have no timeout: a stalled peer keeps this pending until it
   * disconnects.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private accept(socket: net.Socket): void {
    const io = new SocketFramed(socket);
    if (this.closing) {
      log("%s: refused, server is shutting down", io.peer);
      io.close();
      return;
    }

    log("%s: accepted connection", io.peer);
    const session = new Session(io, {
      servedDir: this.config.servedDir,
      chunkSize: this.config.chunkSize,
    });

    let finished = false;
    const done = session.run().finally(() => {
      finished = true;
    });
    this.workers.push({ done, isFinished: () => finished });

    if (this.workers.length > this.config.reapThreshold) {
      this.reap();
    }
  }

  /** Drop handles of sessions that have already ended. */
  private reap(): void {
    const before = this.workers.length;
    this.workers = this.workers.filter((worker) => !worker.isFinished());
    log("reaped %d finished workers, %d still running", before - this.workers.length, this.workers.length);
  }

  private onListenerError(err: Error): void {
    log("listener failed, shutting down: %s", describeError(err));
    this.close().catch((e: unknown) => {
      log("shutdown after listener failure failed: %s", describeError(e));
    });
  }

  private async shutdown(): Promise<void> {
    const server = this.server;
    if (!server) return;

    // net.Server.close stops accepting at once; its callback only fires
    // after every accepted socket has been closed.
    const released = new Promise<void>((resolve) => {
      server.close((err) => {
        if (err) log("close: %s", describeError(err));
        resolve();
      });
    });

    log("waiting for %d workers", this.workers.length);
    await Promise.all(this.workers.map((worker) => worker.done));
    await released;

    this.workers = [];
    this.server = null;
    log("listener released");
  }
}
