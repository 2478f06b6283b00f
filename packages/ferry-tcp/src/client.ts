// Client side of the ferry protocol.

import { open, stat, type FileHandle } from "node:fs/promises";
import path from "node:path";
import {
  type ByteStream,
  type ClientCommand,
  type Transfer,
  Status,
  ConnectionError,
  TransferError,
  CHUNK_SIZE,
  DEFAULT_PORT,
  encodeCommand,
  parseSize,
  writeFully,
  describeError,
  logger,
} from "@ferry/core";
import { connectFramed } from "./framing.ts";

const log = logger("client");

/** Configuration for the client. */
export interface ClientConfig {
  /** Server host. */
  host: string;
  /** Server port. */
  port: number;
  /** Directory GET writes into and PUT reads from. */
  localDir: string;
  /** Chunk size for file and payload I/O. */
  chunkSize: number;
}

/** Default client configuration. */
export function defaultClientConfig(): ClientConfig {
  return {
    host: "127.0.0.1",
    port: DEFAULT_PORT,
    localDir: process.cwd(),
    chunkSize: CHUNK_SIZE,
  };
}

export type ClientOptions = Pick<ClientConfig, "localDir" | "chunkSize">;

/**
 * Drives one connection to a ferry server.
 *
 * Operations must not overlap: each one writes its command and reads the
 * whole response before the next may start.
 *
 * @example
 * ```typescript
 * const client = await FileClient.connect({ host: "127.0.0.1", port: 12345 });
 * console.log(await client.list());
 * await client.put("report.pdf");
 * await client.quit();
 * ```
 */
export class FileClient implements Transfer {
  private io: ByteStream;
  private options: ClientOptions;

  constructor(io: ByteStream, options: Partial<ClientOptions> = {}) {
    this.io = io;
    this.options = {
      localDir: options.localDir ?? process.cwd(),
      chunkSize: options.chunkSize ?? CHUNK_SIZE,
    };
  }

  /**
   * Connect to a server.
   *
   * Rejects with ConnectionError (kind "io") if the server is unreachable.
   */
  static async connect(config: Partial<ClientConfig> = {}): Promise<FileClient> {
    const { host, port, localDir, chunkSize } = { ...defaultClientConfig(), ...config };
    const io = await connectFramed({ host, port });
    log("connected to %s:%d", host, port);
    return new FileClient(io, { localDir, chunkSize });
  }

  get isOpen(): boolean {
    return this.io.isOpen;
  }

  async list(): Promise<string> {
    await this.send({ kind: "list" });
    const size = await this.readSizedResponse();
    const body = await this.io.recvExact(size);
    if (body === null) {
      throw ConnectionError.io("Failed to read listing");
    }
    return Buffer.from(body).toString("utf8");
  }

  /**
   * Download `filename` into the local directory, replacing any file of the
   * same name.
   */
  async get(filename: string): Promise<number> {
    if (filename.length === 0) {
      throw TransferError.usage("Usage: GET <filename>");
    }

    await this.send({ kind: "get", filename });
    const size = await this.readSizedResponse();

    const dest = path.join(this.options.localDir, filename);
    let handle: FileHandle;
    try {
      handle = await open(dest, "w");
    } catch (e) {
      log("GET %s: cannot open %s: %s", filename, dest, describeError(e));
      await this.drain(size);
      throw TransferError.local("Failed to open local file for writing");
    }

    let received = 0;
    try {
      while (received < size) {
        const chunk = await this.io.recvExact(Math.min(this.options.chunkSize, size - received));
        if (chunk === null) {
          throw ConnectionError.io(`download of ${filename} cut short after ${received} of ${size} bytes`);
        }
        await writeFully(handle, chunk, received);
        received += chunk.length;
      }
    } finally {
      await handle.close();
    }

    log("GET %s: %d bytes", filename, size);
    return size;
  }

  /**
   * Upload the local file `filename` under the same name.
   *
   * The name goes on the wire as given; the server rejects anything that is
   * not a plain name, after consuming the payload.
   */
  async put(filename: string): Promise<number> {
    if (filename.length === 0) {
      throw TransferError.usage("Usage: PUT <filename>");
    }

    const source = path.join(this.options.localDir, filename);
    let size: number;
    let handle: FileHandle;
    try {
      const info = await stat(source);
      if (!info.isFile()) {
        throw TransferError.local(`Local file not found: ${filename}`);
      }
      size = info.size;
      handle = await open(source, "r");
    } catch (e) {
      if (e instanceof TransferError) throw e;
      log("PUT %s: %s", filename, describeError(e));
      throw TransferError.local(`Local file not found: ${filename}`);
    }

    try {
      await this.send({ kind: "put", filename });
      await this.sendLine(String(size));
      await this.streamFile(handle, size);
    } finally {
      await handle.close();
    }

    await this.readStatus();
    log("PUT %s: %d bytes", filename, size);
    return size;
  }

  /** Send QUIT and close without waiting for the server. */
  async quit(): Promise<void> {
    if (this.io.isOpen) {
      await this.io.sendLine(encodeCommand({ kind: "quit" }));
    }
    this.io.close();
  }

  close(): void {
    this.io.close();
  }

  private async streamFile(handle: FileHandle, size: number): Promise<void> {
    const chunk = Buffer.alloc(Math.min(this.options.chunkSize, size));
    let sent = 0;
    while (sent < size) {
      const { bytesRead } = await handle.read(chunk, 0, Math.min(chunk.length, size - sent), sent);
      if (bytesRead === 0) {
        // The announced size can no longer be met, so the stream cannot be
        // brought back in step.
        this.io.close();
        throw ConnectionError.io("Local file shrank during upload");
      }
      if (!(await this.io.sendAll(chunk.subarray(0, bytesRead)))) {
        throw ConnectionError.io("Send error");
      }
      sent += bytesRead;
    }
  }

  private async drain(size: number): Promise<void> {
    let remaining = size;
    while (remaining > 0) {
      const chunk = await this.io.recvExact(Math.min(this.options.chunkSize, remaining));
      if (chunk === null) throw ConnectionError.closed();
      remaining -= chunk.length;
    }
  }

  private send(command: ClientCommand): Promise<void> {
    return this.sendLine(encodeCommand(command));
  }

  private async sendLine(line: string): Promise<void> {
    if (!(await this.io.sendLine(line))) {
      throw ConnectionError.closed();
    }
  }

  private async readLine(): Promise<string> {
    const line = await this.io.readLine();
    if (line === null) {
      throw ConnectionError.closed();
    }
    return line;
  }

  /** Read a status line; throws TransferError with the server's message on ERR. */
  private async readStatus(): Promise<void> {
    const status = await this.readLine();
    if (status === Status.OK) return;
    if (status === Status.ERR) {
      throw TransferError.remote(await this.readLine());
    }
    throw ConnectionError.protocol(`Unexpected response: ${status}`);
  }

  /** Read `OK` plus a size line, as sent for LIST and GET. */
  private async readSizedResponse(): Promise<number> {
    await this.readStatus();
    const sizeLine = await this.readLine();
    const size = parseSize(sizeLine);
    if (size === null) {
      throw ConnectionError.protocol(`Invalid size header from server: ${sizeLine}`);
    }
    return size;
  }
}
