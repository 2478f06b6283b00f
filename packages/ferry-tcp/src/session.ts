// Per-connection protocol engine.
//
// Reads one command line at a time, runs it against the served directory
// and writes the response, until the peer disconnects or sends QUIT. A
// command's whole response (payload included) is written, or its upload
// drained, before the next line is read, so the stream stays framed.

import { open, stat, type FileHandle } from "node:fs/promises";
import path from "node:path";
import {
  type ByteStream,
  type Command,
  Status,
  ErrorMessage,
  CHUNK_SIZE,
  isSafeFilename,
  parseCommand,
  parseSize,
  formatListing,
  readListing,
  writeFully,
  describeError,
  logger,
} from "@ferry/core";

const log = logger("session");

/** Where a session is in its command loop. */
export type SessionState = "await_command" | "listing" | "downloading" | "uploading" | "closed";

export interface SessionOptions {
  /** Directory that LIST, GET and PUT operate in. */
  servedDir: string;
  /** Chunk size for file reads and payload reads. */
  chunkSize: number;
}

/** Whether the loop may read another command after this one. */
type Outcome = "continue" | "close";

/**
 * One connection's session.
 *
 * `run()` owns the stream: it closes it on every exit path and never
 * rejects, so a failing connection cannot affect the acceptor or other
 * sessions.
 */
export class Session {
  private io: ByteStream;
  private options: SessionOptions;
  private _state: SessionState = "await_command";

  constructor(io: ByteStream, options: Partial<SessionOptions> & Pick<SessionOptions, "servedDir">) {
    this.io = io;
    this.options = { chunkSize: CHUNK_SIZE, ...options };
  }

  get state(): SessionState {
    return this._state;
  }

  /**
   * Run the command loop until the peer disconnects, sends QUIT, or a
   * response can no longer be written.
   */
  async run(): Promise<void> {
    const peer = this.io.peer;
    log("%s: session started", peer);
    try {
      while (true) {
        const line = await this.io.readLine();
        if (line === null) {
          log("%s: peer disconnected", peer);
          break;
        }

        const command = parseCommand(line);
        if (command.kind === "quit") {
          log("%s: QUIT", peer);
          break;
        }

        const outcome = await this.dispatch(command);
        if (outcome === "close") break;
        this._state = "await_command";
      }
    } catch (e) {
      log("%s: session failed: %s", peer, describeError(e));
    } finally {
      this._state = "closed";
      this.io.close();
      log("%s: session closed", peer);
    }
  }

  private dispatch(command: Exclude<Command, { kind: "quit" }>): Promise<Outcome> {
    switch (command.kind) {
      case "list":
        this._state = "listing";
        return this.list();
      case "get":
        this._state = "downloading";
        return this.get(command.filename);
      case "put":
        this._state = "uploading";
        return this.put(command.filename);
      case "unknown":
        log("%s: unknown command %o", this.io.peer, command.line);
        return this.respondError(ErrorMessage.UNKNOWN_COMMAND);
    }
  }

  private async list(): Promise<Outcome> {
    let body: Buffer;
    try {
      body = Buffer.from(formatListing(await readListing(this.options.servedDir)), "utf8");
    } catch (e) {
      log("%s: LIST failed: %s", this.io.peer, describeError(e));
      return this.respondError(ErrorMessage.LIST_FAILED);
    }

    log("%s: LIST (%d bytes)", this.io.peer, body.length);
    if (!(await this.sendSizeHeader(body.length))) return "close";
    if (body.length > 0 && !(await this.io.sendAll(body))) return "close";
    return "continue";
  }

  private async get(filename: string): Promise<Outcome> {
    const peer = this.io.peer;
    if (!isSafeFilename(filename)) {
      log("%s: GET rejected name %o", peer, filename);
      return this.respondError(ErrorMessage.INVALID_FILENAME);
    }

    const target = path.join(this.options.servedDir, filename);
    let size: number;
    try {
      const info = await stat(target);
      if (!info.isFile()) {
        log("%s: GET %s is not a regular file", peer, filename);
        return this.respondError(ErrorMessage.FILE_NOT_FOUND);
      }
      size = info.size;
    } catch (e) {
      log("%s: GET %s: %s", peer, filename, describeError(e));
      return this.respondError(ErrorMessage.FILE_NOT_FOUND);
    }

    let handle: FileHandle;
    try {
      handle = await open(target, "r");
    } catch (e) {
      log("%s: GET %s open failed: %s", peer, filename, describeError(e));
      return this.respondError(ErrorMessage.OPEN_FAILED);
    }

    try {
      if (!(await this.sendSizeHeader(size))) return "close";
      log("%s: GET %s (%d bytes)", peer, filename, size);
      // Once the size is committed there is no way to signal a failure in
      // band: any problem ends the connection and the client sees a short
      // read.
      return (await this.streamFile(handle, size)) ? "continue" : "close";
    } catch (e) {
      log("%s: GET %s aborted: %s", peer, filename, describeError(e));
      return "close";
    } finally {
      await handle.close();
    }
  }

  /** Send exactly `size` bytes of the file. False if that could not be done. */
  private async streamFile(handle: FileHandle, size: number): Promise<boolean> {
    const chunk = Buffer.alloc(Math.min(this.options.chunkSize, size));
    let sent = 0;
    while (sent < size) {
      const want = Math.min(chunk.length, size - sent);
      const { bytesRead } = await handle.read(chunk, 0, want, sent);
      if (bytesRead === 0) {
        log("%s: file shrank to %d of %d bytes", this.io.peer, sent, size);
        return false;
      }
      if (!(await this.io.sendAll(chunk.subarray(0, bytesRead)))) return false;
      sent += bytesRead;
    }
    return true;
  }

  private async put(filename: string): Promise<Outcome> {
    const peer = this.io.peer;
    if (!isSafeFilename(filename)) {
      log("%s: PUT rejected name %o", peer, filename);
      if ((await this.respondError(ErrorMessage.INVALID_FILENAME)) === "close") return "close";
      // The client sends its size line and payload regardless; skip them.
      const sizeLine = await this.io.readLine();
      if (sizeLine === null) return "close";
      const size = parseSize(sizeLine);
      if (size === null) {
        log("%s: PUT size %o unreadable, stream is out of step", peer, sizeLine);
        return "continue";
      }
      return this.drain(size);
    }

    const sizeLine = await this.io.readLine();
    if (sizeLine === null) return "close";
    const size = parseSize(sizeLine);
    if (size === null) {
      // The payload length is unknown, so nothing can be drained. The next
      // command read may land inside the payload; that is left to the client.
      log("%s: PUT %s bad size header %o", peer, filename, sizeLine);
      return this.respondError(ErrorMessage.INVALID_SIZE);
    }

    const target = path.join(this.options.servedDir, filename);
    let handle: FileHandle;
    try {
      handle = await open(target, "w");
    } catch (e) {
      log("%s: PUT %s create failed: %s", peer, filename, describeError(e));
      if ((await this.respondError(ErrorMessage.CREATE_FAILED)) === "close") return "close";
      return this.drain(size);
    }

    let received = 0;
    let writeFailed = false;
    let shortRead = false;
    try {
      while (received < size) {
        const chunk = await this.io.recvExact(Math.min(this.options.chunkSize, size - received));
        if (chunk === null) {
          shortRead = true;
          break;
        }
        if (!writeFailed) {
          try {
            await writeFully(handle, chunk, received);
          } catch (e) {
            // Keep reading so the payload is consumed in full.
            log("%s: PUT %s write failed: %s", peer, filename, describeError(e));
            writeFailed = true;
          }
        }
        received += chunk.length;
      }
    } finally {
      await handle.close();
    }

    if (shortRead) {
      log("%s: PUT %s short read, %d of %d bytes", peer, filename, received, size);
      await this.respondError(ErrorMessage.TRANSFER_ERROR);
      return "close";
    }
    if (writeFailed) {
      return this.respondError(ErrorMessage.TRANSFER_ERROR);
    }

    log("%s: PUT %s (%d bytes)", peer, filename, size);
    return (await this.io.sendLine(Status.OK)) ? "continue" : "close";
  }

  /** Read and discard `size` payload bytes. */
  private async drain(size: number): Promise<Outcome> {
    let remaining = size;
    while (remaining > 0) {
      const chunk = await this.io.recvExact(Math.min(this.options.chunkSize, remaining));
      if (chunk === null) return "close";
      remaining -= chunk.length;
    }
    log("%s: drained %d bytes", this.io.peer, size);
    return "continue";
  }

  private async sendSizeHeader(size: number): Promise<boolean> {
    return (await this.io.sendLine(Status.OK)) && (await this.io.sendLine(String(size)));
  }

  private async respondError(message: ErrorMessage): Promise<Outcome> {
    const sent = (await this.io.sendLine(Status.ERR)) && (await this.io.sendLine(message));
    return sent ? "continue" : "close";
  }
}
