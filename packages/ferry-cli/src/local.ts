// Local mode: the interactive commands run directly against a directory on
// this machine, with no server in between.

import { copyFile, stat } from "node:fs/promises";
import path from "node:path";
import {
  type Transfer,
  ErrorMessage,
  TransferError,
  describeError,
  ensureDirectory,
  formatListing,
  isSafeFilename,
  logger,
  readListing,
} from "@ferry/core";

const log = logger("local");

/** Options for LocalTransfer. */
export interface LocalOptions {
  /** Directory playing the part of the served directory. */
  dir: string;
  /** Where GET writes and PUT reads; defaults to the working directory. */
  workDir: string;
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * A Transfer over a local directory, using the same filename guard and
 * listing format as a server session.
 */
export class LocalTransfer implements Transfer {
  readonly dir: string;
  readonly workDir: string;
  private open = true;

  constructor(options: Pick<LocalOptions, "dir"> & Partial<LocalOptions>) {
    this.dir = path.resolve(options.dir);
    this.workDir = path.resolve(options.workDir ?? process.cwd());
  }

  /** Create the directory if it is missing; failure is logged only. */
  async prepare(): Promise<boolean> {
    return ensureDirectory(this.dir);
  }

  get isOpen(): boolean {
    return this.open;
  }

  async list(): Promise<string> {
    try {
      return formatListing(await readListing(this.dir));
    } catch (e) {
      log("listing %s failed: %s", this.dir, describeError(e));
      throw TransferError.remote(ErrorMessage.LIST_FAILED);
    }
  }

  async get(filename: string): Promise<number> {
    if (filename.length === 0) throw TransferError.usage("Usage: GET <filename>");
    if (!isSafeFilename(filename)) throw TransferError.local(ErrorMessage.INVALID_FILENAME);

    const source = path.join(this.dir, filename);
    if (!(await isRegularFile(source))) {
      throw TransferError.local(`File not found on server: ${filename}`);
    }
    return this.copy(source, path.join(this.workDir, filename));
  }

  async put(filename: string): Promise<number> {
    if (filename.length === 0) throw TransferError.usage("Usage: PUT <filename>");
    if (!isSafeFilename(filename)) throw TransferError.local(ErrorMessage.INVALID_FILENAME);

    const source = path.join(this.workDir, filename);
    if (!(await isRegularFile(source))) {
      throw TransferError.local(`Local file not found: ${filename}`);
    }
    return this.copy(source, path.join(this.dir, filename));
  }

  async quit(): Promise<void> {
    this.close();
  }

  close(): void {
    this.open = false;
  }

  private async copy(from: string, to: string): Promise<number> {
    try {
      await copyFile(from, to);
      const { size } = await stat(to);
      log("copied %s -> %s (%d bytes)", from, to, size);
      return size;
    } catch (e) {
      log("copy %s -> %s failed: %s", from, to, describeError(e));
      throw TransferError.local(ErrorMessage.TRANSFER_ERROR);
    }
  }
}
