import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { TransferError, parseListing } from "@ferry/core";
import { LocalTransfer } from "./local.ts";

async function failure(promise: Promise<unknown>): Promise<[string, string] | null> {
  return promise.then(
    () => null,
    (e: unknown) => (e instanceof TransferError ? [e.kind, e.message] : null),
  );
}

describe("LocalTransfer", () => {
  let base: string;
  let dir: string;
  let workDir: string;
  let transfer: LocalTransfer;

  beforeEach(async () => {
    base = await mkdtemp(path.join(tmpdir(), "ferry-local-"));
    dir = path.join(base, "store");
    workDir = path.join(base, "work");
    await mkdir(workDir);
    transfer = new LocalTransfer({ dir, workDir });
    expect(await transfer.prepare()).toBe(true);
  });

  afterEach(async () => {
    await rm(base, { recursive: true, force: true });
  });

  it("creates its directory and starts empty", async () => {
    expect(existsSync(dir)).toBe(true);
    expect(await transfer.list()).toBe("");
  });

  it("copies a file in and back out", async () => {
    await writeFile(path.join(workDir, "notes.txt"), "hello local");
    expect(await transfer.put("notes.txt")).toBe(11);
    expect(await readFile(path.join(dir, "notes.txt"), "utf8")).toBe("hello local");

    await rm(path.join(workDir, "notes.txt"));
    expect(await transfer.get("notes.txt")).toBe(11);
    expect(await readFile(path.join(workDir, "notes.txt"), "utf8")).toBe("hello local");
  });

  it("lists in the wire format", async () => {
    await writeFile(path.join(dir, "a.txt"), "a");
    await mkdir(path.join(dir, "sub"));
    const entries = parseListing(await transfer.list());
    expect(entries.sort((x, y) => x.name.localeCompare(y.name))).toEqual([
      { name: "a.txt", kind: "file" },
      { name: "sub", kind: "dir" },
    ]);
  });

  it("applies the filename guard", async () => {
    expect(await failure(transfer.get("../work/x"))).toEqual(["local", "Invalid filename"]);
    expect(await failure(transfer.put("a\\b"))).toEqual(["local", "Invalid filename"]);
  });

  it("reports missing files on either side", async () => {
    expect(await failure(transfer.get("gone.txt"))).toEqual(["local", "File not found on server: gone.txt"]);
    expect(await failure(transfer.put("gone.txt"))).toEqual(["local", "Local file not found: gone.txt"]);
  });

  it("rejects empty names as usage errors", async () => {
    expect(await failure(transfer.get(""))).toEqual(["usage", "Usage: GET <filename>"]);
    expect(await failure(transfer.put(""))).toEqual(["usage", "Usage: PUT <filename>"]);
  });

  it("closes on QUIT", async () => {
    expect(transfer.isOpen).toBe(true);
    await transfer.quit();
    expect(transfer.isOpen).toBe(false);
  });
});
