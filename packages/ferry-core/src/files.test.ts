import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, open, readFile, rm, writeFile, symlink } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { readListing, ensureDirectory, writeFully } from "./files.ts";

describe("served directory helpers", () => {
  let base: string;

  beforeEach(async () => {
    base = await mkdtemp(path.join(tmpdir(), "ferry-files-"));
  });

  afterEach(async () => {
    await rm(base, { recursive: true, force: true });
  });

  it("lists files, directories and other entries", async () => {
    await writeFile(path.join(base, "a.txt"), "abc");
    await mkdir(path.join(base, "sub"));
    await symlink(path.join(base, "a.txt"), path.join(base, "link"));

    const entries = await readListing(base);
    const byName = Object.fromEntries(entries.map((e) => [e.name, e.kind]));
    expect(byName).toEqual({ "a.txt": "file", sub: "dir", link: "other" });
  });

  it("does not recurse", async () => {
    await mkdir(path.join(base, "sub"));
    await writeFile(path.join(base, "sub", "inner.txt"), "x");

    expect(await readListing(base)).toEqual([{ name: "sub", kind: "dir" }]);
  });

  it("lists an empty directory as no entries", async () => {
    expect(await readListing(base)).toEqual([]);
  });

  it("creates missing directories with their parents", async () => {
    const dir = path.join(base, "one", "two");
    expect(await ensureDirectory(dir)).toBe(true);
    expect(await readListing(path.join(base, "one"))).toEqual([{ name: "two", kind: "dir" }]);
  });

  it("reports failure instead of throwing", async () => {
    await writeFile(path.join(base, "plain"), "");
    expect(await ensureDirectory(path.join(base, "plain", "child"))).toBe(false);
  });

  it("writes every byte at the requested position", async () => {
    const file = path.join(base, "out.bin");
    const handle = await open(file, "w");
    try {
      await writeFully(handle, new Uint8Array([1, 2, 3]), 0);
      await writeFully(handle, new Uint8Array([4, 5]), 3);
    } finally {
      await handle.close();
    }
    expect(new Uint8Array(await readFile(file))).toEqual(new Uint8Array([1, 2, 3, 4, 5]));
  });
});
