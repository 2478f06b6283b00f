import { describe, it, expect } from "vitest";
import { isSafeFilename } from "./filename.ts";

describe("isSafeFilename", () => {
  it("accepts plain names", () => {
    for (const name of ["a", "notes.txt", "archive.tar.gz", ".hidden", "with space", "x.y.z", "-dash"]) {
      expect(isSafeFilename(name), name).toBe(true);
    }
  });

  it("rejects the empty name", () => {
    expect(isSafeFilename("")).toBe(false);
  });

  it("rejects forward slashes anywhere", () => {
    for (const name of ["/", "/etc/passwd", "dir/file", "file/"]) {
      expect(isSafeFilename(name), name).toBe(false);
    }
  });

  it("rejects backslashes anywhere", () => {
    for (const name of ["\\", "dir\\file", "C:\\boot.ini"]) {
      expect(isSafeFilename(name), name).toBe(false);
    }
  });

  it("rejects any '..' substring, not just traversal segments", () => {
    for (const name of ["..", "...", "a..b", "file..", "..hidden"]) {
      expect(isSafeFilename(name), name).toBe(false);
    }
  });

  it("agrees with the deny-list on generated names", () => {
    const alphabet = ["a", ".", "/", "\\", "b", " "];
    for (let i = 0; i < 500; i++) {
      let name = "";
      let n = i;
      do {
        name += alphabet[n % alphabet.length];
        n = Math.floor(n / alphabet.length);
      } while (n > 0);
      const expected = !name.includes("/") && !name.includes("\\") && !name.includes("..");
      expect(isSafeFilename(name), JSON.stringify(name)).toBe(expected);
    }
  });
});
