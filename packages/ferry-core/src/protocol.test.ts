import { describe, it, expect } from "vitest";
import {
  parseCommand,
  encodeCommand,
  parseSize,
  formatListing,
  parseListing,
} from "./protocol.ts";

describe("parseCommand", () => {
  it("recognizes the four commands", () => {
    expect(parseCommand("LIST")).toEqual({ kind: "list" });
    expect(parseCommand("GET notes.txt")).toEqual({ kind: "get", filename: "notes.txt" });
    expect(parseCommand("PUT notes.txt")).toEqual({ kind: "put", filename: "notes.txt" });
    expect(parseCommand("QUIT")).toEqual({ kind: "quit" });
  });

  it("matches LIST and QUIT by prefix", () => {
    expect(parseCommand("LIST everything")).toEqual({ kind: "list" });
    expect(parseCommand("QUITTING")).toEqual({ kind: "quit" });
  });

  it("keeps the filename verbatim, including spaces and an empty name", () => {
    expect(parseCommand("GET  two spaces ")).toEqual({ kind: "get", filename: " two spaces " });
    expect(parseCommand("PUT ")).toEqual({ kind: "put", filename: "" });
  });

  it("treats GET/PUT without a separating space as unknown", () => {
    expect(parseCommand("GET")).toEqual({ kind: "unknown", line: "GET" });
    expect(parseCommand("PUTfile")).toEqual({ kind: "unknown", line: "PUTfile" });
  });

  it("is case sensitive", () => {
    expect(parseCommand("list")).toEqual({ kind: "unknown", line: "list" });
  });

  it("reports the empty line as unknown", () => {
    expect(parseCommand("")).toEqual({ kind: "unknown", line: "" });
  });
});

describe("encodeCommand", () => {
  it("renders wire lines", () => {
    expect(encodeCommand({ kind: "list" })).toBe("LIST");
    expect(encodeCommand({ kind: "get", filename: "a.bin" })).toBe("GET a.bin");
    expect(encodeCommand({ kind: "put", filename: "a.bin" })).toBe("PUT a.bin");
    expect(encodeCommand({ kind: "quit" })).toBe("QUIT");
  });
});

describe("parseSize", () => {
  it("accepts decimal digits", () => {
    expect(parseSize("0")).toBe(0);
    expect(parseSize("1048576")).toBe(1048576);
    expect(parseSize("007")).toBe(7);
  });

  it("rejects anything else", () => {
    for (const line of ["", "-1", "+1", "1.5", "12abc", " 12", "12 ", "0x10", "1e3"]) {
      expect(parseSize(line), JSON.stringify(line)).toBeNull();
    }
  });

  it("rejects sizes beyond the safe integer range", () => {
    expect(parseSize("9007199254740993")).toBeNull();
  });
});

describe("listing bodies", () => {
  it("formats one tab-separated line per entry", () => {
    const body = formatListing([
      { name: "a.txt", kind: "file" },
      { name: "sub", kind: "dir" },
      { name: "link", kind: "other" },
    ]);
    expect(body).toBe("a.txt\tfile\nsub\tdir\nlink\tother\n");
  });

  it("formats an empty directory as an empty body", () => {
    expect(formatListing([])).toBe("");
  });

  it("parses a body back into entries", () => {
    expect(parseListing("a.txt\tfile\nsub\tdir\n")).toEqual([
      { name: "a.txt", kind: "file" },
      { name: "sub", kind: "dir" },
    ]);
  });

  it("skips malformed lines", () => {
    expect(parseListing("garbage\nx\tweird\nok\tfile\n")).toEqual([{ name: "ok", kind: "file" }]);
  });
});
