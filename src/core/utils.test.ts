import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { compactTimestamp, tailLines, writeJsonFileAtomic } from "./utils.js";

describe("compactTimestamp", () => {
  it("formats UTC time as YYYYMMDDHHMMSS", () => {
    expect(compactTimestamp(new Date(Date.UTC(2024, 1, 3, 4, 5, 6)))).toBe("20240203040506");
  });

  it("sorts in chronological order across a daylight-saving fallback", () => {
    // 01:30 EDT and, one hour later, 01:30 EST on the same local date
    const before = new Date(Date.UTC(2024, 10, 3, 5, 30, 0));
    const after = new Date(before.getTime() + 60 * 60 * 1000);

    expect(compactTimestamp(before)).toBe("20241103053000");
    expect(compactTimestamp(after)).toBe("20241103063000");
    expect([compactTimestamp(after), compactTimestamp(before)].sort()).toEqual([
      "20241103053000",
      "20241103063000",
    ]);
  });
});

describe("tailLines", () => {
  it("keeps the last lines and ignores trailing whitespace", () => {
    expect(tailLines("a\nb\nc\nd\n\n", 2)).toBe("c\nd");
  });

  it("returns short text unchanged", () => {
    expect(tailLines("only", 5)).toBe("only");
  });
});

describe("writeJsonFileAtomic", () => {
  it("creates parent directories and leaves no temp files behind", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "atomic-write-"));
    const target = path.join(dir, "nested", "data.json");

    await writeJsonFileAtomic(target, { ok: true });

    expect(JSON.parse(fs.readFileSync(target, "utf8"))).toEqual({ ok: true });
    expect(fs.readdirSync(path.dirname(target))).toEqual(["data.json"]);
  });
});
