import { describe, expect, it } from "vitest";

import { msFromMinutes, msFromSeconds, secondsFromMs } from "./time.js";

describe("secondsFromMs", () => {
  it("rounds milliseconds to seconds with millisecond precision", () => {
    expect(secondsFromMs(1234)).toBe(1.234);
  });

  it("returns zero for non-finite values", () => {
    expect(secondsFromMs(Number.POSITIVE_INFINITY)).toBe(0);
  });
});

describe("msFromSeconds", () => {
  it("converts fractional seconds", () => {
    expect(msFromSeconds(1.5)).toBe(1500);
  });

  it("clamps negative and non-finite values to zero", () => {
    expect(msFromSeconds(-3)).toBe(0);
    expect(msFromSeconds(Number.NaN)).toBe(0);
  });
});

describe("msFromMinutes", () => {
  it("leaves an unset timeout unset", () => {
    expect(msFromMinutes(undefined)).toBeUndefined();
  });

  it("converts minutes to milliseconds", () => {
    expect(msFromMinutes(2)).toBe(120_000);
  });
});
