import { describe, expect, it } from "vitest";
import { formatDuration, parseDuration } from "../duration.js";
import { InvalidDurationError } from "../errors.js";

describe("parseDuration", () => {
  it.each([
    ["24h", 86_400_000],
    ["1h30m", 5_400_000],
    ["45s", 45_000],
    ["500ms", 500],
    ["1.5s", 1500],
    ["2m0.5s", 120_500],
    ["0", 0],
    [" 10s ", 10_000],
  ])("parses %s", (input, expected) => {
    expect(parseDuration(input)).toBe(expected);
  });

  it.each(["", "10", "1d", "h", "-5s", "5s garbage", "1h 30m"])("rejects %j", (input) => {
    expect(() => parseDuration(input)).toThrow(InvalidDurationError);
  });
});

describe("formatDuration", () => {
  it("renders the largest units first", () => {
    expect(formatDuration(5_400_000)).toBe("1h30m");
    expect(formatDuration(86_400_000)).toBe("24h");
    expect(formatDuration(61_250)).toBe("1m1s250ms");
    expect(formatDuration(0)).toBe("0s");
  });
});
