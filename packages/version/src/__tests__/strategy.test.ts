import { describe, it, expect } from "vitest";
import { parseConstraints } from "../constraints.js";
import {
  InvalidVersionError,
  NoMatchingMajorError,
  NoMatchingVersionError,
  UnknownStrategyError,
} from "../errors.js";
import { isValidStrategy, selectVersion } from "../strategy.js";

const AVAILABLE = ["2.0.0", "1.5.2", "1.5.1", "1.0.0"];

describe("selectVersion", () => {
  it("latest returns the newest version", () => {
    expect(selectVersion("1.2.3", AVAILABLE, "latest")).toBe("2.0.0");
  });

  it("minor returns the newest version with the same major", () => {
    expect(selectVersion("1.2.3", AVAILABLE, "minor")).toBe("1.5.2");
  });

  it("minor fails when no version shares the major", () => {
    expect(() => selectVersion("1.0.0", ["2.0.0", "2.1.0", "3.0.0"], "minor")).toThrow(
      NoMatchingMajorError,
    );
  });

  it("minor fails on an unparsable current version", () => {
    expect(() => selectVersion("main", AVAILABLE, "minor")).toThrow(InvalidVersionError);
  });

  it("narrows candidates with constraints first", () => {
    const constraints = parseConstraints("< 1.5.2");
    expect(selectVersion("1.0.0", AVAILABLE, "latest", constraints)).toBe("1.5.1");
  });

  it("fails when constraints exclude every candidate", () => {
    const constraints = parseConstraints(">= 5.0.0");
    expect(() => selectVersion("1.0.0", AVAILABLE, "latest", constraints)).toThrow(
      NoMatchingVersionError,
    );
  });

  it("fails when no versions are available", () => {
    expect(() => selectVersion("1.0.0", [], "latest")).toThrow("No available versions");
  });

  it("rejects unknown strategies", () => {
    expect(() => selectVersion("1.0.0", AVAILABLE, "newest")).toThrow(UnknownStrategyError);
  });
});

describe("isValidStrategy", () => {
  it("accepts minor and latest only", () => {
    expect(isValidStrategy("minor")).toBe(true);
    expect(isValidStrategy("latest")).toBe(true);
    expect(isValidStrategy("major")).toBe(false);
  });
});
