import { describe, expect, test } from "vitest";
import { formatBytes, formatDuration } from "../../src/utils/format";

describe("formatBytes", () => {
  test.each([
    [0, "0 B"],
    [512, "512 B"],
    [1024, "1 KB"],
    [1536, "1.5 KB"],
    [1024 * 1024 * 3.25, "3.25 MB"],
  ])("formats %d as %s", (bytes, expected) => {
    expect(formatBytes(bytes)).toBe(expected);
  });
});

describe("formatDuration", () => {
  test.each([
    [0, "0ms"],
    [999, "999ms"],
    [1000, "1.0s"],
    [12_340, "12.3s"],
    [90_000, "1m 30s"],
    [3_725_000, "62m 5s"],
  ])("formats %d as %s", (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});
