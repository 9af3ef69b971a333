import { describe, it, expect } from "vitest";
import { percent, formatDuration, standardDeviation, removeNullFields } from "../src/metrics.js";

describe("percent", () => {
  it("rounds to an integer percentage", () => {
    expect(percent(1, 4)).toBe(25);
    expect(percent(2, 3)).toBe(67);
  });

  it("returns 0 when total is 0", () => {
    expect(percent(3, 0)).toBe(0);
  });
});

describe("formatDuration", () => {
  it("formats sub-second durations in ms", () => {
    expect(formatDuration(500)).toBe("500ms");
  });

  it("formats seconds and minutes", () => {
    expect(formatDuration(5_000)).toBe("5s");
    expect(formatDuration(120_000)).toBe("2m");
    expect(formatDuration(150_000)).toBe("2m 30s");
  });

  it("formats hours and days", () => {
    expect(formatDuration(11_100_000)).toBe("3h 5m");
    expect(formatDuration(7_200_000)).toBe("2h");
    expect(formatDuration(187_200_000)).toBe("2d 4h");
    expect(formatDuration(259_200_000)).toBe("3d");
  });

  it("keeps the sign of negative durations", () => {
    expect(formatDuration(-5_000)).toBe("-5s");
  });
});

describe("standardDeviation", () => {
  it("returns 0 for an empty list", () => {
    expect(standardDeviation([])).toBe(0);
    expect(standardDeviation([], { population: false })).toBe(0);
  });

  it("returns 0 for a single value", () => {
    expect(standardDeviation([5])).toBe(0);
    expect(standardDeviation([5], { population: false })).toBe(0);
  });

  it("computes the population standard deviation by default", () => {
    expect(standardDeviation([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });

  it("computes the sample standard deviation on request", () => {
    expect(standardDeviation([1, 2, 3, 4], { population: false })).toBeCloseTo(Math.sqrt(5 / 3), 10);
  });
});

describe("removeNullFields", () => {
  it("drops null and undefined values only", () => {
    expect(removeNullFields({ a: 1, b: null, c: undefined, d: 0, e: "" })).toEqual({ a: 1, d: 0, e: "" });
  });

  it("does not modify its input", () => {
    const input = { a: 1, b: null };
    removeNullFields(input);
    expect(input).toEqual({ a: 1, b: null });
  });
});
