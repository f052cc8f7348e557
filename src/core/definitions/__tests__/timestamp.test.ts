import { describe, it, expect } from "vitest";
import { parseTimestamp, formatTimestamp } from "../timestamp.js";

describe("parseTimestamp", () => {
  it("should parse a date as UTC midnight", () => {
    expect(parseTimestamp("2021-06-01")).toEqual({ ok: true, value: Date.UTC(2021, 5, 1) });
  });

  it("should parse a plain date and time at UTC", () => {
    expect(parseTimestamp("2021-06-01T10:30:00")).toEqual({
      ok: true,
      value: Date.UTC(2021, 5, 1, 10, 30, 0),
    });
  });

  it("should accept a space separator and omitted seconds", () => {
    expect(parseTimestamp("2021-06-01 10:30")).toEqual({ ok: true, value: Date.UTC(2021, 5, 1, 10, 30) });
  });

  it("should apply the offset of an instant", () => {
    expect(parseTimestamp("2021-06-01T10:30:00+02:00")).toEqual({
      ok: true,
      value: Date.UTC(2021, 5, 1, 8, 30),
    });
    expect(parseTimestamp("2021-06-01T10:00:00-0130")).toEqual({
      ok: true,
      value: Date.UTC(2021, 5, 1, 11, 30),
    });
  });

  it("should truncate fractions below a millisecond", () => {
    expect(parseTimestamp("2021-06-01T10:30:00.123456Z")).toEqual({
      ok: true,
      value: Date.UTC(2021, 5, 1, 10, 30, 0, 123),
    });
  });

  it("should accept February 29 only in leap years", () => {
    expect(parseTimestamp("2024-02-29").ok).toBe(true);
    expect(parseTimestamp("2023-02-29").ok).toBe(false);
  });

  it("should reject impossible calendar dates", () => {
    expect(parseTimestamp("2023-02-30")).toEqual({
      ok: false,
      error: "day 30 is out of range for 2023-02",
    });
    expect(parseTimestamp("2023-13-01").ok).toBe(false);
    expect(parseTimestamp("2023-01-01T24:00:00").ok).toBe(false);
  });

  it("should reject text matching no grammar", () => {
    expect(parseTimestamp("yesterday")).toEqual({ ok: false, error: "not a date" });
    expect(parseTimestamp("").ok).toBe(false);
  });
});

describe("formatTimestamp", () => {
  it("should render whole seconds without a fraction", () => {
    expect(formatTimestamp(Date.UTC(2021, 5, 1))).toBe("2021-06-01T00:00:00Z");
  });

  it("should keep milliseconds when present", () => {
    expect(formatTimestamp(Date.UTC(2021, 5, 1, 0, 0, 0, 5))).toBe("2021-06-01T00:00:00.005Z");
  });

  it("should render what parseTimestamp read", () => {
    const parsed = parseTimestamp("2024-01-01T12:00:00+01:00");
    expect(parsed.ok && formatTimestamp(parsed.value)).toBe("2024-01-01T11:00:00Z");
  });
});
