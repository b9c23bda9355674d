import { describe, expect, it } from "vitest";
import {
  checkDate,
  checkString,
  parseTimestamp,
  subtractMonths,
} from "../../src/rules/predicates.js";

const NOW = new Date("2024-06-10T12:00:00.000Z");

describe("checkString", () => {
  it("compares case-insensitively after trimming both sides", () => {
    expect(checkString("  Your Interview Schedule ", "contains", "INTERVIEW")).toEqual({
      ok: true,
      value: true,
    });
    expect(checkString("Hello", "equals", "  hello  ")).toEqual({ ok: true, value: true });
  });

  it("negates contains and equals", () => {
    expect(checkString("weekly report", "does_not_contain", "report")).toEqual({
      ok: true,
      value: false,
    });
    expect(checkString("weekly report", "does_not_equal", "report")).toEqual({
      ok: true,
      value: true,
    });
  });

  it("treats an empty rule value as contained in everything", () => {
    expect(checkString("anything", "contains", "")).toEqual({ ok: true, value: true });
  });

  it("fails with UnsupportedPredicate for unknown names", () => {
    const result = checkString("x", "starts_with", "x");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("UnsupportedPredicate");
  });
});

describe("parseTimestamp", () => {
  it("reads values without an offset as UTC", () => {
    expect(parseTimestamp("2024-06-01T10:00:00")?.toISOString()).toBe("2024-06-01T10:00:00.000Z");
    expect(parseTimestamp("2024-06-01 10:00:00")?.toISOString()).toBe("2024-06-01T10:00:00.000Z");
    expect(parseTimestamp("2024-06-01")?.toISOString()).toBe("2024-06-01T00:00:00.000Z");
  });

  it("honours an explicit offset", () => {
    expect(parseTimestamp("2024-06-01T10:00:00+02:00")?.toISOString()).toBe(
      "2024-06-01T08:00:00.000Z",
    );
  });

  it("returns null for text that is not a timestamp", () => {
    expect(parseTimestamp("")).toBeNull();
    expect(parseTimestamp("yesterday")).toBeNull();
  });
});

describe("subtractMonths", () => {
  it("clamps the day to the end of a shorter month", () => {
    expect(subtractMonths(new Date("2024-03-31T08:00:00Z"), 1).toISOString()).toBe(
      "2024-02-29T08:00:00.000Z",
    );
    expect(subtractMonths(new Date("2023-03-31T08:00:00Z"), 1).toISOString()).toBe(
      "2023-02-28T08:00:00.000Z",
    );
  });

  it("crosses year boundaries", () => {
    expect(subtractMonths(new Date("2024-01-15T00:00:00Z"), 1).toISOString()).toBe(
      "2023-12-15T00:00:00.000Z",
    );
    expect(subtractMonths(new Date("2024-01-15T00:00:00Z"), 13).toISOString()).toBe(
      "2022-12-15T00:00:00.000Z",
    );
  });
});

describe("checkDate", () => {
  it("matches messages newer than N days with less_than_days", () => {
    expect(checkDate("2024-06-09T12:00:00Z", "less_than_days", "2", NOW)).toEqual({
      ok: true,
      value: true,
    });
    expect(checkDate("2024-06-01T12:00:00Z", "less_than_days", "2", NOW)).toEqual({
      ok: true,
      value: false,
    });
  });

  it("matches messages older than N days with greater_than_days", () => {
    expect(checkDate("2024-06-01T12:00:00Z", "greater_than_days", "2", NOW)).toEqual({
      ok: true,
      value: true,
    });
  });

  it("matches neither predicate at the exact boundary instant", () => {
    const boundary = "2024-06-08T12:00:00Z";
    expect(checkDate(boundary, "less_than_days", "2", NOW)).toEqual({ ok: true, value: false });
    expect(checkDate(boundary, "greater_than_days", "2", NOW)).toEqual({ ok: true, value: false });
  });

  it("uses calendar months for the month predicates", () => {
    // One month before 2024-06-10T12:00Z is 2024-05-10T12:00Z
    expect(checkDate("2024-05-11T00:00:00Z", "less_than_months", "1", NOW)).toEqual({
      ok: true,
      value: true,
    });
    expect(checkDate("2024-05-10T00:00:00Z", "greater_than_months", "1", NOW)).toEqual({
      ok: true,
      value: true,
    });
  });

  it("accepts a padded integer value", () => {
    expect(checkDate("2024-06-09T12:00:00Z", "less_than_days", " 2 ", NOW)).toEqual({
      ok: true,
      value: true,
    });
  });

  it("rejects non-integer values", () => {
    for (const value of ["two", "2.5", ""]) {
      const result = checkDate("2024-06-09T12:00:00Z", "less_than_days", value, NOW);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe("InvalidConditionValue");
    }
  });

  it("reports an unparseable record timestamp", () => {
    const result = checkDate("not a date", "less_than_days", "2", NOW);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("InvalidRecordValue");
  });

  it("checks the predicate before the value", () => {
    const result = checkDate("2024-06-09T12:00:00Z", "contains", "abc", NOW);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("UnsupportedPredicate");
  });
});
