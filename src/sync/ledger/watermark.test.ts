import { describe, expect, it } from "vitest";
import { compareWatermarks, formatWatermark, maxWatermark, toIsoTimestamp } from "./watermark";

describe("toIsoTimestamp", () => {
  it("normalises dates and strings to UTC ISO", () => {
    expect(toIsoTimestamp(new Date(Date.UTC(2025, 4, 2, 9, 30)))).toBe("2025-05-02T09:30:00.000Z");
    expect(toIsoTimestamp("2025-05-02T11:30:00+02:00")).toBe("2025-05-02T09:30:00.000Z");
  });

  it("rejects unparseable values", () => {
    expect(() => toIsoTimestamp("not a date")).toThrow(RangeError);
  });
});

describe("compareWatermarks", () => {
  const early = { changedAt: "2025-05-01T00:00:00.000Z", jobId: 900 };
  const late = { changedAt: "2025-05-02T00:00:00.000Z", jobId: 10 };

  it("orders by timestamp first", () => {
    expect(compareWatermarks(early, late)).toBeLessThan(0);
    expect(compareWatermarks(late, early)).toBeGreaterThan(0);
  });

  it("breaks timestamp ties on job id", () => {
    const sameTime = { changedAt: early.changedAt, jobId: 901 };
    expect(compareWatermarks(early, sameTime)).toBe(-1);
    expect(compareWatermarks(early, { ...early })).toBe(0);
  });

  it("compares instants, not strings", () => {
    const offset = { changedAt: "2025-05-01T02:00:00+02:00", jobId: 900 };
    expect(compareWatermarks(early, offset)).toBe(0);
  });
});

describe("maxWatermark", () => {
  const a = { changedAt: "2025-06-01T00:00:00.000Z", jobId: 1 };
  const b = { changedAt: "2025-06-01T00:00:00.000Z", jobId: 2 };

  it("returns the greater position", () => {
    expect(maxWatermark(a, b)).toBe(b);
    expect(maxWatermark(b, a)).toBe(b);
  });

  it("treats null as the lowest position", () => {
    expect(maxWatermark(null, a)).toBe(a);
    expect(maxWatermark(a, null)).toBe(a);
    expect(maxWatermark(null, null)).toBeNull();
  });
});

describe("formatWatermark", () => {
  it("renders the position or a placeholder", () => {
    expect(formatWatermark({ changedAt: "2025-06-01T00:00:00.000Z", jobId: 42 })).toBe("2025-06-01T00:00:00.000Z#42");
    expect(formatWatermark(null)).toBe("(none)");
  });
});
