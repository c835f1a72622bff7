import { describe, expect, it } from "vitest";
import { intervalsOverlap, sessionInterval, sessionOverlapsWindow } from "../src/lib/overlap.js";
import { sessionAt } from "./helpers.js";

describe("intervalsOverlap", () => {
  it("treats [) end as non-overlapping", () => {
    const aStart = new Date("2025-01-01T10:00:00Z");
    const aEnd = new Date("2025-01-01T11:00:00Z");
    const bStart = new Date("2025-01-01T11:00:00Z");
    const bEnd = new Date("2025-01-01T12:00:00Z");
    expect(intervalsOverlap(aStart, aEnd, bStart, bEnd)).toBe(false);
    expect(intervalsOverlap(bStart, bEnd, aStart, aEnd)).toBe(false);
  });

  it("overlaps when ranges intersect", () => {
    const aStart = new Date("2025-01-01T10:00:00Z");
    const aEnd = new Date("2025-01-01T11:00:00Z");
    const bStart = new Date("2025-01-01T10:30:00Z");
    const bEnd = new Date("2025-01-01T12:00:00Z");
    expect(intervalsOverlap(aStart, aEnd, bStart, bEnd)).toBe(true);
  });

  it("overlaps when one range contains the other", () => {
    const aStart = new Date("2025-01-01T10:00:00Z");
    const aEnd = new Date("2025-01-01T14:00:00Z");
    const bStart = new Date("2025-01-01T11:00:00Z");
    const bEnd = new Date("2025-01-01T12:00:00Z");
    expect(intervalsOverlap(bStart, bEnd, aStart, aEnd)).toBe(true);
  });
});

describe("sessionInterval", () => {
  it("ends a session after its film duration", () => {
    const { start, end } = sessionInterval(sessionAt("22:30"));
    expect(start.toISOString()).toBe("2025-01-01T22:30:00.000Z");
    expect(end.toISOString()).toBe("2025-01-02T00:30:00.000Z");
  });

  it("matches windows across midnight", () => {
    const late = sessionAt("23:00");
    expect(sessionOverlapsWindow(late, new Date("2025-01-02T00:00:00Z"), new Date("2025-01-02T01:00:00Z"))).toBe(true);
    expect(sessionOverlapsWindow(late, new Date("2025-01-02T01:00:00Z"), new Date("2025-01-02T02:00:00Z"))).toBe(false);
  });
});
