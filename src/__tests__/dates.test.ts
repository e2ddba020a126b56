import { describe, it, expect } from "vitest";
import { addDays, dateInTimeZone, daysBetween, isCalendarDate, previousDay } from "../dates.js";
import { FixedClock, SystemClock } from "../clock.js";

describe("calendar dates", () => {
  it("adds days across month, year and leap-day boundaries", () => {
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(addDays("2025-02-28", 1)).toBe("2025-03-01");
    expect(addDays("2025-12-31", 1)).toBe("2026-01-01");
    expect(addDays("2025-09-03", -3)).toBe("2025-08-31");
  });

  it("previousDay crosses the year boundary", () => {
    expect(previousDay("2025-01-01")).toBe("2024-12-31");
  });

  it("counts whole days regardless of DST changes", () => {
    expect(daysBetween("2025-03-08", "2025-03-10")).toBe(2);
    expect(daysBetween("2025-11-01", "2025-11-03")).toBe(2);
    expect(daysBetween("2025-09-05", "2025-09-01")).toBe(-4);
    expect(daysBetween("2025-09-01", "2025-09-01")).toBe(0);
  });

  it("rejects malformed and impossible dates", () => {
    expect(isCalendarDate("2025-09-01")).toBe(true);
    expect(isCalendarDate("2025-02-30")).toBe(false);
    expect(isCalendarDate("2025-9-1")).toBe(false);
    expect(isCalendarDate("yesterday")).toBe(false);
    expect(() => addDays("2025-13-01", 1)).toThrow('Invalid calendar date: "2025-13-01"');
  });

  it("formats an instant in the user's time zone", () => {
    const instant = new Date("2025-09-01T02:00:00Z");
    expect(dateInTimeZone(instant, "UTC")).toBe("2025-09-01");
    expect(dateInTimeZone(instant, "America/New_York")).toBe("2025-08-31");
    expect(dateInTimeZone(new Date("2025-09-01T20:00:00Z"), "Asia/Tokyo")).toBe("2025-09-02");
  });
});

describe("clocks", () => {
  it("FixedClock stays put until advanced", () => {
    const clock = new FixedClock("2025-09-01");
    expect(clock.today()).toBe("2025-09-01");
    expect(clock.today()).toBe("2025-09-01");
    expect(clock.advance()).toBe("2025-09-02");
    expect(clock.advance(2)).toBe("2025-09-04");
    clock.set("2025-10-01");
    expect(clock.today()).toBe("2025-10-01");
    expect(clock.now().toISOString()).toBe("2025-10-01T12:00:00.000Z");
  });

  it("FixedClock rejects invalid dates", () => {
    expect(() => new FixedClock("2025-02-30")).toThrow('Invalid calendar date: "2025-02-30"');
  });

  it("SystemClock reports a calendar date", () => {
    expect(isCalendarDate(new SystemClock("Europe/Berlin").today())).toBe(true);
  });
});
