import { describe, it, expect } from "vitest";
import {
  addDays,
  daysInMonth,
  diffInDays,
  formatDate,
  isLeapYear,
  isValidDate,
  isValidTimezone,
  todayIn,
  weekday,
  withYear,
} from "./time.js";

// ---------------------------------------------------------------------------
// Validity
// ---------------------------------------------------------------------------

describe("isLeapYear", () => {
  it("follows the Gregorian rules", () => {
    expect(isLeapYear(2024)).toBe(true);
    expect(isLeapYear(2023)).toBe(false);
    expect(isLeapYear(1900)).toBe(false);
    expect(isLeapYear(2000)).toBe(true);
  });
});

describe("daysInMonth", () => {
  it("handles February and the 30-day months", () => {
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(2024, 4)).toBe(30);
    expect(daysInMonth(2024, 12)).toBe(31);
  });
});

describe("isValidDate", () => {
  it("accepts real dates and rejects impossible ones", () => {
    expect(isValidDate(2024, 2, 29)).toBe(true);
    expect(isValidDate(2023, 2, 29)).toBe(false);
    expect(isValidDate(2024, 4, 31)).toBe(false);
    expect(isValidDate(2024, 0, 1)).toBe(false);
    expect(isValidDate(0, 1, 1)).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Arithmetic
// ---------------------------------------------------------------------------

describe("addDays / diffInDays", () => {
  it("crosses month and year boundaries", () => {
    expect(addDays({ year: 2024, month: 1, day: 31 }, 1)).toEqual({ year: 2024, month: 2, day: 1 });
    expect(addDays({ year: 2024, month: 12, day: 30 }, 3)).toEqual({ year: 2025, month: 1, day: 2 });
    expect(addDays({ year: 2024, month: 3, day: 1 }, -1)).toEqual({ year: 2024, month: 2, day: 29 });
  });

  it("counts whole days, negative for earlier dates", () => {
    const today = { year: 2024, month: 6, day: 10 };
    expect(diffInDays({ year: 2024, month: 6, day: 15 }, today)).toBe(5);
    expect(diffInDays({ year: 2024, month: 6, day: 9 }, today)).toBe(-1);
    expect(diffInDays({ year: 2025, month: 6, day: 10 }, today)).toBe(365);
  });
});

describe("weekday", () => {
  it("numbers Monday as 0 and Sunday as 6", () => {
    expect(weekday({ year: 2024, month: 6, day: 10 })).toBe(0);
    expect(weekday({ year: 2024, month: 6, day: 15 })).toBe(5);
    expect(weekday({ year: 2024, month: 6, day: 16 })).toBe(6);
  });
});

describe("withYear", () => {
  it("moves a date into another year", () => {
    expect(withYear({ year: 1990, month: 3, day: 17 }, 2024)).toEqual({ year: 2024, month: 3, day: 17 });
  });

  it("clamps 29 February to 28 February in a common year", () => {
    expect(withYear({ year: 2000, month: 2, day: 29 }, 2023)).toEqual({ year: 2023, month: 2, day: 28 });
    expect(withYear({ year: 2000, month: 2, day: 29 }, 2024)).toEqual({ year: 2024, month: 2, day: 29 });
  });
});

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

describe("formatDate", () => {
  it("pads day, month and year", () => {
    expect(formatDate({ year: 2024, month: 6, day: 5 })).toBe("05.06.2024");
    expect(formatDate({ year: 50, month: 12, day: 25 })).toBe("25.12.0050");
  });
});

// ---------------------------------------------------------------------------
// Today
// ---------------------------------------------------------------------------

describe("todayIn", () => {
  it("returns the UTC calendar date", () => {
    expect(todayIn("UTC", new Date("2024-06-10T23:30:00Z"))).toEqual({ year: 2024, month: 6, day: 10 });
  });

  it("is already tomorrow east of UTC", () => {
    // 23:30 UTC = 08:30 next day JST (UTC+9)
    expect(todayIn("Asia/Tokyo", new Date("2024-06-10T23:30:00Z"))).toEqual({ year: 2024, month: 6, day: 11 });
  });

  it("is still yesterday west of UTC", () => {
    // 02:00 UTC = 22:00 previous day EDT (UTC-4)
    expect(todayIn("America/New_York", new Date("2024-06-10T02:00:00Z"))).toEqual({ year: 2024, month: 6, day: 9 });
  });
});

describe("isValidTimezone", () => {
  it("accepts IANA names and rejects unknown ones", () => {
    expect(isValidTimezone("Europe/Amsterdam")).toBe(true);
    expect(isValidTimezone("UTC")).toBe(true);
    expect(isValidTimezone("Mars/Olympus_Mons")).toBe(false);
  });
});
