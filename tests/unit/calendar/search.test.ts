import { describe, it, expect } from "vitest";
import { DateTime, IANAZone } from "luxon";
import {
  dayOfWeek,
  nextDayOfMonth,
  nextOccurrence,
  nextWeekday,
  parseNextTarget,
  parseWeekday,
  weekTimestamps,
} from "../../../src/calendar/search.js";
import { InvalidArgumentError } from "../../../src/utils/errors.js";
import { FIXED_NOW } from "../../setup.js";

const UTC = IANAZone.create("UTC");
const SHANGHAI = IANAZone.create("Asia/Shanghai");

describe("parseWeekday", () => {
  it("should map names to Monday-first indexes", () => {
    expect(parseWeekday("Monday")).toBe(0);
    expect(parseWeekday("wednesday")).toBe(2);
    expect(parseWeekday(" SUNDAY ")).toBe(6);
  });

  it("should return undefined for unknown names", () => {
    expect(parseWeekday("funday")).toBeUndefined();
    expect(parseWeekday("mon")).toBeUndefined();
  });
});

describe("dayOfWeek", () => {
  it("should read the weekday in the given zone", () => {
    // 2023-11-14 22:13:20 UTC is already Wednesday in Shanghai
    expect(dayOfWeek(1700000000, UTC)).toBe("Tuesday");
    expect(dayOfWeek(1700000000, SHANGHAI)).toBe("Wednesday");
  });

  it("should handle the epoch", () => {
    expect(dayOfWeek(0, UTC)).toBe("Thursday");
  });
});

describe("weekTimestamps", () => {
  it("should return local midnights from Monday to Sunday in UTC", () => {
    const week = weekTimestamps(1700000000, UTC);

    expect(Object.keys(week)).toEqual([
      "Monday",
      "Tuesday",
      "Wednesday",
      "Thursday",
      "Friday",
      "Saturday",
      "Sunday",
    ]);
    expect(week.Monday).toEqual({
      timestamp: 1699833600,
      date: "2023-11-13 00:00:00",
    });
    expect(week.Sunday).toEqual({
      timestamp: 1700352000,
      date: "2023-11-19 00:00:00",
    });
  });

  it("should place midnights in the requested zone", () => {
    const week = weekTimestamps(1700000000, SHANGHAI);

    expect(week.Monday).toEqual({
      timestamp: 1699804800,
      date: "2023-11-13 00:00:00",
    });
    expect(week.Sunday).toEqual({
      timestamp: 1700323200,
      date: "2023-11-19 00:00:00",
    });
  });

  it("should space the days one day apart", () => {
    const stamps = Object.values(weekTimestamps(1736908200, UTC)).map(
      (day) => day.timestamp,
    );

    for (let i = 1; i < stamps.length; i++) {
      expect(stamps[i] - stamps[i - 1]).toBe(86400);
    }
  });

  it("should land on Monday midnight when the reference day skips midnight", () => {
    // Santiago springs forward at 00:00 on Sunday 2024-09-08
    const santiago = IANAZone.create("America/Santiago");
    const week = weekTimestamps(1725800000, santiago);

    expect(week.Monday).toEqual({
      timestamp: 1725249600,
      date: "2024-09-02 00:00:00",
    });
    expect(week.Tuesday).toEqual({
      timestamp: 1725336000,
      date: "2024-09-03 00:00:00",
    });
    expect(week.Saturday).toEqual({
      timestamp: 1725681600,
      date: "2024-09-07 00:00:00",
    });
  });

  it("should keep Monday midnight and Sunday in the same week", () => {
    expect(weekTimestamps(1699833600, UTC).Monday.timestamp).toBe(1699833600);
    expect(weekTimestamps(1700352000 + 3600, UTC).Monday.timestamp).toBe(
      1699833600,
    );
  });
});

describe("nextWeekday", () => {
  // FIXED_NOW is Wednesday 2025-01-15 10:30:00 in Shanghai
  it("should find a later day in the same week", () => {
    const occurrence = nextWeekday(4, SHANGHAI, FIXED_NOW);

    expect(occurrence.next_occurrence_time).toBe("2025-01-17 00:00:00");
    expect(occurrence.time_remaining_seconds).toBe(135000);
  });

  it("should wrap into the following week", () => {
    const monday = nextWeekday(0, SHANGHAI, FIXED_NOW);
    const tuesday = nextWeekday(1, SHANGHAI, FIXED_NOW);

    expect(monday.next_occurrence_time).toBe("2025-01-20 00:00:00");
    expect(monday.time_remaining_seconds).toBe(394200);
    expect(tuesday.next_occurrence_time).toBe("2025-01-21 00:00:00");
    expect(tuesday.time_remaining_seconds).toBe(480600);
  });

  it("should move a full week ahead when today's midnight has passed", () => {
    const occurrence = nextWeekday(2, SHANGHAI, FIXED_NOW);

    expect(occurrence.next_occurrence_time).toBe("2025-01-22 00:00:00");
    expect(occurrence.time_remaining_seconds).toBe(567000);
  });

  it("should return zero remaining at exactly midnight of the target day", () => {
    const midnight = DateTime.fromISO("2025-01-15T00:00:00", {
      zone: "Asia/Shanghai",
    });
    const occurrence = nextWeekday(2, SHANGHAI, midnight);

    expect(occurrence.next_occurrence_time).toBe("2025-01-15 00:00:00");
    expect(occurrence.time_remaining_seconds).toBe(0);
  });

  it("should return only the rendered time and the seconds remaining", () => {
    expect(nextWeekday(4, SHANGHAI, FIXED_NOW)).toEqual({
      next_occurrence_time: "2025-01-17 00:00:00",
      time_remaining_seconds: 135000,
    });
  });

  it("should use midnight in the requested zone", () => {
    const occurrence = nextWeekday(4, UTC, FIXED_NOW);

    expect(occurrence.next_occurrence_time).toBe("2025-01-17 00:00:00");
    expect(occurrence.time_remaining_seconds).toBe(163800);
  });
});

describe("nextDayOfMonth", () => {
  it("should find a later day in the current month", () => {
    const occurrence = nextDayOfMonth(20, SHANGHAI, FIXED_NOW);

    expect(occurrence.next_occurrence_time).toBe("2025-01-20 00:00:00");
    expect(occurrence.time_remaining_seconds).toBe(394200);
  });

  it("should move to next month when today's midnight has passed", () => {
    const occurrence = nextDayOfMonth(15, SHANGHAI, FIXED_NOW);

    expect(occurrence.next_occurrence_time).toBe("2025-02-15 00:00:00");
    expect(occurrence.time_remaining_seconds).toBe(2640600);
  });

  it("should move to next month for earlier days", () => {
    const occurrence = nextDayOfMonth(10, SHANGHAI, FIXED_NOW);

    expect(occurrence.next_occurrence_time).toBe("2025-02-10 00:00:00");
    expect(occurrence.time_remaining_seconds).toBe(2208600);
  });

  it("should skip months that lack the day", () => {
    const endOfJanuary = DateTime.fromISO("2025-01-31T10:30:00", {
      zone: "Asia/Shanghai",
    });

    expect(nextDayOfMonth(31, SHANGHAI, endOfJanuary).next_occurrence_time).toBe(
      "2025-03-31 00:00:00",
    );
    expect(nextDayOfMonth(30, SHANGHAI, endOfJanuary).next_occurrence_time).toBe(
      "2025-03-30 00:00:00",
    );
  });

  it("should roll over into the next year", () => {
    const december = DateTime.fromISO("2025-12-20T12:00:00", {
      zone: "Asia/Shanghai",
    });

    expect(nextDayOfMonth(5, SHANGHAI, december).next_occurrence_time).toBe(
      "2026-01-05 00:00:00",
    );
  });

  it("should reject days outside 1-31", () => {
    expect(() => nextDayOfMonth(0, SHANGHAI, FIXED_NOW)).toThrow(
      "Day of month must be between 1 and 31, got 0",
    );
    expect(() => nextDayOfMonth(32, SHANGHAI, FIXED_NOW)).toThrow(
      InvalidArgumentError,
    );
  });
});

describe("parseNextTarget", () => {
  it("should recognize weekday names", () => {
    expect(parseNextTarget("Friday")).toEqual({ kind: "weekday", weekday: 4 });
  });

  it("should recognize days of month as integers or digit strings", () => {
    expect(parseNextTarget(15)).toEqual({ kind: "day-of-month", day: 15 });
    expect(parseNextTarget("15")).toEqual({ kind: "day-of-month", day: 15 });
  });

  it("should reject anything else", () => {
    expect(() => parseNextTarget("someday")).toThrow(
      `Invalid target "someday": expected a weekday name or a day of month (1-31)`,
    );
    expect(() => parseNextTarget(2.5)).toThrow(InvalidArgumentError);
    expect(() => parseNextTarget(true)).toThrow(InvalidArgumentError);
  });
});

describe("nextOccurrence", () => {
  it("should dispatch on the target kind", () => {
    expect(
      nextOccurrence({ kind: "weekday", weekday: 0 }, SHANGHAI, FIXED_NOW)
        .next_occurrence_time,
    ).toBe("2025-01-20 00:00:00");
    expect(
      nextOccurrence({ kind: "day-of-month", day: 20 }, SHANGHAI, FIXED_NOW)
        .next_occurrence_time,
    ).toBe("2025-01-20 00:00:00");
  });
});
