import { describe, expect, it, vi, beforeEach } from "vitest";
import { getDayOfWeek } from "../../../src/actions/get-day-of-week.js";
import { getWeekdayTimestampsForWeek } from "../../../src/actions/get-weekday-timestamps-for-week.js";
import { timeUntilNextDate } from "../../../src/actions/time-until-next-date.js";
import { calculateTimeUntilTargets } from "../../../src/actions/calculate-time-until-targets.js";
import { InvalidArgumentError } from "../../../src/utils/errors.js";
import { FIXED_NOW } from "../../setup.js";

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
}));

// Mock the logger
vi.mock("../../../src/utils/logger.js", () => ({
  getChildLogger: vi.fn().mockReturnValue(mockLogger),
}));

describe("getDayOfWeek", () => {
  it("should use the default zone", async () => {
    const result = await getDayOfWeek({ timestamp: 1700000000 });

    expect(result).toEqual({
      timestamp: 1700000000,
      timezone: "Asia/Shanghai",
      day_of_week: "Wednesday",
    });
  });

  it("should use the UTC calendar day when asked", async () => {
    const result = await getDayOfWeek({ timestamp: "1700000000", timezone: "UTC" });

    expect(result.day_of_week).toBe("Tuesday");
  });
});

describe("getWeekdayTimestampsForWeek", () => {
  it("should return the week around the reference timestamp", async () => {
    const result = await getWeekdayTimestampsForWeek({
      timestamp: "1700000000",
      timezone: "UTC",
    });

    expect(result.reference_timestamp).toBe(1700000000);
    expect(result.timezone).toBe("UTC");
    expect(result.week_timestamps.Monday).toEqual({
      timestamp: 1699833600,
      date: "2023-11-13 00:00:00",
    });
    expect(result.week_timestamps.Wednesday).toEqual({
      timestamp: 1700006400,
      date: "2023-11-15 00:00:00",
    });
  });
});

describe("timeUntilNextDate", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should resolve a weekday name", async () => {
    const result = await timeUntilNextDate({ target: "friday" }, { now: FIXED_NOW });

    expect(result).toEqual({
      target_day: "friday",
      timezone: "Asia/Shanghai",
      next_occurrence_time: "2025-01-17 00:00:00",
      time_remaining_seconds: 135000,
    });
  });

  it("should never return today for the current weekday", async () => {
    const result = await timeUntilNextDate(
      { target: "Wednesday" },
      { now: FIXED_NOW },
    );

    expect(result.next_occurrence_time).toBe("2025-01-22 00:00:00");
  });

  it("should resolve a day of month", async () => {
    const result = await timeUntilNextDate({ target: 20 }, { now: FIXED_NOW });

    expect(result).toEqual({
      target_day: 20,
      timezone: "Asia/Shanghai",
      next_occurrence_time: "2025-01-20 00:00:00",
      time_remaining_seconds: 394200,
    });
  });

  it("should reject days out of range", async () => {
    await expect(
      timeUntilNextDate({ target: 32 }, { now: FIXED_NOW }),
    ).rejects.toBeInstanceOf(InvalidArgumentError);
  });
});

describe("calculateTimeUntilTargets", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should report each target and warn about failures", async () => {
    const result = await calculateTimeUntilTargets(
      {
        targets: JSON.stringify({
          a: "1700000000",
          b: "next monday",
          c: "bogus",
        }),
      },
      { now: FIXED_NOW },
    );

    expect(result).toEqual({
      timezone: "Asia/Shanghai",
      results: {
        a: {
          target: "1700000000",
          target_time: "2023-11-15 06:13:20",
          time_remaining_seconds: -36908200,
        },
        b: {
          target: "next monday",
          next_occurrence_time: "2025-01-20 00:00:00",
          time_remaining_seconds: 394200,
        },
        c: { error: `Invalid integer value for 'c': "bogus"` },
      },
    });
    expect(mockLogger.warn).toHaveBeenCalledWith(
      { failed: ["c"] },
      "Some targets could not be resolved",
    );
  });

  it("should fail the call when targets is not a JSON object", async () => {
    await expect(
      calculateTimeUntilTargets({ targets: "[1]" }, { now: FIXED_NOW }),
    ).rejects.toMatchObject({ field: "targets", code: "INVALID_ARGUMENT" });
  });
});
