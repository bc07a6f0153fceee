import {
  isDimModeActive,
  isNightModeActive,
  isScheduleActive,
  isWithinTimeWindow,
  localize,
  matchesMonthlyWeekday,
  normalizeTimeOfDay,
} from "../schedule";
import { makeApp, makeDevice } from "../../__tests__/helpers/fixtures";

const at = (iso: string): Date => new Date(iso);

describe("localize", () => {
  it("converts an instant to the device's wall clock", () => {
    const local = localize(at("2025-01-06T23:30:00Z"), "America/New_York");
    expect(local.hhmm).toBe("18:30");
    expect(local.day).toBe(6);
    expect(local.weekday).toBe(1);
  });

  it("falls back to the process zone for unknown zones", () => {
    const instant = at("2025-01-06T23:30:00Z");
    expect(localize(instant, "Not/AZone").hhmm).toBe(localize(instant, undefined).hhmm);
  });
});

describe("normalizeTimeOfDay", () => {
  it("pads single-digit hours and drops seconds", () => {
    expect(normalizeTimeOfDay("7:05", "00:00")).toBe("07:05");
    expect(normalizeTimeOfDay("22:15:30", "00:00")).toBe("22:15");
  });

  it("returns the fallback for missing or malformed values", () => {
    expect(normalizeTimeOfDay(null, "06:00")).toBe("06:00");
    expect(normalizeTimeOfDay("noon", "06:00")).toBe("06:00");
    expect(normalizeTimeOfDay("24:00", "06:00")).toBe("06:00");
  });
});

describe("isWithinTimeWindow", () => {
  it("includes both ends of a same-day window", () => {
    expect(isWithinTimeWindow("09:00", "09:00", "17:00")).toBe(true);
    expect(isWithinTimeWindow("17:00", "09:00", "17:00")).toBe(true);
    expect(isWithinTimeWindow("17:01", "09:00", "17:00")).toBe(false);
  });

  it("wraps past midnight", () => {
    expect(isWithinTimeWindow("23:00", "22:00", "06:00")).toBe(true);
    expect(isWithinTimeWindow("06:00", "22:00", "06:00")).toBe(true);
    expect(isWithinTimeWindow("12:00", "22:00", "06:00")).toBe(false);
  });
});

describe("isNightModeActive", () => {
  const device = makeDevice({ nightModeEnabled: true, nightStart: "22:00", nightEnd: "06:00" });

  it("is active inside the window and inactive at its end", () => {
    expect(isNightModeActive(device, at("2025-01-06T23:30:00Z"))).toBe(true);
    expect(isNightModeActive(device, at("2025-01-07T05:59:00Z"))).toBe(true);
    expect(isNightModeActive(device, at("2025-01-07T06:00:00Z"))).toBe(false);
    expect(isNightModeActive(device, at("2025-01-06T12:00:00Z"))).toBe(false);
  });

  it("uses the device timezone", () => {
    const eastCoast = { ...device, timezone: "America/New_York" };
    expect(isNightModeActive(eastCoast, at("2025-01-06T23:30:00Z"))).toBe(false);
    expect(isNightModeActive(eastCoast, at("2025-01-07T03:30:00Z"))).toBe(true);
  });

  it("is never active when disabled", () => {
    expect(isNightModeActive({ ...device, nightModeEnabled: false }, at("2025-01-06T23:30:00Z"))).toBe(false);
  });

  it("defaults to 22:00-06:00", () => {
    const defaults = makeDevice({ nightModeEnabled: true });
    expect(isNightModeActive(defaults, at("2025-01-06T22:00:00Z"))).toBe(true);
    expect(isNightModeActive(defaults, at("2025-01-06T21:59:00Z"))).toBe(false);
  });
});

describe("isDimModeActive", () => {
  it("runs from dimTime until the night window ends", () => {
    const device = makeDevice({ dimTime: "20:00" });
    expect(isDimModeActive(device, at("2025-01-06T21:00:00Z"))).toBe(true);
    expect(isDimModeActive(device, at("2025-01-07T05:00:00Z"))).toBe(true);
    expect(isDimModeActive(device, at("2025-01-06T12:00:00Z"))).toBe(false);
  });

  it("is off without a dim time", () => {
    expect(isDimModeActive(makeDevice(), at("2025-01-06T21:00:00Z"))).toBe(false);
  });
});

describe("isScheduleActive", () => {
  const device = makeDevice();
  const monday = "2025-01-06";

  it("honours the time-of-day window", () => {
    const app = makeApp({ iname: "100", startTime: "09:00", endTime: "17:00" });
    expect(isScheduleActive(app, device, at(`${monday}T12:00:00Z`))).toBe(true);
    expect(isScheduleActive(app, device, at(`${monday}T18:00:00Z`))).toBe(false);
  });

  it("filters on the legacy day list", () => {
    expect(isScheduleActive(makeApp({ iname: "100", days: ["Monday "] }), device, at(`${monday}T12:00:00Z`))).toBe(
      true
    );
    expect(isScheduleActive(makeApp({ iname: "100", days: ["tuesday"] }), device, at(`${monday}T12:00:00Z`))).toBe(
      false
    );
  });

  it("ignores the recurrence type unless custom recurrence is on", () => {
    const app = makeApp({ iname: "100", recurrenceType: "yearly", recurrenceStartDate: "2025-03-10" });
    expect(isScheduleActive(app, device, at(`${monday}T12:00:00Z`))).toBe(true);
  });

  describe("custom recurrence", () => {
    const recurring = (overrides: Parameters<typeof makeApp>[0]) =>
      makeApp({ useCustomRecurrence: true, recurrenceStartDate: "2025-01-01", ...overrides });
    const activeOn = (app: ReturnType<typeof makeApp>, date: string): boolean =>
      isScheduleActive(app, device, at(`${date}T12:00:00Z`));

    it("repeats every n days from the start date", () => {
      const app = recurring({ iname: "100", recurrenceType: "daily", recurrenceInterval: 3 });
      expect(activeOn(app, "2025-01-01")).toBe(true);
      expect(activeOn(app, "2025-01-02")).toBe(false);
      expect(activeOn(app, "2025-01-04")).toBe(true);
      expect(activeOn(app, "2025-01-07")).toBe(true);
      expect(activeOn(app, "2024-12-31")).toBe(false);
    });

    it("stops after the end date", () => {
      const app = recurring({ iname: "100", recurrenceType: "daily", recurrenceEndDate: "2025-01-05" });
      expect(activeOn(app, "2025-01-05")).toBe(true);
      expect(activeOn(app, "2025-01-06")).toBe(false);
    });

    it("counts weeks from the Monday of the start week", () => {
      const app = recurring({
        iname: "100",
        recurrenceType: "weekly",
        recurrenceInterval: 2,
        recurrencePattern: { weekdays: ["monday"] },
      });
      expect(activeOn(app, "2025-01-06")).toBe(false);
      expect(activeOn(app, "2025-01-13")).toBe(true);
      expect(activeOn(app, "2025-01-14")).toBe(false);
    });

    it("matches a day of the month every n months", () => {
      const app = recurring({
        iname: "100",
        recurrenceType: "monthly",
        recurrenceInterval: 2,
        recurrencePattern: { dayOfMonth: 15 },
      });
      expect(activeOn(app, "2025-01-15")).toBe(true);
      expect(activeOn(app, "2025-02-15")).toBe(false);
      expect(activeOn(app, "2025-03-15")).toBe(true);
      expect(activeOn(app, "2025-03-14")).toBe(false);
    });

    it("matches an ordinal weekday of the month", () => {
      const app = recurring({
        iname: "100",
        recurrenceType: "monthly",
        recurrencePattern: { dayOfWeek: "first_monday" },
      });
      expect(activeOn(app, "2025-01-06")).toBe(true);
      expect(activeOn(app, "2025-02-03")).toBe(true);
      expect(activeOn(app, "2025-01-13")).toBe(false);
    });

    it("matches the start date's month and day every n years", () => {
      const app = recurring({
        iname: "100",
        recurrenceType: "yearly",
        recurrenceInterval: 2,
        recurrenceStartDate: "2025-03-10",
      });
      expect(activeOn(app, "2025-03-10")).toBe(true);
      expect(activeOn(app, "2026-03-10")).toBe(false);
      expect(activeOn(app, "2027-03-10")).toBe(true);
      expect(activeOn(app, "2027-03-11")).toBe(false);
    });

    it("still requires the time window", () => {
      const app = recurring({ iname: "100", recurrenceType: "daily", startTime: "20:00", endTime: "21:00" });
      expect(activeOn(app, "2025-01-01")).toBe(false);
    });
  });
});

describe("matchesMonthlyWeekday", () => {
  const local = (date: string) => localize(at(`${date}T12:00:00Z`), "UTC");

  it("recognises the last weekday of a month", () => {
    expect(matchesMonthlyWeekday(local("2025-01-31"), "last_friday")).toBe(true);
    expect(matchesMonthlyWeekday(local("2025-01-24"), "last_friday")).toBe(false);
  });

  it("rejects malformed tokens", () => {
    expect(matchesMonthlyWeekday(local("2025-01-06"), "monday")).toBe(false);
    expect(matchesMonthlyWeekday(local("2025-01-06"), "fifth_monday")).toBe(false);
  });
});
