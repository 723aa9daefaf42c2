import {
	addCalendarDays,
	atZonedTime,
	formatCalendarDate,
	formatZonedIso,
	isValidCalendarDate,
	parseTimestampMs,
	resolveTimeZone,
	timeZoneOffsetMs,
	zonedCalendarDate,
	zonedDateTimeParts,
} from "@dirops/core";
import { describe, expect, test } from "vitest";

describe("time zones", () => {
	test("resolveTimeZone accepts IANA names and rejects unknown ones", () => {
		expect(resolveTimeZone("Europe/Berlin")).toBe("Europe/Berlin");
		expect(resolveTimeZone("  UTC  ")).toBe("UTC");
		expect(resolveTimeZone("Mars/Olympus_Mons")).toBeNull();
		expect(resolveTimeZone("")).toBeNull();
		expect(resolveTimeZone(42)).toBeNull();
	});

	test("offsets follow daylight saving time", () => {
		expect(timeZoneOffsetMs(Date.UTC(2025, 0, 10, 12), "Europe/Berlin")).toBe(60 * 60_000);
		expect(timeZoneOffsetMs(Date.UTC(2025, 6, 10, 12), "Europe/Berlin")).toBe(2 * 60 * 60_000);
		expect(timeZoneOffsetMs(Date.UTC(2025, 6, 10, 12), "UTC")).toBe(0);
	});

	test("zonedDateTimeParts reads the wall clock of the zone", () => {
		expect(zonedDateTimeParts(Date.UTC(2025, 0, 10, 23, 30), "Europe/Berlin")).toEqual({
			year: 2025,
			month: 1,
			day: 11,
			hour: 0,
			minute: 30,
			second: 0,
		});
		expect(zonedCalendarDate(Date.UTC(2025, 0, 10, 23, 30), "UTC")).toEqual({ year: 2025, month: 1, day: 10 });
	});

	test("atZonedTime converts a local wall-clock time to an instant", () => {
		const winter = atZonedTime({ year: 2025, month: 1, day: 10 }, { hour: 16 }, "Europe/Berlin");
		expect(winter).toBe(Date.UTC(2025, 0, 10, 15));
		const summer = atZonedTime({ year: 2025, month: 7, day: 1 }, { hour: 16, minute: 30 }, "Europe/Berlin");
		expect(summer).toBe(Date.UTC(2025, 6, 1, 14, 30));
	});

	test("formatZonedIso carries the zone offset", () => {
		expect(formatZonedIso(Date.UTC(2025, 0, 10, 15), "Europe/Berlin")).toBe("2025-01-10T16:00:00+01:00");
		expect(formatZonedIso(Date.UTC(2025, 6, 1, 14, 30), "Europe/Berlin")).toBe("2025-07-01T16:30:00+02:00");
		expect(formatZonedIso(Date.UTC(2025, 0, 10, 15), "UTC")).toBe("2025-01-10T15:00:00+00:00");
	});

	test("parseTimestampMs round-trips formatted instants", () => {
		expect(parseTimestampMs("2025-01-10T16:00:00+01:00")).toBe(Date.UTC(2025, 0, 10, 15));
		expect(parseTimestampMs("not a date")).toBeNull();
		expect(parseTimestampMs("")).toBeNull();
		expect(parseTimestampMs(null)).toBeNull();
	});
});

describe("calendar dates", () => {
	test("isValidCalendarDate rejects impossible days", () => {
		expect(isValidCalendarDate({ year: 2024, month: 2, day: 29 })).toBe(true);
		expect(isValidCalendarDate({ year: 2025, month: 2, day: 29 })).toBe(false);
		expect(isValidCalendarDate({ year: 2025, month: 13, day: 1 })).toBe(false);
		expect(isValidCalendarDate({ year: 2025, month: 4, day: 31 })).toBe(false);
	});

	test("addCalendarDays crosses month and year boundaries", () => {
		expect(addCalendarDays({ year: 2024, month: 12, day: 31 }, 1)).toEqual({ year: 2025, month: 1, day: 1 });
		expect(addCalendarDays({ year: 2025, month: 3, day: 1 }, -1)).toEqual({ year: 2025, month: 2, day: 28 });
	});

	test("formatCalendarDate pads day and month", () => {
		expect(formatCalendarDate({ year: 2025, month: 1, day: 5 })).toBe("05.01.2025");
	});
});
