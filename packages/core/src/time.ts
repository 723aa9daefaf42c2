export type CalendarDate = {
	year: number;
	month: number;
	day: number;
};

export type ZonedDateTimeParts = CalendarDate & {
	hour: number;
	minute: number;
	second: number;
};

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
	const cached = formatterCache.get(timeZone);
	if (cached) {
		return cached;
	}
	const formatter = new Intl.DateTimeFormat("en-US", {
		timeZone,
		hourCycle: "h23",
		year: "numeric",
		month: "2-digit",
		day: "2-digit",
		hour: "2-digit",
		minute: "2-digit",
		second: "2-digit",
	});
	formatterCache.set(timeZone, formatter);
	return formatter;
}

function pad2(value: number): string {
	return String(value).padStart(2, "0");
}

/** Canonical IANA name for `raw`, or null when the runtime does not know the zone. */
export function resolveTimeZone(raw: unknown): string | null {
	if (typeof raw !== "string") {
		return null;
	}
	const trimmed = raw.trim();
	if (!trimmed) {
		return null;
	}
	try {
		return new Intl.DateTimeFormat("en-US", { timeZone: trimmed }).resolvedOptions().timeZone;
	} catch (err) {
		if (err instanceof RangeError) {
			return null;
		}
		throw err;
	}
}

export function zonedDateTimeParts(timestampMs: number, timeZone: string): ZonedDateTimeParts {
	const out: ZonedDateTimeParts = { year: 0, month: 0, day: 0, hour: 0, minute: 0, second: 0 };
	for (const part of getFormatter(timeZone).formatToParts(new Date(timestampMs))) {
		const value = Number.parseInt(part.value, 10);
		switch (part.type) {
			case "year":
				out.year = value;
				break;
			case "month":
				out.month = value;
				break;
			case "day":
				out.day = value;
				break;
			case "hour":
				out.hour = value === 24 ? 0 : value;
				break;
			case "minute":
				out.minute = value;
				break;
			case "second":
				out.second = value;
				break;
			default:
				break;
		}
	}
	return out;
}

export function zonedCalendarDate(timestampMs: number, timeZone: string): CalendarDate {
	const parts = zonedDateTimeParts(timestampMs, timeZone);
	return { year: parts.year, month: parts.month, day: parts.day };
}

/** UTC offset of `timeZone` at the given instant, in milliseconds (east positive). */
export function timeZoneOffsetMs(timestampMs: number, timeZone: string): number {
	const wholeSecondMs = Math.floor(timestampMs / 1_000) * 1_000;
	const p = zonedDateTimeParts(wholeSecondMs, timeZone);
	const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
	return asUtc - wholeSecondMs;
}

/**
 * Instant at which the wall clock in `timeZone` shows `parts`. Wall-clock times
 * skipped by a DST jump resolve to the instant just after the gap.
 */
export function zonedTimeToUtcMs(parts: ZonedDateTimeParts, timeZone: string): number {
	const naive = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
	const offset = timeZoneOffsetMs(naive, timeZone);
	const first = naive - offset;
	const corrected = timeZoneOffsetMs(first, timeZone);
	if (corrected === offset) {
		return first;
	}
	return naive - corrected;
}

export function atZonedTime(
	date: CalendarDate,
	time: { hour: number; minute?: number },
	timeZone: string,
): number {
	return zonedTimeToUtcMs(
		{
			year: date.year,
			month: date.month,
			day: date.day,
			hour: time.hour,
			minute: time.minute ?? 0,
			second: 0,
		},
		timeZone,
	);
}

/** ISO-8601 with the zone's UTC offset, e.g. `2025-01-10T16:00:00+01:00`. */
export function formatZonedIso(timestampMs: number, timeZone: string): string {
	const p = zonedDateTimeParts(timestampMs, timeZone);
	const offsetMinutes = Math.round(timeZoneOffsetMs(timestampMs, timeZone) / 60_000);
	const sign = offsetMinutes < 0 ? "-" : "+";
	const abs = Math.abs(offsetMinutes);
	const offset = `${sign}${pad2(Math.trunc(abs / 60))}:${pad2(abs % 60)}`;
	const date = `${String(p.year).padStart(4, "0")}-${pad2(p.month)}-${pad2(p.day)}`;
	return `${date}T${pad2(p.hour)}:${pad2(p.minute)}:${pad2(p.second)}${offset}`;
}

export function formatCalendarDate(date: CalendarDate): string {
	return `${pad2(date.day)}.${pad2(date.month)}.${String(date.year).padStart(4, "0")}`;
}

export function isValidCalendarDate(date: CalendarDate): boolean {
	if (!Number.isInteger(date.year) || !Number.isInteger(date.month) || !Number.isInteger(date.day)) {
		return false;
	}
	const candidate = new Date(Date.UTC(date.year, date.month - 1, date.day));
	return (
		candidate.getUTCFullYear() === date.year && candidate.getUTCMonth() === date.month - 1 && candidate.getUTCDate() === date.day
	);
}

export function addCalendarDays(date: CalendarDate, days: number): CalendarDate {
	const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + Math.trunc(days)));
	return {
		year: shifted.getUTCFullYear(),
		month: shifted.getUTCMonth() + 1,
		day: shifted.getUTCDate(),
	};
}

export function parseTimestampMs(value: unknown): number | null {
	if (typeof value !== "string" || value.trim().length === 0) {
		return null;
	}
	const parsed = Date.parse(value.trim());
	return Number.isFinite(parsed) ? parsed : null;
}
