import { addCalendarDays, type CalendarDate, isValidCalendarDate } from "@dirops/core";

export type IntentKind = "reset_password" | "disable_account";

export type ClassifiedRequest = {
	intent: IntentKind | null;
	/** Free-text identity query with keyword phrase and date mentions removed. */
	query: string | null;
	date: CalendarDate | null;
};

export type ClassifyOpts = {
	/** Calendar date "today" in the operator's time zone, for relative dates. */
	today: CalendarDate;
};

/** Turns free text into an intent, an identity query and an optional date. */
export interface IntentClassifier {
	classify(text: string, opts: ClassifyOpts): ClassifiedRequest;
}

const RESET_PASSWORD_PATTERNS = [/смени\s+пароль/iu, /сброс(?:ь|ить)\s+пароль/iu, /reset\s+pass(?:word)?/iu];
const DISABLE_ACCOUNT_PATTERNS = [/заблокируй/iu, /отключи/iu, /disable\s+account/iu, /увол(?:ена|ен)/iu];

const MONTHS: Record<string, number> = {
	января: 1,
	февраля: 2,
	марта: 3,
	апреля: 4,
	мая: 5,
	июня: 6,
	июля: 7,
	августа: 8,
	сентября: 9,
	октября: 10,
	ноября: 11,
	декабря: 12,
	january: 1,
	february: 2,
	march: 3,
	april: 4,
	may: 5,
	june: 6,
	july: 7,
	august: 8,
	september: 9,
	october: 10,
	november: 11,
	december: 12,
};

const NUMERIC_DATE = /(\d{1,2})[.\-/](\d{1,2})[.\-/](\d{2,4})/u;
const NAMED_MONTH_DATE = new RegExp(`(\\d{1,2})\\s+(${Object.keys(MONTHS).join("|")})(?:\\s+(\\d{4}))?`, "iu");
const RELATIVE_WORD = /(послезавтра|завтра|сегодня|day after tomorrow|tomorrow|today)/iu;
const RELATIVE_DAYS = /(?:через\s+(\d{1,3})\s+дн[а-яё]*|in\s+(\d{1,3})\s+days?)/iu;

const RELATIVE_OFFSETS: Record<string, number> = {
	сегодня: 0,
	today: 0,
	завтра: 1,
	tomorrow: 1,
	послезавтра: 2,
	"day after tomorrow": 2,
};

const LEADING_FILLERS = new Set([
	"пользователю",
	"пользователя",
	"сотруднику",
	"сотрудника",
	"учетку",
	"учётку",
	"для",
	"user",
	"for",
	"account",
]);
const TRAILING_FILLERS = new Set(["с", "со", "в", "на", "до", "from", "on", "at", "by"]);

export type DateMention = {
	date: CalendarDate;
	/** Exact matched text, so callers can cut it out of the query. */
	text: string;
};

function parseYear(raw: string): number | null {
	const value = Number.parseInt(raw, 10);
	if (raw.length === 2) {
		return 2000 + value;
	}
	if (raw.length === 4) {
		return value;
	}
	return null;
}

/** First date mention in `text`: numeric, then named month, then relative words. */
export function extractDate(text: string, today: CalendarDate): DateMention | null {
	const numeric = NUMERIC_DATE.exec(text);
	if (numeric) {
		const year = parseYear(numeric[3] ?? "");
		const date = {
			year: year ?? 0,
			month: Number.parseInt(numeric[2] ?? "", 10),
			day: Number.parseInt(numeric[1] ?? "", 10),
		};
		if (year != null && isValidCalendarDate(date)) {
			return { date, text: numeric[0] };
		}
	}

	const named = NAMED_MONTH_DATE.exec(text);
	if (named) {
		const month = MONTHS[(named[2] ?? "").toLowerCase()];
		const date = {
			year: named[3] ? Number.parseInt(named[3], 10) : today.year,
			month: month ?? 0,
			day: Number.parseInt(named[1] ?? "", 10),
		};
		if (month != null && isValidCalendarDate(date)) {
			return { date, text: named[0] };
		}
	}

	const days = RELATIVE_DAYS.exec(text);
	if (days) {
		const count = Number.parseInt(days[1] ?? days[2] ?? "0", 10);
		return { date: addCalendarDays(today, count), text: days[0] };
	}

	const word = RELATIVE_WORD.exec(text);
	if (word) {
		const offset = RELATIVE_OFFSETS[(word[1] ?? "").toLowerCase()] ?? 0;
		return { date: addCalendarDays(today, offset), text: word[0] };
	}

	return null;
}

function cleanQuery(raw: string, dateText: string | null): string | null {
	let text = raw;
	if (dateText) {
		text = text.replace(dateText, " ");
	}
	const words = text
		.replace(/[«»"',;:!?()]/gu, " ")
		.split(/\s+/u)
		.filter((word) => word.length > 0);
	while (words.length > 0 && LEADING_FILLERS.has((words[0] ?? "").toLowerCase())) {
		words.shift();
	}
	while (words.length > 0 && TRAILING_FILLERS.has((words[words.length - 1] ?? "").toLowerCase())) {
		words.pop();
	}
	const query = words.join(" ").replace(/\.+$/u, "").trim();
	return query.length > 0 ? query : null;
}

function matchIntent(text: string): { intent: IntentKind; rest: string } | null {
	const groups: Array<[IntentKind, RegExp[]]> = [
		["reset_password", RESET_PASSWORD_PATTERNS],
		["disable_account", DISABLE_ACCOUNT_PATTERNS],
	];
	for (const [intent, patterns] of groups) {
		for (const pattern of patterns) {
			const match = pattern.exec(text);
			if (match) {
				return { intent, rest: text.slice(match.index + match[0].length) };
			}
		}
	}
	return null;
}

/** Keyword rules for Russian and English operator phrasing. */
export class RuleIntentClassifier implements IntentClassifier {
	public classify(text: string, opts: ClassifyOpts): ClassifiedRequest {
		const mention = extractDate(text, opts.today);
		const matched = matchIntent(text);
		if (!matched) {
			return { intent: null, query: null, date: mention?.date ?? null };
		}
		return {
			intent: matched.intent,
			query: cleanQuery(matched.rest, mention?.text ?? null),
			date: mention?.date ?? null,
		};
	}
}
