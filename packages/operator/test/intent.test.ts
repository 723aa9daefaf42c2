import { extractDate, RuleIntentClassifier } from "@dirops/operator";
import { describe, expect, test } from "vitest";

const TODAY = { year: 2025, month: 1, day: 10 };

describe("RuleIntentClassifier", () => {
	const classifier = new RuleIntentClassifier();

	test("password reset in English", () => {
		expect(classifier.classify("reset password Ivanov", { today: TODAY })).toEqual({
			intent: "reset_password",
			query: "Ivanov",
			date: null,
		});
	});

	test("deactivation with an explicit date", () => {
		expect(classifier.classify("disable account Ivanov 10.01.2025", { today: TODAY })).toEqual({
			intent: "disable_account",
			query: "Ivanov",
			date: { year: 2025, month: 1, day: 10 },
		});
	});

	test("fillers and relative dates are stripped from the query", () => {
		expect(classifier.classify("заблокируй пользователя Петров с завтра", { today: TODAY })).toEqual({
			intent: "disable_account",
			query: "Петров",
			date: { year: 2025, month: 1, day: 11 },
		});
		expect(classifier.classify("reset password for Ivanov послезавтра", { today: TODAY })).toEqual({
			intent: "reset_password",
			query: "Ivanov",
			date: { year: 2025, month: 1, day: 12 },
		});
	});

	test("a keyword without a name leaves the query empty", () => {
		expect(classifier.classify("смени пароль", { today: TODAY })).toEqual({
			intent: "reset_password",
			query: null,
			date: null,
		});
	});

	test("unrelated text has no intent", () => {
		expect(classifier.classify("hello there", { today: TODAY })).toEqual({ intent: null, query: null, date: null });
	});
});

describe("extractDate", () => {
	test("numeric dates accept two-digit years", () => {
		expect(extractDate("until 05/02/25", TODAY)).toEqual({ date: { year: 2025, month: 2, day: 5 }, text: "05/02/25" });
	});

	test("impossible numeric dates are ignored", () => {
		expect(extractDate("31.02.2025", TODAY)).toBeNull();
	});

	test("named months default to the current year", () => {
		expect(extractDate("с 5 марта", TODAY)?.date).toEqual({ year: 2025, month: 3, day: 5 });
		expect(extractDate("on 1 April 2026", TODAY)?.date).toEqual({ year: 2026, month: 4, day: 1 });
	});

	test("relative day counts cross month ends", () => {
		const endOfMonth = { year: 2025, month: 1, day: 30 };
		expect(extractDate("in 3 days", endOfMonth)?.date).toEqual({ year: 2025, month: 2, day: 2 });
		expect(extractDate("через 2 дня", endOfMonth)?.date).toEqual({ year: 2025, month: 2, day: 1 });
		expect(extractDate("today", endOfMonth)?.date).toEqual(endOfMonth);
	});
});
