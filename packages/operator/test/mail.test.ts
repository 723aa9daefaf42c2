import { extractOffboardingNotice, parseMailMessage } from "@dirops/operator";
import { describe, expect, test } from "vitest";

const TODAY = { year: 2025, month: 1, day: 5 };

describe("extractOffboardingNotice", () => {
	test("reads the name field and the last working day", () => {
		const notice = extractOffboardingNotice({
			subject: " Увольнение сотрудника ",
			body: "ФИО: Петров Пётр\nПоследний рабочий день 10.01.2025",
			today: TODAY,
		});

		expect(notice).toEqual({
			name: "Петров Пётр",
			handle: null,
			targetDate: { year: 2025, month: 1, day: 10 },
			subject: "Увольнение сотрудника",
		});
	});

	test("reads an explicit account handle", () => {
		const notice = extractOffboardingNotice({
			subject: "Termination notice",
			body: "Employee: John Smith, sam: JSmith, last working day 15.01.2025",
			today: TODAY,
		});

		expect(notice).toEqual({
			name: "John Smith",
			handle: "jsmith",
			targetDate: { year: 2025, month: 1, day: 15 },
			subject: "Termination notice",
		});
	});

	test("falls back to the first capitalised name pair", () => {
		const notice = extractOffboardingNotice({
			subject: "Уведомление",
			body: "Уволен Сидоров Иван с 12.01.2025",
			today: TODAY,
		});

		expect(notice?.name).toBe("Сидоров Иван");
		expect(notice?.targetDate).toEqual({ year: 2025, month: 1, day: 12 });
	});

	test("ignores mails that are not offboarding notices", () => {
		expect(extractOffboardingNotice({ subject: "Lunch menu", body: "Soup of the day", today: TODAY })).toBeNull();
	});

	test("ignores notices that name nobody", () => {
		expect(extractOffboardingNotice({ subject: "termination", body: "see attachment", today: TODAY })).toBeNull();
	});
});

describe("parseMailMessage", () => {
	test("reads the subject from the header block", () => {
		expect(parseMailMessage("Subject: Termination\r\nFrom: hr@example.test\r\n\r\nEmployee: Ivanova\r\nThanks")).toEqual({
			subject: "Termination",
			body: "Employee: Ivanova\nThanks",
		});
	});

	test("text without a leading subject line is all body", () => {
		expect(parseMailMessage("Employee: Ivanova\n")).toEqual({ subject: "", body: "Employee: Ivanova\n" });
	});
});
