import type { CalendarDate } from "@dirops/core";
import { extractDate } from "./intent.js";

/** Offboarding notice extracted from an HR mail, before identity resolution. */
export type MailOffboardingEvent = {
	name: string | null;
	handle: string | null;
	targetDate: CalendarDate | null;
	subject: string;
};

const TRIGGER = /уволен|увольнение|последний рабочий день|terminated|termination|last working day/iu;
const HANDLE_FIELD = /\bsam\s*[:=]\s*([a-z0-9_.-]+)/iu;
const NAME_FIELD = /(?:фио|сотрудник|employee|name)\s*[:=]\s*([^\n,;]+)/iu;
const CYRILLIC_NAME = /([А-ЯЁ][а-яё]+\s+[А-ЯЁ][а-яё]+)/gu;
const NOT_A_NAME = /увол|последн|рабоч|приказ|уведомл/iu;

function firstCyrillicName(text: string): string | null {
	for (const match of text.matchAll(CYRILLIC_NAME)) {
		const candidate = match[1] ?? "";
		if (!NOT_A_NAME.test(candidate)) {
			return candidate;
		}
	}
	return null;
}

/**
 * Reads an offboarding notice out of a mail's subject and body. Returns null
 * when the mail is not an offboarding notice or names nobody.
 */
export function extractOffboardingNotice(opts: {
	subject: string;
	body: string;
	today: CalendarDate;
}): MailOffboardingEvent | null {
	const text = `${opts.subject}\n${opts.body}`;
	if (!TRIGGER.test(text)) {
		return null;
	}
	const handle = HANDLE_FIELD.exec(text)?.[1]?.toLowerCase() ?? null;
	const explicitName = NAME_FIELD.exec(text)?.[1]?.trim() || null;
	const name = explicitName ?? firstCyrillicName(text);
	if (!handle && !name) {
		return null;
	}
	return {
		name,
		handle,
		targetDate: extractDate(text, opts.today)?.date ?? null,
		subject: opts.subject.trim(),
	};
}

export type MailMessage = {
	subject: string;
	body: string;
};

const HEADER_LINE = /^([A-Za-z][A-Za-z-]*):\s*(.*)$/;

/**
 * Splits a saved message into subject and body. Headers are only read when
 * the text starts with a Subject line; they end at the first blank line.
 */
export function parseMailMessage(raw: string): MailMessage {
	const lines = raw.replace(/\r\n/g, "\n").split("\n");
	if (!/^subject:/i.test(lines[0] ?? "")) {
		return { subject: "", body: raw };
	}
	let subject = "";
	let index = 0;
	for (; index < lines.length; index++) {
		const line = lines[index] ?? "";
		if (line.trim() === "") {
			index += 1;
			break;
		}
		const header = HEADER_LINE.exec(line);
		if (header && header[1]?.toLowerCase() === "subject") {
			subject = (header[2] ?? "").trim();
		}
	}
	return { subject, body: lines.slice(index).join("\n") };
}
