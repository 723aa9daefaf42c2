import { randomInt } from "node:crypto";

export const PASSWORD_SPECIALS = "!@#$%^&*";
const UPPER = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const LOWER = "abcdefghijklmnopqrstuvwxyz";
const DIGITS = "0123456789";
const POOL = `${UPPER}${LOWER}${DIGITS}${PASSWORD_SPECIALS}`;

export const DEFAULT_PASSWORD_LENGTH = 12;
const MIN_PASSWORD_LENGTH = 9;

/** Uniform integer in [0, maxExclusive). */
export type RandomIndex = (maxExclusive: number) => number;

function pick(chars: string, random: RandomIndex): string {
	return chars.charAt(random(chars.length));
}

/**
 * One character from each class, the rest from the whole pool, then shuffled.
 * Lengths below 9 fall back to the default of 12.
 */
export function generatePassword(length: number = DEFAULT_PASSWORD_LENGTH, random: RandomIndex = randomInt): string {
	const size = Number.isInteger(length) && length >= MIN_PASSWORD_LENGTH ? length : DEFAULT_PASSWORD_LENGTH;
	const chars = [pick(UPPER, random), pick(LOWER, random), pick(DIGITS, random), pick(PASSWORD_SPECIALS, random)];
	while (chars.length < size) {
		chars.push(pick(POOL, random));
	}
	for (let i = chars.length - 1; i > 0; i -= 1) {
		const j = random(i + 1);
		const a = chars[i] ?? "";
		chars[i] = chars[j] ?? a;
		chars[j] = a;
	}
	return chars.join("");
}
