import { randomBytes } from "node:crypto";

function hexByte(n: number): string {
	return n.toString(16).padStart(2, "0");
}

export function randomHex(bytes: number): string {
	return [...randomBytes(Math.max(1, Math.trunc(bytes)))].map(hexByte).join("");
}

export function shortId(): string {
	// 8 hex chars: fits chat callback payload limits.
	return randomHex(4);
}
