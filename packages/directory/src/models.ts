import { z } from "zod";

/** Account handle accepted by the action layer (sAMAccountName-like). */
export const HANDLE_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;

export const IdentitySchema = z.object({
	handle: z.string().min(1),
	display_name: z.string(),
	path: z.string(),
	enabled: z.boolean(),
});
export type Identity = z.infer<typeof IdentitySchema>;

export function isValidHandle(value: string): boolean {
	return HANDLE_PATTERN.test(value);
}

export function identityLabel(identity: Identity, maxLength: number = 60): string {
	const name = identity.display_name.trim() || identity.handle;
	const label = `${name} / ${identity.handle}`;
	return label.length > maxLength ? label.slice(0, maxLength) : label;
}

export type DirectoryAction =
	| { kind: "disable_account"; handle: string }
	| { kind: "reset_password"; handle: string; password: string; mustChangeAtLogon: boolean };

export type DirectoryActionKind = DirectoryAction["kind"];

export type ActionResult = { ok: true; output: string } | { ok: false; reason: string };
