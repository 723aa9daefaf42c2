/** Selection payload carried by a chat button. Parsed once where the transport hands it over. */
export type CallbackPayload = { kind: "pick"; token: string; handle: string } | { kind: "cancel"; token: string };

const PICK_PAYLOAD = /^pick:([0-9a-f]{8,32}):([A-Za-z0-9._-]{1,64})$/;
const CANCEL_PAYLOAD = /^cancel:([0-9a-f]{8,32})$/;

/** Chat platforms cap callback data at 64 bytes. */
export const MAX_CALLBACK_PAYLOAD_BYTES = 64;

export function encodeCallbackPayload(payload: CallbackPayload): string {
	switch (payload.kind) {
		case "pick":
			return `pick:${payload.token}:${payload.handle}`;
		case "cancel":
			return `cancel:${payload.token}`;
	}
}

export function parseCallbackPayload(raw: unknown): CallbackPayload | null {
	if (typeof raw !== "string") {
		return null;
	}
	const trimmed = raw.trim();
	if (Buffer.byteLength(trimmed, "utf8") > MAX_CALLBACK_PAYLOAD_BYTES) {
		return null;
	}
	const pick = PICK_PAYLOAD.exec(trimmed);
	if (pick?.[1] && pick[2]) {
		return { kind: "pick", token: pick[1], handle: pick[2] };
	}
	const cancel = CANCEL_PAYLOAD.exec(trimmed);
	if (cancel?.[1]) {
		return { kind: "cancel", token: cancel[1] };
	}
	return null;
}
