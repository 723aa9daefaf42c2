export type ReplyChoice = {
	label: string;
	/** Encoded callback payload, see `encodeCallbackPayload`. */
	payload: string;
};

/** Transport-neutral answer to an operator message. */
export type Reply = {
	text: string;
	choices: ReplyChoice[];
};

export function textReply(text: string): Reply {
	return { text, choices: [] };
}
