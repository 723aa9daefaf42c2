export type {
	AddAdminDecision,
	AdminBinding,
	AdminRosterEntry,
	AdminRosterOpts,
	OperatorRole,
	RemoveAdminDecision,
} from "./admins.js";
export { AdminAddEntrySchema, AdminRemoveEntrySchema, AdminRoster, AdminRosterEntrySchema } from "./admins.js";
export type { CallbackPayload } from "./callback_payload.js";
export { encodeCallbackPayload, MAX_CALLBACK_PAYLOAD_BYTES, parseCallbackPayload } from "./callback_payload.js";
export type { CliIO, RunOpts } from "./cli.js";
export { formatReply, run } from "./cli.js";
export type { CliArgSpec, CliRunResult } from "./cli_primitives.js";
export { CliArgs, EXIT_FAILURE, EXIT_NEEDS_OPERATOR, EXIT_OK } from "./cli_primitives.js";
export type { ConsoleCommand, OperatorConsoleOpts } from "./commands.js";
export { CONSOLE_HELP, formatJobLine, OperatorConsole, parseConsoleCommand } from "./commands.js";
export type { DirectoryMode, DiropsConfig } from "./config.js";
export {
	applyEnvOverrides,
	defaultDiropsConfig,
	getDiropsConfigPath,
	loadDiropsConfig,
	normalizeDiropsConfig,
	readDiropsConfigFile,
	writeDiropsConfigFile,
} from "./config.js";
export type { ClassifiedRequest, ClassifyOpts, DateMention, IntentClassifier, IntentKind } from "./intent.js";
export { extractDate, RuleIntentClassifier } from "./intent.js";
export type { MailMessage, MailOffboardingEvent } from "./mail.js";
export { extractOffboardingNotice, parseMailMessage } from "./mail.js";
export type { MailDecision, RequestPipelineOpts } from "./pipeline.js";
export { NOT_UNDERSTOOD_REPLY, RequestPipeline, SELECTION_EXPIRED_REPLY } from "./pipeline.js";
export type { Reply, ReplyChoice } from "./reply.js";
export { textReply } from "./reply.js";
export type { DiropsRuntimeOpts } from "./runtime.js";
export { DiropsRuntime } from "./runtime.js";
export type { PendingAction, SessionResolveDecision } from "./sessions.js";
export { DEFAULT_SESSION_TTL_MS, DisambiguationSessions } from "./sessions.js";
