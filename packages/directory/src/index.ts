export type { ActionExecutor, PerformedAction } from "./action_executor.js";
export { NoopActionExecutor, PowerShellActionExecutor } from "./action_executor.js";
export type { FieldMatch, MatchTier } from "./fuzzy.js";
export {
	levenshtein,
	normalizeForMatch,
	partialSimilarity,
	scoreField,
	similarity,
	tokenSortSimilarity,
	weightedSimilarity,
} from "./fuzzy.js";
export type { ActionResult, DirectoryAction, DirectoryActionKind, Identity } from "./models.js";
export { HANDLE_PATTERN, IdentitySchema, identityLabel, isValidHandle } from "./models.js";
export type { RandomIndex } from "./password.js";
export { DEFAULT_PASSWORD_LENGTH, generatePassword, PASSWORD_SPECIALS } from "./password.js";
export type { PowerShellRunnerOpts, ScriptResult, ScriptRunner } from "./powershell.js";
export {
	buildDisableScript,
	buildResetPasswordScript,
	buildSearchScript,
	createPowerShellRunner,
	escapePowerShellLiteral,
	MAX_SEARCH_RESULTS,
	parseSearchOutput,
	quotePowerShell,
} from "./powershell.js";
export type { IdentityResolverOpts, RankedIdentity } from "./resolver.js";
export { DEFAULT_CANDIDATE_LIMIT, IdentityResolver, rankIdentities } from "./resolver.js";
export type { IdentitySearch } from "./search.js";
export { DirectorySearchError, loadIdentityFixture, PowerShellIdentitySearch, StaticIdentitySearch } from "./search.js";
