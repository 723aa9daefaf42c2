export type { AuditEntry, AuditListOpts, AuditLogOpts, AuditRecordOpts } from "./audit_log.js";
export { AuditEntrySchema, AuditLog } from "./audit_log.js";
export { PersistenceFailureError, SchedulerNotReadyError } from "./errors.js";
export type { JobExecutionOutcome, JobExecutorOpts } from "./executor.js";
export { DEFAULT_ACTION_TIMEOUT_MS, JobExecutor } from "./executor.js";
export type { JobStatus, JobType, TerminalJobStatus } from "./job_state.js";
export {
	assertValidJobTransition,
	canTransitionJob,
	InvalidJobTransitionError,
	isTerminalJobStatus,
	JobStatusSchema,
	JobTypeSchema,
	TERMINAL_JOB_STATUSES,
} from "./job_state.js";
export type {
	CreateJobDecision,
	CreateJobOpts,
	DurableJobStoreOpts,
	JobClaimDecision,
	JobLoadIssue,
	JobRecord,
	JobTransitionDecision,
} from "./job_store.js";
export { DurableJobStore, JobRecordSchema, jobRunAtMs, SYSTEM_PRINCIPAL } from "./job_store.js";
export type { JobTimerRegistryOpts, JobTimerSnapshot } from "./job_timer.js";
export { JobTimerRegistry } from "./job_timer.js";
export type { RecoveryBootstrapperOpts, RecoveryReport, RestoredJob, SkippedJob } from "./recovery.js";
export { DEFAULT_OVERDUE_DELAY_MS, RecoveryBootstrapper } from "./recovery.js";
export type { JobSchedulerOpts, ScheduleDecision, ScheduleJobOpts } from "./scheduler.js";
export { JobScheduler, OPERATOR_CANCEL_REASON } from "./scheduler.js";
