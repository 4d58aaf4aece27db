export * from "./errors.js";
export { StructuredLogger, type LogEntry, type LoggerOptions } from "./logger.js";
export { loadSupervisorConfig, type SupervisorConfig } from "./config/supervisorConfig.js";
export {
  withLock,
  readLockMetadata,
  resolveLockFile,
  LOCK_TIMEOUT_EXIT_CODE,
  type LockOutcome,
  type WithLockOptions,
} from "./locks/repositoryLock.js";
export { HostResourceProbe, type ResourceProbe, type WorkerRole } from "./probe/resourceProbe.js";
export { PsProcessTable, type ProcessSnapshot, type ProcessTable } from "./probe/processTable.js";
export { ProtectedModeFlag, type ProtectedModeEvaluation, type ProtectedModeState } from "./coordination/protectedModeFlag.js";
export {
  AdmissionController,
  type AdmissionDecision,
  type AdmissionLimits,
  type DenialReason,
} from "./admission/admissionController.js";
export { computeBackoffDelay, requestAdmissionWithBackoff, type BackoffPolicy } from "./admission/backoff.js";
export { Watchdog, type SweepReport, type WatchdogLimits } from "./watchdog/watchdog.js";
export { FileActionLog, type WatchdogAction } from "./watchdog/actionLog.js";
export { TaskRegistry, type TaskSnapshot, type TaskStatus } from "./tasks/taskRegistry.js";
export { TaskArchive, type ArchivedTask } from "./tasks/taskArchive.js";
export { CommandTaskRunner, type ExitInfo, type TaskRunner, type WorkerHandle } from "./tasks/taskRunner.js";
export { LogNotifier, WebhookNotifier, type Notifier } from "./notify/notifier.js";
export { HttpHealthProbe, SystemdServiceController } from "./health/siblingService.js";
export { AgentSupervisor, type SubmitRequest, type TaskView } from "./supervisor/agentSupervisor.js";
export { createSupervisorRuntime, type SupervisorRuntime } from "./supervisor/runtime.js";
export { createSupervisorServer } from "./server.js";
