import { AdmissionController } from "../admission/admissionController.js";
import type { SupervisorConfig } from "../config/supervisorConfig.js";
import { ProtectedModeFlag } from "../coordination/protectedModeFlag.js";
import { createChildProcessGateway, type ChildProcessGateway } from "../gateways/childProcess.js";
import { HttpHealthProbe, SystemdServiceController } from "../health/siblingService.js";
import type { StructuredLogger } from "../logger.js";
import { LogNotifier, WebhookNotifier, type Notifier } from "../notify/notifier.js";
import { PsProcessTable } from "../probe/processTable.js";
import { HostResourceProbe, type ResourceProbe, type WorkerRole } from "../probe/resourceProbe.js";
import { TaskArchive } from "../tasks/taskArchive.js";
import { TaskRegistry } from "../tasks/taskRegistry.js";
import { CommandTaskRunner, type TaskRunner } from "../tasks/taskRunner.js";
import { FileActionLog } from "../watchdog/actionLog.js";
import { Watchdog, type SiblingService } from "../watchdog/watchdog.js";
import { AgentSupervisor } from "./agentSupervisor.js";

/** Every long-lived component of a supervisor process. */
export interface SupervisorRuntime {
  readonly config: SupervisorConfig;
  readonly logger: StructuredLogger;
  readonly role: WorkerRole;
  readonly probe: ResourceProbe;
  readonly flag: ProtectedModeFlag;
  readonly registry: TaskRegistry;
  readonly supervisor: AgentSupervisor;
  readonly watchdog: Watchdog;
  readonly actionLog: FileActionLog;
  readonly notifier: Notifier;
}

/** Collaborators replaced in tests; production defaults are derived from the config. */
export interface SupervisorRuntimeOverrides {
  readonly gateway?: ChildProcessGateway;
  readonly probe?: ResourceProbe;
  readonly runner?: TaskRunner;
  readonly notifier?: Notifier;
  readonly sibling?: SiblingService | null;
  readonly fetchImpl?: typeof fetch;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  readonly sendSignal?: (pid: number, signal: "SIGTERM" | "SIGKILL") => void;
}

/** Wires the supervisor components described by {@link config}. */
export function createSupervisorRuntime(
  config: SupervisorConfig,
  logger: StructuredLogger,
  overrides: SupervisorRuntimeOverrides = {},
): SupervisorRuntime {
  const gateway = overrides.gateway ?? createChildProcessGateway();
  const role: WorkerRole = {
    name: config.worker.roleName,
    commandPattern: config.worker.pattern,
    ...(config.worker.user !== null ? { user: config.worker.user } : {}),
  };
  const probe = overrides.probe ?? new HostResourceProbe({ processTable: new PsProcessTable(gateway) });
  const flag = new ProtectedModeFlag({ path: config.flag.path, staleAfterMs: config.flag.staleAfterMs, logger });
  const registry = new TaskRegistry();
  const configuredPrimaries = [...config.primaryPids];

  const notifier =
    overrides.notifier ??
    (config.notifyWebhookUrl !== null
      ? new WebhookNotifier({
          url: config.notifyWebhookUrl,
          logger,
          ...(overrides.fetchImpl !== undefined ? { fetchImpl: overrides.fetchImpl } : {}),
        })
      : new LogNotifier(logger));

  const runner =
    overrides.runner ??
    new CommandTaskRunner({
      command: config.agent.command,
      args: config.agent.args,
      allowedEnvKeys: config.agent.envKeys,
      gateway,
      logger,
      ...(config.agent.timeoutMs !== null ? { timeoutMs: config.agent.timeoutMs } : {}),
    });

  const supervisor = new AgentSupervisor({
    role,
    admission: new AdmissionController({ probe, logger }),
    probe,
    registry,
    runner,
    notifier,
    logger,
    limits: { maxConcurrent: config.admission.maxConcurrent, minFreeGb: config.admission.minFreeGb },
    backoff: {
      initialDelayMs: config.admission.backoffInitialMs,
      factor: 2,
      maxDelayMs: config.admission.backoffMaxMs,
    },
    archive: new TaskArchive(config.tasks.directory),
    ...(overrides.sleep !== undefined ? { sleep: overrides.sleep } : {}),
  });

  const sibling =
    overrides.sibling !== undefined
      ? overrides.sibling
      : config.health.serviceName !== null
        ? {
            probe: new HttpHealthProbe({
              url: config.health.url,
              timeoutMs: config.health.timeoutMs,
              ...(overrides.fetchImpl !== undefined ? { fetchImpl: overrides.fetchImpl } : {}),
            }),
            controller: new SystemdServiceController({ serviceName: config.health.serviceName, gateway, logger }),
          }
        : null;

  const sleep = overrides.sleep;
  const actionLog = new FileActionLog(config.watchdog.actionLogPath);
  const watchdog = new Watchdog({
    limits: {
      workerRole: role,
      maxWorkers: config.watchdog.maxWorkers,
      sessionDirectory: config.watchdog.sessionDirectory,
      sessionPattern: config.watchdog.sessionPattern,
      maxSessionFiles: config.watchdog.maxSessionFiles,
      buildPattern: config.watchdog.buildPattern,
      buildMaxSeconds: config.watchdog.buildMaxSeconds,
      buildProtectedMaxSeconds: config.watchdog.buildProtectedMaxSeconds,
      zombiePattern: config.watchdog.zombiePattern,
      criticalMemoryGb: config.watchdog.criticalMemoryGb,
      healthRecheckMs: config.health.recheckMs,
    },
    probe,
    flag,
    actionLog,
    logger,
    primaryPids: () => [...configuredPrimaries, ...supervisor.primaryPids()],
    sibling,
    ...(overrides.sendSignal !== undefined ? { sendSignal: overrides.sendSignal } : {}),
    ...(sleep !== undefined ? { sleep: (ms: number) => sleep(ms) } : {}),
  });

  return { config, logger, role, probe, flag, registry, supervisor, watchdog, actionLog, notifier };
}
