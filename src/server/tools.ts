import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import type { ProtectedModeFlag } from "../coordination/protectedModeFlag.js";
import type { StructuredLogger } from "../logger.js";
import type { AgentSupervisor } from "../supervisor/agentSupervisor.js";
import { TASK_ID_PATTERN } from "../tasks/taskArchive.js";
import type { ActionLogEntry } from "../watchdog/actionLog.js";
import type { Watchdog } from "../watchdog/watchdog.js";
import { toolError } from "./toolErrors.js";

/** Collaborators the tool handlers operate on. */
export interface SupervisorToolContext {
  readonly supervisor: AgentSupervisor;
  readonly watchdog: Watchdog;
  readonly flag: ProtectedModeFlag;
  readonly actionLog: { readRecent(limit: number): Promise<ActionLogEntry[]> };
  readonly logger: StructuredLogger;
}

/** Watchdog actions echoed by `supervisor_status`. */
const RECENT_ACTIONS = 10;

const TaskIdSchema = z.string().regex(TASK_ID_PATTERN, "letters, digits, '-' or '_' (max 64)");

export const AgentSubmitInputShape = {
  prompt: z.string().min(1).max(100_000),
  working_directory: z.string().min(1).optional(),
  id: TaskIdSchema.optional(),
  primary: z.boolean().optional(),
} as const;
export const AgentSubmitInputSchema = z.object(AgentSubmitInputShape).strict();

export const TaskReferenceInputShape = {
  task_id: TaskIdSchema,
} as const;
export const TaskReferenceInputSchema = z.object(TaskReferenceInputShape).strict();

export const EmptyInputShape = {} as const;

function ok(tool: string, result: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ tool, result }, null, 2) }],
    structuredContent: result,
  };
}

/** Registers the supervisor tools on {@link server}. */
export function registerSupervisorTools(server: McpServer, context: SupervisorToolContext): void {
  const { supervisor, watchdog, flag, actionLog, logger } = context;

  server.registerTool(
    "agent_submit",
    {
      title: "Submit agent task",
      description:
        "Queues a prompt for an agent worker and returns immediately with the task id. The worker starts once admission (concurrency ceiling and free memory) allows it.",
      inputSchema: AgentSubmitInputShape,
    },
    async (input: unknown) => {
      try {
        const parsed = AgentSubmitInputSchema.parse(input);
        const snapshot = supervisor.submit({
          prompt: parsed.prompt,
          ...(parsed.working_directory !== undefined ? { workingDirectory: parsed.working_directory } : {}),
          ...(parsed.id !== undefined ? { id: parsed.id } : {}),
          ...(parsed.primary !== undefined ? { primary: parsed.primary } : {}),
        });
        return ok("agent_submit", { task_id: snapshot.id, status: snapshot.status });
      } catch (error) {
        return toolError(logger, "agent_submit", error);
      }
    },
  );

  server.registerTool(
    "agent_status",
    {
      title: "Agent task status",
      description: "Returns the status of a task, including its output tail once finished.",
      inputSchema: TaskReferenceInputShape,
    },
    async (input: unknown) => {
      try {
        const parsed = TaskReferenceInputSchema.parse(input);
        const view = await supervisor.status(parsed.task_id);
        return ok("agent_status", { task: view });
      } catch (error) {
        return toolError(logger, "agent_status", error);
      }
    },
  );

  server.registerTool(
    "agent_acknowledge",
    {
      title: "Acknowledge agent task",
      description: "Removes a finished task from the registry. Its result stays available through agent_status.",
      inputSchema: TaskReferenceInputShape,
    },
    async (input: unknown) => {
      try {
        const parsed = TaskReferenceInputSchema.parse(input);
        const view = supervisor.acknowledge(parsed.task_id);
        return ok("agent_acknowledge", { task: view });
      } catch (error) {
        return toolError(logger, "agent_acknowledge", error);
      }
    },
  );

  server.registerTool(
    "agent_cancel",
    {
      title: "Cancel agent task",
      description: "Cancels a queued task immediately or sends SIGTERM to a running worker.",
      inputSchema: TaskReferenceInputShape,
    },
    async (input: unknown) => {
      try {
        const parsed = TaskReferenceInputSchema.parse(input);
        const view = supervisor.cancel(parsed.task_id);
        return ok("agent_cancel", { task: view });
      } catch (error) {
        return toolError(logger, "agent_cancel", error);
      }
    },
  );

  server.registerTool(
    "supervisor_status",
    {
      title: "Supervisor status",
      description:
        "Task counters, admission limits, host samples, protected-mode state and the latest watchdog actions.",
      inputSchema: EmptyInputShape,
    },
    async () => {
      try {
        const [queue, protectedMode, recentActions] = await Promise.all([
          supervisor.queueStatus(),
          flag.inspect(),
          actionLog.readRecent(RECENT_ACTIONS),
        ]);
        return ok("supervisor_status", {
          tasks: { ...queue.tasks },
          limits: { ...queue.limits },
          host_workers: queue.hostWorkers,
          free_memory_gb: queue.freeMemoryGB,
          protected_mode: { ...protectedMode },
          watchdog_sweeping: watchdog.sweeping,
          recent_actions: recentActions,
        });
      } catch (error) {
        return toolError(logger, "supervisor_status", error);
      }
    },
  );

  server.registerTool(
    "watchdog_sweep",
    {
      title: "Run watchdog sweep",
      description: "Runs one watchdog sweep now (or joins the one in progress) and returns the per-check report.",
      inputSchema: EmptyInputShape,
    },
    async () => {
      try {
        const report = await watchdog.sweep();
        return ok("watchdog_sweep", { report: { ...report } });
      } catch (error) {
        return toolError(logger, "watchdog_sweep", error);
      }
    },
  );
}
