import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import process from "node:process";

import { registerSupervisorTools } from "./server/tools.js";
import type { SupervisorRuntime } from "./supervisor/runtime.js";

// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

export const SERVER_NAME = "agent-supervisor";
export const SERVER_VERSION = "0.1.0";

/** Builds an MCP server exposing the supervisor tools of {@link runtime}. */
export function createSupervisorServer(runtime: SupervisorRuntime): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  registerSupervisorTools(server, {
    supervisor: runtime.supervisor,
    watchdog: runtime.watchdog,
    flag: runtime.flag,
    actionLog: runtime.actionLog,
    logger: runtime.logger,
  });
  return server;
}

export interface ServeOptions {
  /** Starts the periodic watchdog alongside the tools. */
  readonly watchdog: boolean;
}

/**
 * Serves the supervisor over stdio until SIGINT/SIGTERM. Queued tasks are
 * cancelled on shutdown; running workers are left to finish.
 */
export async function serve(runtime: SupervisorRuntime, options: ServeOptions): Promise<void> {
  const { logger } = runtime;
  const server = createSupervisorServer(runtime);

  if (options.watchdog) {
    runtime.watchdog.start(runtime.config.watchdog.sweepIntervalMs);
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("stdio_listening", { watchdog: options.watchdog });

  await new Promise<void>((resolve) => {
    const shutdown = (signal: NodeJS.Signals): void => {
      logger.warn("shutdown_signal", { signal });
      resolve();
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });

  await runtime.watchdog.stop();
  await runtime.supervisor.shutdown();
  try {
    await server.close();
  } catch (error) {
    logger.error("transport_close_failed", { message: error instanceof Error ? error.message : String(error) });
  }
  await runtime.notifier.flush();
  await logger.flush();
}
