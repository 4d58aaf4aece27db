import { runCommand, type ChildProcessGateway } from "../gateways/childProcess.js";
import type { StructuredLogger } from "../logger.js";
import { describeError } from "../nodePrimitives.js";

/** Liveness probe of the sibling service. */
export interface HealthProbe {
  /** True iff the endpoint answered HTTP 200 within the timeout. */
  check(): Promise<HealthCheckResult>;
}

export interface HealthCheckResult {
  readonly healthy: boolean;
  /** HTTP status, `null` when no response arrived (refused, timeout). */
  readonly status: number | null;
  readonly error?: string;
}

export interface HttpHealthProbeOptions {
  readonly url: string;
  readonly timeoutMs?: number;
  readonly fetchImpl?: typeof fetch;
}

/** GETs the health URL; only the status code is inspected. */
export class HttpHealthProbe implements HealthProbe {
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(private readonly options: HttpHealthProbeOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 5_000;
  }

  get url(): string {
    return this.options.url;
  }

  async check(): Promise<HealthCheckResult> {
    try {
      const response = await this.fetchImpl(this.options.url, {
        method: "GET",
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      // Body is irrelevant; release the socket.
      await response.body?.cancel();
      return { healthy: response.status === 200, status: response.status };
    } catch (error) {
      return { healthy: false, status: null, error: describeError(error) };
    }
  }
}

/** Controls the sibling service unit. */
export interface ServiceController {
  readonly serviceName: string;
  isActive(): Promise<boolean>;
  restart(): Promise<void>;
}

export interface SystemdServiceControllerOptions {
  readonly serviceName: string;
  readonly gateway: ChildProcessGateway;
  readonly logger?: StructuredLogger;
}

/** {@link ServiceController} driving a systemd unit through `systemctl`. */
export class SystemdServiceController implements ServiceController {
  readonly serviceName: string;

  constructor(private readonly options: SystemdServiceControllerOptions) {
    this.serviceName = options.serviceName;
  }

  async isActive(): Promise<boolean> {
    try {
      const result = await runCommand(this.options.gateway, {
        command: "systemctl",
        args: ["is-active", "--quiet", this.serviceName],
        allowedEnvKeys: ["PATH"],
        timeoutMs: 10_000,
      });
      return result.exitCode === 0;
    } catch (error) {
      // No systemd on this host: the service cannot be managed, treat it as inactive.
      this.options.logger?.debug("service_state_unavailable", {
        service: this.serviceName,
        message: describeError(error),
      });
      return false;
    }
  }

  async restart(): Promise<void> {
    const result = await runCommand(this.options.gateway, {
      command: "systemctl",
      args: ["restart", this.serviceName],
      allowedEnvKeys: ["PATH"],
      timeoutMs: 60_000,
    });
    if (result.exitCode !== 0) {
      throw new Error(
        `systemctl restart ${this.serviceName} exited with ${result.exitCode ?? result.signal}: ${result.stderr.trim()}`,
      );
    }
  }
}
