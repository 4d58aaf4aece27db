import type { StructuredLogger } from "../logger.js";
import { describeError } from "../nodePrimitives.js";
import type { TaskStatus } from "../tasks/taskRegistry.js";

/** Human readable status update about one task. */
export interface Notification {
  readonly taskId: string;
  readonly status: TaskStatus;
  readonly text: string;
}

/**
 * Best-effort delivery channel. `notify` never throws and never blocks the
 * caller; delivery failures are logged by the implementation.
 */
export interface Notifier {
  notify(notification: Notification): void;
  /** Resolves once every notification handed over so far was attempted. */
  flush(): Promise<void>;
}

/** Notifier writing updates to the structured log only. */
export class LogNotifier implements Notifier {
  constructor(private readonly logger: StructuredLogger) {}

  notify(notification: Notification): void {
    this.logger.info("task_notification", {
      task_id: notification.taskId,
      status: notification.status,
      text: notification.text,
    });
  }

  async flush(): Promise<void> {
    // Nothing is buffered.
  }
}

export interface WebhookNotifierOptions {
  readonly url: string;
  readonly logger: StructuredLogger;
  readonly timeoutMs?: number;
  readonly headers?: Record<string, string>;
  readonly fetchImpl?: typeof fetch;
}

/**
 * Posts each notification as JSON to a webhook. Deliveries are chained so
 * they reach the endpoint in submission order.
 */
export class WebhookNotifier implements Notifier {
  private queue: Promise<void> = Promise.resolve();
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(private readonly options: WebhookNotifierOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  notify(notification: Notification): void {
    this.queue = this.queue.then(() => this.deliver(notification));
  }

  flush(): Promise<void> {
    return this.queue;
  }

  private async deliver(notification: Notification): Promise<void> {
    try {
      const response = await this.fetchImpl(this.options.url, {
        method: "POST",
        headers: { "content-type": "application/json", ...this.options.headers },
        body: JSON.stringify({
          task_id: notification.taskId,
          status: notification.status,
          text: notification.text,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        this.options.logger.warn("notification_rejected", {
          task_id: notification.taskId,
          http_status: response.status,
        });
      }
    } catch (error) {
      this.options.logger.warn("notification_failed", {
        task_id: notification.taskId,
        message: describeError(error),
      });
    }
  }
}
