import { beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { setTimeout as delay } from "node:timers/promises";

import { LogNotifier, WebhookNotifier } from "../src/notify/notifier.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

interface RecordedRequest {
  readonly url: string;
  readonly init: RequestInit | undefined;
}

describe("notify/notifier", () => {
  let logger: RecordingLogger;

  beforeEach(() => {
    logger = new RecordingLogger();
  });

  describe("LogNotifier", () => {
    it("writes the update to the structured log", async () => {
      const notifier = new LogNotifier(logger);

      notifier.notify({ taskId: "t-1", status: "failed", text: "Task t-1 failed" });
      await notifier.flush();

      expect(logger.entries).to.deep.equal([
        {
          level: "info",
          message: "task_notification",
          payload: { task_id: "t-1", status: "failed", text: "Task t-1 failed" },
        },
      ]);
    });
  });

  describe("WebhookNotifier", () => {
    let requests: RecordedRequest[];

    beforeEach(() => {
      requests = [];
    });

    it("posts each notification as JSON, in submission order", async () => {
      const fetchImpl: typeof fetch = async (input, init) => {
        const url = String(input);
        // The first delivery is slower; order must still hold.
        if (requests.length === 0) {
          await delay(20);
        }
        requests.push({ url, init });
        return new Response(null, { status: 204 });
      };
      const notifier = new WebhookNotifier({
        url: "http://hooks.test/agents",
        logger,
        headers: { "x-hook-token": "test-secret" },
        fetchImpl,
      });

      notifier.notify({ taskId: "a", status: "completed", text: "Task a completed" });
      notifier.notify({ taskId: "b", status: "timed_out", text: "Task b timed out" });
      await notifier.flush();

      expect(requests.map((request) => request.init?.body)).to.deep.equal([
        '{"task_id":"a","status":"completed","text":"Task a completed"}',
        '{"task_id":"b","status":"timed_out","text":"Task b timed out"}',
      ]);
      expect(requests[0]?.url).to.equal("http://hooks.test/agents");
      expect(requests[0]?.init?.method).to.equal("POST");
      expect(requests[0]?.init?.headers).to.deep.equal({
        "content-type": "application/json",
        "x-hook-token": "test-secret",
      });
      expect(logger.entries).to.deep.equal([]);
    });

    it("logs rejected deliveries", async () => {
      const notifier = new WebhookNotifier({
        url: "http://hooks.test/agents",
        logger,
        fetchImpl: async () => new Response("busy", { status: 503 }),
      });

      notifier.notify({ taskId: "a", status: "completed", text: "Task a completed" });
      await notifier.flush();

      expect(logger.entries).to.deep.equal([
        { level: "warn", message: "notification_rejected", payload: { task_id: "a", http_status: 503 } },
      ]);
    });

    it("keeps delivering after a transport failure", async () => {
      let attempts = 0;
      const notifier = new WebhookNotifier({
        url: "http://hooks.test/agents",
        logger,
        fetchImpl: async () => {
          attempts += 1;
          if (attempts === 1) {
            throw new TypeError("fetch failed");
          }
          return new Response(null, { status: 200 });
        },
      });

      notifier.notify({ taskId: "a", status: "failed", text: "Task a failed" });
      notifier.notify({ taskId: "b", status: "completed", text: "Task b completed" });
      await notifier.flush();

      expect(attempts).to.equal(2);
      expect(logger.entries).to.deep.equal([
        { level: "warn", message: "notification_failed", payload: { task_id: "a", message: "fetch failed" } },
      ]);
    });
  });
});
