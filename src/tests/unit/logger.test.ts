import assert from "node:assert/strict";
import http from "node:http";
import { test } from "node:test";
import { createLogger, formatLogBatch, logContext, redactMeta } from "../../config/logger";

function wait(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

test("writes one JSON line per entry at or above the minimum level", () => {
  const lines: string[] = [];
  const logger = createLogger({ minLevel: "info", write: (line) => lines.push(line) });

  logger.debug("hidden");
  logger.info("Resume parsed", { segment_count: 3 });

  assert.equal(lines.length, 1);
  assert.equal(lines[0].endsWith("\n"), true);
  const payload: unknown = JSON.parse(lines[0]);
  assert.ok(typeof payload === "object" && payload !== null);
  assert.equal(Reflect.get(payload, "level"), "info");
  assert.equal(Reflect.get(payload, "message"), "Resume parsed");
  assert.deepEqual(Reflect.get(payload, "meta"), { segment_count: 3 });
});

test("logContext merges context and extra fields", () => {
  const lines: string[] = [];
  const logger = createLogger({ write: (line) => lines.push(line) });

  logContext(logger, "warn", "Resume segment not recognized", { header: "Hobbies", order_index: 4 }, { lines: 2 });

  const payload: unknown = JSON.parse(lines[0]);
  assert.ok(typeof payload === "object" && payload !== null);
  assert.equal(Reflect.get(payload, "level"), "warn");
  assert.deepEqual(Reflect.get(payload, "meta"), { header: "Hobbies", order_index: 4, lines: 2 });
});

test("webhook sink batches warnings and redacts secrets", async () => {
  const sent: Array<{ url: string; text: string }> = [];
  const logger = createLogger({
    minLevel: "error",
    write: () => undefined,
    webhook: {
      enabled: true,
      url: "http://logs.internal.test/hook",
      minLevel: "warn",
      ratePerMinute: 5,
      batchMs: 250,
      send: async (url, text) => {
        sent.push({ url, text });
      },
    },
  });

  logger.info("not forwarded");
  logger.warn("Resume segment not recognized", { header: "HOBBIES", api_token: "test-secret" });
  await wait(400);

  assert.equal(sent.length, 1);
  assert.equal(sent[0].url, "http://logs.internal.test/hook");
  const lines = sent[0].text.split("\n");
  assert.equal(lines[0].startsWith("[WARN] "), true);
  assert.equal(lines[1], "Resume segment not recognized");
  assert.equal(lines[2], 'meta: {"header":"HOBBIES","api_token":"[REDACTED]"}');
  assert.equal(lines.length, 3);
});

test("failed webhook deliveries never throw and are reported in the next batch", async () => {
  const sent: string[] = [];
  let calls = 0;
  const logger = createLogger({
    write: () => undefined,
    webhook: {
      enabled: true,
      url: "http://logs.internal.test/hook",
      minLevel: "error",
      ratePerMinute: 10,
      batchMs: 250,
      send: async (_url, text) => {
        calls += 1;
        if (calls === 1) {
          throw new Error("unreachable");
        }
        sent.push(text);
      },
    },
  });

  logger.error("first");
  await wait(400);
  logger.error("second");
  await wait(400);

  assert.equal(calls, 2);
  assert.equal(sent.length, 1);
  assert.equal(sent[0].split("\n")[0], "(1 earlier batch(es) failed to deliver)");
});

test("long meta values are truncated", () => {
  const redacted = redactMeta({ text: "x".repeat(600), authorization: "Bearer test-secret" });

  assert.equal(redacted.text, `${"x".repeat(500)}...`);
  assert.equal(redacted.authorization, "[REDACTED]");
  assert.equal(
    formatLogBatch([{ level: "error", message: "boom", timestamp: "2024-01-01T00:00:00.000Z" }]),
    "[ERROR] 2024-01-01T00:00:00.000Z\nboom",
  );
});

test("default sender posts JSON batches and counts error replies as failures", async () => {
  const received: Array<{ contentType?: string; body: string }> = [];
  const server = http.createServer((request, response) => {
    let body = "";
    request.setEncoding("utf8");
    request.on("data", (chunk: string) => {
      body += chunk;
    });
    request.on("end", () => {
      received.push({ contentType: request.headers["content-type"], body });
      response.statusCode = received.length === 1 ? 500 : 200;
      response.setHeader("connection", "close");
      response.end();
    });
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  assert.ok(address !== null && typeof address === "object");

  const logger = createLogger({
    write: () => undefined,
    webhook: {
      enabled: true,
      url: `http://127.0.0.1:${address.port}/hook`,
      minLevel: "error",
      ratePerMinute: 10,
      batchMs: 250,
    },
  });

  try {
    logger.error("first");
    await wait(600);
    logger.error("second");
    await wait(600);
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  assert.equal(received.length, 2);
  assert.equal(received[0].contentType, "application/json");
  const texts = received.map((request) => {
    const payload: unknown = JSON.parse(request.body);
    assert.ok(typeof payload === "object" && payload !== null);
    return String(Reflect.get(payload, "text"));
  });
  assert.equal(texts[0].split("\n")[1], "first");
  const retried = texts[1].split("\n");
  assert.equal(retried[0], "(1 earlier batch(es) failed to deliver)");
  assert.equal(retried[1], "");
  assert.equal(retried[2].startsWith("[ERROR] "), true);
  assert.equal(retried[3], "second");
});
