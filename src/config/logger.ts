import fetch from "node-fetch";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export type WebhookSender = (url: string, text: string) => Promise<void>;

export interface CreateLoggerOptions {
  minLevel?: LogLevel;
  write?: (line: string) => void;
  webhook?: {
    enabled: boolean;
    url?: string;
    minLevel: LogLevel;
    ratePerMinute: number;
    batchMs: number;
    send?: WebhookSender;
  };
}

export interface LoggerContext {
  document?: string;
  document_type?: string;
  chars?: number;
  segment_count?: number;
  unrecognized_count?: number;
  header?: string;
  order_index?: number;
  latency_ms?: number;
  ok?: boolean;
  error_code?: string;
}

export interface SinkEntry {
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
  timestamp: string;
}

export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export function createLogger(options?: CreateLoggerOptions): Logger {
  const minLevel = options?.minLevel ?? "debug";
  const write = options?.write ?? ((line: string) => process.stdout.write(line));
  const sink = buildWebhookLogSink(options?.webhook);

  const log = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    const timestamp = new Date().toISOString();
    if (isAtLeast(level, minLevel)) {
      const payload: Record<string, unknown> = {
        timestamp,
        level,
        message,
      };
      if (meta) {
        payload.meta = meta;
      }
      write(`${safeJson(payload)}\n`);
    }
    sink?.enqueue({ level, message, meta, timestamp });
  };

  return {
    debug(message, meta) {
      log("debug", message, meta);
    },
    info(message, meta) {
      log("info", message, meta);
    },
    warn(message, meta) {
      log("warn", message, meta);
    },
    error(message, meta) {
      log("error", message, meta);
    },
  };
}

export function logContext(
  logger: Logger,
  level: LogLevel,
  message: string,
  context: LoggerContext,
  fields?: Record<string, unknown>,
): void {
  const meta: Record<string, unknown> = {
    ...context,
    ...(fields ?? {}),
  };

  if (level === "debug") {
    logger.debug(message, meta);
    return;
  }
  if (level === "warn") {
    logger.warn(message, meta);
    return;
  }
  if (level === "error") {
    logger.error(message, meta);
    return;
  }
  logger.info(message, meta);
}

class WebhookLogSink {
  private readonly queue: SinkEntry[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private windowStartMs = Date.now();
  private sentInWindow = 0;
  private failedDeliveries = 0;

  constructor(
    private readonly url: string,
    private readonly minLevel: LogLevel,
    private readonly ratePerMinute: number,
    private readonly batchMs: number,
    private readonly send: WebhookSender,
  ) {}

  enqueue(entry: SinkEntry): void {
    if (!isAtLeast(entry.level, this.minLevel)) {
      return;
    }
    this.queue.push(entry);
    this.scheduleFlush();
  }

  private scheduleFlush(): void {
    if (this.flushTimer) {
      return;
    }
    this.flushTimer = setTimeout(() => {
      void this.flush();
    }, this.batchMs);
    this.flushTimer.unref();
  }

  private async flush(): Promise<void> {
    this.flushTimer = null;
    if (!this.queue.length) {
      return;
    }
    if (!this.tryConsumeRateWindow()) {
      this.scheduleFlush();
      return;
    }

    const batch = this.queue.splice(0, 5);
    const text = formatLogBatch(batch, this.failedDeliveries);
    try {
      await this.send(this.url, text);
      this.failedDeliveries = 0;
    } catch {
      // Delivery failures are reported in the next batch header, never thrown.
      this.failedDeliveries += 1;
    } finally {
      if (this.queue.length) {
        this.scheduleFlush();
      }
    }
  }

  private tryConsumeRateWindow(): boolean {
    const now = Date.now();
    if (now - this.windowStartMs >= 60_000) {
      this.windowStartMs = now;
      this.sentInWindow = 0;
    }
    if (this.sentInWindow >= this.ratePerMinute) {
      return false;
    }
    this.sentInWindow += 1;
    return true;
  }
}

function buildWebhookLogSink(config: CreateLoggerOptions["webhook"] | undefined): WebhookLogSink | undefined {
  if (!config?.enabled) {
    return undefined;
  }
  const url = config.url?.trim();
  if (!url) {
    return undefined;
  }
  return new WebhookLogSink(
    url,
    config.minLevel,
    Math.max(1, Math.floor(config.ratePerMinute)),
    Math.max(250, Math.floor(config.batchMs)),
    config.send ?? postToWebhook,
  );
}

function isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
}

export function formatLogBatch(entries: ReadonlyArray<SinkEntry>, failedDeliveries = 0): string {
  const blocks = entries.map((entry) => {
    const redactedMeta = entry.meta ? redactMeta(entry.meta) : undefined;
    const metaText = redactedMeta ? `\nmeta: ${safeJson(redactedMeta)}` : "";
    return `[${entry.level.toUpperCase()}] ${entry.timestamp}\n${entry.message}${metaText}`;
  });
  const header = failedDeliveries > 0 ? `(${failedDeliveries} earlier batch(es) failed to deliver)\n\n` : "";
  return truncateMessage(`${header}${blocks.join("\n\n---\n\n")}`, 3800);
}

export function redactMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    const lowerKey = key.toLowerCase();
    if (
      lowerKey.includes("token") ||
      lowerKey.includes("secret") ||
      lowerKey.includes("apikey") ||
      lowerKey.includes("api_key") ||
      lowerKey.includes("authorization")
    ) {
      output[key] = "[REDACTED]";
      continue;
    }
    if (typeof value === "string" && value.length > 500) {
      output[key] = `${value.slice(0, 500)}...`;
      continue;
    }
    output[key] = value;
  }
  return output;
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return "\"[unserializable]\"";
  }
}

function truncateMessage(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars - 3)}...`;
}

async function postToWebhook(url: string, text: string): Promise<void> {
  const response = await fetch(url, {
    method: "POST",
    headers: {
      "content-type": "application/json",
    },
    body: JSON.stringify({ text }),
  });
  if (!response.ok) {
    throw new Error(`log_webhook_send_failed_http_${response.status}`);
  }
}
