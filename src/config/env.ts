import dotenv from "dotenv";
import {
  DEFAULT_HEADING_MAX_LENGTH,
  DEFAULT_MAX_DOCUMENT_BYTES,
  MIN_HEADING_MAX_LENGTH,
} from "../shared/constants";
import type { LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  logLevel: LogLevel;
  logWebhookUrl?: string;
  logWebhookLevel: LogLevel;
  logWebhookRatePerMin: number;
  logWebhookBatchMs: number;
  headingMaxLength: number;
  maxDocumentBytes: number;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const logWebhookLevelRaw = (source.LOG_WEBHOOK_LEVEL ?? "warn").trim().toLowerCase();
  const logWebhookRatePerMinRaw = source.LOG_WEBHOOK_RATE_PER_MIN ?? "20";
  const logWebhookBatchMsRaw = source.LOG_WEBHOOK_BATCH_MS ?? "2500";
  const headingMaxLengthRaw = source.RESUME_HEADING_MAX_LENGTH ?? String(DEFAULT_HEADING_MAX_LENGTH);
  const maxDocumentBytesRaw = source.RESUME_MAX_DOCUMENT_BYTES ?? String(DEFAULT_MAX_DOCUMENT_BYTES);
  const logWebhookRatePerMin = Number(logWebhookRatePerMinRaw);
  const logWebhookBatchMs = Number(logWebhookBatchMsRaw);
  const headingMaxLength = Number(headingMaxLengthRaw);
  const maxDocumentBytes = Number(maxDocumentBytesRaw);

  if (!Number.isFinite(logWebhookRatePerMin) || logWebhookRatePerMin < 1) {
    throw new Error(`Invalid LOG_WEBHOOK_RATE_PER_MIN value: ${logWebhookRatePerMinRaw}`);
  }
  if (!Number.isFinite(logWebhookBatchMs) || logWebhookBatchMs < 250) {
    throw new Error(`Invalid LOG_WEBHOOK_BATCH_MS value: ${logWebhookBatchMsRaw}`);
  }
  if (!Number.isInteger(headingMaxLength) || headingMaxLength < MIN_HEADING_MAX_LENGTH) {
    throw new Error(`Invalid RESUME_HEADING_MAX_LENGTH value: ${headingMaxLengthRaw}`);
  }
  if (!Number.isInteger(maxDocumentBytes) || maxDocumentBytes <= 0) {
    throw new Error(`Invalid RESUME_MAX_DOCUMENT_BYTES value: ${maxDocumentBytesRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    logLevel: parseLogLevel("LOG_LEVEL", logLevelRaw),
    logWebhookUrl: getOptionalTrimmed(source, "LOG_WEBHOOK_URL"),
    logWebhookLevel: parseLogLevel("LOG_WEBHOOK_LEVEL", logWebhookLevelRaw),
    logWebhookRatePerMin,
    logWebhookBatchMs,
    headingMaxLength,
    maxDocumentBytes,
  };
}

function getOptionalTrimmed(source: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parseLogLevel(name: string, value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid ${name} value: ${value}`);
}
