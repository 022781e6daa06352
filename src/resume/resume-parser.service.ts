import path from "node:path";
import type { EnvConfig } from "../config/env";
import { createLogger, logContext } from "../config/logger";
import type { Logger } from "../config/logger";
import { DocumentService } from "../documents/document.service";
import type { ParseResult } from "../shared/types/resume.types";
import { parse } from "./resume-parser";

export interface ResumeParserServiceOptions {
  headingMaxLength?: number;
}

export class ResumeParserService {
  constructor(
    private readonly logger: Logger,
    private readonly documentService: DocumentService,
    private readonly options: ResumeParserServiceOptions = {},
  ) {}

  parseText(text: string, documentName = "inline"): ParseResult {
    const startedAt = Date.now();
    const result = parse(text, { headingMaxLength: this.options.headingMaxLength });
    const { record, unrecognized } = result;

    for (const segment of unrecognized) {
      logContext(this.logger, "warn", "Resume segment not recognized", {
        document: documentName,
        header: segment.header,
        order_index: segment.orderIndex,
      }, {
        lines: segment.body.length,
      });
    }

    logContext(this.logger, "info", "Resume parsed", {
      document: documentName,
      chars: text.length,
      unrecognized_count: unrecognized.length,
      latency_ms: Date.now() - startedAt,
      ok: true,
    }, {
      experience: record.experience.length,
      education: record.education.length,
      projects: record.projects.length,
      skill_groups: record.skills.length,
      certifications: record.certifications.length,
      languages: Object.keys(record.languages).length,
    });

    return result;
  }

  async parseDocument(buffer: Buffer, fileName?: string, mimeType?: string): Promise<ParseResult> {
    const text = await this.documentService.extractText(buffer, fileName, mimeType);
    return this.parseText(text, fileName ?? "document");
  }

  async parseFile(filePath: string): Promise<ParseResult> {
    try {
      const text = await this.documentService.readFile(filePath);
      return this.parseText(text, path.basename(filePath));
    } catch (error) {
      logContext(this.logger, "error", "Resume file could not be read", {
        document: path.basename(filePath),
        ok: false,
        error_code: "document_read_failed",
      }, {
        error: error instanceof Error ? error.message : "Unknown error",
      });
      throw error;
    }
  }
}

export function createResumeParserService(env: EnvConfig): ResumeParserService {
  const logger = createLogger({
    minLevel: env.logLevel,
    webhook: {
      enabled: Boolean(env.logWebhookUrl),
      url: env.logWebhookUrl,
      minLevel: env.logWebhookLevel,
      ratePerMinute: env.logWebhookRatePerMin,
      batchMs: env.logWebhookBatchMs,
    },
  });
  const documentService = new DocumentService(logger, env.maxDocumentBytes);
  return new ResumeParserService(logger, documentService, {
    headingMaxLength: env.headingMaxLength,
  });
}
