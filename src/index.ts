export { loadEnv } from "./config/env";
export type { EnvConfig } from "./config/env";
export { createLogger, logContext, noopLogger } from "./config/logger";
export type { CreateLoggerOptions, Logger, LoggerContext, LogLevel } from "./config/logger";
export { DocumentService } from "./documents/document.service";
export type { DocumentType } from "./documents/document.service";
export { classifySegment, extractSegment } from "./resume/field-extractor";
export { assembleRecord } from "./resume/record-assembler";
export { serializeResume, toResumeDocument } from "./resume/resume-document.serializer";
export type { DocumentValue, ResumeDocument } from "./resume/resume-document.serializer";
export { parse } from "./resume/resume-parser";
export { createResumeParserService, ResumeParserService } from "./resume/resume-parser.service";
export { reconstructLines, segmentSections } from "./resume/section-segmenter";
export { splitLines } from "./shared/utils/lines";
export * from "./shared/types/resume.types";
