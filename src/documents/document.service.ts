import { readFile } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "../config/logger";
import { DEFAULT_MAX_DOCUMENT_BYTES } from "../shared/constants";
import { extractDocxText } from "./extractors/docx.extractor";
import { extractPdfText } from "./extractors/pdf.extractor";

export type DocumentType = "text" | "pdf" | "docx" | "unknown";

const TEXT_EXTENSIONS = [".txt", ".text", ".md"];

export class DocumentService {
  constructor(
    private readonly logger: Logger,
    private readonly maxDocumentBytes: number = DEFAULT_MAX_DOCUMENT_BYTES,
  ) {}

  detectDocumentType(fileName?: string, mimeType?: string): DocumentType {
    const normalizedFileName = (fileName ?? "").toLowerCase();
    const normalizedMime = (mimeType ?? "").toLowerCase();

    if (normalizedMime.includes("pdf") || normalizedFileName.endsWith(".pdf")) {
      return "pdf";
    }

    if (
      normalizedMime.includes(
        "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
      ) || normalizedFileName.endsWith(".docx")
    ) {
      return "docx";
    }

    if (
      normalizedMime.startsWith("text/") ||
      TEXT_EXTENSIONS.some((extension) => normalizedFileName.endsWith(extension))
    ) {
      return "text";
    }

    return "unknown";
  }

  validateSupportedDocument(fileName?: string, mimeType?: string): Exclude<DocumentType, "unknown"> {
    const type = this.detectDocumentType(fileName, mimeType);
    if (type === "unknown") {
      throw new Error("Unsupported document type. Please provide TXT, PDF or DOCX.");
    }
    return type;
  }

  async extractText(buffer: Buffer, fileName?: string, mimeType?: string): Promise<string> {
    const type = this.validateSupportedDocument(fileName, mimeType);
    if (buffer.byteLength > this.maxDocumentBytes) {
      throw new Error(
        `Document is too large: ${buffer.byteLength} bytes, limit is ${this.maxDocumentBytes}.`,
      );
    }

    const text = await this.extractByType(type, buffer);
    // Line breaks carry the section structure, so only NUL bytes and line
    // endings are normalized here.
    const cleanText = text.replace(/\u0000/g, "").replace(/\r\n?/g, "\n");

    this.logger.info("Document text extracted", {
      mimeType,
      fileName,
      document_type: type,
      chars: cleanText.length,
    });

    if (!cleanText.trim()) {
      throw new Error("Could not extract text from document.");
    }

    return cleanText;
  }

  async readFile(filePath: string): Promise<string> {
    const buffer = await readFile(filePath);
    return this.extractText(buffer, path.basename(filePath));
  }

  private async extractByType(type: Exclude<DocumentType, "unknown">, buffer: Buffer): Promise<string> {
    if (type === "pdf") {
      return extractPdfText(buffer);
    }
    if (type === "docx") {
      return extractDocxText(buffer);
    }
    return buffer.toString("utf8");
  }
}
