import type { ParseOptions, ParseResult } from "../shared/types/resume.types";
import { splitLines } from "../shared/utils/lines";
import { extractSegment } from "./field-extractor";
import { assembleRecord } from "./record-assembler";
import { segmentSections } from "./section-segmenter";

/**
 * Parses résumé text into a structured record and the segments that could not
 * be classified. Pure: the same text always yields an equal result.
 */
export function parse(text: string, options: ParseOptions = {}): ParseResult {
  const lines = splitLines(text);
  const segments = segmentSections(lines, { headingMaxLength: options.headingMaxLength });
  return assembleRecord(segments.map(extractSegment));
}
