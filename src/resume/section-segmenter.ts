import {
  DEFAULT_HEADING_MAX_LENGTH,
  HEADER_SEGMENT_NAME,
  UNSTRUCTURED_SEGMENT_NAME,
} from "../shared/constants";
import type { Segment } from "../shared/types/resume.types";
import { isBlankLine, isBulletLine, isContentLine, isSeparatorLine } from "../shared/utils/lines";
import { isKnownSectionHeader } from "./section-classifier";

export interface SegmenterOptions {
  headingMaxLength?: number;
}

interface HeadingMatch {
  index: number;
  span: number;
  header: string;
}

/**
 * Splits résumé lines into ordered segments, one per detected heading.
 *
 * A heading is a short non-bullet line that is either underlined by a
 * separator rule or written in capitals. A capitalized line that names no
 * known section must follow a blank line or rule, so acronyms inside an entry
 * (a "CTO" title, an "MIT" school) stay in the body. The first non-blank line
 * of the document only counts as a heading when it names a known section,
 * since the top of a résumé is normally the candidate's name. Lines before the first
 * heading form the implicit HEADER segment; with no heading at all the whole
 * document is one UNSTRUCTURED segment.
 */
export function segmentSections(
  lines: ReadonlyArray<string>,
  options: SegmenterOptions = {},
): Segment[] {
  const maxLength = options.headingMaxLength ?? DEFAULT_HEADING_MAX_LENGTH;
  const headings = findHeadings(lines, maxLength);

  if (headings.length === 0) {
    return [
      {
        header: UNSTRUCTURED_SEGMENT_NAME,
        headingLines: [],
        body: lines.slice(),
        orderIndex: 0,
        startLine: 0,
      },
    ];
  }

  const segments: Segment[] = [];
  const firstHeadingIndex = headings[0].index;
  if (firstHeadingIndex > 0) {
    segments.push({
      header: HEADER_SEGMENT_NAME,
      headingLines: [],
      body: lines.slice(0, firstHeadingIndex),
      orderIndex: 0,
      startLine: 0,
    });
  }

  headings.forEach((heading, position) => {
    const next = headings[position + 1];
    const bodyStart = heading.index + heading.span;
    const bodyEnd = next ? next.index : lines.length;
    segments.push({
      header: heading.header,
      headingLines: lines.slice(heading.index, bodyStart),
      body: lines.slice(bodyStart, bodyEnd),
      orderIndex: segments.length,
      startLine: heading.index,
    });
  });

  return segments;
}

/** Inverse of segmentation: the original line sequence. */
export function reconstructLines(segments: ReadonlyArray<Segment>): string[] {
  return segments.flatMap((segment) => [...segment.headingLines, ...segment.body]);
}

function findHeadings(lines: ReadonlyArray<string>, maxLength: number): HeadingMatch[] {
  const firstContentIndex = lines.findIndex((line) => !isBlankLine(line));
  const headings: HeadingMatch[] = [];

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index];
    if (!isHeadingCandidate(line, maxLength)) {
      continue;
    }

    const header = toHeaderText(line);
    const nextLine = lines[index + 1];
    const underlined = nextLine !== undefined && isSeparatorLine(nextLine);
    const capitalized = isCapitalizedHeading(line);
    if (!underlined && !capitalized) {
      continue;
    }
    const known = isKnownSectionHeader(header);
    if (index === firstContentIndex && !known) {
      continue;
    }
    if (!underlined && !known && !followsBreak(lines, index)) {
      continue;
    }

    headings.push({ index, span: underlined ? 2 : 1, header });
    if (underlined) {
      index += 1;
    }
  }

  return headings;
}

function followsBreak(lines: ReadonlyArray<string>, index: number): boolean {
  return index === 0 || !isContentLine(lines[index - 1]);
}

function isHeadingCandidate(line: string, maxLength: number): boolean {
  const trimmed = line.trim();
  if (!trimmed || trimmed.length > maxLength) {
    return false;
  }
  if (isBulletLine(line) || isSeparatorLine(line)) {
    return false;
  }
  if (!/\p{L}/u.test(trimmed)) {
    return false;
  }
  return !trimmed.includes("@") && !trimmed.includes("://") && !trimmed.includes("|");
}

function isCapitalizedHeading(line: string): boolean {
  const trimmed = line.trim();
  if (trimmed.includes(",")) {
    return false;
  }
  return /\p{Lu}/u.test(trimmed) && !/\p{Ll}/u.test(trimmed);
}

function toHeaderText(line: string): string {
  return line.trim().replace(/\s*:$/, "");
}
