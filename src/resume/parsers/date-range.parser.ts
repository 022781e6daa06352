import { OPEN_DATE_RANGE_END } from "../../shared/constants";
import type { DateRange } from "../../shared/types/resume.types";

const MONTH =
  "(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\\.?";
const DATE = `(?:${MONTH},?\\s+\\d{4}|\\d{1,2}\\/\\d{4}|\\d{4})`;
const OPEN_END = "(?:present|current|now|today)";
const RANGE_SOURCE = `\\b(${DATE})\\s*(?:-|–|—|\\bto\\b)\\s*(${DATE}|${OPEN_END})\\b`;

export interface DateRangeCut {
  range?: DateRange;
  remainder: string;
}

export function parseDateRange(text: string): DateRange | null {
  const match = findLastRange(text);
  return match ? toDateRange(match) : null;
}

/**
 * Removes the last date-range token from the text and returns it together
 * with what is left, trimmed of dangling separators.
 */
export function cutDateRange(text: string): DateRangeCut {
  const match = findLastRange(text);
  if (!match || match.index === undefined) {
    return { remainder: text.trim() };
  }

  const before = text.slice(0, match.index);
  const after = text.slice(match.index + match[0].length);
  return {
    range: toDateRange(match),
    remainder: cleanRemainder(`${before} ${after}`),
  };
}

function findLastRange(text: string): RegExpMatchArray | null {
  let last: RegExpMatchArray | null = null;
  for (const match of text.matchAll(new RegExp(RANGE_SOURCE, "gi"))) {
    last = match;
  }
  return last;
}

function toDateRange(match: RegExpMatchArray): DateRange {
  const start = collapse(match[1]);
  const end = collapse(match[2]);
  return {
    start,
    end: new RegExp(`^${OPEN_END}$`, "i").test(end) ? OPEN_DATE_RANGE_END : end,
  };
}

function cleanRemainder(text: string): string {
  return text
    .replace(/\(\s*\)|\[\s*\]/g, " ")
    .replace(/^[\s|•·,;:–—-]+/, "")
    .replace(/[\s|•·,;:–—-]+$/, "")
    .replace(/[ \t]{3,}/g, "  ")
    .trim();
}

function collapse(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}
