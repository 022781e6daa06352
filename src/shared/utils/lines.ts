const SEPARATOR_PATTERN = /^\s*(?:-{3,}|_{3,}|={3,})\s*$/;
const BULLET_PATTERN = /^\s*[-*•·]\s+/;

export function splitLines(text: string): string[] {
  const normalized = text.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
  if (!normalized) {
    return [];
  }
  return normalized.split("\n");
}

export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}

export function isSeparatorLine(line: string): boolean {
  return SEPARATOR_PATTERN.test(line);
}

export function isBulletLine(line: string): boolean {
  return !isSeparatorLine(line) && BULLET_PATTERN.test(line);
}

/** Trimmed line without its bullet marker. */
export function stripBullet(line: string): string {
  if (!isBulletLine(line)) {
    return line.trim();
  }
  return line.replace(BULLET_PATTERN, "").trim();
}

/** Lines that carry content: not blank and not a dash/underscore rule. */
export function isContentLine(line: string): boolean {
  return !isBlankLine(line) && !isSeparatorLine(line);
}

export function normalizeHeaderKeyword(header: string): string {
  return header
    .toLowerCase()
    .replace(/&/g, " and ")
    .replace(/[^\p{L}\p{N}\s]+/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Splits on the delimiter characters that appear outside parentheses.
 */
export function splitOutsideParens(text: string, delimiters: ReadonlySet<string>): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = "";
  for (const char of text) {
    if (char === "(") {
      depth += 1;
    } else if (char === ")") {
      depth = Math.max(0, depth - 1);
    }
    if (depth === 0 && delimiters.has(char)) {
      parts.push(current);
      current = "";
      continue;
    }
    current += char;
  }
  parts.push(current);
  return parts.map((part) => part.trim()).filter(Boolean);
}

/** Splits "Label: value" on the first colon when the label is plain words. */
export function splitLabelPrefix(text: string): { label: string; value: string } | null {
  const match = text.match(/^([\p{L}][\p{L} .'-]{0,30}?)\s*:\s*(.*)$/u);
  if (!match) {
    return null;
  }
  return {
    label: match[1].trim(),
    value: match[2].trim(),
  };
}
