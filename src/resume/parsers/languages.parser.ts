import { isContentLine, splitOutsideParens, stripBullet } from "../../shared/utils/lines";

const ENTRY_DELIMITERS: ReadonlySet<string> = new Set([",", ";", "|"]);

export type LanguageProficiency = readonly [language: string, proficiency: string];

/**
 * Accepts "English (Native)", "German: B2" and "French - Basic", several per
 * line when separated by commas, semicolons or pipes. A bare language name
 * maps to an empty proficiency label.
 */
export function parseLanguages(body: ReadonlyArray<string>): LanguageProficiency[] {
  const pairs: LanguageProficiency[] = [];
  for (const line of body) {
    if (!isContentLine(line)) {
      continue;
    }
    for (const part of splitOutsideParens(stripBullet(line), ENTRY_DELIMITERS)) {
      pairs.push(parseLanguagePart(part));
    }
  }
  return pairs;
}

export function parseLanguagePart(text: string): LanguageProficiency {
  const parenthesized = text.match(/^(.+?)\s*\((.*)\)$/);
  if (parenthesized) {
    return [parenthesized[1].trim(), parenthesized[2].trim()];
  }

  const labeled = text.match(/^(.+?)\s*(?::|\s[-–—]\s)\s*(.+)$/);
  if (labeled) {
    return [labeled[1].trim(), labeled[2].trim()];
  }

  return [text.trim(), ""];
}
