import { SECTION_KEYWORDS } from "../shared/constants";
import type { SectionKind } from "../shared/types/resume.types";
import { normalizeHeaderKeyword } from "../shared/utils/lines";

const KEYWORD_TO_KIND: ReadonlyMap<string, SectionKind> = buildKeywordIndex();

export function classifyHeader(header: string): SectionKind | null {
  return KEYWORD_TO_KIND.get(normalizeHeaderKeyword(header)) ?? null;
}

export function isKnownSectionHeader(header: string): boolean {
  return classifyHeader(header) !== null;
}

function buildKeywordIndex(): Map<string, SectionKind> {
  const index = new Map<string, SectionKind>();
  for (const [kind, keywords] of Object.entries(SECTION_KEYWORDS)) {
    if (!isSectionKind(kind)) {
      continue;
    }
    for (const keyword of keywords) {
      index.set(normalizeHeaderKeyword(keyword), kind);
    }
  }
  return index;
}

function isSectionKind(value: string): value is SectionKind {
  return Object.prototype.hasOwnProperty.call(SECTION_KEYWORDS, value);
}
