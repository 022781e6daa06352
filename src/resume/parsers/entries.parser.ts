import type { DateRange, Entry } from "../../shared/types/resume.types";
import { isBlankLine, isBulletLine, isSeparatorLine, stripBullet } from "../../shared/utils/lines";
import { cutDateRange } from "./date-range.parser";

interface EntryDraft {
  title: string;
  organization?: string;
  location?: string;
  dateRange?: DateRange;
  bulletPoints: string[];
  metaSeen: boolean;
  sealed: boolean;
}

const META_PART_SEPARATOR = /\s*[|•·]\s*|\t+|\s{2,}|\s+[-–—]\s+/;
const CONTINUATION_INDENT = /^\s{2,}\S/;

/**
 * Block grammar shared by experience, education and projects:
 *
 *   Title line
 *   Organization | Location | Date range     (meta line, optional)
 *   Date range                                (when the meta line had none)
 *   - bullet
 *   - bullet
 *
 * Once an entry has bullets, or a blank line follows its header block, the
 * next non-bullet line opens a new entry.
 */
export function parseEntries(body: ReadonlyArray<string>): Entry[] {
  const drafts: EntryDraft[] = [];
  let current: EntryDraft | null = null;
  let lastWasBullet = false;

  for (const line of body) {
    if (isBlankLine(line) || isSeparatorLine(line)) {
      if (current) {
        current.sealed = true;
      }
      lastWasBullet = false;
      continue;
    }

    if (isBulletLine(line)) {
      if (!current) {
        current = createDraft("");
        current.metaSeen = true;
        drafts.push(current);
      }
      current.bulletPoints.push(stripBullet(line));
      lastWasBullet = true;
      continue;
    }

    if (current && lastWasBullet && CONTINUATION_INDENT.test(line)) {
      appendToLastBullet(current, line.trim());
      continue;
    }
    lastWasBullet = false;

    if (current && !current.sealed && current.bulletPoints.length === 0 && absorbHeaderLine(current, line)) {
      continue;
    }

    current = createDraftFromTitleLine(line);
    drafts.push(current);
  }

  return drafts.map(toEntry);
}

function createDraft(title: string): EntryDraft {
  return {
    title,
    bulletPoints: [],
    metaSeen: false,
    sealed: false,
  };
}

function createDraftFromTitleLine(line: string): EntryDraft {
  const cut = cutDateRange(line);
  if (!cut.range) {
    return createDraft(line.trim());
  }

  // One-line form: "Title | Organization | Location | Jan 2020 - Present"
  const [title = "", ...rest] = splitMetaParts(cut.remainder);
  const draft = createDraft(title);
  draft.dateRange = cut.range;
  if (rest.length > 0) {
    fillOrganizationAndLocation(draft, rest);
    draft.metaSeen = true;
  }
  return draft;
}

function absorbHeaderLine(draft: EntryDraft, line: string): boolean {
  const cut = cutDateRange(line);

  if (!draft.metaSeen) {
    draft.metaSeen = true;
    if (cut.range && !draft.dateRange) {
      draft.dateRange = cut.range;
      fillOrganizationAndLocation(draft, splitMetaParts(cut.remainder));
      return true;
    }
    fillOrganizationAndLocation(draft, splitMetaParts(cut.range ? line.trim() : cut.remainder));
    return true;
  }

  if (cut.range && !draft.dateRange) {
    draft.dateRange = cut.range;
    fillOrganizationAndLocation(draft, splitMetaParts(cut.remainder));
    return true;
  }

  if (!cut.range && draft.organization === undefined) {
    fillOrganizationAndLocation(draft, splitMetaParts(cut.remainder));
    return true;
  }

  return false;
}

function fillOrganizationAndLocation(draft: EntryDraft, parts: ReadonlyArray<string>): void {
  if (parts.length === 0) {
    return;
  }

  const leftovers: string[] = [];
  let index = 0;
  if (draft.organization === undefined) {
    draft.organization = parts[0];
    index = 1;
  }
  const locationParts = parts.slice(index);
  if (locationParts.length > 0) {
    if (draft.location === undefined) {
      draft.location = locationParts.join(", ");
    } else {
      leftovers.push(locationParts.join(" | "));
    }
  }

  // Nothing left to hold it: keep the text with the entry's bullet points.
  draft.bulletPoints.push(...leftovers);
}

function splitMetaParts(text: string): string[] {
  return text
    .split(META_PART_SEPARATOR)
    .map((part) => part.trim())
    .filter(Boolean);
}

function appendToLastBullet(draft: EntryDraft, text: string): void {
  const lastIndex = draft.bulletPoints.length - 1;
  draft.bulletPoints[lastIndex] = `${draft.bulletPoints[lastIndex]} ${text}`;
}

function toEntry(draft: EntryDraft): Entry {
  return {
    title: draft.title,
    ...(draft.organization !== undefined ? { organization: draft.organization } : {}),
    ...(draft.location !== undefined ? { location: draft.location } : {}),
    ...(draft.dateRange ? { dateRange: draft.dateRange } : {}),
    bulletPoints: draft.bulletPoints,
  };
}
