import type {
  ContactInfo,
  Entry,
  ParseResult,
  SegmentExtraction,
  SkillGroup,
  UnrecognizedSegment,
} from "../shared/types/resume.types";

export function createEmptyContact(): ContactInfo {
  return {
    profileLinks: [],
    other: [],
  };
}

/**
 * Folds per-segment extractions into one record. Sections that appear more
 * than once are concatenated in source order.
 */
export function assembleRecord(extractions: ReadonlyArray<SegmentExtraction>): ParseResult {
  const ordered = extractions.slice().sort((left, right) => left.orderIndex - right.orderIndex);

  const summaries: string[] = [];
  let contact = createEmptyContact();
  const skills: SkillGroup[] = [];
  const experience: Entry[] = [];
  const education: Entry[] = [];
  const projects: Entry[] = [];
  const certifications: string[] = [];
  const languages: Array<readonly [string, string]> = [];
  const unrecognized: UnrecognizedSegment[] = [];

  for (const extraction of ordered) {
    switch (extraction.kind) {
      case "summary":
        if (extraction.summary) {
          summaries.push(extraction.summary);
        }
        break;
      case "contact":
        contact = mergeContact(contact, extraction.contact);
        break;
      case "skills":
        skills.push(...extraction.skills);
        break;
      case "experience":
        experience.push(...extraction.entries);
        break;
      case "education":
        education.push(...extraction.entries);
        break;
      case "projects":
        projects.push(...extraction.entries);
        break;
      case "certifications":
        certifications.push(...extraction.certifications);
        break;
      case "languages":
        languages.push(...extraction.languages);
        break;
      case "unrecognized":
        unrecognized.push(extraction.segment);
        break;
    }
  }

  return {
    record: {
      summary: summaries.join("\n"),
      contact,
      skills,
      experience,
      education,
      projects,
      certifications,
      languages: mergeLanguages(languages),
    },
    unrecognized,
  };
}

export function mergeContact(base: ContactInfo, next: ContactInfo): ContactInfo {
  const name = base.name ?? next.name;
  const email = base.email ?? next.email;
  const phone = base.phone ?? next.phone;
  const location = base.location ?? next.location;
  const displaced = [
    displacedValue(base.name, next.name),
    displacedValue(base.email, next.email),
    displacedValue(base.phone, next.phone),
    displacedValue(base.location, next.location),
  ].filter((value): value is string => value !== null);

  return {
    ...(name !== undefined ? { name } : {}),
    ...(email !== undefined ? { email } : {}),
    ...(phone !== undefined ? { phone } : {}),
    profileLinks: Array.from(new Set([...base.profileLinks, ...next.profileLinks])),
    ...(location !== undefined ? { location } : {}),
    other: [...base.other, ...displaced, ...next.other],
  };
}

/** Repeated language names keep every distinct label, joined with "; ". */
export function mergeLanguages(
  pairs: ReadonlyArray<readonly [string, string]>,
): Record<string, string> {
  const merged = new Map<string, string>();
  for (const [language, label] of pairs) {
    const existing = merged.get(language);
    if (existing === undefined || existing === "") {
      merged.set(language, label);
      continue;
    }
    if (label === "" || existing.split("; ").includes(label)) {
      continue;
    }
    merged.set(language, `${existing}; ${label}`);
  }
  return Object.fromEntries(merged);
}

function displacedValue(kept: string | undefined, incoming: string | undefined): string | null {
  if (kept === undefined || incoming === undefined || kept === incoming) {
    return null;
  }
  return incoming;
}
