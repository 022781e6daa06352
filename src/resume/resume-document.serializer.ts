import type {
  ContactInfo,
  Entry,
  ParseResult,
  SkillGroup,
  UnrecognizedSegment,
} from "../shared/types/resume.types";

export type DocumentValue = string | number | DocumentValue[] | { [key: string]: DocumentValue };
export type ResumeDocument = { [key: string]: DocumentValue };

/** Nested snake_case map for downstream consumers; key order is fixed. */
export function toResumeDocument(result: ParseResult): ResumeDocument {
  const { record } = result;
  return {
    record: {
      summary: record.summary,
      contact: contactToDocument(record.contact),
      skills: record.skills.map(skillGroupToDocument),
      experience: record.experience.map(entryToDocument),
      education: record.education.map(entryToDocument),
      projects: record.projects.map(entryToDocument),
      certifications: record.certifications.slice(),
      languages: { ...record.languages },
    },
    unrecognized: result.unrecognized.map(unrecognizedToDocument),
  };
}

export function serializeResume(result: ParseResult): string {
  return JSON.stringify(toResumeDocument(result), null, 2);
}

function contactToDocument(contact: ContactInfo): ResumeDocument {
  const document: ResumeDocument = {};
  if (contact.name !== undefined) {
    document.name = contact.name;
  }
  if (contact.email !== undefined) {
    document.email = contact.email;
  }
  if (contact.phone !== undefined) {
    document.phone = contact.phone;
  }
  document.profile_links = contact.profileLinks.slice();
  if (contact.location !== undefined) {
    document.location = contact.location;
  }
  document.other = contact.other.slice();
  return document;
}

function skillGroupToDocument(group: SkillGroup): ResumeDocument {
  return {
    category: group.category,
    items: group.items.slice(),
  };
}

function entryToDocument(entry: Entry): ResumeDocument {
  const document: ResumeDocument = { title: entry.title };
  if (entry.organization !== undefined) {
    document.organization = entry.organization;
  }
  if (entry.location !== undefined) {
    document.location = entry.location;
  }
  if (entry.dateRange) {
    document.date_range = {
      start: entry.dateRange.start,
      end: entry.dateRange.end,
    };
  }
  document.bullet_points = entry.bulletPoints.slice();
  return document;
}

function unrecognizedToDocument(segment: UnrecognizedSegment): ResumeDocument {
  return {
    header: segment.header,
    order_index: segment.orderIndex,
    body: segment.body.slice(),
  };
}
