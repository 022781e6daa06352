import { HEADER_SEGMENT_NAME } from "../shared/constants";
import type { Segment, SectionKind, SegmentExtraction } from "../shared/types/resume.types";
import { parseCertifications } from "./parsers/certifications.parser";
import { parseContact } from "./parsers/contact.parser";
import { parseEntries } from "./parsers/entries.parser";
import { parseLanguages } from "./parsers/languages.parser";
import { parseSkills } from "./parsers/skills.parser";
import { parseSummary } from "./parsers/summary.parser";
import { classifyHeader } from "./section-classifier";

export function classifySegment(segment: Segment): SectionKind | null {
  if (segment.header === HEADER_SEGMENT_NAME && segment.headingLines.length === 0) {
    return "contact";
  }
  return classifyHeader(segment.header);
}

export function extractSegment(segment: Segment): SegmentExtraction {
  const kind = classifySegment(segment);
  const { body, orderIndex } = segment;

  switch (kind) {
    case "summary":
      return { kind, orderIndex, summary: parseSummary(body) };
    case "contact":
      return { kind, orderIndex, contact: parseContact(body) };
    case "skills":
      return { kind, orderIndex, skills: parseSkills(body) };
    case "experience":
    case "education":
    case "projects":
      return { kind, orderIndex, entries: parseEntries(body) };
    case "certifications":
      return { kind, orderIndex, certifications: parseCertifications(body) };
    case "languages":
      return { kind, orderIndex, languages: parseLanguages(body) };
    case null:
      return {
        kind: "unrecognized",
        orderIndex,
        segment: {
          header: segment.header,
          body: segment.body.slice(),
          orderIndex,
        },
      };
  }
}
