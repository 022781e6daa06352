import type { SectionKind } from "./types/resume.types";

export const HEADER_SEGMENT_NAME = "HEADER";
export const UNSTRUCTURED_SEGMENT_NAME = "UNSTRUCTURED";
export const GENERAL_SKILL_CATEGORY = "General";
export const OPEN_DATE_RANGE_END = "Present";

export const DEFAULT_HEADING_MAX_LENGTH = 40;
export const MIN_HEADING_MAX_LENGTH = 8;
export const DEFAULT_MAX_DOCUMENT_BYTES = 5 * 1024 * 1024;

export const SECTION_KEYWORDS: Readonly<Record<SectionKind, ReadonlyArray<string>>> = {
  summary: [
    "summary",
    "professional summary",
    "career summary",
    "profile",
    "professional profile",
    "objective",
    "career objective",
    "about",
    "about me",
  ],
  contact: [
    "header",
    "contact",
    "contact information",
    "contact info",
    "contact details",
    "personal information",
    "personal details",
  ],
  skills: [
    "skills",
    "technical skills",
    "core skills",
    "key skills",
    "skills and tools",
    "core competencies",
    "competencies",
    "technologies",
  ],
  experience: [
    "experience",
    "work experience",
    "professional experience",
    "employment",
    "employment history",
    "work history",
    "career history",
  ],
  education: ["education", "academic background", "education and training"],
  projects: ["projects", "personal projects", "selected projects", "key projects", "side projects"],
  certifications: [
    "certifications",
    "certificates",
    "licenses and certifications",
    "certifications and licenses",
    "courses and certifications",
  ],
  languages: ["languages", "spoken languages", "language skills"],
};
