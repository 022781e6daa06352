export type SectionKind =
  | "summary"
  | "contact"
  | "skills"
  | "experience"
  | "education"
  | "projects"
  | "certifications"
  | "languages";

export type EntrySectionKind = "experience" | "education" | "projects";

export interface Segment {
  readonly header: string;
  readonly headingLines: ReadonlyArray<string>;
  readonly body: ReadonlyArray<string>;
  readonly orderIndex: number;
  readonly startLine: number;
}

export interface ContactInfo {
  readonly name?: string;
  readonly email?: string;
  readonly phone?: string;
  readonly profileLinks: ReadonlyArray<string>;
  readonly location?: string;
  readonly other: ReadonlyArray<string>;
}

export interface DateRange {
  readonly start: string;
  readonly end: string;
}

export interface Entry {
  readonly title: string;
  readonly organization?: string;
  readonly location?: string;
  readonly dateRange?: DateRange;
  readonly bulletPoints: ReadonlyArray<string>;
}

export interface SkillGroup {
  readonly category: string;
  readonly items: ReadonlyArray<string>;
}

export interface ResumeRecord {
  readonly summary: string;
  readonly contact: ContactInfo;
  readonly skills: ReadonlyArray<SkillGroup>;
  readonly experience: ReadonlyArray<Entry>;
  readonly education: ReadonlyArray<Entry>;
  readonly projects: ReadonlyArray<Entry>;
  readonly certifications: ReadonlyArray<string>;
  readonly languages: Readonly<Record<string, string>>;
}

export interface UnrecognizedSegment {
  readonly header: string;
  readonly body: ReadonlyArray<string>;
  readonly orderIndex: number;
}

export interface ParseResult {
  readonly record: ResumeRecord;
  readonly unrecognized: ReadonlyArray<UnrecognizedSegment>;
}

export type SegmentExtraction =
  | { kind: "summary"; orderIndex: number; summary: string }
  | { kind: "contact"; orderIndex: number; contact: ContactInfo }
  | { kind: "skills"; orderIndex: number; skills: ReadonlyArray<SkillGroup> }
  | { kind: EntrySectionKind; orderIndex: number; entries: ReadonlyArray<Entry> }
  | { kind: "certifications"; orderIndex: number; certifications: ReadonlyArray<string> }
  | { kind: "languages"; orderIndex: number; languages: ReadonlyArray<readonly [string, string]> }
  | { kind: "unrecognized"; orderIndex: number; segment: UnrecognizedSegment };

export interface ParseOptions {
  headingMaxLength?: number;
}
