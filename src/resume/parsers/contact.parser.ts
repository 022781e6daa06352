import type { ContactInfo } from "../../shared/types/resume.types";
import { isContentLine, splitLabelPrefix, stripBullet } from "../../shared/utils/lines";

type ContactField = "name" | "email" | "phone" | "location" | "link";

interface ContactDraft {
  name?: string;
  email?: string;
  phone?: string;
  location?: string;
  profileLinks: string[];
  other: string[];
}

const LABELS: ReadonlyMap<string, ContactField> = new Map<string, ContactField>([
  ["name", "name"],
  ["full name", "name"],
  ["email", "email"],
  ["e-mail", "email"],
  ["mail", "email"],
  ["phone", "phone"],
  ["tel", "phone"],
  ["telephone", "phone"],
  ["mobile", "phone"],
  ["cell", "phone"],
  ["location", "location"],
  ["address", "location"],
  ["city", "location"],
  ["based in", "location"],
  ["linkedin", "link"],
  ["github", "link"],
  ["gitlab", "link"],
  ["website", "link"],
  ["portfolio", "link"],
  ["web", "link"],
  ["url", "link"],
  ["blog", "link"],
  ["twitter", "link"],
]);

const TOKEN_SEPARATOR = /\s*[|•·]\s*/;
const EMAIL_PATTERN = /^(?:mailto:)?([^\s@]+@[^\s@]+\.[^\s@]+)$/i;
const URL_PATTERN =
  /^(?:https?:\/\/\S+|www\.\S+|(?:[a-z0-9-]+\.)+[a-z]{2,}(?:\/\S*)?)$/i;
const PHONE_PATTERN = /^\+?[\d\s().-]+$/;
const LOCATION_PATTERN = /^[\p{L}][\p{L} .'-]*,\s*[\p{L}][\p{L} .'-]*$/u;

/**
 * Reads the name/contact block. Tokens are matched against email, phone and
 * link patterns first, then "Label: value" prefixes; the first token left over
 * is the name. Whatever fits no field ends up in `other`.
 */
export function parseContact(body: ReadonlyArray<string>): ContactInfo {
  const draft: ContactDraft = {
    profileLinks: [],
    other: [],
  };

  for (const line of body) {
    if (!isContentLine(line)) {
      continue;
    }
    const tokens = stripBullet(line)
      .split(TOKEN_SEPARATOR)
      .map((token) => token.trim())
      .filter(Boolean);
    for (const token of tokens) {
      readToken(draft, token);
    }
  }

  return {
    ...(draft.name !== undefined ? { name: draft.name } : {}),
    ...(draft.email !== undefined ? { email: draft.email } : {}),
    ...(draft.phone !== undefined ? { phone: draft.phone } : {}),
    profileLinks: draft.profileLinks,
    ...(draft.location !== undefined ? { location: draft.location } : {}),
    other: draft.other,
  };
}

export function isEmailToken(token: string): boolean {
  return EMAIL_PATTERN.test(token);
}

export function isPhoneToken(token: string): boolean {
  if (!PHONE_PATTERN.test(token)) {
    return false;
  }
  const digits = token.replace(/\D/g, "");
  return digits.length >= 7 && digits.length <= 15;
}

export function isUrlToken(token: string): boolean {
  return URL_PATTERN.test(token);
}

function readToken(draft: ContactDraft, token: string): void {
  const detected = detectField(token);
  if (detected) {
    assign(draft, detected, normalizeValue(detected, token), token);
    return;
  }

  const labeled = splitLabelPrefix(token);
  if (labeled) {
    const field = LABELS.get(labeled.label.toLowerCase());
    if (field && labeled.value) {
      assign(draft, field, normalizeValue(field, labeled.value), token);
      return;
    }
    draft.other.push(token);
    return;
  }

  if (draft.name === undefined) {
    draft.name = token;
    return;
  }
  if (draft.location === undefined && LOCATION_PATTERN.test(token)) {
    draft.location = token;
    return;
  }
  draft.other.push(token);
}

function detectField(token: string): ContactField | null {
  if (isEmailToken(token)) {
    return "email";
  }
  if (isUrlToken(token)) {
    return "link";
  }
  if (isPhoneToken(token)) {
    return "phone";
  }
  return null;
}

function normalizeValue(field: ContactField, value: string): string {
  if (field === "email") {
    return value.replace(/^mailto:/i, "");
  }
  return value;
}

function assign(draft: ContactDraft, field: ContactField, value: string, rawToken: string): void {
  if (field === "link") {
    if (!draft.profileLinks.includes(value)) {
      draft.profileLinks.push(value);
    }
    return;
  }
  if (draft[field] === undefined) {
    draft[field] = value;
    return;
  }
  draft.other.push(rawToken);
}
