import { GENERAL_SKILL_CATEGORY } from "../../shared/constants";
import type { SkillGroup } from "../../shared/types/resume.types";
import { isContentLine, stripBullet } from "../../shared/utils/lines";

export function parseSkills(body: ReadonlyArray<string>): SkillGroup[] {
  return body.filter(isContentLine).map((line) => parseSkillLine(stripBullet(line)));
}

export function parseSkillLine(text: string): SkillGroup {
  const colonIndex = text.indexOf(":");
  if (colonIndex < 0) {
    return {
      category: GENERAL_SKILL_CATEGORY,
      items: splitItems(text),
    };
  }

  const category = text.slice(0, colonIndex).trim();
  return {
    category: category || GENERAL_SKILL_CATEGORY,
    items: splitItems(text.slice(colonIndex + 1)),
  };
}

function splitItems(text: string): string[] {
  return text
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}
