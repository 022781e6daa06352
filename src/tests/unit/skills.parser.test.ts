import assert from "node:assert/strict";
import { test } from "node:test";
import { parseSkillLine, parseSkills } from "../../resume/parsers/skills.parser";

test("category line splits items on commas", () => {
  assert.deepEqual(parseSkillLine("Programming Languages: Python, JavaScript, TypeScript"), {
    category: "Programming Languages",
    items: ["Python", "JavaScript", "TypeScript"],
  });
});

test("lines without a category become General groups", () => {
  assert.deepEqual(parseSkills(["Docker, Kubernetes", "", "-----", "- Cloud: AWS", ": Git, , Jira,"]), [
    { category: "General", items: ["Docker", "Kubernetes"] },
    { category: "Cloud", items: ["AWS"] },
    { category: "General", items: ["Git", "Jira"] },
  ]);
});
