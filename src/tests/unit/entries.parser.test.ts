import assert from "node:assert/strict";
import { test } from "node:test";
import { parseEntries } from "../../resume/parsers/entries.parser";

test("title, organization/location line and date line form one entry", () => {
  const entries = parseEntries([
    "Senior Software Engineer",
    "TechCorp Inc. | San Francisco, CA",
    "January 2021 - Present",
    "- Built billing APIs",
  ]);

  assert.deepEqual(entries, [
    {
      title: "Senior Software Engineer",
      organization: "TechCorp Inc.",
      location: "San Francisco, CA",
      dateRange: { start: "January 2021", end: "Present" },
      bulletPoints: ["Built billing APIs"],
    },
  ]);
});

test("one-line title form carries organization, location and dates", () => {
  const entries = parseEntries(["Software Engineer | Startup Labs | Remote | Jun 2017 - Dec 2020", "- Shipped v1"]);

  assert.deepEqual(entries, [
    {
      title: "Software Engineer",
      organization: "Startup Labs",
      location: "Remote",
      dateRange: { start: "Jun 2017", end: "Dec 2020" },
      bulletPoints: ["Shipped v1"],
    },
  ]);
});

test("entries without bullets are separated by blank lines", () => {
  const entries = parseEntries([
    "B.S. Physics",
    "Tech University",
    "2010 - 2014",
    "",
    "M.S. Physics",
    "Tech University | 2014 - 2016",
  ]);

  assert.deepEqual(entries, [
    {
      title: "B.S. Physics",
      organization: "Tech University",
      dateRange: { start: "2010", end: "2014" },
      bulletPoints: [],
    },
    {
      title: "M.S. Physics",
      organization: "Tech University",
      dateRange: { start: "2014", end: "2016" },
      bulletPoints: [],
    },
  ]);
});

test("a non-bullet line after bullets opens the next entry", () => {
  const entries = parseEntries(["Analyst", "- Wrote reports", "Consultant", "Big Firm"]);

  assert.deepEqual(entries, [
    { title: "Analyst", bulletPoints: ["Wrote reports"] },
    { title: "Consultant", organization: "Big Firm", bulletPoints: [] },
  ]);
});

test("a bullet before any title opens an untitled entry", () => {
  const entries = parseEntries(["- orphan detail", "Engineer"]);

  assert.deepEqual(entries, [
    { title: "", bulletPoints: ["orphan detail"] },
    { title: "Engineer", bulletPoints: [] },
  ]);
});

test("indented line after a bullet continues it", () => {
  const entries = parseEntries(["Developer", "- Built a queue", "   that scaled to 1M jobs"]);

  assert.deepEqual(entries[0].bulletPoints, ["Built a queue that scaled to 1M jobs"]);
});

test("unparseable dates stay as text", () => {
  const entries = parseEntries(["Engineer", "Acme | sometime in 2019"]);

  assert.deepEqual(entries, [
    { title: "Engineer", organization: "Acme", location: "sometime in 2019", bulletPoints: [] },
  ]);
});
