import assert from "node:assert/strict";
import { test } from "node:test";
import {
  isBulletLine,
  isSeparatorLine,
  normalizeHeaderKeyword,
  splitLabelPrefix,
  splitLines,
  splitOutsideParens,
  stripBullet,
} from "../../shared/utils/lines";

test("splitLines normalizes line endings and drops a byte order mark", () => {
  assert.deepEqual(splitLines("a\r\nb\rc"), ["a", "b", "c"]);
  assert.deepEqual(splitLines("\uFEFFx\n"), ["x", ""]);
  assert.deepEqual(splitLines(""), []);
});

test("separator and bullet detection", () => {
  assert.equal(isSeparatorLine("-----"), true);
  assert.equal(isSeparatorLine("  ___  "), true);
  assert.equal(isSeparatorLine("--"), false);
  assert.equal(isBulletLine("- item"), true);
  assert.equal(isBulletLine("  * nested"), true);
  assert.equal(isBulletLine("• dot"), true);
  assert.equal(isBulletLine("-----"), false);
  assert.equal(isBulletLine("-item"), false);
  assert.equal(stripBullet("  - Python "), "Python");
  assert.equal(stripBullet("  Plain "), "Plain");
});

test("normalizeHeaderKeyword reads ampersands as 'and' and drops punctuation", () => {
  assert.equal(normalizeHeaderKeyword("Licenses & Certifications:"), "licenses and certifications");
  assert.equal(normalizeHeaderKeyword("  WORK   EXPERIENCE "), "work experience");
});

test("splitOutsideParens keeps delimiters inside parentheses", () => {
  assert.deepEqual(splitOutsideParens("English (Native, fluent); German", new Set([",", ";"])), [
    "English (Native, fluent)",
    "German",
  ]);
});

test("splitLabelPrefix splits on the first colon", () => {
  assert.deepEqual(splitLabelPrefix("Email: jane@example.com"), {
    label: "Email",
    value: "jane@example.com",
  });
  assert.equal(splitLabelPrefix("no colon here"), null);
});
