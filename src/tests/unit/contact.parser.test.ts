import assert from "node:assert/strict";
import { test } from "node:test";
import { isPhoneToken, isUrlToken, parseContact } from "../../resume/parsers/contact.parser";

test("pipe-separated contact line and labeled lines", () => {
  const contact = parseContact([
    "Jane Doe",
    "jane@example.com | +1 (555) 010-2030 | https://janedoe.dev",
    "LinkedIn: linkedin.com/in/janedoe",
    "Location: Austin, TX",
    "",
  ]);

  assert.deepEqual(contact, {
    name: "Jane Doe",
    email: "jane@example.com",
    phone: "+1 (555) 010-2030",
    profileLinks: ["https://janedoe.dev", "linkedin.com/in/janedoe"],
    location: "Austin, TX",
    other: [],
  });
});

test("unlabeled location fills the field and unmatched tokens go to other", () => {
  const contact = parseContact([
    "Jane Doe",
    "Staff Engineer",
    "Berlin, Germany",
    "Email: jane@example.com",
    "GitHub: github.com/jane",
    "github.com/jane",
    "Availability: immediate",
  ]);

  assert.deepEqual(contact, {
    name: "Jane Doe",
    email: "jane@example.com",
    profileLinks: ["github.com/jane"],
    location: "Berlin, Germany",
    other: ["Staff Engineer", "Availability: immediate"],
  });
});

test("a second email is kept in other and mailto prefixes are dropped", () => {
  const contact = parseContact(["Jane Doe", "mailto:jane@example.com", "jd@example.org"]);

  assert.equal(contact.email, "jane@example.com");
  assert.deepEqual(contact.other, ["jd@example.org"]);
});

test("phone detection needs at least seven digits", () => {
  assert.equal(isPhoneToken("555-0102"), true);
  assert.equal(isPhoneToken("2019"), false);
  assert.equal(isPhoneToken("+44 20 7946 0958"), true);
});

test("bare domains count as profile links", () => {
  const contact = parseContact(["Jane Doe", "janedoe.dev | jane.io | jane@example.com"]);

  assert.deepEqual(contact.profileLinks, ["janedoe.dev", "jane.io"]);
  assert.equal(contact.email, "jane@example.com");
  assert.deepEqual(contact.other, []);
  assert.equal(isUrlToken("Inc."), false);
  assert.equal(isUrlToken("555.010.2030"), false);
});
