import test from "node:test";
import assert from "node:assert/strict";
import { slug } from "../src/slug.js";

test("slug collapses case, punctuation and padding variants to one id", () => {
  assert.equal(slug("Rogue"), "rogue");
  assert.equal(slug("ROGUE!!"), "rogue");
  assert.equal(slug("  rogue  "), "rogue");
});

test("slug joins words with a single underscore", () => {
  assert.equal(slug("Night City (Watson)"), "night_city_watson");
  assert.equal(slug("Rogue Amendiares"), "rogue_amendiares");
  assert.equal(slug("Tyger---Claws"), "tyger_claws");
});

test("slug is idempotent", () => {
  for (const name of ["The Afterlife", "Kabuki Market #2", "  Arasaka Tower  "]) {
    assert.equal(slug(slug(name)), slug(name));
  }
});

test("slug of a name with no alphanumerics is empty", () => {
  assert.equal(slug("!!!"), "");
  assert.equal(slug(""), "");
});
