import assert from "node:assert/strict";
import test from "node:test";
import { countWords, toPlainText } from "./text";

test("toPlainText keeps comparison signs in prose", () => {
  const text = "Fees stay <2% for small loans and >5% for large ones.";

  assert.equal(toPlainText(text), text);
  assert.equal(countWords(toPlainText(text)), 11);
});

test("toPlainText drops tags and markdown link syntax", () => {
  assert.equal(toPlainText("<b>Solar</b> [guide](/g)"), " Solar  guide");
  assert.equal(toPlainText('<a href="https://x.test">cost</a> &amp; <br/>savings'), " cost  &  savings");
});
