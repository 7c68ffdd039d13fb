import assert from "node:assert/strict";
import test from "node:test";
import { readJsonBody, toApiError } from "./api-errors";
import { ConfigurationError, ValidationError } from "./errors";

test("validation errors map to 400 with their issues", () => {
  const response = toApiError(new ValidationError("bad url", ["bad url", "too many"]), "test");

  assert.deepEqual(response, {
    status: 400,
    body: { error: "bad url", kind: "validation", issues: ["bad url", "too many"] },
  });
});

test("configuration errors carry the remediation", () => {
  const response = toApiError(new ConfigurationError("no key", "set OPENAI_API_KEY"), "test");

  assert.equal(response.status, 400);
  assert.equal(response.body.kind, "configuration");
  assert.equal(response.body.remediation, "set OPENAI_API_KEY");
});

test("anything else is an internal error", () => {
  assert.deepEqual(toApiError(new Error("boom"), "test"), {
    status: 500,
    body: { error: "boom", kind: "internal" },
  });
});

test("readJsonBody rejects malformed JSON as a validation error", async () => {
  const request = new Request("http://localhost/api", { method: "POST", body: "{oops" });
  await assert.rejects(readJsonBody(request), ValidationError);
});
