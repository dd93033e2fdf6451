import assert from "node:assert/strict";
import { test } from "node:test";
import { maskEcho } from "../prompts.js";

const QUESTION = "Enter Authorization header value [ZIMMERMAN]: ";

test("maskEcho shows the question when it is first written", () => {
  assert.equal(maskEcho(QUESTION, QUESTION), QUESTION);
});

test("maskEcho masks typed characters", () => {
  assert.equal(maskEcho("t", QUESTION), "*");
  assert.equal(maskEcho("test", QUESTION), "****");
});

test("maskEcho masks the input when readline redraws the line", () => {
  // After a backspace readline rewrites the prompt and the remaining input in one chunk.
  assert.equal(maskEcho(`${QUESTION}test-secre`, QUESTION), `${QUESTION}**********`);
});

test("maskEcho passes line endings through", () => {
  assert.equal(maskEcho("\n", QUESTION), "\n");
  assert.equal(maskEcho("\r\n", QUESTION), "\r\n");
});
