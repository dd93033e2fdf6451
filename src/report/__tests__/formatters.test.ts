import assert from "node:assert/strict";
import { test } from "node:test";
import {
  describeResponseBody,
  formatInstallText,
  formatResponseText,
  formatStatusText
} from "../formatters.js";
import type { InstallResult } from "../../install/runInstall.js";

const MASKED_LINE =
  '30 9 * * * curl -s -H "Authorization: ZI*******" http://localhost:5000/backup/update-tgf-datasets';

const installResult = (status: InstallResult["status"]): InstallResult => ({
  status,
  line: MASKED_LINE.replace("ZI*******", "ZIMMERMAN"),
  maskedLine: MASKED_LINE,
  tokenSource: "default",
  nextCrontab: null
});

test("install messages match the operator-facing wording", () => {
  assert.equal(formatInstallText(installResult("added")), "✅ Cron job added.");
  assert.equal(formatInstallText(installResult("exists")), "ℹ️ Cron job already exists.");
  assert.equal(
    formatInstallText(installResult("dry-run")),
    `Dry run: cron job not added.\nWould append: ${MASKED_LINE}`
  );
});

test("status text lists related entries", () => {
  const text = formatStatusText({
    installed: false,
    expectedLine: MASKED_LINE,
    tokenSource: "option",
    entries: ["0 1 * * * curl -s -H \"Authorization: te*********\" http://x/update-tgf-datasets"]
  });

  assert.equal(
    text,
    [
      "Cron job not installed.",
      `Expected entry: ${MASKED_LINE}`,
      "",
      "Entries calling the refresh endpoint:",
      '  0 1 * * * curl -s -H "Authorization: te*********" http://x/update-tgf-datasets'
    ].join("\n")
  );
});

test("status text notes when the default token was assumed", () => {
  const text = formatStatusText({
    installed: true,
    expectedLine: MASKED_LINE,
    tokenSource: "default",
    entries: []
  });

  assert.equal(
    text,
    [
      "Cron job installed.",
      `Expected entry: ${MASKED_LINE}`,
      "(checked with the default Authorization header value; pass --token to check another)",
      "",
      "No entries call the refresh endpoint."
    ].join("\n")
  );
});

test("response bodies prefer message, then data, then JSON", () => {
  assert.equal(describeResponseBody({ code: 200, message: "Success" }), "Success");
  assert.equal(describeResponseBody({ code: 200, data: "OK" }), "OK");
  assert.equal(describeResponseBody({ code: 500 }), '{"code":500}');
  assert.equal(describeResponseBody("plain"), "plain");
  assert.equal(describeResponseBody(null), "");
});

test("response text shows status, url and duration", () => {
  assert.equal(
    formatResponseText({ url: "http://localhost:5000/backup/health-check", status: 200, body: null, durationMs: 1500 }),
    "200 from http://localhost:5000/backup/health-check in 1.5s"
  );
  assert.equal(
    formatResponseText({ url: "http://x/update-tgf-datasets", status: 200, body: { message: "Success" }, durationMs: 125000 }),
    "200 from http://x/update-tgf-datasets in 2m 5s\nSuccess"
  );
});
