import assert from "node:assert/strict";
import { test } from "node:test";
import { runStatus } from "../runStatus.js";
import type { RefreshConfig } from "../../config/loadConfig.js";
import type { CrontabStore } from "../../cron/crontab.js";
import type { Logger } from "../../logging/logger.js";

const REFRESH_URL = "http://localhost:5000/backup/update-tgf-datasets";

const makeConfig = (overrides: Partial<RefreshConfig> = {}): RefreshConfig => ({
  baseUrl: "http://localhost:5000/backup",
  schedule: "30 9 * * *",
  token: null,
  timeoutSeconds: 600,
  stateDir: "/tmp/dx-refresh-test",
  ...overrides
});

const storeWith = (text: string): CrontabStore => ({
  read: async () => text,
  write: async () => {
    throw new Error("status must not write");
  }
});

test("status: default entry is reported as installed", async () => {
  const crontab = `0 3 * * * /usr/local/bin/backup.sh\n30 9 * * * curl -s -H "Authorization: ZIMMERMAN" ${REFRESH_URL}\n`;

  const result = await runStatus({ config: makeConfig(), store: storeWith(crontab) });

  assert.equal(result.installed, true);
  assert.equal(result.tokenSource, "default");
  assert.equal(result.expectedLine, `30 9 * * * curl -s -H "Authorization: ZI*******" ${REFRESH_URL}`);
  assert.deepEqual(result.entries, [`30 9 * * * curl -s -H "Authorization: ZI*******" ${REFRESH_URL}`]);
});

test("status: entries with another token are listed but do not count", async () => {
  const crontab = `30 9 * * * curl -s -H "Authorization: test-secret" ${REFRESH_URL}\n`;

  const result = await runStatus({ config: makeConfig(), store: storeWith(crontab) });

  assert.equal(result.installed, false);
  assert.deepEqual(result.entries, [`30 9 * * * curl -s -H "Authorization: te*********" ${REFRESH_URL}`]);
});

test("status: token option selects the entry to look for", async () => {
  const crontab = `30 9 * * * curl -s -H "Authorization: test-secret" ${REFRESH_URL}\n`;

  const result = await runStatus({ config: makeConfig(), token: "test-secret", store: storeWith(crontab) });

  assert.equal(result.installed, true);
  assert.equal(result.tokenSource, "option");
});

test("status: empty crontab has no entries", async () => {
  const result = await runStatus({ config: makeConfig(), store: storeWith("") });

  assert.equal(result.installed, false);
  assert.deepEqual(result.entries, []);
});

test("status: the logged expected line has the token masked", async () => {
  const logged: Array<Record<string, unknown> | undefined> = [];
  const push = (_message: string, meta?: Record<string, unknown>) => {
    logged.push(meta);
  };
  const appLogger: Logger = { debug: push, info: push, warn: push, error: push };

  await runStatus({ config: makeConfig(), token: "test-secret", store: storeWith(""), appLogger });

  assert.equal(logged.length, 1);
  assert.equal(logged[0]?.expectedLine, `30 9 * * * curl -s -H "Authorization: te*********" ${REFRESH_URL}`);
});
