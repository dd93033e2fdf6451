import type { RefreshConfig } from "../config/loadConfig.js";
import { buildCronLine, extractAuthorization, findEntriesForUrl, hasCronLine } from "../cron/cronLine.js";
import { SystemCrontab, type CrontabStore } from "../cron/crontab.js";
import { noopLogger, redactText, withSecrets, type Logger } from "../logging/logger.js";
import { refreshUrl } from "../services/refresh/refreshClient.js";
import { resolveToken, type TokenSource } from "./runInstall.js";

export interface StatusOptions {
  config: RefreshConfig;
  token?: string | null;
  store?: CrontabStore;
  appLogger?: Logger;
}

export interface StatusResult {
  installed: boolean;
  /** Expected entry, token masked. */
  expectedLine: string;
  tokenSource: TokenSource;
  /** Active entries calling the refresh URL, tokens masked. */
  entries: string[];
}

function maskEntry(entry: string): string {
  const token = extractAuthorization(entry);
  return token ? redactText(entry, [token]) : entry;
}

/** Never prompts: without a token option or config value the default token is assumed. */
export async function runStatus(options: StatusOptions): Promise<StatusResult> {
  const store = options.store ?? new SystemCrontab();

  const { token, source } = await resolveToken({
    explicit: options.token,
    config: options.config,
    prompt: null
  });
  const url = refreshUrl(options.config.baseUrl);
  const line = buildCronLine({ schedule: options.config.schedule, token, url });
  const appLogger = withSecrets(options.appLogger ?? noopLogger, [token]);

  const crontab = await store.read();
  const installed = hasCronLine(crontab, line);
  const entries = findEntriesForUrl(crontab, url).map(maskEntry);
  appLogger.info("Checked crontab", { installed, expectedLine: line, entries: entries.length, tokenSource: source });

  return {
    installed,
    expectedLine: redactText(line, [token]),
    tokenSource: source,
    entries
  };
}
