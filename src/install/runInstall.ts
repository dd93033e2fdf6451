import { DEFAULT_TOKEN } from "../config/defaults.js";
import type { RefreshConfig } from "../config/loadConfig.js";
import { buildCronLine } from "../cron/cronLine.js";
import { SystemCrontab, type CrontabStore } from "../cron/crontab.js";
import { ensureCronLine, type CronInstallStatus } from "../cron/ensureCronLine.js";
import { noopLogger, redactText, withSecrets, type Logger } from "../logging/logger.js";
import { refreshUrl } from "../services/refresh/refreshClient.js";
import type { PromptFn } from "../ui/prompts.js";

export type TokenSource = "option" | "config" | "prompt" | "default";

export type ResolvedToken = {
  token: string;
  source: TokenSource;
};

export const TOKEN_PROMPT = `Enter Authorization header value [${DEFAULT_TOKEN}]: `;

export async function resolveToken(params: {
  explicit?: string | null;
  config: RefreshConfig;
  prompt?: PromptFn | null;
}): Promise<ResolvedToken> {
  const explicit = params.explicit?.trim();
  if (explicit) return { token: explicit, source: "option" };
  if (params.config.token) return { token: params.config.token, source: "config" };
  if (params.prompt) {
    const answer = (await params.prompt(TOKEN_PROMPT)).trim();
    if (answer) return { token: answer, source: "prompt" };
  }
  return { token: DEFAULT_TOKEN, source: "default" };
}

export interface InstallOptions {
  config: RefreshConfig;
  token?: string | null;
  dryRun?: boolean;
  store?: CrontabStore;
  prompt?: PromptFn | null;
  uiLogger?: Logger;
  appLogger?: Logger;
}

export interface InstallResult {
  status: CronInstallStatus;
  line: string;
  /** `line` with the token masked, for display and logs. */
  maskedLine: string;
  tokenSource: TokenSource;
  nextCrontab: string | null;
}

export async function runInstall(options: InstallOptions): Promise<InstallResult> {
  const uiLogger = options.uiLogger ?? noopLogger;
  const store = options.store ?? new SystemCrontab();

  const { token, source } = await resolveToken({
    explicit: options.token,
    config: options.config,
    prompt: options.prompt
  });
  if (source === "default") {
    uiLogger.info("No Authorization header value entered; using the default.");
  }

  const line = buildCronLine({
    schedule: options.config.schedule,
    token,
    url: refreshUrl(options.config.baseUrl)
  });
  const appLogger = withSecrets(options.appLogger ?? noopLogger, [token]);
  appLogger.info("Ensuring cron entry", {
    line,
    tokenSource: source,
    dryRun: Boolean(options.dryRun)
  });

  const result = await ensureCronLine({
    store,
    line,
    dryRun: options.dryRun,
    logger: appLogger
  });

  return {
    status: result.status,
    line,
    maskedLine: redactText(line, [token]),
    tokenSource: source,
    nextCrontab: result.nextCrontab
  };
}
