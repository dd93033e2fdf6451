import { appendCronLine, hasCronLine } from "./cronLine.js";
import type { CrontabStore } from "./crontab.js";
import { noopLogger, type Logger } from "../logging/logger.js";

export type CronInstallStatus = "added" | "exists" | "dry-run";

export type EnsureCronLineParams = {
  store: CrontabStore;
  line: string;
  dryRun?: boolean;
  logger?: Logger;
};

export type EnsureCronLineResult = {
  status: CronInstallStatus;
  /** Crontab text that was (or, on a dry run, would have been) written. Null when unchanged. */
  nextCrontab: string | null;
};

/**
 * Installs `line` unless an identical entry is already present. Existing
 * entries are never rewritten or removed.
 */
export async function ensureCronLine(params: EnsureCronLineParams): Promise<EnsureCronLineResult> {
  const logger = params.logger ?? noopLogger;
  const current = await params.store.read();

  if (hasCronLine(current, params.line)) {
    logger.info("Cron entry already present; crontab left unchanged.");
    return { status: "exists", nextCrontab: null };
  }

  const next = appendCronLine(current, params.line);
  if (params.dryRun) {
    logger.info("Dry run; crontab not written.");
    return { status: "dry-run", nextCrontab: next };
  }

  await params.store.write(next);
  logger.info("Cron entry appended to crontab.");
  return { status: "added", nextCrontab: next };
}
