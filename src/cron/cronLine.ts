import {
  ConfigInvalidScheduleError,
  ConfigInvalidUrlError,
  ConfigMissingTokenError,
  ConfigUnsafeTokenError
} from "../errors/config.errors.js";

// The token ends up inside a double-quoted shell argument on a cron line.
// cron turns an unescaped % into a newline. Everything appended to the
// crontab stays printable ASCII so it survives the latin1 round trip.
const UNSAFE_TOKEN_PATTERN = /["\\$`%]|[^\x20-\x7e]/;

// The URL is an unquoted shell word.
const UNSAFE_URL_PATTERN = /[%"'\\$`;&|<>#(){}]|[^\x21-\x7e]/;

const SCHEDULE_FIELD_PATTERN = /^[0-9A-Za-z*\/,-]+$/;

const AUTHORIZATION_PATTERN = /-H "Authorization: ([^"]*)"/;

export type CronLineParams = {
  schedule: string;
  token: string;
  url: string;
};

export function assertValidSchedule(schedule: string): void {
  const fields = schedule.trim().split(/\s+/).filter(Boolean);
  if (fields.length !== 5 || !fields.every((field) => SCHEDULE_FIELD_PATTERN.test(field))) {
    throw new ConfigInvalidScheduleError(schedule);
  }
}

export function assertSafeToken(token: string): void {
  if (!token) {
    throw new ConfigMissingTokenError();
  }
  if (UNSAFE_TOKEN_PATTERN.test(token)) {
    throw new ConfigUnsafeTokenError();
  }
}

export function assertSafeUrl(url: string): void {
  if (!url || UNSAFE_URL_PATTERN.test(url)) {
    throw new ConfigInvalidUrlError(url);
  }
}

export function buildCronLine(params: CronLineParams): string {
  assertValidSchedule(params.schedule);
  assertSafeToken(params.token);
  assertSafeUrl(params.url);
  return `${params.schedule} curl -s -H "Authorization: ${params.token}" ${params.url}`;
}

export function splitCrontabLines(crontab: string): string[] {
  if (!crontab) return [];
  const lines = crontab.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function hasCronLine(crontab: string, line: string): boolean {
  const target = line.trim();
  return splitCrontabLines(crontab).some((entry) => entry.trim() === target);
}

/** Appends `line` without touching any byte of the existing crontab text. */
export function appendCronLine(crontab: string, line: string): string {
  if (!crontab) return `${line}\n`;
  const separator = crontab.endsWith("\n") ? "" : "\n";
  return `${crontab}${separator}${line}\n`;
}

/** Active (uncommented) entries that call `url`. */
export function findEntriesForUrl(crontab: string, url: string): string[] {
  return splitCrontabLines(crontab)
    .map((entry) => entry.trim())
    .filter((entry) => entry && !entry.startsWith("#"))
    .filter((entry) => entry.split(/\s+/).includes(url));
}

export function extractAuthorization(line: string): string | null {
  const match = AUTHORIZATION_PATTERN.exec(line);
  return match ? match[1] : null;
}
