import os from "node:os";
import path from "node:path";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { readEnv } from "./env.js";
import {
  CONFIG_FILE_NAMES,
  DEFAULT_BASE_URL,
  DEFAULT_SCHEDULE,
  DEFAULT_STATE_DIR_NAME,
  DEFAULT_TIMEOUT_SECONDS,
  MAX_TIMEOUT_SECONDS
} from "./defaults.js";
import { assertSafeUrl, assertValidSchedule } from "../cron/cronLine.js";
import {
  ConfigFileInvalidError,
  ConfigFileNotFoundError,
  ConfigInvalidTimeoutError,
  ConfigInvalidUrlError
} from "../errors/config.errors.js";

export interface RefreshConfig {
  /** Backend URL prefix the route paths are appended to. No trailing slash. */
  baseUrl: string;
  schedule: string;
  /** Token from the environment or config file; null means "ask". */
  token: string | null;
  timeoutSeconds: number;
  stateDir: string;
}

type ConfigFile = {
  baseUrl?: string;
  schedule?: string;
  token?: string;
  timeoutSeconds?: number;
  stateDir?: string;
};

export interface LoadConfigParams {
  cwd: string;
  configPath?: string | null;
  overrides?: Partial<RefreshConfig>;
}

function readStringField(
  record: Record<string, unknown>,
  key: keyof ConfigFile,
  filePath: string
): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigFileInvalidError(filePath, `${key} must be a string`);
  }
  return value;
}

export function parseConfigFile(raw: string, filePath: string): ConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigFileInvalidError(filePath, message);
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigFileInvalidError(filePath, "expected a JSON object");
  }
  const record: Record<string, unknown> = { ...parsed };

  const timeout = record.timeoutSeconds;
  if (timeout !== undefined && timeout !== null && typeof timeout !== "number") {
    throw new ConfigFileInvalidError(filePath, "timeoutSeconds must be a number");
  }

  return {
    baseUrl: readStringField(record, "baseUrl", filePath),
    schedule: readStringField(record, "schedule", filePath),
    token: readStringField(record, "token", filePath),
    timeoutSeconds: typeof timeout === "number" ? timeout : undefined,
    stateDir: readStringField(record, "stateDir", filePath)
  };
}

async function loadConfigFile(cwd: string, configPath?: string | null): Promise<ConfigFile> {
  const candidates = configPath
    ? [path.resolve(cwd, configPath)]
    : CONFIG_FILE_NAMES.map((name) => path.resolve(cwd, name));

  for (const candidate of candidates) {
    if (!existsSync(candidate)) {
      if (configPath) throw new ConfigFileNotFoundError(candidate);
      continue;
    }
    const raw = await readFile(candidate, "utf-8");
    return parseConfigFile(raw, candidate);
  }

  return {};
}

export function normalizeBaseUrl(raw: string): string {
  const trimmed = raw.trim().replace(/\/+$/, "");
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new ConfigInvalidUrlError(raw);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigInvalidUrlError(raw);
  }
  assertSafeUrl(trimmed);
  return trimmed;
}

function parseTimeout(raw: string | number): number {
  const value = typeof raw === "number" ? raw : Number(raw);
  if (!Number.isFinite(value) || value <= 0 || value > MAX_TIMEOUT_SECONDS) {
    throw new ConfigInvalidTimeoutError(String(raw));
  }
  return value;
}

function definedOverrides(overrides: Partial<RefreshConfig> = {}): Partial<RefreshConfig> {
  const result: Partial<RefreshConfig> = {};
  if (overrides.baseUrl !== undefined) result.baseUrl = overrides.baseUrl;
  if (overrides.schedule !== undefined) result.schedule = overrides.schedule;
  if (overrides.token !== undefined) result.token = overrides.token;
  if (overrides.timeoutSeconds !== undefined) result.timeoutSeconds = overrides.timeoutSeconds;
  if (overrides.stateDir !== undefined) result.stateDir = overrides.stateDir;
  return result;
}

export async function loadConfig(params: LoadConfigParams): Promise<RefreshConfig> {
  const configFile = await loadConfigFile(params.cwd, params.configPath);

  const stateDir =
    readEnv("DX_REFRESH_STATE_DIR") ||
    configFile.stateDir ||
    path.join(os.homedir(), DEFAULT_STATE_DIR_NAME);

  const cfg: RefreshConfig = {
    baseUrl: readEnv("DX_REFRESH_BASE_URL") || configFile.baseUrl || DEFAULT_BASE_URL,
    schedule: readEnv("DX_REFRESH_SCHEDULE") || configFile.schedule || DEFAULT_SCHEDULE,
    token: readEnv("DX_REFRESH_TOKEN") || configFile.token?.trim() || null,
    timeoutSeconds: parseTimeout(
      readEnv("DX_REFRESH_TIMEOUT") ?? configFile.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS
    ),
    stateDir: path.resolve(params.cwd, stateDir),
    ...definedOverrides(params.overrides)
  };

  const schedule = cfg.schedule.trim().split(/\s+/).join(" ");
  assertValidSchedule(schedule);

  return {
    ...cfg,
    schedule,
    baseUrl: normalizeBaseUrl(cfg.baseUrl),
    timeoutSeconds: parseTimeout(cfg.timeoutSeconds)
  };
}
