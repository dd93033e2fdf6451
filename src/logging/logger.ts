import path from "node:path";
import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export type AppLogger = Logger & {
  path: string;
  close: () => Promise<void>;
};

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

export function maskSecret(value: string): string {
  if (value.length <= 4) return "*".repeat(Math.max(value.length, 1));
  return `${value.slice(0, 2)}${"*".repeat(value.length - 2)}`;
}

/** Replaces every occurrence of each secret in `text` with its masked form. */
export function redactText(text: string, secrets: readonly string[]): string {
  return secrets
    .filter(Boolean)
    .reduce((masked, secret) => masked.split(secret).join(maskSecret(secret)), text);
}

/** Masks every secret inside strings, arrays and plain objects. */
export function redactValue(value: unknown, secrets: readonly string[]): unknown {
  if (!secrets.length) return value;
  if (typeof value === "string") return redactText(value, secrets);
  if (Array.isArray(value)) return value.map((item) => redactValue(item, secrets));
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = redactValue(item, secrets);
    }
    return out;
  }
  return value;
}

function redactMeta(
  meta: Record<string, unknown> | undefined,
  secrets: readonly string[]
): Record<string, unknown> | undefined {
  if (!meta) return undefined;
  const out: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(meta)) {
    out[key] = redactValue(item, secrets);
  }
  return out;
}

/**
 * Wraps `logger` so `secrets` never reach it in clear, in the message or in
 * any string nested in `meta`.
 */
export function withSecrets(logger: Logger, secrets: readonly string[]): Logger {
  const live = secrets.filter(Boolean);
  if (!live.length) return logger;
  const forward = (level: LogLevel) => (message: string, meta?: Record<string, unknown>) =>
    logger[level](redactText(message, live), redactMeta(meta, live));
  return {
    debug: forward("debug"),
    info: forward("info"),
    warn: forward("warn"),
    error: forward("error")
  };
}

type AppLoggerParams = {
  stateDir: string;
  label?: string;
  /** Values masked in every entry written, e.g. a token known up front. */
  secrets?: readonly string[];
};

/** JSON-lines log under `<stateDir>/logs`, one file per command run. */
export async function createAppLogger(params: AppLoggerParams): Promise<AppLogger> {
  const dir = path.join(params.stateDir, "logs");
  await mkdir(dir, { recursive: true });
  const startedAt = new Date().toISOString();
  const label = params.label ?? "dx-refresh";
  const filePath = path.join(dir, `${label}-${startedAt.replace(/[:.]/g, "-")}.jsonl`);
  const stream = createWriteStream(filePath, { flags: "a" });
  const secrets = (params.secrets ?? []).filter(Boolean);
  let closed = false;

  stream.on("error", () => {
    closed = true;
  });

  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (closed) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level: level === "warn" ? "warning" : level,
      command: label,
      message: redactText(message, secrets),
      meta: redactMeta(meta, secrets)
    };
    try {
      stream.write(`${JSON.stringify(entry)}\n`);
    } catch {
      closed = true;
    }
  };

  return {
    path: filePath,
    close: async () => {
      if (closed) return;
      closed = true;
      await new Promise<void>((resolve) => stream.end(resolve));
    },
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta)
  };
}
