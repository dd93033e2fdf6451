import type { InstallResult } from "../install/runInstall.js";
import type { StatusResult } from "../install/runStatus.js";
import type { RefreshResponse } from "../services/refresh/refreshClient.js";

export const INSTALL_MESSAGES = {
  added: "✅ Cron job added.",
  exists: "ℹ️ Cron job already exists.",
  "dry-run": "Dry run: cron job not added."
} as const;

export function formatInstallText(result: InstallResult): string {
  const lines: string[] = [INSTALL_MESSAGES[result.status]];
  if (result.status === "dry-run") {
    lines.push(`Would append: ${result.maskedLine}`);
  }
  return lines.join("\n");
}

export function formatStatusText(result: StatusResult): string {
  const lines = [
    result.installed ? "Cron job installed." : "Cron job not installed.",
    `Expected entry: ${result.expectedLine}`
  ];
  if (result.tokenSource === "default") {
    lines.push("(checked with the default Authorization header value; pass --token to check another)");
  }
  if (result.entries.length) {
    lines.push("", "Entries calling the refresh endpoint:");
    for (const entry of result.entries) {
      lines.push(`  ${entry}`);
    }
  } else {
    lines.push("", "No entries call the refresh endpoint.");
  }
  return lines.join("\n");
}

export function formatStatusJson(result: StatusResult): string {
  return JSON.stringify(result, null, 2);
}

export function describeResponseBody(body: unknown): string {
  if (body === null || body === undefined) return "";
  if (typeof body === "string") return body;
  if (typeof body === "object" && !Array.isArray(body)) {
    const record: Record<string, unknown> = { ...body };
    for (const key of ["message", "data"]) {
      const value = record[key];
      if (typeof value === "string") return value;
    }
  }
  return JSON.stringify(body);
}

function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) return "0s";
  const totalSeconds = durationMs / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.round(totalSeconds - minutes * 60);
  return `${minutes}m ${seconds}s`;
}

export function formatResponseText(response: RefreshResponse): string {
  const detail = describeResponseBody(response.body);
  const head = `${response.status} from ${response.url} in ${formatDuration(response.durationMs)}`;
  return detail ? `${head}\n${detail}` : head;
}

export function formatResponseJson(response: RefreshResponse): string {
  return JSON.stringify(response, null, 2);
}
