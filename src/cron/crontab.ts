import { spawn } from "node:child_process";
import {
  CrontabReadError,
  CrontabUnavailableError,
  CrontabWriteError
} from "../errors/crontab.errors.js";

export type CommandResult = {
  exitCode: number | null;
  stdout: Buffer;
  stderr: string;
};

export type CommandRunner = (command: string, args: string[], input?: Buffer) => Promise<CommandResult>;

/**
 * Crontab text is kept as latin1: one character per byte, so whatever the
 * file holds is written back unchanged.
 */
export const CRONTAB_ENCODING = "latin1";

export interface CrontabStore {
  /** Current crontab text, "" when the user has none. */
  read(): Promise<string>;
  /** Replaces the whole crontab with `text`. */
  write(text: string): Promise<void>;
}

export function isBrokenPipe(err: Error): boolean {
  return "code" in err && err.code === "EPIPE";
}

export const runCommand: CommandRunner = (command, args, input) =>
  new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      stdio: [input === undefined ? "ignore" : "pipe", "pipe", "pipe"]
    });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    proc.stdout?.on("data", (chunk: Buffer) => {
      stdout.push(chunk);
    });
    proc.stderr?.on("data", (chunk: Buffer) => {
      stderr.push(chunk);
    });
    proc.on("error", (err) => reject(err));
    proc.on("close", (code) => {
      resolve({
        exitCode: code,
        stdout: Buffer.concat(stdout),
        stderr: Buffer.concat(stderr).toString("utf-8")
      });
    });
    if (input !== undefined && proc.stdin) {
      // The process exiting before reading all of stdin shows up in its exit code.
      proc.stdin.on("error", (err) => {
        if (!isBrokenPipe(err)) reject(err);
      });
      proc.stdin.end(input);
    }
  });

function isMissingCrontab(stderr: string): boolean {
  return stderr.toLowerCase().includes("no crontab for");
}

export type SystemCrontabOptions = {
  command?: string;
  run?: CommandRunner;
};

export class SystemCrontab implements CrontabStore {
  private readonly command: string;
  private readonly run: CommandRunner;

  constructor(options: SystemCrontabOptions = {}) {
    this.command = options.command ?? "crontab";
    this.run = options.run ?? runCommand;
  }

  async read(): Promise<string> {
    const result = await this.exec(["-l"]);
    if (result.exitCode === 0) return result.stdout.toString(CRONTAB_ENCODING);
    if (isMissingCrontab(result.stderr)) return "";
    throw new CrontabReadError(result.exitCode, result.stderr.trim());
  }

  async write(text: string): Promise<void> {
    const result = await this.exec(["-"], Buffer.from(text, CRONTAB_ENCODING));
    if (result.exitCode !== 0) {
      throw new CrontabWriteError(result.exitCode, result.stderr.trim());
    }
  }

  private async exec(args: string[], input?: Buffer): Promise<CommandResult> {
    try {
      return await this.run(this.command, args, input);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new CrontabUnavailableError(this.command, message);
    }
  }
}
