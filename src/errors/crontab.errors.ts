export class CrontabUnavailableError extends Error {
  constructor(command: string, message: string) {
    super(`Could not run ${command}: ${message}`);
    this.name = "CrontabUnavailableError";
  }
}

export class CrontabReadError extends Error {
  exitCode: number | null;

  constructor(exitCode: number | null, stderr: string) {
    const detail = stderr ? `: ${stderr}` : "";
    super(`crontab -l exited with code ${exitCode ?? "unknown"}${detail}`);
    this.name = "CrontabReadError";
    this.exitCode = exitCode;
  }
}

export class CrontabWriteError extends Error {
  exitCode: number | null;

  constructor(exitCode: number | null, stderr: string) {
    const detail = stderr ? `: ${stderr}` : "";
    super(`crontab - exited with code ${exitCode ?? "unknown"}${detail}`);
    this.name = "CrontabWriteError";
    this.exitCode = exitCode;
  }
}
