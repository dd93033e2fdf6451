import assert from "node:assert/strict";
import { test } from "node:test";
import { SystemCrontab, isBrokenPipe, runCommand, type CommandResult, type CommandRunner } from "../crontab.js";
import { ensureCronLine } from "../ensureCronLine.js";
import {
  CrontabReadError,
  CrontabUnavailableError,
  CrontabWriteError
} from "../../errors/crontab.errors.js";

type Call = { command: string; args: string[]; input?: Buffer };

const LINE = '30 9 * * * curl -s -H "Authorization: ZIMMERMAN" http://localhost:5000/backup/update-tgf-datasets';

const ok = (stdout = ""): CommandResult => ({ exitCode: 0, stdout: Buffer.from(stdout), stderr: "" });
const failed = (exitCode: number, stderr: string): CommandResult => ({ exitCode, stdout: Buffer.alloc(0), stderr });

const fakeRunner = (results: CommandResult[]) => {
  const calls: Call[] = [];
  const run: CommandRunner = async (command, args, input) => {
    calls.push({ command, args, input });
    const next = results.shift();
    if (!next) throw new Error("unexpected call");
    return next;
  };
  return { calls, run };
};

test("system crontab reads with crontab -l", async () => {
  const { calls, run } = fakeRunner([ok("0 3 * * * a\n")]);

  const text = await new SystemCrontab({ run }).read();

  assert.equal(text, "0 3 * * * a\n");
  assert.deepEqual(calls, [{ command: "crontab", args: ["-l"], input: undefined }]);
});

test("system crontab treats a missing crontab as empty", async () => {
  const { run } = fakeRunner([failed(1, "no crontab for deploy\n")]);

  assert.equal(await new SystemCrontab({ run }).read(), "");
});

test("system crontab surfaces other read failures", async () => {
  const { run } = fakeRunner([failed(1, "permission denied\n")]);

  await assert.rejects(new SystemCrontab({ run }).read(), (err) => {
    assert.ok(err instanceof CrontabReadError);
    assert.equal(err.message, "crontab -l exited with code 1: permission denied");
    return true;
  });
});

test("system crontab writes through crontab - on stdin", async () => {
  const { calls, run } = fakeRunner([ok()]);

  await new SystemCrontab({ run, command: "/usr/bin/crontab" }).write("0 3 * * * a\n");

  assert.deepEqual(calls, [{ command: "/usr/bin/crontab", args: ["-"], input: Buffer.from("0 3 * * * a\n") }]);
});

test("system crontab checks the write exit code", async () => {
  const { run } = fakeRunner([failed(1, "errors in crontab file, can't install.\n")]);

  await assert.rejects(new SystemCrontab({ run }).write("bad\n"), (err) => {
    assert.ok(err instanceof CrontabWriteError);
    assert.equal(err.exitCode, 1);
    assert.equal(err.message, "crontab - exited with code 1: errors in crontab file, can't install.");
    return true;
  });
});

test("system crontab reports a missing crontab binary", async () => {
  const run: CommandRunner = async () => {
    throw new Error("spawn crontab ENOENT");
  };

  await assert.rejects(new SystemCrontab({ run }).read(), (err) => {
    assert.ok(err instanceof CrontabUnavailableError);
    assert.equal(err.message, "Could not run crontab: spawn crontab ENOENT");
    return true;
  });
});

test("install keeps existing bytes that are not valid UTF-8", async () => {
  // "# résumé" saved as Latin-1.
  const original = Buffer.from([0x23, 0x20, 0x72, 0xe9, 0x73, 0x75, 0x6d, 0xe9, 0x0a]);
  const written: Buffer[] = [];
  const run: CommandRunner = async (_command, args, input) => {
    if (args[0] === "-l") return { exitCode: 0, stdout: original, stderr: "" };
    if (input) written.push(input);
    return ok();
  };

  const result = await ensureCronLine({ store: new SystemCrontab({ run }), line: LINE });

  assert.equal(result.status, "added");
  assert.equal(written.length, 1);
  assert.deepEqual(written[0], Buffer.concat([original, Buffer.from(`${LINE}\n`)]));
});

test("install recognises its entry next to non-UTF-8 bytes", async () => {
  const existing = Buffer.concat([Buffer.from([0x23, 0xff, 0xfe, 0x0a]), Buffer.from(`${LINE}\n`)]);
  const { calls, run } = fakeRunner([{ exitCode: 0, stdout: existing, stderr: "" }]);

  const result = await ensureCronLine({ store: new SystemCrontab({ run }), line: LINE });

  assert.equal(result.status, "exists");
  assert.equal(calls.length, 1);
});

test("isBrokenPipe matches only EPIPE", () => {
  assert.equal(isBrokenPipe(Object.assign(new Error("write EPIPE"), { code: "EPIPE" })), true);
  assert.equal(isBrokenPipe(Object.assign(new Error("spawn crontab ENOENT"), { code: "ENOENT" })), false);
  assert.equal(isBrokenPipe(new Error("plain")), false);
});

test("a writer that exits without reading stdin reports its exit code", async () => {
  // sh exits before reading the crontab; a large input makes the broken pipe likely.
  const run: CommandRunner = (_command, _args, input) =>
    runCommand("sh", ["-c", "echo 'crontab: refused' >&2; exit 3"], input);
  const text = `${"# filler line for the pipe\n".repeat(40000)}${LINE}\n`;

  await assert.rejects(new SystemCrontab({ run }).write(text), (err) => {
    assert.ok(err instanceof CrontabWriteError);
    assert.equal(err.exitCode, 3);
    assert.equal(err.message, "crontab - exited with code 3: crontab: refused");
    return true;
  });
});
