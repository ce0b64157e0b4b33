import { spawn } from "node:child_process";
import type { ExecResult, RunOptions } from "./types.js";

/**
 * Run a process to completion and capture its output.
 *
 * Never rejects: a process that cannot be spawned (missing binary, EACCES)
 * comes back as a failed result with the spawn error in `stderr` and exit
 * code 127.
 */
export function execCommand(
  command: string,
  args: string[],
  options: RunOptions = {}
): Promise<ExecResult> {
  return new Promise((resolve) => {
    const proc = spawn(command, args, { stdio: ["pipe", "pipe", "pipe"] });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    const finish = (result: ExecResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    proc.on("error", (error) => {
      finish({
        stdout: "",
        stderr: error.message,
        exitCode: 127,
        success: false,
      });
    });

    proc.on("close", (code) => {
      const exitCode = code ?? 1;
      finish({
        stdout: Buffer.concat(stdout).toString("utf8").trim(),
        stderr: Buffer.concat(stderr).toString("utf8").trim(),
        exitCode,
        success: exitCode === 0,
      });
    });

    // Writing to a process that failed to spawn raises EPIPE on the stream
    proc.stdin.on("error", () => undefined);
    if (options.stdin !== undefined) {
      proc.stdin.write(options.stdin);
    }
    proc.stdin.end();
  });
}

/**
 * Render a command line for log output and error messages.
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args.map(shellQuote)].join(" ");
}

/**
 * Quote a single argument for a POSIX shell. Plain words pass through.
 */
export function shellQuote(arg: string): string {
  if (arg !== "" && /^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}
