import { access, chmod, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { homedir } from "node:os";
import { execCommand, formatCommand } from "./exec.js";
import { CommandError } from "./errors.js";
import type { ExecResult, RunOptions } from "./types.js";

export interface WriteFileOptions {
  /** Permission bits, applied even when the file already existed. */
  mode: number;
}

/**
 * The machine being provisioned. Every probe and every action goes through
 * this interface, so the same reconciliation code runs locally, over SSH, or
 * against an in-memory fake in tests.
 */
export interface Host {
  /** Human-readable label for log lines. */
  readonly label: string;

  run(command: string, args: string[], options?: RunOptions): Promise<ExecResult>;
  fileExists(path: string): Promise<boolean>;
  readFile(path: string): Promise<string>;
  writeFile(path: string, content: string, options: WriteFileOptions): Promise<void>;
  /** Create a directory (and parents) and set its mode. */
  ensureDirectory(path: string, mode: number): Promise<void>;
  /** Home directory of the user commands run as. */
  home(): Promise<string>;
}

/**
 * Run a command and throw a CommandError when it exits non-zero.
 * Returns trimmed stdout.
 */
export async function runOrThrow(
  host: Host,
  command: string,
  args: string[],
  options?: RunOptions
): Promise<string> {
  const result = await host.run(command, args, options);
  if (!result.success) {
    throw new CommandError(
      formatCommand(command, args),
      result.exitCode,
      result.stderr || result.stdout
    );
  }
  return result.stdout;
}

/**
 * First address from `hostname -I`, for the URLs and login hints printed at
 * the end of a run. Falls back to the host label.
 */
export async function hostAddress(host: Host): Promise<string> {
  const result = await host.run("hostname", ["-I"]);
  const address = result.success ? result.stdout.trim().split(/\s+/)[0] : undefined;
  return address || host.label;
}

/**
 * The machine this process runs on.
 */
export class LocalHost implements Host {
  readonly label = "localhost";

  run(command: string, args: string[], options?: RunOptions): Promise<ExecResult> {
    return execCommand(command, args, options);
  }

  async fileExists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  readFile(path: string): Promise<string> {
    return readFile(path, "utf8");
  }

  async writeFile(path: string, content: string, options: WriteFileOptions): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, { mode: options.mode });
    // writeFile's mode is filtered by the umask and ignored for existing files
    await chmod(path, options.mode);
  }

  async ensureDirectory(path: string, mode: number): Promise<void> {
    await mkdir(path, { recursive: true, mode });
    await chmod(path, mode);
  }

  async home(): Promise<string> {
    return homedir();
  }
}
