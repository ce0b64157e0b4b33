import { execCommand, formatCommand, shellQuote } from "./exec.js";
import { CommandError } from "./errors.js";
import type { Host, WriteFileOptions } from "./host.js";
import type { ExecResult, RunOptions, SSHOptions } from "./types.js";

/**
 * Build SSH command arguments from options
 */
export function buildSSHArgs(options: SSHOptions): string[] {
  const args: string[] = [];

  args.push("-o", "LogLevel=ERROR");
  args.push("-o", "StrictHostKeyChecking=no");
  args.push("-o", "UserKnownHostsFile=/dev/null");

  // No pseudo-terminal, quiet mode: keeps MOTD and banners out of stdout
  args.push("-T");
  args.push("-q");

  if (options.batchMode) {
    args.push("-o", "BatchMode=yes");
  }

  if (options.connectTimeout) {
    args.push("-o", `ConnectTimeout=${options.connectTimeout}`);
  }

  if (options.port) {
    args.push("-p", String(options.port));
  }

  args.push(`${options.user}@${options.host}`);

  return args;
}

/**
 * Execute a shell command line on the remote host
 */
export function sshExec(
  commandLine: string,
  options: SSHOptions,
  stdinContent?: string
): Promise<ExecResult> {
  return execCommand("ssh", [...buildSSHArgs(options), commandLine], {
    stdin: stdinContent,
  });
}

/**
 * Filter MOTD from SSH output: for single-value commands like `echo $HOME`
 * the value is the last non-empty line.
 */
export function filterMOTDFromOutput(output: string): string {
  const lines = output
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l);
  return lines[lines.length - 1] ?? "";
}

/**
 * A remote machine reached through the `ssh` client. File operations are
 * shell commands on the remote side; content travels over stdin.
 */
export class SshHost implements Host {
  readonly label: string;
  private homeCache: string | null = null;

  constructor(private readonly options: SSHOptions) {
    this.label = `${options.user}@${options.host}`;
  }

  run(command: string, args: string[], options?: RunOptions): Promise<ExecResult> {
    return sshExec(formatCommand(command, args), this.options, options?.stdin);
  }

  async fileExists(path: string): Promise<boolean> {
    const result = await sshExec(`test -e ${shellQuote(path)}`, this.options);
    return result.success;
  }

  async readFile(path: string): Promise<string> {
    const command = `cat ${shellQuote(path)}`;
    const result = await sshExec(command, this.options);
    if (!result.success) {
      throw new CommandError(command, result.exitCode, result.stderr);
    }
    return result.stdout;
  }

  async writeFile(path: string, content: string, options: WriteFileOptions): Promise<void> {
    const quoted = shellQuote(path);
    const mode = options.mode.toString(8);
    // umask 077 keeps the file private between creation and chmod
    const command = [
      `mkdir -p "$(dirname ${quoted})"`,
      `(umask 077 && cat > ${quoted})`,
      `chmod ${mode} ${quoted}`,
    ].join(" && ");
    const result = await sshExec(command, this.options, content);
    if (!result.success) {
      throw new CommandError(command, result.exitCode, result.stderr);
    }
  }

  async ensureDirectory(path: string, mode: number): Promise<void> {
    const quoted = shellQuote(path);
    const command = `mkdir -p ${quoted} && chmod ${mode.toString(8)} ${quoted}`;
    const result = await sshExec(command, this.options);
    if (!result.success) {
      throw new CommandError(command, result.exitCode, result.stderr);
    }
  }

  async home(): Promise<string> {
    if (this.homeCache === null) {
      const result = await sshExec("echo $HOME", this.options);
      if (!result.success) {
        throw new CommandError("echo $HOME", result.exitCode, result.stderr);
      }
      this.homeCache = filterMOTDFromOutput(result.stdout);
    }
    return this.homeCache;
  }
}

/**
 * Check if SSH connection is possible
 */
export async function sshTestConnection(options: SSHOptions): Promise<boolean> {
  const result = await sshExec("echo OK", {
    ...options,
    batchMode: true,
    connectTimeout: 5,
  });
  return result.success && filterMOTDFromOutput(result.stdout) === "OK";
}
