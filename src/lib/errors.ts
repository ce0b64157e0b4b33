/**
 * Error types raised while provisioning.
 *
 * Commands throw these; only the CLI entry point turns them into log lines
 * and exit codes. Nothing is retried.
 */

export class ProvisionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The environment is not fit for provisioning (wrong OS, no network, missing
 * Docker). Raised before anything is changed.
 */
export class PreconditionError extends ProvisionError {}

/**
 * Missing or invalid configuration values.
 */
export class ConfigError extends ProvisionError {
  readonly keys: string[];

  constructor(message: string, keys: string[] = []) {
    super(message);
    this.keys = keys;
  }
}

/**
 * An external command exited non-zero.
 */
export class CommandError extends ProvisionError {
  readonly command: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stderr: string) {
    super(
      stderr
        ? `\`${command}\` exited with status ${exitCode}: ${stderr}`
        : `\`${command}\` exited with status ${exitCode}`
    );
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * A reconciliation step ended in `failed`. Resources reconciled before it are
 * left as they are.
 */
export class ReconcileError extends ProvisionError {
  readonly stage: string;
  readonly reason: string;

  constructor(stage: string, reason: string) {
    super(`Step "${stage}" failed: ${reason}`);
    this.stage = stage;
    this.reason = reason;
  }
}

/**
 * Render any thrown value as a single line.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
