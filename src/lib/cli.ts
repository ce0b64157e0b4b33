import { DEFAULT_CONFIG_FILE } from "./config.js";

const COMMANDS = ["provision", "status", "harden"] as const;
type Command = (typeof COMMANDS)[number];

export interface CliArgs {
  command: Command;
  configPath: string;
  positional: string[];
}

export function usage(): string {
  return `Usage: odoo-provision [command] [options]

Commands:
  provision                 Create or start the Odoo stack (default)
  status                    Read-only health report of the stack
  harden <user> <pubkey>    First-run hardening of a fresh server (as root)

Options:
  --config <path>           Stack configuration file (default: ${DEFAULT_CONFIG_FILE})

Environment Variables:
  TARGET_HOST               Provision a remote server over SSH instead of this machine
  TARGET_USER               SSH user for TARGET_HOST (default: root)
  TARGET_PORT               SSH port for TARGET_HOST
  HARDEN_USER               Username for harden, when not given as argument
  HARDEN_SSH_PUBKEY         Public key (or path to a .pub file) for harden

Examples:
  odoo-provision
  odoo-provision status
  TARGET_HOST=192.168.1.100 odoo-provision provision --config ./prod.conf
  sudo odoo-provision harden deploy ~/.ssh/id_ed25519.pub`;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export class UsageError extends Error {}

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let configPath = DEFAULT_CONFIG_FILE;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--config") {
      const value = argv[++i];
      if (!value) throw new UsageError("--config requires a path");
      configPath = value;
    } else if (arg.startsWith("--config=")) {
      configPath = arg.slice("--config=".length);
    } else if (arg === "-h" || arg === "--help") {
      throw new UsageError("");
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [first, ...rest] = positional;
  if (first === undefined) {
    return { command: "provision", configPath, positional: [] };
  }
  if (!isCommand(first)) {
    throw new UsageError(`Unknown command: ${first}`);
  }
  return { command: first, configPath, positional: rest };
}
