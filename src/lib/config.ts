import { randomBytes } from "node:crypto";
import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { ConfigError } from "./errors.js";
import type { DeployMode, HardenConfig, StackConfig, TargetConfig } from "./types.js";

export const DEFAULT_CONFIG_FILE = "setup.conf";

/**
 * Keys of setup.conf in resolution order: a value may refer to any key
 * listed before it (`$BASE_PATH/addons`) and to `$HOME`.
 */
const STACK_KEYS = [
  "ODOO_VERSION",
  "ODOO_CONTAINER_NAME",
  "DB_CONTAINER_NAME",
  "DB_IMAGE",
  "DB_USER",
  "DB_PASSWORD",
  "ODOO_MASTER_PASSWORD",
  "ODOO_PORT",
  "ODOO_NETWORK",
  "DEPLOY_MODE",
  "COMPOSE_PROJECT",
  "BASE_PATH",
  "ODOO_ADDONS_PATH",
  "ODOO_CONFIG_PATH",
  "DB_DATA_PATH",
  "BACKUP_PATH",
] as const;

type StackKey = (typeof STACK_KEYS)[number];

const DEFAULTS: Record<Exclude<StackKey, "DB_PASSWORD" | "ODOO_MASTER_PASSWORD">, string> = {
  ODOO_VERSION: "16.0",
  ODOO_CONTAINER_NAME: "odoo",
  DB_CONTAINER_NAME: "db",
  DB_IMAGE: "postgres:15",
  DB_USER: "odoo",
  ODOO_PORT: "8069",
  ODOO_NETWORK: "odoo-net",
  DEPLOY_MODE: "containers",
  COMPOSE_PROJECT: "odoo",
  BASE_PATH: "$HOME/odoo-data",
  ODOO_ADDONS_PATH: "$BASE_PATH/addons",
  ODOO_CONFIG_PATH: "$BASE_PATH/config",
  DB_DATA_PATH: "$BASE_PATH/postgres",
  BACKUP_PATH: "$BASE_PATH/backups",
};

const DEPLOY_MODES: readonly DeployMode[] = ["containers", "compose"];
const DOCKER_NAME = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;
const COMPOSE_PROJECT_NAME = /^[a-z0-9][a-z0-9_-]*$/;

/**
 * Parse a KEY=VALUE file. Blank lines and `#` comments are skipped, quotes
 * around values are removed and a comment after the value is dropped.
 */
export function parseKeyValue(content: string): Record<string, string> {
  const env: Record<string, string> = {};

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }

    const match = trimmed.match(/^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/);
    if (!match?.[1] || match[2] === undefined) {
      continue;
    }

    const key = match[1];
    const rest = match[2];
    const quote = rest[0];
    let value: string;

    if (quote === '"' || quote === "'") {
      const end = rest.indexOf(quote, 1);
      value = end === -1 ? rest.slice(1) : rest.slice(1, end);
    } else {
      value = rest.replace(/\s+#.*$/, "").trim();
    }

    env[key] = value;
  }

  return env;
}

/**
 * Replace `$NAME` and `${NAME}` with known values; unknown names stay as
 * written. A leading `~/` means the home directory.
 */
export function expandValue(value: string, vars: Record<string, string>): string {
  const home = vars.HOME;
  const withHome =
    home !== undefined && (value === "~" || value.startsWith("~/"))
      ? home + value.slice(1)
      : value;

  return withHome.replace(
    /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g,
    (whole, braced: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare ?? "";
      return vars[name] ?? whole;
    }
  );
}

export function generatePassword(): string {
  return randomBytes(24).toString("base64url");
}

/**
 * Default setup.conf with fresh random credentials.
 */
export function renderDefaultSetupConfig(generate: () => string = generatePassword): string {
  return `# Odoo stack configuration
# Created on first run. Edit freely: existing values are never regenerated.

ODOO_VERSION="${DEFAULTS.ODOO_VERSION}"             # Odoo image tag
ODOO_CONTAINER_NAME="${DEFAULTS.ODOO_CONTAINER_NAME}"
DB_CONTAINER_NAME="${DEFAULTS.DB_CONTAINER_NAME}"
DB_IMAGE="${DEFAULTS.DB_IMAGE}"
DB_USER="${DEFAULTS.DB_USER}"
DB_PASSWORD="${generate()}"
ODOO_MASTER_PASSWORD="${generate()}"
ODOO_PORT="${DEFAULTS.ODOO_PORT}"                 # Published port on the host
ODOO_NETWORK="${DEFAULTS.ODOO_NETWORK}"
DEPLOY_MODE="${DEFAULTS.DEPLOY_MODE}"        # containers | compose
COMPOSE_PROJECT="${DEFAULTS.COMPOSE_PROJECT}"

# Paths on the target host
BASE_PATH="${DEFAULTS.BASE_PATH}"
ODOO_ADDONS_PATH="${DEFAULTS.ODOO_ADDONS_PATH}"
ODOO_CONFIG_PATH="${DEFAULTS.ODOO_CONFIG_PATH}"
DB_DATA_PATH="${DEFAULTS.DB_DATA_PATH}"
BACKUP_PATH="${DEFAULTS.BACKUP_PATH}"
`;
}

function isDeployMode(value: string): value is DeployMode {
  return DEPLOY_MODES.some((mode) => mode === value);
}

/**
 * Merge file values with environment overrides, expand references and
 * validate. Environment variables take precedence over the file.
 */
export function resolveStackConfig(
  fileValues: Record<string, string>,
  home: string,
  env: NodeJS.ProcessEnv = process.env
): StackConfig {
  const vars: Record<string, string> = { HOME: home };
  const missing: string[] = [];

  for (const key of STACK_KEYS) {
    const raw =
      env[key] ??
      fileValues[key] ??
      (key === "DB_PASSWORD" || key === "ODOO_MASTER_PASSWORD" ? undefined : DEFAULTS[key]);
    if (raw === undefined || raw.trim() === "") {
      missing.push(key);
      continue;
    }
    vars[key] = expandValue(raw.trim(), vars);
  }

  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required configuration: ${missing.join(", ")}. ` +
        `Set them in ${DEFAULT_CONFIG_FILE} or as environment variables.`,
      missing
    );
  }

  const value = (key: StackKey): string => vars[key] ?? "";
  const invalid: string[] = [];

  const port = Number(value("ODOO_PORT"));
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    invalid.push("ODOO_PORT");
  }

  const deployMode = value("DEPLOY_MODE");
  if (!isDeployMode(deployMode)) {
    invalid.push("DEPLOY_MODE");
  }

  for (const key of ["ODOO_CONTAINER_NAME", "DB_CONTAINER_NAME", "ODOO_NETWORK"] as const) {
    if (!DOCKER_NAME.test(value(key))) invalid.push(key);
  }
  if (!COMPOSE_PROJECT_NAME.test(value("COMPOSE_PROJECT"))) {
    invalid.push("COMPOSE_PROJECT");
  }
  if (value("ODOO_CONTAINER_NAME") === value("DB_CONTAINER_NAME")) {
    invalid.push("DB_CONTAINER_NAME");
  }

  for (const key of [
    "BASE_PATH",
    "ODOO_ADDONS_PATH",
    "ODOO_CONFIG_PATH",
    "DB_DATA_PATH",
    "BACKUP_PATH",
  ] as const) {
    if (!value(key).startsWith("/")) invalid.push(key);
  }

  if (invalid.length > 0 || !isDeployMode(deployMode)) {
    throw new ConfigError(`Invalid configuration: ${invalid.join(", ")}`, invalid);
  }

  return {
    odooVersion: value("ODOO_VERSION"),
    odooContainerName: value("ODOO_CONTAINER_NAME"),
    dbContainerName: value("DB_CONTAINER_NAME"),
    dbImage: value("DB_IMAGE"),
    dbUser: value("DB_USER"),
    dbPassword: value("DB_PASSWORD"),
    odooMasterPassword: value("ODOO_MASTER_PASSWORD"),
    odooPort: port,
    odooNetwork: value("ODOO_NETWORK"),
    deployMode,
    composeProject: value("COMPOSE_PROJECT"),
    basePath: value("BASE_PATH"),
    odooAddonsPath: value("ODOO_ADDONS_PATH"),
    odooConfigPath: value("ODOO_CONFIG_PATH"),
    dbDataPath: value("DB_DATA_PATH"),
    backupPath: value("BACKUP_PATH"),
  };
}

/**
 * Load setup.conf and resolve it against the target host's home directory.
 */
export async function loadStackConfig(
  configPath: string,
  home: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<StackConfig> {
  const content = await readFile(configPath, "utf8");
  return resolveStackConfig(parseKeyValue(content), home, env);
}

/**
 * Where commands run. Without TARGET_HOST everything happens locally.
 */
export function loadTargetConfig(env: NodeJS.ProcessEnv = process.env): TargetConfig {
  const host = env.TARGET_HOST?.trim() ?? "";
  const user = env.TARGET_USER?.trim() || "root";
  const rawPort = env.TARGET_PORT?.trim();

  if (!rawPort) {
    return { host, user };
  }

  const port = Number(rawPort);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid TARGET_PORT: ${rawPort}`, ["TARGET_PORT"]);
  }
  return { host, user, port };
}

const USERNAME = /^[a-z_][a-z0-9_-]{0,31}$/;
const PUBLIC_KEY =
  /^(ssh-(rsa|ed25519|dss)|ecdsa-sha2-nistp(256|384|521)|sk-(ssh-ed25519|ecdsa-sha2-nistp256)@openssh\.com)\s+[A-Za-z0-9+/]+={0,3}(\s+.*)?$/;

export function isPublicKey(text: string): boolean {
  return PUBLIC_KEY.test(text.trim());
}

/**
 * Expand ~ to home directory
 */
export function expandHomePath(path: string): string {
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  if (path === "~") {
    return homedir();
  }
  return path;
}

export interface HardenArgs {
  username?: string;
  publicKey?: string;
}

/**
 * Hardening inputs from command-line arguments, falling back to
 * HARDEN_USER / HARDEN_SSH_PUBKEY. The key may be given inline or as a path
 * to a .pub file on this machine.
 */
export async function loadHardenConfig(
  args: HardenArgs,
  env: NodeJS.ProcessEnv = process.env
): Promise<HardenConfig> {
  const username = (args.username ?? env.HARDEN_USER ?? "").trim();
  const keySource = (args.publicKey ?? env.HARDEN_SSH_PUBKEY ?? "").trim();

  const missing: string[] = [];
  if (!username) missing.push("HARDEN_USER");
  if (!keySource) missing.push("HARDEN_SSH_PUBKEY");
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required configuration: ${missing.join(", ")}. ` +
        "Pass them as arguments or set them as environment variables.",
      missing
    );
  }

  if (!USERNAME.test(username) || username === "root") {
    throw new ConfigError(`Invalid username: ${username}`, ["HARDEN_USER"]);
  }

  let publicKey = keySource;
  if (!isPublicKey(keySource)) {
    const keyPath = expandHomePath(keySource);
    try {
      publicKey = (await readFile(keyPath, "utf8")).trim();
    } catch {
      throw new ConfigError(`SSH public key file not found: ${keyPath}`, ["HARDEN_SSH_PUBKEY"]);
    }
    if (!isPublicKey(publicKey)) {
      throw new ConfigError(`Not an OpenSSH public key: ${keyPath}`, ["HARDEN_SSH_PUBKEY"]);
    }
  }

  return {
    username,
    publicKey,
    adminGroup: env.ADMIN_GROUP?.trim() || "sudo",
    sshService: env.SSH_SERVICE?.trim() || "ssh",
    sshdConfigPath: env.SSHD_CONFIG?.trim() || "/etc/ssh/sshd_config",
    firewallRule: env.FIREWALL_SSH_RULE?.trim() || "OpenSSH",
    connectivityProbe: env.CONNECTIVITY_PROBE?.trim() || "8.8.8.8",
  };
}
