/**
 * Connection target loaded from the environment.
 * When `host` is empty, commands run on the local machine.
 */
export interface TargetConfig {
  host: string;
  user: string;
  port?: number;
}

/**
 * SSH execution options
 */
export interface SSHOptions {
  host: string;
  user: string;
  port?: number;
  batchMode?: boolean;
  connectTimeout?: number;
}

/**
 * Process result, local or remote
 */
export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  success: boolean;
}

export interface RunOptions {
  stdin?: string;
}

/**
 * How the stack is laid out on the host.
 * `containers` runs each container directly, `compose` hands a generated
 * docker-compose.yml to `docker compose`.
 */
export type DeployMode = "containers" | "compose";

/**
 * Resolved stack configuration (setup.conf + environment overrides)
 */
export interface StackConfig {
  odooVersion: string;
  odooContainerName: string;
  dbContainerName: string;
  dbImage: string;
  dbUser: string;
  dbPassword: string;
  odooMasterPassword: string;
  odooPort: number;
  odooNetwork: string;
  deployMode: DeployMode;
  composeProject: string;
  basePath: string;
  odooAddonsPath: string;
  odooConfigPath: string;
  dbDataPath: string;
  backupPath: string;
}

/**
 * Inputs for first-run server hardening
 */
export interface HardenConfig {
  username: string;
  publicKey: string;
  adminGroup: string;
  sshService: string;
  sshdConfigPath: string;
  firewallRule: string;
  connectivityProbe: string;
}

/**
 * Collected status results
 */
export interface StatusReport {
  passed: number;
  failed: number;
  warnings: number;
  passedItems: string[];
  failedItems: string[];
  warnedItems: string[];
}

/**
 * Docker Compose configuration structure
 */
export interface DockerComposeConfig {
  services?: Record<string, DockerComposeService>;
  networks?: Record<string, DockerComposeNetwork>;
}

/**
 * Docker Compose service configuration
 */
export interface DockerComposeService {
  image?: string;
  container_name?: string;
  volumes?: string[];
  networks?: string[];
  restart?: string;
  environment?: Record<string, string>;
  ports?: string[];
  depends_on?: string[];
}

/**
 * Docker Compose network configuration
 */
export interface DockerComposeNetwork {
  name?: string;
}
