import { LocalHost, hostAddress, type Host } from "../lib/host.js";
import { log } from "../lib/logger.js";
import { PreconditionError, errorMessage } from "../lib/errors.js";
import { defineResource, reconcile, type ReconcileResult } from "../lib/reconciler.js";
import {
  applyPlan,
  checkPlan,
  emptyReport,
  planStep,
  printReport,
  recordFail,
  recordPass,
  recordWarn,
  summarize,
  type PlanStep,
} from "../lib/plan.js";
import { renderDefaultSetupConfig } from "../lib/config.js";
import { buildComposeConfig, renderComposeFile, ODOO_INTERNAL_PORT } from "../lib/compose.js";
import { checkMemory, requireDocker, requireUbuntu } from "../lib/preflight.js";
import { containerDriver, type ContainerSpec } from "../lib/resources/container.js";
import { networkDriver } from "../lib/resources/network.js";
import { composeStackDriver } from "../lib/resources/compose-stack.js";
import {
  OWNER_ONLY_DIRECTORY,
  configFileDriver,
  directoryDriver,
} from "../lib/resources/files.js";
import { groupMembershipDriver } from "../lib/resources/account.js";
import { containerLogs, findContainer } from "../lib/resources/docker.js";
import type { StackConfig, StatusReport } from "../lib/types.js";

/** Log lines inspected per container in status mode. */
export const LOG_TAIL = 200;
const LOG_PROBLEM = /\b(error|warning|fatal|critical)\b/i;
const MAX_LOG_EXCERPT = 5;

/**
 * Create setup.conf with random credentials when it does not exist yet. An
 * existing file is loaded as is, never regenerated.
 */
export async function ensureSetupConfig(
  path: string,
  host: Host = new LocalHost()
): Promise<ReconcileResult> {
  const result = await reconcile(
    defineResource("config-file", path, {
      content: renderDefaultSetupConfig(),
      sensitive: true,
    }),
    configFileDriver(host)
  );

  switch (result.outcome.status) {
    case "created":
      log.info(`Configuration file not found. Created ${path} with random credentials.`);
      break;
    case "failed":
      throw new PreconditionError(`Cannot create ${path}: ${result.outcome.reason}`);
    default:
      log.info(`Loading configuration from ${path}`);
  }
  return result;
}

export function renderOdooConf(config: StackConfig): string {
  return `[options]
admin_passwd = ${config.odooMasterPassword}
db_host = ${config.dbContainerName}
db_port = 5432
db_user = ${config.dbUser}
db_password = ${config.dbPassword}
addons_path = /mnt/extra-addons
`;
}

export function odooConfFile(config: StackConfig): string {
  return `${config.odooConfigPath}/odoo.conf`;
}

export function composeFile(config: StackConfig): string {
  return `${config.basePath}/docker-compose.yml`;
}

function databaseContainer(config: StackConfig): ContainerSpec {
  return {
    image: config.dbImage,
    network: config.odooNetwork,
    restart: "always",
    environment: {
      POSTGRES_USER: config.dbUser,
      POSTGRES_PASSWORD: config.dbPassword,
      POSTGRES_DB: "postgres",
    },
    ports: [],
    volumes: [{ source: config.dbDataPath, target: "/var/lib/postgresql/data" }],
  };
}

function odooContainer(config: StackConfig): ContainerSpec {
  return {
    image: `odoo:${config.odooVersion}`,
    network: config.odooNetwork,
    restart: "always",
    environment: {},
    ports: [{ host: config.odooPort, container: ODOO_INTERNAL_PORT }],
    volumes: [
      { source: config.odooAddonsPath, target: "/mnt/extra-addons" },
      { source: odooConfFile(config), target: "/etc/odoo/odoo.conf" },
    ],
  };
}

/**
 * Every resource of the stack, in the order it is reconciled. `user` adds
 * docker group membership for a non-root operator.
 */
export function buildStackPlan(
  host: Host,
  config: StackConfig,
  options: { user?: string } = {}
): PlanStep[] {
  const steps: PlanStep[] = [];
  const directories = directoryDriver(host);
  const files = configFileDriver(host);

  if (options.user && options.user !== "root") {
    steps.push(
      planStep(
        "Docker group permissions",
        defineResource("group-membership", `docker:${options.user}`, {
          user: options.user,
          group: "docker",
        }),
        groupMembershipDriver(host),
        { level: "info", message: `User ${options.user} is already in the docker group.` }
      )
    );
  }

  const dataDirectories: Array<[string, string]> = [
    ["addons", config.odooAddonsPath],
    ["config", config.odooConfigPath],
    ["postgres", config.dbDataPath],
    ["backups", config.backupPath],
  ];
  for (const [label, path] of dataDirectories) {
    steps.push(
      planStep(
        `Data directory (${label})`,
        defineResource("directory", path, { mode: OWNER_ONLY_DIRECTORY }),
        directories
      )
    );
  }

  steps.push(
    planStep(
      "Odoo configuration file",
      defineResource("config-file", odooConfFile(config), {
        content: renderOdooConf(config),
        sensitive: true,
      }),
      files,
      { level: "info", message: "odoo.conf already exists; leaving it unchanged." }
    )
  );

  if (config.deployMode === "compose") {
    const file = composeFile(config);
    steps.push(
      planStep(
        "Compose file",
        defineResource("config-file", file, {
          content: renderComposeFile(buildComposeConfig(config)),
          sensitive: true,
        }),
        files,
        { level: "info", message: "docker-compose.yml already exists; leaving it unchanged." }
      ),
      planStep(
        "Compose stack",
        defineResource("compose-stack", config.composeProject, { file }),
        composeStackDriver(host)
      )
    );
    return steps;
  }

  const containers = containerDriver(host);
  steps.push(
    planStep(
      "Docker network",
      defineResource("network", config.odooNetwork, { driver: "bridge" }),
      networkDriver(host)
    ),
    planStep(
      "PostgreSQL container",
      defineResource("container", config.dbContainerName, databaseContainer(config)),
      containers
    ),
    planStep(
      "Odoo container",
      defineResource("container", config.odooContainerName, odooContainer(config)),
      containers
    )
  );
  return steps;
}

async function currentUser(host: Host): Promise<string | undefined> {
  const result = await host.run("id", ["-un"]);
  return result.success ? result.stdout.trim() : undefined;
}

/**
 * Preflight checks, then reconcile every stack resource. Throws on the first
 * failure.
 */
export async function provisionStack(
  host: Host,
  config: StackConfig
): Promise<ReconcileResult[]> {
  log.info("Running prerequisite checks...");
  await requireUbuntu(host);
  await checkMemory(host);
  await requireDocker(host);
  log.ok("Prerequisite checks passed.");
  log.blank();

  const user = await currentUser(host);
  const steps = buildStackPlan(host, config, { user });
  const results = await applyPlan(steps);

  if (results.some((r) => r.kind === "group-membership" && r.outcome.status === "created")) {
    log.warn("You must log out and log back in for the docker group change to take effect.");
  }

  const counts = summarize(results);
  const address = await hostAddress(host);
  const plural = (n: number) => (n === 1 ? "" : "s");

  log.blank();
  log.separator();
  log.success("Odoo, Docker, and PostgreSQL setup is complete!");
  log.separator();
  log.raw(
    `${counts.created} created, ${counts["started-existing"]} started, ` +
      `${counts["already-satisfied"]} already in place (${results.length} resource${plural(results.length)})`
  );
  log.raw(`Odoo:            http://${address}:${config.odooPort}`);
  log.raw(`Custom addons:   ${config.odooAddonsPath}`);
  log.raw(`Odoo config:     ${odooConfFile(config)}`);
  log.raw(`Backups:         ${config.backupPath}`);
  log.separator();

  return results;
}

/**
 * Log lines mentioning error, warning, fatal or critical.
 */
export function scanLogText(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.trimEnd())
    .filter((line) => LOG_PROBLEM.test(line));
}

function containerNames(config: StackConfig): string[] {
  return [config.dbContainerName, config.odooContainerName];
}

/**
 * Read-only health report: probes every resource and scans recent container
 * logs. Never creates or starts anything. Only a missing Docker is fatal.
 */
export async function stackStatus(host: Host, config: StackConfig): Promise<StatusReport> {
  const report = emptyReport();

  log.info(`Checking Odoo stack on ${host.label}`);
  log.blank();
  await requireDocker(host);
  recordPass(report, "Docker service is active");
  log.blank();

  log.info("Checking resources...");
  await checkPlan(buildStackPlan(host, config), report);
  log.blank();

  log.info(`Scanning the last ${LOG_TAIL} log lines of each container...`);
  for (const name of containerNames(config)) {
    try {
      if (!(await findContainer(host, name))) continue;
      const problems = scanLogText(await containerLogs(host, name, LOG_TAIL));
      if (problems.length === 0) {
        recordPass(report, `${name}: no errors in recent logs`);
      } else {
        recordWarn(report, `${name}: ${problems.length} recent log line(s) report problems`);
        for (const line of problems.slice(-MAX_LOG_EXCERPT)) {
          log.raw(`    ${line}`);
        }
      }
    } catch (error) {
      recordFail(report, `${name}: could not read logs: ${errorMessage(error)}`);
    }
  }
  log.blank();

  printReport(`Odoo stack status (${config.deployMode})`, report);
  if (report.failed === 0 && report.warnings === 0) {
    log.success("All checks passed!");
  } else if (report.failed === 0) {
    log.info("All resources are up, but some warnings to review.");
  } else {
    log.alert("Some resources are missing or stopped. Run provisioning to fix them.");
  }

  return report;
}
