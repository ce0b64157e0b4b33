import { runOrThrow, type Host } from "../host.js";

/**
 * Structured queries against the Docker CLI. Each list command is asked for
 * JSON so names are compared in code, exactly, instead of grepping output.
 */

export interface ContainerSummary {
  id: string;
  names: string[];
  image: string;
  state: string;
}

export interface NetworkSummary {
  id: string;
  name: string;
  driver: string;
}

export interface ComposeProjectSummary {
  name: string;
  status: string;
  configFiles: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value : "";
}

/**
 * `--format '{{json .}}'` prints one JSON document per line.
 */
export function parseJsonLines(output: string): Record<string, unknown>[] {
  const records: Record<string, unknown>[] = [];
  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const parsed: unknown = JSON.parse(trimmed);
    if (isRecord(parsed)) records.push(parsed);
  }
  return records;
}

export async function listContainers(host: Host): Promise<ContainerSummary[]> {
  const stdout = await runOrThrow(host, "docker", [
    "ps",
    "--all",
    "--no-trunc",
    "--format",
    "{{json .}}",
  ]);
  return parseJsonLines(stdout).map((record) => ({
    id: stringField(record, "ID"),
    names: stringField(record, "Names")
      .split(",")
      .map((name) => name.trim())
      .filter(Boolean),
    image: stringField(record, "Image"),
    state: stringField(record, "State").toLowerCase(),
  }));
}

export async function findContainer(
  host: Host,
  name: string
): Promise<ContainerSummary | undefined> {
  const containers = await listContainers(host);
  return containers.find((container) => container.names.includes(name));
}

export async function listNetworks(host: Host): Promise<NetworkSummary[]> {
  const stdout = await runOrThrow(host, "docker", [
    "network",
    "ls",
    "--format",
    "{{json .}}",
  ]);
  return parseJsonLines(stdout).map((record) => ({
    id: stringField(record, "ID"),
    name: stringField(record, "Name"),
    driver: stringField(record, "Driver"),
  }));
}

/**
 * `docker compose ls --format json` prints a single JSON array.
 */
export async function listComposeProjects(host: Host): Promise<ComposeProjectSummary[]> {
  const stdout = await runOrThrow(host, "docker", [
    "compose",
    "ls",
    "--all",
    "--format",
    "json",
  ]);
  if (!stdout.trim()) return [];

  const parsed: unknown = JSON.parse(stdout);
  if (!Array.isArray(parsed)) {
    throw new Error("unexpected output from `docker compose ls`");
  }
  return parsed.filter(isRecord).map((record) => ({
    name: stringField(record, "Name"),
    status: stringField(record, "Status").toLowerCase(),
    configFiles: stringField(record, "ConfigFiles"),
  }));
}

/**
 * Most recent log lines of a container, stdout and stderr together.
 */
export async function containerLogs(host: Host, name: string, tail: number): Promise<string> {
  const result = await host.run("docker", ["logs", "--tail", String(tail), name]);
  if (!result.success) {
    throw new Error(result.stderr || `docker logs exited with status ${result.exitCode}`);
  }
  return [result.stdout, result.stderr].filter(Boolean).join("\n");
}
