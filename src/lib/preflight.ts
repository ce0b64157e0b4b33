import type { Host } from "./host.js";
import { log } from "./logger.js";
import { PreconditionError } from "./errors.js";

/** Below this much RAM Odoo is expected to be slow. */
export const MIN_MEMORY_KIB = 2 * 1024 * 1024;

/**
 * Distribution id from /etc/os-release (`ID=ubuntu`).
 */
export function parseOsRelease(content: string): { id: string; prettyName: string } {
  const fields = new Map<string, string>();
  for (const line of content.split("\n")) {
    const match = line.trim().match(/^([A-Z_]+)=(.*)$/);
    if (match?.[1] && match[2] !== undefined) {
      fields.set(match[1], match[2].replace(/^["']|["']$/g, ""));
    }
  }
  return {
    id: (fields.get("ID") ?? "").toLowerCase(),
    prettyName: fields.get("PRETTY_NAME") ?? fields.get("NAME") ?? "unknown",
  };
}

/**
 * MemTotal from /proc/meminfo, in KiB.
 */
export function parseMemTotal(content: string): number | undefined {
  const match = content.match(/^MemTotal:\s+(\d+)\s+kB/m);
  return match?.[1] ? Number(match[1]) : undefined;
}

export async function requireUbuntu(host: Host): Promise<void> {
  let content: string;
  try {
    content = await host.readFile("/etc/os-release");
  } catch {
    throw new PreconditionError("Cannot read /etc/os-release; this tool supports Ubuntu only.");
  }
  const release = parseOsRelease(content);
  if (release.id !== "ubuntu") {
    throw new PreconditionError(
      `This tool supports Ubuntu only (found ${release.prettyName}).`
    );
  }
  log.ok(`Operating system: ${release.prettyName}`);
}

/**
 * Low memory is only worth a warning.
 */
export async function checkMemory(host: Host): Promise<void> {
  let total: number | undefined;
  try {
    total = parseMemTotal(await host.readFile("/proc/meminfo"));
  } catch {
    total = undefined;
  }

  if (total === undefined) {
    log.warn("Could not determine total memory");
  } else if (total < MIN_MEMORY_KIB) {
    log.warn(
      `Less than 2GB of RAM detected (${Math.round(total / 1024)} MiB). Odoo may run slowly.`
    );
  } else {
    log.ok(`Memory: ${Math.round(total / 1024)} MiB`);
  }
}

export async function requireDocker(host: Host): Promise<void> {
  const version = await host.run("docker", ["--version"]);
  if (!version.success) {
    throw new PreconditionError(
      "Docker is not installed. Install Docker Engine and run again."
    );
  }
  const active = await host.run("systemctl", ["is-active", "--quiet", "docker"]);
  if (!active.success) {
    throw new PreconditionError(
      "Docker service is not running. Start it with 'sudo systemctl start docker'."
    );
  }
  log.ok(version.stdout);
}

export async function requireRoot(host: Host): Promise<void> {
  const result = await host.run("id", ["-u"]);
  if (!result.success || result.stdout.trim() !== "0") {
    throw new PreconditionError("This command must be run as root.");
  }
}

export async function requireInternet(host: Host, probe: string): Promise<void> {
  const result = await host.run("ping", ["-c", "1", "-W", "3", probe]);
  if (!result.success) {
    throw new PreconditionError(
      `No internet connection (could not reach ${probe}). Check the network settings.`
    );
  }
  log.ok("Internet connection is active");
}
