import { runOrThrow, type Host } from "../host.js";
import { CommandError } from "../errors.js";
import type { ObservedState, ResourceDriver } from "../reconciler.js";

export interface FirewallRuleSpec {
  action: "allow" | "limit";
}

export type FirewallSpec = Record<string, never>;

/** Exit status of a shell that could not find the command. */
const COMMAND_NOT_FOUND = 127;

/**
 * Rules as `ufw show added` lists them, one `ufw <action> <rule>` per line.
 * Unlike `ufw status`, this works while the firewall is still inactive.
 */
export function parseAddedRules(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.startsWith("ufw "));
}

/**
 * Reads the `Status:` line of `ufw status`.
 */
export function parseFirewallStatus(output: string): ObservedState {
  const match = output.match(/^Status:\s*(\w+)/m);
  if (!match?.[1]) {
    throw new Error(`unrecognised \`ufw status\` output: ${output.slice(0, 80)}`);
  }
  return match[1].toLowerCase() === "active" ? "present-running" : "present-stopped";
}

/**
 * Firewall rules, named by the rule argument (`OpenSSH`, `8069/tcp`).
 */
export function firewallRuleDriver(host: Host): ResourceDriver<FirewallRuleSpec> {
  return {
    kind: "firewall-rule",
    artifact: false,

    async probe(resource) {
      const stdout = await runOrThrow(host, "ufw", ["show", "added"]);
      const wanted = `ufw ${resource.desiredSpec.action} ${resource.name}`;
      return parseAddedRules(stdout).includes(wanted) ? "present-running" : "absent";
    },

    async create(resource) {
      await runOrThrow(host, "ufw", [resource.desiredSpec.action, resource.name]);
    },
  };
}

/**
 * The firewall itself: inactive is the stopped state, enabling starts it.
 * Installing ufw is out of reach, so an absent firewall cannot be created.
 */
export function firewallDriver(host: Host): ResourceDriver<FirewallSpec> {
  return {
    kind: "firewall",
    artifact: false,

    async probe() {
      const result = await host.run("ufw", ["status"]);
      if (result.exitCode === COMMAND_NOT_FOUND) return "absent";
      if (!result.success) {
        throw new CommandError("ufw status", result.exitCode, result.stderr);
      }
      return parseFirewallStatus(result.stdout);
    },

    async create(resource) {
      throw new Error(`${resource.name} is not installed on this host; install it and run again`);
    },

    async start() {
      await runOrThrow(host, "ufw", ["--force", "enable"]);
    },
  };
}
