import { runOrThrow, type Host } from "../host.js";
import type { ResourceDriver } from "../reconciler.js";
import { OWNER_ONLY_DIRECTORY, OWNER_ONLY_FILE } from "./files.js";

export interface AccountSpec {
  /** OpenSSH public key line installed into authorized_keys. */
  publicKey: string;
}

export interface GroupMembershipSpec {
  user: string;
  group: string;
}

/**
 * Home directory from a `getent passwd` entry (sixth field).
 */
export function parsePasswdHome(entry: string): string {
  const home = entry.trim().split(":")[5];
  if (!home) {
    throw new Error(`unexpected passwd entry: ${entry.trim()}`);
  }
  return home;
}

/**
 * Login accounts with key-only SSH access. An existing account is left alone,
 * its keys included.
 */
export function accountDriver(host: Host): ResourceDriver<AccountSpec> {
  return {
    kind: "os-account",
    artifact: false,

    async probe(resource) {
      const result = await host.run("id", ["-u", resource.name]);
      return result.success ? "present-running" : "absent";
    },

    async create(resource) {
      const name = resource.name;
      await runOrThrow(host, "adduser", ["--disabled-password", "--gecos", "", name]);

      const home = parsePasswdHome(await runOrThrow(host, "getent", ["passwd", name]));
      const sshDir = `${home}/.ssh`;
      await host.ensureDirectory(sshDir, OWNER_ONLY_DIRECTORY);
      await host.writeFile(`${sshDir}/authorized_keys`, `${resource.desiredSpec.publicKey.trim()}\n`, {
        mode: OWNER_ONLY_FILE,
      });
      await runOrThrow(host, "chown", ["-R", `${name}:${name}`, sshDir]);
    },
  };
}

/**
 * Supplementary group membership, named `<group>:<user>`.
 */
export function groupMembershipDriver(host: Host): ResourceDriver<GroupMembershipSpec> {
  return {
    kind: "group-membership",
    artifact: false,

    async probe(resource) {
      const { user, group } = resource.desiredSpec;
      const groups = await runOrThrow(host, "id", ["-nG", user]);
      return groups.split(/\s+/).includes(group) ? "present-running" : "absent";
    },

    async create(resource) {
      const { user, group } = resource.desiredSpec;
      await runOrThrow(host, "usermod", ["-aG", group, user]);
    },
  };
}
