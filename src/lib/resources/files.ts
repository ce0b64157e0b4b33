import type { Host } from "../host.js";
import type { ResourceDriver } from "../reconciler.js";

export const OWNER_ONLY_FILE = 0o600;
export const DEFAULT_FILE = 0o644;
export const OWNER_ONLY_DIRECTORY = 0o700;

export interface ConfigFileSpec {
  content: string;
  /** Credentials inside: written owner read/write only. */
  sensitive: boolean;
}

export interface DirectorySpec {
  mode: number;
}

/**
 * Files written once with default content. Resource name is the path. An
 * existing file is left untouched even when the default content changed.
 */
export function configFileDriver(host: Host): ResourceDriver<ConfigFileSpec> {
  return {
    kind: "config-file",
    artifact: true,

    async probe(resource) {
      return (await host.fileExists(resource.name)) ? "present-running" : "absent";
    },

    async create(resource) {
      const { content, sensitive } = resource.desiredSpec;
      await host.writeFile(resource.name, content, {
        mode: sensitive ? OWNER_ONLY_FILE : DEFAULT_FILE,
      });
    },
  };
}

export function directoryDriver(host: Host): ResourceDriver<DirectorySpec> {
  return {
    kind: "directory",
    artifact: true,

    async probe(resource) {
      return (await host.fileExists(resource.name)) ? "present-running" : "absent";
    },

    async create(resource) {
      await host.ensureDirectory(resource.name, resource.desiredSpec.mode);
    },
  };
}
