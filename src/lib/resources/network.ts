import { runOrThrow, type Host } from "../host.js";
import type { ResourceDriver } from "../reconciler.js";
import { listNetworks } from "./docker.js";

export interface NetworkSpec {
  driver: string;
}

/**
 * User-defined Docker networks. They have no stopped state.
 */
export function networkDriver(host: Host): ResourceDriver<NetworkSpec> {
  return {
    kind: "network",
    artifact: false,

    async probe(resource) {
      const networks = await listNetworks(host);
      return networks.some((network) => network.name === resource.name)
        ? "present-running"
        : "absent";
    },

    async create(resource) {
      await runOrThrow(host, "docker", [
        "network",
        "create",
        "--driver",
        resource.desiredSpec.driver,
        resource.name,
      ]);
    },
  };
}
