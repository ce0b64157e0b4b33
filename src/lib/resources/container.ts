import { runOrThrow, type Host } from "../host.js";
import type { ManagedResource, ObservedState, ResourceDriver } from "../reconciler.js";
import { findContainer } from "./docker.js";

export interface PortMapping {
  host: number;
  container: number;
}

export interface VolumeMount {
  source: string;
  target: string;
  readonly?: boolean;
}

export interface ContainerSpec {
  image: string;
  network?: string;
  restart: "always" | "unless-stopped" | "on-failure" | "no";
  environment: Record<string, string>;
  ports: PortMapping[];
  volumes: VolumeMount[];
}

const RUNNING_STATES = new Set(["running", "restarting"]);

/**
 * Arguments for `docker run` that create the container detached.
 */
export function buildRunArgs(name: string, spec: Readonly<ContainerSpec>): string[] {
  const args = ["run", "--detach", "--name", name];

  if (spec.network) {
    args.push("--network", spec.network);
  }
  args.push(`--restart=${spec.restart}`);

  for (const [key, value] of Object.entries(spec.environment)) {
    args.push("--env", `${key}=${value}`);
  }
  for (const port of spec.ports) {
    args.push("--publish", `${port.host}:${port.container}`);
  }
  for (const volume of spec.volumes) {
    const suffix = volume.readonly ? ":ro" : "";
    args.push("--volume", `${volume.source}:${volume.target}${suffix}`);
  }

  args.push(spec.image);
  return args;
}

/**
 * Docker containers. A stopped container is started again, never removed and
 * recreated, so its writable layer survives. A paused one counts as stopped
 * and is unpaused.
 */
export function containerDriver(host: Host): ResourceDriver<ContainerSpec> {
  return {
    kind: "container",
    artifact: false,

    async probe(resource: ManagedResource<ContainerSpec>): Promise<ObservedState> {
      const container = await findContainer(host, resource.name);
      if (!container) return "absent";
      return RUNNING_STATES.has(container.state) ? "present-running" : "present-stopped";
    },

    async create(resource: ManagedResource<ContainerSpec>): Promise<void> {
      await runOrThrow(host, "docker", buildRunArgs(resource.name, resource.desiredSpec));
    },

    async start(resource: ManagedResource<ContainerSpec>): Promise<void> {
      const container = await findContainer(host, resource.name);
      const verb = container?.state === "paused" ? "unpause" : "start";
      await runOrThrow(host, "docker", [verb, resource.name]);
    },
  };
}
