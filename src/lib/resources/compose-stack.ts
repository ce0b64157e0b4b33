import { runOrThrow, type Host } from "../host.js";
import type { ObservedState, ResourceDriver } from "../reconciler.js";
import { listComposeProjects } from "./docker.js";

export interface ComposeStackSpec {
  /** Path of the docker-compose.yml on the host. */
  file: string;
}

/**
 * `Status` from `docker compose ls` looks like `running(2)` or
 * `running(1), exited(1)`. Anything short of every container running counts
 * as stopped.
 */
export function classifyComposeStatus(status: string): ObservedState {
  const parts = status
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);
  if (parts.length === 0) return "present-stopped";
  return parts.every((part) => part.startsWith("running"))
    ? "present-running"
    : "present-stopped";
}

/**
 * A `docker compose` project, identified by its project name.
 */
export function composeStackDriver(host: Host): ResourceDriver<ComposeStackSpec> {
  const compose = (name: string, file: string, ...args: string[]) =>
    runOrThrow(host, "docker", ["compose", "--project-name", name, "--file", file, ...args]);

  return {
    kind: "compose-stack",
    artifact: false,

    async probe(resource) {
      const projects = await listComposeProjects(host);
      const project = projects.find((candidate) => candidate.name === resource.name);
      if (!project) return "absent";
      return classifyComposeStatus(project.status);
    },

    async create(resource) {
      await compose(resource.name, resource.desiredSpec.file, "up", "--detach");
    },

    async start(resource) {
      await compose(resource.name, resource.desiredSpec.file, "start");
    },
  };
}
