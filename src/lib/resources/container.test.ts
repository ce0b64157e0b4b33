import { describe, expect, it, vi } from "vitest";
import { FakeHost } from "../../testing/fake-host.js";
import { defineResource, reconcile } from "../reconciler.js";
import { buildRunArgs, containerDriver, type ContainerSpec } from "./container.js";
import { findContainer, listComposeProjects, parseJsonLines } from "./docker.js";
import { networkDriver } from "./network.js";

const odoo: ContainerSpec = {
  image: "odoo:16.0",
  network: "odoo-net",
  restart: "always",
  environment: { HOST: "db" },
  ports: [{ host: 8069, container: 8069 }],
  volumes: [
    { source: "/srv/odoo/addons", target: "/mnt/extra-addons" },
    { source: "/srv/odoo/odoo.conf", target: "/etc/odoo/odoo.conf", readonly: true },
  ],
};

describe("buildRunArgs", () => {
  it("renders network, environment, ports and volumes", () => {
    expect(buildRunArgs("odoo", odoo)).toEqual([
      "run",
      "--detach",
      "--name",
      "odoo",
      "--network",
      "odoo-net",
      "--restart=always",
      "--env",
      "HOST=db",
      "--publish",
      "8069:8069",
      "--volume",
      "/srv/odoo/addons:/mnt/extra-addons",
      "--volume",
      "/srv/odoo/odoo.conf:/etc/odoo/odoo.conf:ro",
      "odoo:16.0",
    ]);
  });

  it("omits the network when none is given", () => {
    expect(
      buildRunArgs("db", {
        image: "postgres:15",
        restart: "no",
        environment: {},
        ports: [],
        volumes: [],
      })
    ).toEqual(["run", "--detach", "--name", "db", "--restart=no", "postgres:15"]);
  });
});

describe("parseJsonLines", () => {
  it("parses one document per line and skips blanks", () => {
    expect(parseJsonLines('{"Names":"odoo"}\n\n{"Names":"db"}\n')).toEqual([
      { Names: "odoo" },
      { Names: "db" },
    ]);
  });
});

describe("findContainer", () => {
  it("matches any of a container's names exactly", async () => {
    const host = new FakeHost();
    vi.spyOn(host, "run").mockResolvedValue({
      stdout: JSON.stringify({ ID: "abc", Names: "odoo_web,odoo", Image: "odoo:16.0", State: "Running" }),
      stderr: "",
      exitCode: 0,
      success: true,
    });

    expect(await findContainer(host, "odoo")).toEqual({
      id: "abc",
      names: ["odoo_web", "odoo"],
      image: "odoo:16.0",
      state: "running",
    });
    expect(await findContainer(host, "odoo_w")).toBeUndefined();
  });
});

describe("listComposeProjects", () => {
  it("treats empty output as no projects", async () => {
    const host = new FakeHost();
    vi.spyOn(host, "run").mockResolvedValue({ stdout: "", stderr: "", exitCode: 0, success: true });

    expect(await listComposeProjects(host)).toEqual([]);
  });
});

describe("containerDriver", () => {
  it("creates a container whose name is only a substring of others", async () => {
    const host = new FakeHost();
    host.containers.set("odoo2", { image: "odoo:15.0", state: "running", args: [] });
    host.containers.set("myodoo", { image: "odoo:14.0", state: "exited", args: [] });

    const result = await reconcile(defineResource("container", "odoo", odoo), containerDriver(host));

    expect(result.observed).toBe("absent");
    expect(result.outcome).toEqual({ status: "created" });
    expect(host.containers.get("myodoo")?.state).toBe("exited");
    expect(host.mutatingCalls()).toHaveLength(1);
  });

  it("counts a restarting container as running", async () => {
    const host = new FakeHost();
    host.containers.set("odoo", { image: "odoo:16.0", state: "restarting", args: [] });

    const result = await reconcile(defineResource("container", "odoo", odoo), containerDriver(host));

    expect(result.outcome).toEqual({ status: "already-satisfied" });
  });

  it("unpauses a paused container instead of calling it running", async () => {
    const host = new FakeHost();
    host.containers.set("odoo", { image: "odoo:16.0", state: "paused", args: [] });

    const result = await reconcile(defineResource("container", "odoo", odoo), containerDriver(host));

    expect(result.observed).toBe("present-stopped");
    expect(result.outcome).toEqual({ status: "started-existing" });
    expect(host.mutatingCalls()).toEqual(["docker unpause odoo"]);
    expect(host.containers.get("odoo")?.state).toBe("running");
  });

  it("reports a name conflict from docker as a failure", async () => {
    const host = new FakeHost();
    host.failures.set("docker run", 'Conflict. The container name "/odoo" is already in use');

    const result = await reconcile(defineResource("container", "odoo", odoo), containerDriver(host));

    expect(result.outcome.status).toBe("failed");
  });
});

describe("networkDriver", () => {
  it("creates the network once", async () => {
    const host = new FakeHost();
    host.networks.add("odoo-net-old");
    const resource = defineResource("network", "odoo-net", { driver: "bridge" });

    const first = await reconcile(resource, networkDriver(host));
    const second = await reconcile(resource, networkDriver(host));

    expect(first.outcome).toEqual({ status: "created" });
    expect(second.outcome).toEqual({ status: "already-satisfied" });
    expect(host.calls.filter((call) => call.startsWith("docker network create"))).toEqual([
      "docker network create --driver bridge odoo-net",
    ]);
  });
});
