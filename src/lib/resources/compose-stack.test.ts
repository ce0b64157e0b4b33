import { describe, expect, it } from "vitest";
import { FakeHost } from "../../testing/fake-host.js";
import { defineResource, reconcile } from "../reconciler.js";
import { classifyComposeStatus, composeStackDriver } from "./compose-stack.js";

describe("classifyComposeStatus", () => {
  it("is running only when every container runs", () => {
    expect(classifyComposeStatus("running(2)")).toBe("present-running");
    expect(classifyComposeStatus("running(1), exited(1)")).toBe("present-stopped");
    expect(classifyComposeStatus("exited(2)")).toBe("present-stopped");
    expect(classifyComposeStatus("")).toBe("present-stopped");
  });
});

describe("composeStackDriver", () => {
  const file = "/srv/odoo/docker-compose.yml";

  it("brings an absent project up", async () => {
    const host = new FakeHost();
    host.files.set(file, { content: "services: {}\n", mode: 0o600 });
    host.composeProjects.set("odoo-staging", "running(2)");

    const result = await reconcile(
      defineResource("compose-stack", "odoo", { file }),
      composeStackDriver(host)
    );

    expect(result.observed).toBe("absent");
    expect(result.outcome).toEqual({ status: "created" });
    expect(host.calls).toContain(`docker compose --project-name odoo --file ${file} up --detach`);
  });

  it("fails when the compose file is missing", async () => {
    const host = new FakeHost();

    const result = await reconcile(
      defineResource("compose-stack", "odoo", { file }),
      composeStackDriver(host)
    );

    expect(result.outcome).toEqual({
      status: "failed",
      reason: `\`docker compose --project-name odoo --file ${file} up --detach\` exited with status 14: open ${file}: no such file or directory`,
    });
  });
});
