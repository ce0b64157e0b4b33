import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FakeHost } from "../testing/fake-host.js";
import { PreconditionError, ReconcileError } from "../lib/errors.js";
import type { HardenConfig } from "../lib/types.js";
import { buildHardenPlan, hardenServer } from "./harden.js";

const PUBLIC_KEY = "ssh-ed25519 AAAAC3NzaC1lZDI1NTE5AAAAIPlaceholderKeyForTests alice@laptop";
const SSHD_CONFIG = "/etc/ssh/sshd_config";

const config: HardenConfig = {
  username: "alice",
  publicKey: PUBLIC_KEY,
  adminGroup: "sudo",
  sshService: "ssh",
  sshdConfigPath: SSHD_CONFIG,
  firewallRule: "OpenSSH",
  connectivityProbe: "8.8.8.8",
};

function freshServer(): FakeHost {
  const host = new FakeHost();
  host.uid = 0;
  host.whoami = "root";
  host.files.set(SSHD_CONFIG, {
    content:
      "Include /etc/ssh/sshd_config.d/*.conf\n" +
      "#PermitRootLogin prohibit-password\n" +
      "PasswordAuthentication yes\n",
    mode: 0o644,
  });
  return host;
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error
  );
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("buildHardenPlan", () => {
  it("opens SSH in the firewall before enabling it", () => {
    const steps = buildHardenPlan(freshServer(), config);

    expect(steps.map((s) => s.stage)).toEqual([
      "User account",
      "Administrative group",
      "SSH daemon: PermitRootLogin no",
      "SSH daemon: PasswordAuthentication no",
      "Firewall rule for SSH",
      "Firewall",
    ]);
  });
});

describe("hardenServer", () => {
  it("hardens a fresh server", async () => {
    const host = freshServer();

    const results = await hardenServer(host, config);

    expect(results.map((r) => [r.kind, r.name, r.outcome.status])).toEqual([
      ["os-account", "alice", "created"],
      ["group-membership", "sudo:alice", "created"],
      ["config-directive", "PermitRootLogin", "created"],
      ["config-directive", "PasswordAuthentication", "created"],
      ["firewall-rule", "OpenSSH", "created"],
      ["firewall", "ufw", "started-existing"],
    ]);
    expect(host.files.get(SSHD_CONFIG)?.content).toBe(
      "PermitRootLogin no\n" +
        "PasswordAuthentication no\n" +
        "Include /etc/ssh/sshd_config.d/*.conf\n" +
        "#PermitRootLogin prohibit-password\n" +
        "#PasswordAuthentication yes\n"
    );
    expect(host.users.get("alice")?.groups).toEqual(["alice", "sudo"]);
    expect(host.ufwActive).toBe(true);
  });

  it("installs the public key readable by the new user only", async () => {
    const host = freshServer();

    await hardenServer(host, config);

    expect(host.files.get("/home/alice/.ssh/authorized_keys")).toEqual({
      content: `${PUBLIC_KEY}\n`,
      mode: 0o600,
    });
    expect(host.directories.get("/home/alice/.ssh")).toBe(0o700);
    expect(host.calls).toContain("chown -R alice:alice /home/alice/.ssh");
  });

  it("restarts sshd after the edits and before touching the firewall", async () => {
    const host = freshServer();

    await hardenServer(host, config);

    const validate = host.calls.indexOf(`sshd -t -f ${SSHD_CONFIG}`);
    const restart = host.calls.indexOf("systemctl restart ssh");
    const allow = host.calls.indexOf("ufw allow OpenSSH");
    const enable = host.calls.indexOf("ufw --force enable");
    expect(validate).toBeGreaterThan(-1);
    expect(validate).toBeLessThan(restart);
    expect(restart).toBeLessThan(allow);
    expect(allow).toBeLessThan(enable);
  });

  it("is a no-op on an already hardened server", async () => {
    const host = freshServer();
    await hardenServer(host, config);
    const mutating = host.mutatingCalls().length;
    const writes = host.writes.length;

    const results = await hardenServer(host, config);

    expect(results.every((r) => r.outcome.status === "already-satisfied")).toBe(true);
    expect(host.restartedServices).toEqual(["ssh"]);
    expect(host.mutatingCalls()).toHaveLength(mutating);
    expect(host.writes).toHaveLength(writes);
  });

  it("locks sshd down even when a drop-in file allows password logins", async () => {
    const host = freshServer();
    host.files.set("/etc/ssh/sshd_config.d/50-cloud-init.conf", {
      content: "PasswordAuthentication yes\n",
      mode: 0o600,
    });

    const results = await hardenServer(host, config);

    expect(results.filter((r) => r.kind === "config-directive").map((r) => r.outcome)).toEqual([
      { status: "created" },
      { status: "created" },
    ]);
    expect(host.restartedServices).toEqual(["ssh"]);
    expect(host.ufwActive).toBe(true);
  });

  it("restarts sshd on the next run when the previous restart failed", async () => {
    const host = freshServer();
    host.failures.set("systemctl restart", "Job for ssh.service failed.");

    const error = await rejection(hardenServer(host, config));

    expect(error).toBeInstanceOf(ReconcileError);
    expect(error).toMatchObject({
      stage: "Restart SSH daemon",
      reason: "`systemctl restart ssh` exited with status 1: Job for ssh.service failed.",
    });
    expect(host.restartedServices).toEqual([]);
    expect(host.ufwActive).toBe(false);

    host.failures.clear();
    const results = await hardenServer(host, config);

    expect(results.filter((r) => r.kind === "config-directive").map((r) => r.outcome)).toEqual([
      { status: "already-satisfied" },
      { status: "already-satisfied" },
    ]);
    expect(host.restartedServices).toEqual(["ssh"]);
    expect(host.ufwActive).toBe(true);
  });

  it("reports a failed configuration check as the restart step", async () => {
    const host = freshServer();
    host.failures.set("sshd -t", "/etc/ssh/sshd_config line 3: Bad configuration option");

    const error = await rejection(hardenServer(host, config));

    expect(error).toMatchObject({
      stage: "Restart SSH daemon",
      reason:
        "`sshd -t -f /etc/ssh/sshd_config` exited with status 1: /etc/ssh/sshd_config line 3: Bad configuration option",
    });
    expect(host.restartedServices).toEqual([]);
  });

  it("does not restart sshd when its configuration already matches", async () => {
    const host = freshServer();
    host.files.set(SSHD_CONFIG, {
      content: "PermitRootLogin no\nPasswordAuthentication no\n",
      mode: 0o644,
    });

    await hardenServer(host, config);

    expect(host.restartedServices).toEqual([]);
    expect(host.files.get(SSHD_CONFIG)?.content).toBe(
      "PermitRootLogin no\nPasswordAuthentication no\n"
    );
  });

  it("leaves an existing account and its keys alone", async () => {
    const host = freshServer();
    host.users.set("alice", { uid: 1001, groups: ["alice", "sudo"] });

    const results = await hardenServer(host, config);

    expect(results[0]?.outcome).toEqual({ status: "already-satisfied" });
    expect(results[1]?.outcome).toEqual({ status: "already-satisfied" });
    expect(host.calls.some((call) => call.startsWith("adduser"))).toBe(false);
    expect(host.files.has("/home/alice/.ssh/authorized_keys")).toBe(false);
  });

  it("must run as root", async () => {
    const host = freshServer();
    host.uid = 1000;

    const error = await rejection(hardenServer(host, config));

    expect(error).toBeInstanceOf(PreconditionError);
    expect(error).toMatchObject({ message: "This command must be run as root." });
    expect(host.mutatingCalls()).toEqual([]);
    expect(host.writes).toEqual([]);
  });

  it("requires a working internet connection", async () => {
    const host = freshServer();
    host.online = false;

    const error = await rejection(hardenServer(host, config));

    expect(error).toMatchObject({
      message: "No internet connection (could not reach 8.8.8.8). Check the network settings.",
    });
    expect(host.mutatingCalls()).toEqual([]);
  });

  it("aborts at the firewall rule when ufw is not installed", async () => {
    const host = freshServer();
    host.ufwInstalled = false;

    const error = await rejection(hardenServer(host, config));

    expect(error).toBeInstanceOf(ReconcileError);
    expect(error).toMatchObject({
      stage: "Firewall rule for SSH",
      reason: "probe failed: `ufw show added` exited with status 127: ufw: command not found",
    });
    expect(host.users.has("alice")).toBe(true);
    expect(host.restartedServices).toEqual(["ssh"]);
  });
});
