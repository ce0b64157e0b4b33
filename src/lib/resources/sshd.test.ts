import { describe, expect, it } from "vitest";
import { FakeHost } from "../../testing/fake-host.js";
import { defineResource, reconcile } from "../reconciler.js";
import {
  parseEffectiveConfig,
  setDirective,
  sshdDirectiveDriver,
  sshdRestartPending,
} from "./sshd.js";

describe("setDirective", () => {
  it("turns the commented default into the directive", () => {
    const content = "Port 22\n#PermitRootLogin prohibit-password\nPasswordAuthentication yes\n";

    expect(setDirective(content, "PermitRootLogin", "no")).toBe(
      "Port 22\nPermitRootLogin no\nPasswordAuthentication yes\n"
    );
  });

  it("matches the keyword case-insensitively", () => {
    expect(setDirective("permitrootlogin yes\n", "PermitRootLogin", "no")).toBe(
      "PermitRootLogin no\n"
    );
  });

  it("comments out later active lines for the same keyword", () => {
    const content = "PasswordAuthentication yes\nUsePAM yes\nPasswordAuthentication yes\n";

    expect(setDirective(content, "PasswordAuthentication", "no")).toBe(
      "PasswordAuthentication no\nUsePAM yes\n#PasswordAuthentication yes\n"
    );
  });

  it("does not touch keywords that only share a prefix", () => {
    const content = "PermitRootLoginDelay 5\n";

    expect(setDirective(content, "PermitRootLogin", "no")).toBe(
      "PermitRootLoginDelay 5\nPermitRootLogin no\n"
    );
  });

  it("puts the directive ahead of Include so drop-in files cannot override it", () => {
    const content = "Include /etc/ssh/sshd_config.d/*.conf\n\n#PasswordAuthentication yes\n";

    expect(setDirective(content, "PasswordAuthentication", "no")).toBe(
      "PasswordAuthentication no\nInclude /etc/ssh/sshd_config.d/*.conf\n\n#PasswordAuthentication yes\n"
    );
  });

  it("comments out active lines after Include when moving the directive", () => {
    const content = "Include /etc/ssh/sshd_config.d/*.conf\nPermitRootLogin yes\n";

    expect(setDirective(content, "PermitRootLogin", "no")).toBe(
      "PermitRootLogin no\nInclude /etc/ssh/sshd_config.d/*.conf\n#PermitRootLogin yes\n"
    );
  });

  it("edits in place a directive that already precedes Include", () => {
    const content = "PermitRootLogin yes\nInclude /etc/ssh/sshd_config.d/*.conf\n";

    expect(setDirective(content, "PermitRootLogin", "no")).toBe(
      "PermitRootLogin no\nInclude /etc/ssh/sshd_config.d/*.conf\n"
    );
  });

  it("inserts a missing directive before the first Match block", () => {
    const content = "Port 22\nMatch User backup\n  PasswordAuthentication yes\n";

    expect(setDirective(content, "PasswordAuthentication", "no")).toBe(
      "Port 22\nPasswordAuthentication no\nMatch User backup\n  PasswordAuthentication yes\n"
    );
  });
});

describe("parseEffectiveConfig", () => {
  it("keeps the first value of each keyword", () => {
    const config = parseEffectiveConfig(
      "port 22\npermitrootlogin no\nlistenaddress 0.0.0.0:22\nlistenaddress [::]:22\n"
    );

    expect(config.get("permitrootlogin")).toBe("no");
    expect(config.get("listenaddress")).toBe("0.0.0.0:22");
  });
});

describe("sshdDirectiveDriver", () => {
  const file = "/etc/ssh/sshd_config";

  it("edits the file when the effective value differs, once", async () => {
    const host = new FakeHost();
    host.files.set(file, { content: "PasswordAuthentication yes\n", mode: 0o644 });
    const resource = defineResource("config-directive", "PasswordAuthentication", {
      file,
      value: "no",
    });
    const driver = sshdDirectiveDriver(host);

    const first = await reconcile(resource, driver);
    const second = await reconcile(resource, driver);

    expect(first.outcome).toEqual({ status: "created" });
    expect(second.outcome).toEqual({ status: "already-satisfied" });
    expect(host.files.get(file)).toEqual({ content: "PasswordAuthentication no\n", mode: 0o644 });
    expect(host.writes).toEqual([file]);
  });

  it("wins over a drop-in file that enables password logins", async () => {
    const host = new FakeHost();
    const dropIn = "/etc/ssh/sshd_config.d/50-cloud-init.conf";
    host.files.set(file, {
      content: "Include /etc/ssh/sshd_config.d/*.conf\n#PasswordAuthentication yes\n",
      mode: 0o644,
    });
    host.files.set(dropIn, { content: "PasswordAuthentication yes\n", mode: 0o600 });

    const result = await reconcile(
      defineResource("config-directive", "PasswordAuthentication", { file, value: "no" }),
      sshdDirectiveDriver(host)
    );

    expect(result.observed).toBe("absent");
    expect(result.outcome).toEqual({ status: "created" });
    expect(host.files.get(file)?.content).toBe(
      "PasswordAuthentication no\nInclude /etc/ssh/sshd_config.d/*.conf\n#PasswordAuthentication yes\n"
    );
    expect(host.files.get(dropIn)?.content).toBe("PasswordAuthentication yes\n");
  });

  it("compares values case-insensitively", async () => {
    const host = new FakeHost();
    host.files.set(file, { content: "PermitRootLogin No\n", mode: 0o644 });

    const result = await reconcile(
      defineResource("config-directive", "PermitRootLogin", { file, value: "no" }),
      sshdDirectiveDriver(host)
    );

    expect(result.outcome).toEqual({ status: "already-satisfied" });
  });
});

describe("sshdRestartPending", () => {
  const file = "/etc/ssh/sshd_config";

  function server(): FakeHost {
    const host = new FakeHost();
    host.files.set(file, { content: "PermitRootLogin no\n", mode: 0o644 });
    return host;
  }

  it("is false when the daemon started after the last edit", async () => {
    expect(await sshdRestartPending(server(), file, "ssh")).toBe(false);
  });

  it("is true when the file changed after the daemon started", async () => {
    const host = server();
    await host.writeFile(file, "PermitRootLogin no\nPasswordAuthentication no\n", { mode: 0o644 });

    expect(await sshdRestartPending(host, file, "ssh")).toBe(true);
  });

  it("is false again once the daemon has been restarted", async () => {
    const host = server();
    await host.writeFile(file, "PermitRootLogin no\nPasswordAuthentication no\n", { mode: 0o644 });
    await host.run("systemctl", ["restart", "ssh"]);

    expect(await sshdRestartPending(host, file, "ssh")).toBe(false);
  });

  it("is true when the daemon is not running", async () => {
    const host = server();
    host.sshdStartedAt = undefined;

    expect(await sshdRestartPending(host, file, "ssh")).toBe(true);
    expect(host.calls).toEqual(["systemctl show --property=MainPID --value ssh"]);
  });
});
