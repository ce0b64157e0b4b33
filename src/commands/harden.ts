import { hostAddress, runOrThrow, type Host } from "../lib/host.js";
import { log } from "../lib/logger.js";
import { defineResource, type ReconcileResult } from "../lib/reconciler.js";
import { applyPlan, planStep, type PlanStep } from "../lib/plan.js";
import { requireInternet, requireRoot, requireUbuntu } from "../lib/preflight.js";
import { accountDriver, groupMembershipDriver } from "../lib/resources/account.js";
import { sshdDirectiveDriver, sshdRestartPending } from "../lib/resources/sshd.js";
import {
  firewallDriver,
  firewallRuleDriver,
  type FirewallSpec,
} from "../lib/resources/firewall.js";
import { ReconcileError, errorMessage } from "../lib/errors.js";
import type { HardenConfig } from "../lib/types.js";

/** sshd settings enforced on every server. */
export const SSHD_DIRECTIVES: ReadonlyArray<readonly [string, string]> = [
  ["PermitRootLogin", "no"],
  ["PasswordAuthentication", "no"],
];

/**
 * First-run hardening, in order: login account with key, admin group, sshd
 * lockdown, firewall rule for SSH, firewall on. The SSH rule comes before
 * enabling the firewall so the session in use is never cut off.
 */
export function buildHardenPlan(host: Host, config: HardenConfig): PlanStep[] {
  const directives = sshdDirectiveDriver(host);
  const firewall: FirewallSpec = {};

  return [
    planStep(
      "User account",
      defineResource("os-account", config.username, { publicKey: config.publicKey }),
      accountDriver(host),
      {
        level: "warn",
        message: `User '${config.username}' already exists. Skipping creation and key installation.`,
      }
    ),
    planStep(
      "Administrative group",
      defineResource("group-membership", `${config.adminGroup}:${config.username}`, {
        user: config.username,
        group: config.adminGroup,
      }),
      groupMembershipDriver(host),
      {
        level: "warn",
        message: `User '${config.username}' is already in the ${config.adminGroup} group.`,
      }
    ),
    ...SSHD_DIRECTIVES.map(([key, value]) =>
      planStep(
        `SSH daemon: ${key} ${value}`,
        defineResource("config-directive", key, { file: config.sshdConfigPath, value }),
        directives
      )
    ),
    planStep(
      "Firewall rule for SSH",
      defineResource("firewall-rule", config.firewallRule, { action: "allow" as const }),
      firewallRuleDriver(host)
    ),
    planStep("Firewall", defineResource("firewall", "ufw", firewall), firewallDriver(host)),
  ];
}

/**
 * Validate the edited sshd_config and restart the daemon so it takes effect.
 */
export async function restartSshd(host: Host, config: HardenConfig): Promise<void> {
  await runOrThrow(host, "sshd", ["-t", "-f", config.sshdConfigPath]);
  await runOrThrow(host, "systemctl", ["restart", config.sshService]);
  log.ok("SSH server secured (root login and password auth disabled).");
}

export async function hardenServer(host: Host, config: HardenConfig): Promise<ReconcileResult[]> {
  await requireRoot(host);
  await requireUbuntu(host);
  await requireInternet(host, config.connectivityProbe);
  log.blank();

  const steps = buildHardenPlan(host, config);

  // The daemon restart has to happen between the sshd edits and the firewall
  const firewallAt = steps.findIndex((s) => s.kind === "firewall-rule");
  const results = await applyPlan(steps.slice(0, firewallAt));

  const changedSshd = results.some(
    (r) => r.kind === "config-directive" && r.outcome.status === "created"
  );
  try {
    if (changedSshd || (await sshdRestartPending(host, config.sshdConfigPath, config.sshService))) {
      log.step("Restart SSH daemon");
      await restartSshd(host, config);
    } else {
      log.info("SSH daemon configuration already hardened; no restart needed.");
    }
  } catch (error) {
    throw new ReconcileError("Restart SSH daemon", errorMessage(error));
  }

  results.push(...(await applyPlan(steps.slice(firewallAt))));
  const address = await hostAddress(host);

  log.blank();
  log.separator();
  log.warn("IMPORTANT: Before you close this session, open a NEW terminal and");
  log.warn("check that you can log in with the new user:");
  log.warn(`  ssh ${config.username}@${address}`);
  log.warn("If you cannot log in, DO NOT close this root session.");
  log.separator();
  log.success("Initial server setup is complete!");

  return results;
}
