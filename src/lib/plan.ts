import { log } from "./logger.js";
import { ReconcileError, errorMessage } from "./errors.js";
import {
  isSatisfied,
  reconcile,
  type ManagedResource,
  type ObservedState,
  type OutcomeStatus,
  type ReconcileResult,
  type ResourceDriver,
  type ResourceKind,
} from "./reconciler.js";
import type { StatusReport } from "./types.js";

export interface PresentNotice {
  level: "info" | "warn";
  message: string;
}

/**
 * One stage of a provisioning run, with its resource and driver bound
 * together so plans can mix resource kinds.
 */
export interface PlanStep {
  readonly stage: string;
  readonly kind: ResourceKind;
  readonly name: string;
  /** Files and directories: present is all they can be. */
  readonly artifact: boolean;
  /** Logged instead of the default line when the resource already exists. */
  readonly whenPresent?: PresentNotice;
  reconcile(): Promise<ReconcileResult>;
  /** Probe only. `satisfied` is false for absent or stopped resources. */
  inspect(): Promise<{ observed: ObservedState; satisfied: boolean }>;
}

export function planStep<S>(
  stage: string,
  resource: ManagedResource<S>,
  driver: ResourceDriver<S>,
  whenPresent?: PresentNotice
): PlanStep {
  return {
    stage,
    kind: resource.kind,
    name: resource.name,
    artifact: driver.artifact,
    whenPresent,
    reconcile: () => reconcile(resource, driver),
    inspect: async () => {
      const observed = await driver.probe(resource);
      return { observed, satisfied: isSatisfied(driver, observed) };
    },
  };
}

function describe(step: { kind: ResourceKind; name: string }): string {
  return `${step.kind} "${step.name}"`;
}

function logOutcome(step: PlanStep, result: ReconcileResult): void {
  const { outcome } = result;
  switch (outcome.status) {
    case "created":
      log.ok(`${describe(step)} created`);
      break;
    case "started-existing":
      log.ok(`${describe(step)} was stopped and has been started`);
      break;
    case "already-satisfied":
      if (step.whenPresent) {
        const notice = step.whenPresent;
        if (notice.level === "warn") log.warn(notice.message);
        else log.info(notice.message);
      } else {
        log.info(`${describe(step)} already present`);
      }
      if (result.observed === "present-with-drift") {
        log.warn(`${describe(step)} differs from its declared settings and was left as is`);
      }
      break;
    case "failed":
      log.fail(`${describe(step)}: ${outcome.reason}`);
      break;
  }
}

/**
 * Reconcile every step in order. Stops at the first failure by throwing a
 * ReconcileError; resources handled before it stay as they are.
 */
export async function applyPlan(steps: PlanStep[]): Promise<ReconcileResult[]> {
  const results: ReconcileResult[] = [];

  for (const step of steps) {
    log.step(step.stage);
    const result = await step.reconcile();
    logOutcome(step, result);
    results.push(result);

    if (result.outcome.status === "failed") {
      throw new ReconcileError(step.stage, result.outcome.reason);
    }
  }

  return results;
}

export function emptyReport(): StatusReport {
  return {
    passed: 0,
    failed: 0,
    warnings: 0,
    passedItems: [],
    failedItems: [],
    warnedItems: [],
  };
}

export function recordPass(report: StatusReport, message: string): void {
  log.ok(message);
  report.passed++;
  report.passedItems.push(message);
}

export function recordFail(report: StatusReport, message: string): void {
  log.fail(message);
  report.failed++;
  report.failedItems.push(message);
}

export function recordWarn(report: StatusReport, message: string): void {
  log.warn(message);
  report.warnings++;
  report.warnedItems.push(message);
}

/**
 * Probe every step without changing anything and record the findings.
 */
export async function checkPlan(
  steps: PlanStep[],
  report: StatusReport = emptyReport()
): Promise<StatusReport> {
  for (const step of steps) {
    try {
      const { observed, satisfied } = await step.inspect();
      if (satisfied) {
        const running = observed === "present-running" && !step.artifact;
        recordPass(report, `${describe(step)} is ${running ? "running" : "present"}`);
      } else {
        recordFail(report, `${describe(step)} is ${observed === "absent" ? "missing" : "stopped"}`);
      }
    } catch (error) {
      recordFail(report, `${describe(step)} could not be checked: ${errorMessage(error)}`);
    }
  }
  return report;
}

export type OutcomeCounts = Record<OutcomeStatus, number>;

export function summarize(results: ReconcileResult[]): OutcomeCounts {
  const counts: OutcomeCounts = {
    created: 0,
    "started-existing": 0,
    "already-satisfied": 0,
    failed: 0,
  };
  for (const result of results) {
    counts[result.outcome.status]++;
  }
  return counts;
}

/**
 * Print the report footer in the same layout for every command.
 */
export function printReport(title: string, report: StatusReport): void {
  log.separator();
  log.summary(title);
  log.separator();
  log.raw(`✔ Passed:   ${report.passed}`);
  log.raw(`✗ Failed:   ${report.failed}`);
  log.raw(`⚠ Warnings: ${report.warnings}`);
  log.blank();

  if (report.passed > 0) {
    log.passed();
    for (const item of report.passedItems) log.checkmark(item);
    log.blank();
  }

  if (report.failed > 0) {
    log.failures();
    for (const item of report.failedItems) log.cross(item);
    log.blank();
  }

  if (report.warnings > 0) {
    log.warnings();
    for (const item of report.warnedItems) log.warningMark(item);
    log.blank();
  }
}
