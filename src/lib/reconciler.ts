import { errorMessage } from "./errors.js";

export type ResourceKind =
  | "container"
  | "compose-stack"
  | "config-file"
  | "directory"
  | "network"
  | "firewall-rule"
  | "firewall"
  | "os-account"
  | "group-membership"
  | "config-directive";

/**
 * One externally managed thing, identified by `(kind, name)`.
 * `desiredSpec` carries whatever the driver needs to create it.
 */
export interface ManagedResource<S> {
  readonly kind: ResourceKind;
  readonly name: string;
  readonly desiredSpec: Readonly<S>;
}

/**
 * What a probe found. Drift is never detected by the built-in drivers; the
 * state exists so a driver that can tell reports it, and it is handled as
 * satisfied.
 */
export type ObservedState =
  | "absent"
  | "present-stopped"
  | "present-running"
  | "present-with-drift";

export type ReconciliationOutcome =
  | { status: "created" }
  | { status: "started-existing" }
  | { status: "already-satisfied" }
  | { status: "failed"; reason: string };

export type OutcomeStatus = ReconciliationOutcome["status"];

/**
 * Kind-specific primitives. `probe` must match the resource name exactly,
 * never by prefix or substring.
 */
export interface ResourceDriver<S> {
  readonly kind: ResourceKind;
  /**
   * File artifacts have two states: absent or present. Present artifacts are
   * never rewritten, whatever `desiredSpec` says now.
   */
  readonly artifact: boolean;
  probe(resource: ManagedResource<S>): Promise<ObservedState>;
  create(resource: ManagedResource<S>): Promise<void>;
  start?(resource: ManagedResource<S>): Promise<void>;
}

export interface ReconcileResult {
  kind: ResourceKind;
  name: string;
  observed: ObservedState | null;
  outcome: ReconciliationOutcome;
}

export function defineResource<S>(
  kind: ResourceKind,
  name: string,
  desiredSpec: S
): ManagedResource<S> {
  return Object.freeze({ kind, name, desiredSpec: Object.freeze(desiredSpec) });
}

export function isSatisfied(driver: { artifact: boolean }, state: ObservedState): boolean {
  if (driver.artifact) return state !== "absent";
  return state === "present-running" || state === "present-with-drift";
}

/**
 * Bring one resource to its desired state with at most one corrective action.
 *
 * absent → create, stopped → start, running → nothing. After an action the
 * resource is probed again and must have reached the desired state. Failures
 * are returned, not thrown; nothing is rolled back.
 */
export async function reconcile<S>(
  resource: ManagedResource<S>,
  driver: ResourceDriver<S>
): Promise<ReconcileResult> {
  const result = (
    observed: ObservedState | null,
    outcome: ReconciliationOutcome
  ): ReconcileResult => ({
    kind: resource.kind,
    name: resource.name,
    observed,
    outcome,
  });

  let observed: ObservedState;
  try {
    observed = await driver.probe(resource);
  } catch (error) {
    return result(null, {
      status: "failed",
      reason: `probe failed: ${errorMessage(error)}`,
    });
  }

  if (isSatisfied(driver, observed)) {
    return result(observed, { status: "already-satisfied" });
  }

  let action: "created" | "started-existing";
  try {
    if (observed === "absent") {
      await driver.create(resource);
      action = "created";
    } else if (driver.start) {
      await driver.start(resource);
      action = "started-existing";
    } else {
      return result(observed, {
        status: "failed",
        reason: `${resource.kind} "${resource.name}" exists but cannot be started`,
      });
    }
  } catch (error) {
    return result(observed, { status: "failed", reason: errorMessage(error) });
  }

  let after: ObservedState;
  try {
    after = await driver.probe(resource);
  } catch (error) {
    return result(observed, {
      status: "failed",
      reason: `probe after ${action === "created" ? "create" : "start"} failed: ${errorMessage(error)}`,
    });
  }

  if (!isSatisfied(driver, after)) {
    return result(observed, {
      status: "failed",
      reason: `${resource.kind} "${resource.name}" did not reach the desired state (observed ${after})`,
    });
  }

  return result(observed, { status: action });
}
