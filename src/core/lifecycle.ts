import { SupplyctlError } from "./errors.js";

/**
 * Lifecycle states of a step implementer, in order.
 */
export const LIFECYCLE_STATES = ["constructed", "configured", "validated", "executing", "completed"] as const;

/**
 * `failed` is terminal for a fatal abort (configuration or execution error).
 */
export type LifecycleState = (typeof LIFECYCLE_STATES)[number] | "failed";

export type LifecycleEvent = "configure" | "validate" | "execute" | "complete" | "fail";

const TRANSITIONS: Record<LifecycleState, Partial<Record<LifecycleEvent, LifecycleState>>> = {
  constructed: { configure: "configured" },
  configured: { validate: "validated", fail: "failed" },
  validated: { execute: "executing", fail: "failed" },
  executing: { complete: "completed", fail: "failed" },
  // a finished implementer may be run again
  completed: { configure: "configured" },
  failed: { configure: "configured" },
};

/**
 * Pure function: given current state + event, return next state.
 * Throws on a transition the lifecycle does not allow.
 */
export function nextLifecycleState(current: LifecycleState, event: LifecycleEvent): LifecycleState {
  const next = TRANSITIONS[current][event];
  if (!next) {
    throw new SupplyctlError("LIFECYCLE_INVALID_TRANSITION", `Invalid lifecycle transition: ${current} --${event}-->`);
  }
  return next;
}

export function isTerminal(state: LifecycleState): boolean {
  return state === "completed" || state === "failed";
}
