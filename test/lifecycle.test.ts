import { describe, expect, it } from "vitest";
import { SupplyctlError } from "../src/core/errors.js";
import { LIFECYCLE_STATES, isTerminal, nextLifecycleState, type LifecycleState } from "../src/core/lifecycle.js";

describe("step lifecycle", () => {
  it("walks the happy path in order", () => {
    let state: LifecycleState = "constructed";
    const visited: LifecycleState[] = [state];
    for (const event of ["configure", "validate", "execute", "complete"] as const) {
      state = nextLifecycleState(state, event);
      visited.push(state);
    }
    expect(visited).toEqual([...LIFECYCLE_STATES]);
  });

  it("fails from any state after configuration", () => {
    expect(nextLifecycleState("configured", "fail")).toBe("failed");
    expect(nextLifecycleState("validated", "fail")).toBe("failed");
    expect(nextLifecycleState("executing", "fail")).toBe("failed");
  });

  it("rejects skipping validation", () => {
    expect(() => nextLifecycleState("configured", "execute")).toThrow(SupplyctlError);
    expect(() => nextLifecycleState("configured", "execute")).toThrow(
      "Invalid lifecycle transition: configured --execute-->",
    );
  });

  it("rejects completing before executing", () => {
    expect(() => nextLifecycleState("validated", "complete")).toThrow(SupplyctlError);
  });

  it("allows a finished implementer to be configured again", () => {
    expect(nextLifecycleState("completed", "configure")).toBe("configured");
    expect(nextLifecycleState("failed", "configure")).toBe("configured");
  });

  it("marks completed and failed as terminal", () => {
    expect(isTerminal("completed")).toBe(true);
    expect(isTerminal("failed")).toBe(true);
    expect(isTerminal("executing")).toBe(false);
  });
});
