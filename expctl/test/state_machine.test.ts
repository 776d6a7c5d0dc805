import { describe, expect, it } from "vitest";
import { RunStateTracker, isTerminal, nextRunState, successors } from "../src/core/state-machine.js";

describe("run state machine", () => {
  it("follows the cold-start path", () => {
    const t = new RunStateTracker();
    t.apply("not_locked");
    t.apply("invalidated");
    t.apply("work_started");
    t.apply("work_succeeded");
    expect(t.path).toEqual(["CHECKING", "NOT_CACHED", "INVALIDATED", "RUNNING", "COMMITTED"]);
    expect(t.state).toBe("COMMITTED");
  });

  it("reaches DONE on a cache hit and ROLLED_BACK on failure", () => {
    expect(nextRunState("VALID_CACHE", "cache_accepted")).toBe("DONE");
    expect(nextRunState("RUNNING", "work_failed")).toBe("ROLLED_BACK");
  });

  it("only invalidates a stale stage when forced", () => {
    expect(successors("STALE")).toEqual(["INVALIDATED"]);
    expect(nextRunState("STALE", "invalidated")).toBeNull();
    expect(nextRunState("STALE", "forced")).toBe("INVALIDATED");
  });

  it("lists successors and terminal states", () => {
    expect(successors("CHECKING")).toEqual(["NOT_CACHED", "VALID_CACHE", "STALE"]);
    expect(successors("VALID_CACHE")).toEqual(["DONE", "INVALIDATED"]);
    expect(isTerminal("DONE")).toBe(true);
    expect(isTerminal("COMMITTED")).toBe(true);
    expect(isTerminal("ROLLED_BACK")).toBe(true);
    expect(isTerminal("RUNNING")).toBe(false);
  });

  it("rejects events the current state does not allow", () => {
    const t = new RunStateTracker();
    expect(() => t.apply("work_started")).toThrow('Illegal run event "work_started" in state CHECKING');
    expect(t.state).toBe("CHECKING");
  });

  it("reports each transition to the listener", () => {
    const seen: string[] = [];
    const t = new RunStateTracker((to, from) => seen.push(`${from}>${to}`));
    t.apply("dependencies_match");
    t.apply("cache_accepted");
    expect(seen).toEqual(["CHECKING>VALID_CACHE", "VALID_CACHE>DONE"]);
  });
});
