/**
 * States a stage run moves through, in protocol order.
 */
export const RUN_STATES = [
  "CHECKING",
  "NOT_CACHED",
  "VALID_CACHE",
  "STALE",
  "DONE",
  "INVALIDATED",
  "RUNNING",
  "COMMITTED",
  "ROLLED_BACK",
] as const;

export type RunState = (typeof RUN_STATES)[number];

/**
 * Events that drive state transitions.
 */
export type RunEvent =
  | "not_locked"
  | "dependencies_match"
  | "dependencies_changed"
  | "cache_accepted"
  | "forced"
  | "invalidated"
  | "work_started"
  | "work_succeeded"
  | "work_failed";

const TRANSITIONS: { readonly [S in RunState]: Partial<Record<RunEvent, RunState>> } = {
  CHECKING: {
    not_locked: "NOT_CACHED",
    dependencies_match: "VALID_CACHE",
    dependencies_changed: "STALE",
  },
  VALID_CACHE: { cache_accepted: "DONE", forced: "INVALIDATED" },
  STALE: { forced: "INVALIDATED" },
  NOT_CACHED: { invalidated: "INVALIDATED" },
  INVALIDATED: { work_started: "RUNNING" },
  RUNNING: { work_succeeded: "COMMITTED", work_failed: "ROLLED_BACK" },
  DONE: {},
  COMMITTED: {},
  ROLLED_BACK: {},
};

/**
 * Pure function: given current state + event, return next state, or null if
 * the event is not allowed there.
 */
export function nextRunState(current: RunState, event: RunEvent): RunState | null {
  return TRANSITIONS[current][event] ?? null;
}

/** States reachable in one step from `current`. */
export function successors(current: RunState): RunState[] {
  const out: RunState[] = [];
  for (const to of Object.values(TRANSITIONS[current])) {
    if (to !== undefined && !out.includes(to)) out.push(to);
  }
  return out;
}

export function isTerminal(state: RunState): boolean {
  return successors(state).length === 0;
}

/**
 * Tracks one run's state and history; rejects events the table does not allow.
 */
export class RunStateTracker {
  private current: RunState = "CHECKING";
  private readonly history: RunState[] = ["CHECKING"];

  constructor(private readonly onEnter?: (state: RunState, from: RunState) => void) {}

  get state(): RunState {
    return this.current;
  }

  get path(): RunState[] {
    return [...this.history];
  }

  apply(event: RunEvent): RunState {
    const to = nextRunState(this.current, event);
    if (to === null) {
      throw new Error(`Illegal run event "${event}" in state ${this.current}`);
    }
    const from = this.current;
    this.current = to;
    this.history.push(to);
    this.onEnter?.(to, from);
    return to;
  }
}
