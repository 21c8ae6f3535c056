/**
 * Phase tracking for one migration run.
 *
 * Phases:
 * - initialized: RunContext built, nothing contacted yet
 * - session: Verifying tenant and subscription scope
 * - enumerating: Listing the container
 * - filtering: Applying the tier and time-window filter
 * - recording-discovery: Writing the discovered audit batch
 * - awaiting-confirmation: Blocked on the operator
 * - migrating: Issuing tier changes
 * - recording-migration: Writing the migrated (and failed) audit batches
 * - finished: Terminal, for every non-fatal outcome
 * - failed: Terminal, fatal error from any non-terminal phase
 */

export type RunPhase =
  | "initialized"
  | "session"
  | "enumerating"
  | "filtering"
  | "recording-discovery"
  | "awaiting-confirmation"
  | "migrating"
  | "recording-migration"
  | "finished"
  | "failed";

/** Valid transitions. Each key maps to the set of phases it can move to. */
const VALID_TRANSITIONS: Record<RunPhase, ReadonlySet<RunPhase>> = {
  initialized: new Set(["session", "failed"]),
  session: new Set(["enumerating", "failed"]),
  enumerating: new Set(["filtering", "failed"]),
  // no candidates ends the run here
  filtering: new Set(["recording-discovery", "finished", "failed"]),
  "recording-discovery": new Set(["awaiting-confirmation", "failed"]),
  // declined or interrupted ends the run here
  "awaiting-confirmation": new Set(["migrating", "finished", "failed"]),
  migrating: new Set(["recording-migration", "failed"]),
  "recording-migration": new Set(["finished", "failed"]),
  finished: new Set(),
  failed: new Set(),
};

export interface PhaseTransitionEvent {
  from: RunPhase;
  to: RunPhase;
  timestamp: Date;
  reason?: string;
}

export type PhaseChangeListener = (event: PhaseTransitionEvent) => void;

export class RunStateMachine {
  private phase: RunPhase = "initialized";
  private listeners: PhaseChangeListener[] = [];

  /** Get the current phase. */
  getPhase(): RunPhase {
    return this.phase;
  }

  isTerminal(): boolean {
    return VALID_TRANSITIONS[this.phase].size === 0;
  }

  /** Check whether a transition to the target phase is valid. */
  canTransition(to: RunPhase): boolean {
    return VALID_TRANSITIONS[this.phase].has(to);
  }

  /**
   * Move to a new phase.
   * Throws if the transition is not valid.
   */
  transition(to: RunPhase, reason?: string): void {
    if (!this.canTransition(to)) {
      throw new Error(`Invalid phase transition: ${this.phase} -> ${to}`);
    }

    const event: PhaseTransitionEvent = {
      from: this.phase,
      to,
      timestamp: new Date(),
      reason,
    };

    this.phase = to;

    for (const listener of this.listeners) {
      listener(event);
    }
  }

  /** Register a listener for phase changes. Returns an unsubscribe function. */
  onPhaseChange(listener: PhaseChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}
