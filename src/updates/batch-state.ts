import { InvalidBatchTransitionError } from "../errors.js";
import type { BatchState } from "../models/results.js";

const TRANSITIONS: Readonly<Record<BatchState, readonly BatchState[]>> = {
  PENDING: ["VALIDATED", "FAILED"],
  VALIDATED: ["FETCHED", "FAILED"],
  FETCHED: ["WRITTEN", "FAILED"],
  WRITTEN: ["COMMITTED", "ROLLED_BACK"],
  COMMITTED: [],
  ROLLED_BACK: [],
  FAILED: [],
};

export function canTransition(from: BatchState, to: BatchState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Lifecycle of one update batch. Illegal moves throw; they indicate a coordinator bug. */
export class BatchStateMachine {
  private current: BatchState = "PENDING";
  private readonly history: BatchState[] = ["PENDING"];

  get state(): BatchState {
    return this.current;
  }

  get stateHistory(): readonly BatchState[] {
    return [...this.history];
  }

  transition(to: BatchState): void {
    if (!canTransition(this.current, to)) {
      throw new InvalidBatchTransitionError(this.current, to);
    }
    this.current = to;
    this.history.push(to);
  }
}
