import { InvalidRunTransitionError } from './errors';
import { RunStatus } from './types';

const { RECEIVED, VALIDATING, AGGREGATING, ROUTED, FINALIZING, COMPLETED, FAILED, CANCELLED } = RunStatus;

// VALIDATING may be re-entered when a run is resumed after a restart;
// checks have no external effect so they are simply issued again.
const TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  [RECEIVED]: [VALIDATING, FAILED, CANCELLED],
  [VALIDATING]: [VALIDATING, AGGREGATING, FAILED, CANCELLED],
  [AGGREGATING]: [ROUTED, FAILED, CANCELLED],
  [ROUTED]: [FINALIZING, FAILED, CANCELLED],
  [FINALIZING]: [COMPLETED, FAILED],
  [COMPLETED]: [],
  [FAILED]: [],
  [CANCELLED]: [],
};

export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: RunStatus, to: RunStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidRunTransitionError(from, to);
  }
}

export function isTerminal(status: RunStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/** Cancellation is only honoured before any external write can have started. */
export function isCancellable(status: RunStatus): boolean {
  return canTransition(status, CANCELLED);
}
