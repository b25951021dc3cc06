/**
 * Extraction Runner State Machine
 *
 *   Idle -> Assembling -> Calling -> Validating -> Succeeded
 *                           ^  |         |
 *                           +--+---------+ (retry / next segment)
 *                              |         |
 *                              v         v
 *                          FallingBack / Failed
 *
 * Assembling goes straight to Succeeded when there is no text to send.
 */

export type RunnerState =
  | 'Idle'
  | 'Assembling'
  | 'Calling'
  | 'Validating'
  | 'Succeeded'
  | 'FallingBack'
  | 'Failed';

const TRANSITIONS: Readonly<Record<RunnerState, readonly RunnerState[]>> = {
  Idle: ['Assembling'],
  Assembling: ['Calling', 'Succeeded', 'Failed'],
  Calling: ['Calling', 'Validating', 'FallingBack', 'Failed'],
  Validating: ['Calling', 'Succeeded', 'FallingBack', 'Failed'],
  FallingBack: ['Succeeded', 'Failed'],
  Succeeded: [],
  Failed: []
};

export class IllegalTransitionError extends Error {
  constructor(from: RunnerState, to: RunnerState) {
    super(`Illegal extraction state transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

/**
 * Tracks one extraction run. Terminal states accept no further transitions.
 */
export class RunnerStateMachine {
  private current: RunnerState = 'Idle';
  private readonly trail: RunnerState[] = ['Idle'];

  get state(): RunnerState {
    return this.current;
  }

  /** Every state visited, in order. */
  get history(): readonly RunnerState[] {
    return this.trail;
  }

  get terminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  transition(to: RunnerState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    this.current = to;
    this.trail.push(to);
  }
}
