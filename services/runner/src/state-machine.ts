import { EventEmitter } from 'node:events';
import type { RunState } from './types.js';

/**
 * Valid state transitions for a run.
 *
 * submitting           → running | failed
 * running              → awaiting-termination | failed
 * awaiting-termination → finalizing | failed
 * finalizing           → done | failed
 * done, failed         → (terminal)
 */
const VALID_TRANSITIONS: Record<RunState, Set<RunState>> = {
  submitting: new Set(['running', 'failed']),
  running: new Set(['awaiting-termination', 'failed']),
  'awaiting-termination': new Set(['finalizing', 'failed']),
  finalizing: new Set(['done', 'failed']),
  done: new Set(),
  failed: new Set(),
};

/** Emits `transition` with `(to, from)` after every accepted transition. */
export class RunStateMachine extends EventEmitter {
  private _state: RunState;

  constructor(initialState: RunState = 'submitting') {
    super();
    this._state = initialState;
  }

  get state(): RunState {
    return this._state;
  }

  get isTerminal(): boolean {
    return VALID_TRANSITIONS[this._state].size === 0;
  }

  transition(to: RunState): void {
    const allowed = VALID_TRANSITIONS[this._state];
    if (!allowed.has(to)) {
      throw new Error(`Invalid state transition: ${this._state} -> ${to}`);
    }
    const from = this._state;
    this._state = to;
    this.emit('transition', to, from);
  }
}
