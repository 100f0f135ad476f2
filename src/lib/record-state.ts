/**
 * Per-record lifecycle during a reconciliation pass
 */

import { RecordState } from './types';

const TRANSITIONS: Record<RecordState, readonly RecordState[]> = {
  unmatched: ['matched-for-create', 'matched-for-update'],
  'matched-for-create': ['built', 'failed'],
  'matched-for-update': ['built', 'failed'],
  built: ['submitted'],
  submitted: ['succeeded', 'failed'],
  succeeded: [],
  failed: [],
};

export class IllegalTransitionError extends Error {
  constructor(key: string, from: RecordState, to: RecordState) {
    super(`Illegal state transition for ${key || '(no key)'}: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export class RecordStateMachine {
  private current: RecordState = 'unmatched';

  constructor(readonly key: string) {}

  get state(): RecordState {
    return this.current;
  }

  canTransition(to: RecordState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: RecordState): void {
    if (!this.canTransition(to)) {
      throw new IllegalTransitionError(this.key, this.current, to);
    }
    this.current = to;
  }
}
