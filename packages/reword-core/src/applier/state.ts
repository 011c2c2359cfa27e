/**
 * Replay state machine states
 */

import type { ApplyResult } from '@reword/contracts';

export type ApplyState =
  | { kind: 'init' }
  | { kind: 'branch-created'; branch: string }
  | { kind: 'reset'; base: string }
  /** About to replay item `index` */
  | { kind: 'replaying'; index: number; sha: string }
  | { kind: 'done'; result: ApplyResult }
  | { kind: 'aborted'; from: ActiveApplyState; error: unknown };

export type ActiveApplyState = Exclude<ApplyState, { kind: 'done' } | { kind: 'aborted' }>;

export interface ApplyTransition {
  from: ApplyState;
  to: ApplyState;
}

/** Short label for logs, e.g. `replaying(2)` */
export function describeState(state: ApplyState): string {
  switch (state.kind) {
    case 'replaying':
      return `replaying(${state.index})`;
    case 'aborted':
      return `aborted(from ${describeState(state.from)})`;
    default:
      return state.kind;
  }
}
