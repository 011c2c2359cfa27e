/**
 * Applier module
 * @module @reword/core/applier
 */

export { PlanApplier, applyPlan, resolveCommitMessage, identityEnv } from './apply';

export {
  describeState,
  type ApplyState,
  type ActiveApplyState,
  type ApplyTransition,
} from './state';
