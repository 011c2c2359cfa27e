// CLI commands
export * from './flags';
export type { CommandAction, CommandOutcome } from './types';
export { executePlan, registerPlanCommand, type PlanCommandResult } from './plan';
export { executeApply, registerApplyCommand, type ApplyCommandResult } from './apply';
export { executeShow, formatPlan, registerShowCommand, type ShowCommandResult } from './show';
