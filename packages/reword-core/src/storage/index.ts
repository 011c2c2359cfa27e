/**
 * Storage module
 * @module @reword/core/storage
 */

export { serializePlan, deserializePlan, savePlan, loadPlan } from './plan-storage';
