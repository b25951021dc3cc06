export { applyPlan, type MutationPlan, type PlanCounts, planCounts, resolveExtraction, throwIfCancelled } from './resolver';
