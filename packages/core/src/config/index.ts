export type { PlanImportConfig } from './plan-import';
export { loadPlanImportConfig, getPlanImportConfig, resetPlanImportConfig } from './plan-import';
