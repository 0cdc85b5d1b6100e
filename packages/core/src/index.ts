export type { RequestContext } from './auth/context';
export { createRequestContext } from './auth/context';
export type { LogLevel, LogEntry, LogFields, Logger } from './observability/logger';
export {
  logger,
  log,
  setLogLevel,
  isLogLevel,
  childLogger,
  serializeError,
} from './observability/logger';
export type { PlanImportConfig } from './config';
export { loadPlanImportConfig, getPlanImportConfig, resetPlanImportConfig } from './config';
