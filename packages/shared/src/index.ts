export {
  AppError,
  NotFoundError,
  ValidationError,
  SheetReadError,
  CorrectionHydrationError,
} from './errors';
export * from './utils';
