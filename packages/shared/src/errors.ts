export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 400,
    public details?: Array<{ field: string; message: string }>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id?: string) {
    super('NOT_FOUND', id ? `${entity} ${id} not found` : `${entity} not found`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string = 'Validation failed',
    details?: Array<{ field: string; message: string }>,
  ) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

export class SheetReadError extends AppError {
  constructor(sheetName: string, reason: string, cause?: unknown) {
    super('SHEET_UNREADABLE', `Unable to read sheet "${sheetName}": ${reason}`, 422);
    this.cause = cause;
  }
}

export class CorrectionHydrationError extends AppError {
  constructor(userId: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : 'correction store unavailable';
    super(
      'CORRECTION_HYDRATION_FAILED',
      `Failed to load tag corrections for user ${userId}: ${reason}`,
      503,
    );
    this.cause = cause;
  }
}
