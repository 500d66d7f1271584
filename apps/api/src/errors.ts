import { EngineError } from '@debt-planner/engine';

export type ErrorStatus = 400 | 401 | 404 | 422 | 500;

export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public status: ErrorStatus = 400,
    public suggestion = '',
  ) {
    super(message);
  }
}

export const validationError = (message: string) =>
  new AppError('VALIDATION_ERROR', message, 400, 'Check request body');

export const fromEngineError = (err: EngineError) =>
  new AppError(
    err.code,
    err.message,
    422,
    err.debtId ? `Fix debt '${err.debtId}' and retry` : 'Check monthlyBudget',
  );

export function toAppError(err: Error): AppError {
  if (err instanceof AppError) return err;
  if (err instanceof EngineError) return fromEngineError(err);
  return new AppError('INTERNAL_ERROR', err.message, 500, 'Check server logs');
}
