export type PipelineStage = 'config' | 'fetch' | 'map' | 'write';

export interface AppError extends Error {
  stage: PipelineStage;
  code: string;
  details?: Record<string, unknown>;
}

export function createError(
  message: string,
  stage: PipelineStage,
  code: string = 'INTERNAL_ERROR',
  details?: Record<string, unknown>
): AppError {
  const error = new Error(message);
  return Object.assign(error, { stage, code, details });
}

export function isAppError(error: unknown): error is AppError {
  return (
    error instanceof Error &&
    'stage' in error &&
    typeof error.stage === 'string' &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

/**
 * Wrap an unknown throwable as an AppError, keeping an existing AppError as-is
 */
export function toAppError(
  error: unknown,
  stage: PipelineStage,
  code: string,
  details?: Record<string, unknown>
): AppError {
  if (isAppError(error)) {
    return error;
  }
  const wrapped = createError(describeError(error), stage, code, details);
  if (error instanceof Error && error.stack) {
    wrapped.stack = error.stack;
  }
  return wrapped;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
