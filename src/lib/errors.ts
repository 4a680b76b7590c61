import type { GenerationErrorKind } from '../types';

export class HttpStatusError extends Error {
  readonly status: number;

  constructor(service: string, status: number, detail: string) {
    super(`${service} request failed (${status}): ${detail || 'unknown error'}`);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

export class GenerationError extends Error {
  readonly kind: GenerationErrorKind;

  constructor(kind: GenerationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
    this.kind = kind;
  }
}

export class PersistenceError extends Error {
  readonly path: string;

  constructor(action: string, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${action} ${path}: ${reason}`, { cause });
    this.name = 'PersistenceError';
    this.path = path;
  }
}

// DOMException from an aborted signal is matched by name
function isAbortLike(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) return false;
  return error.name === 'AbortError' || error.name === 'TimeoutError';
}

export function classifyGenerationError(error: unknown): GenerationError {
  if (error instanceof GenerationError) return error;
  const message = error instanceof Error ? error.message : String(error);

  if (isAbortLike(error)) {
    return new GenerationError('timeout', 'Note generation timed out', { cause: error });
  }
  if (error instanceof HttpStatusError && (error.status === 401 || error.status === 403)) {
    return new GenerationError('auth', message, { cause: error });
  }
  // fetch() rejects with a TypeError when the connection itself fails
  if (error instanceof TypeError) {
    return new GenerationError('network', message, { cause: error });
  }
  return new GenerationError('provider', message, { cause: error });
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
