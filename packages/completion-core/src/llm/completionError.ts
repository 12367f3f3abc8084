import type { CompletionErrorKind, CompletionResult } from './types.js';

export class CompletionError extends Error {
  readonly kind: CompletionErrorKind;

  constructor(kind: CompletionErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = kind;
    this.kind = kind;
  }
}

export function isCompletionError(value: unknown): value is CompletionError {
  return value instanceof CompletionError;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }

  return String(cause);
}

export function failure(
  kind: CompletionErrorKind,
  message: string,
  cause?: unknown,
): CompletionResult {
  return { ok: false, error: new CompletionError(kind, message, cause) };
}
