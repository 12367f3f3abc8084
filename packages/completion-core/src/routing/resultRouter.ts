import type { CompletionError } from '../llm/completionError.js';
import type { CompletionResult, Continuation } from '../llm/types.js';
import type { DisplaySurface, EditingSurface, Span } from '../surfaces/types.js';

export type ErrorReporter = (error: CompletionError) => void;

export interface RoutingOptions {
  reportError: ErrorReporter;
  /** Runs after the result has been placed (or reported). */
  onSettled?: (result: CompletionResult) => void;
}

export interface DisplayRoutingOptions extends RoutingOptions {
  /** True when a user ran the command; only then is the surface revealed. */
  interactive: boolean;
  onResult?: (text: string) => void;
}

export function createDisplayContinuation(
  surface: DisplaySurface,
  options: DisplayRoutingOptions,
): Continuation {
  return (result) => {
    if (!result.ok) {
      options.reportError(result.error);
      options.onSettled?.(result);
      return;
    }

    options.onResult?.(result.text);

    if (surface.isAlive()) {
      surface.clear();
      surface.insert(result.text);
      surface.setReadOnly(true);

      if (options.interactive && !surface.isVisible()) {
        surface.reveal();
      }
    }

    options.onSettled?.(result);
  };
}

export function createReplaceContinuation(
  document: EditingSurface,
  span: Span,
  options: RoutingOptions,
): Continuation {
  // Only the start survives the deletion; the old end is stale afterwards.
  const { start, end } = span;

  return (result) => {
    if (!result.ok) {
      options.reportError(result.error);
      options.onSettled?.(result);
      return;
    }

    if (document.isAlive()) {
      document.deleteRange({ start, end });
      document.insert(start, result.text);
    }

    options.onSettled?.(result);
  };
}
