import { z } from 'zod';

import { failure } from './completionError.js';
import type { CompletionResult } from './types.js';

const responseEnvelopeSchema = z.object({
  choices: z.array(z.unknown()).min(1, 'choices list is empty'),
});

const choiceSchema = z.object({
  text: z.string(),
});

const serverErrorSchema = z.object({
  error: z.object({
    message: z.string(),
  }),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Extracts `choices[0].text` from a parsed completion payload and trims it.
 * Any other shape becomes a ParsingError carrying the validation failure.
 */
export function decodeCompletionResponse(raw: unknown): CompletionResult {
  const envelope = responseEnvelopeSchema.safeParse(raw);

  if (!envelope.success) {
    return failure(
      'ParsingError',
      `Unexpected completion payload: ${formatIssues(envelope.error)}`,
      envelope.error,
    );
  }

  const choice = choiceSchema.safeParse(envelope.data.choices[0]);

  if (!choice.success) {
    return failure(
      'ParsingError',
      `Unexpected completion choice: ${formatIssues(choice.error)}`,
      choice.error,
    );
  }

  return { ok: true, text: choice.data.text.trim() };
}

export function decodeCompletionBody(body: string, status: number): CompletionResult {
  let raw: unknown;

  try {
    raw = JSON.parse(body);
  } catch (error) {
    return failure(
      'ParsingError',
      `Completion response is not valid JSON (status ${status})`,
      error,
    );
  }

  const result = decodeCompletionResponse(raw);

  if (result.ok || (status >= 200 && status < 300)) {
    return result;
  }

  const serverError = serverErrorSchema.safeParse(raw);
  const detail = serverError.success ? serverError.data.error.message : result.error.message;

  return failure(
    'ParsingError',
    `Completion request failed with status ${status}: ${detail}`,
    result.error,
  );
}
