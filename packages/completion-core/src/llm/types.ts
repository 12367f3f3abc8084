import type { CompletionError } from './completionError.js';

export const DEFAULT_ENDPOINT_URL = 'https://api.openai.com/v1/completions';
export const DEFAULT_MODEL = 'text-davinci-003';
export const DEFAULT_MAX_TOKENS = 1024;
export const DEFAULT_TEMPERATURE = 0;

/** Full text sent to the completion endpoint, instruction included. */
export type Prompt = string;

export interface RequestParameters {
  model: string;
  maxTokens: number;
  temperature: number;
}

export interface CompletionRequest extends RequestParameters {
  prompt: Prompt;
}

export type CompletionErrorKind = 'ConfigurationError' | 'ParsingError' | 'TransportError';

export type CompletionResult =
  | { ok: true; text: string }
  | { ok: false; error: CompletionError };

export type Continuation = (result: CompletionResult) => void;

export interface CompletionQueryClient {
  query(
    prompt: Prompt,
    params: RequestParameters,
    credential: string,
    continuation: Continuation,
  ): void;
}
