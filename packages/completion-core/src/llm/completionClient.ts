import { CompletionError, describeCause, failure } from './completionError.js';
import { RequestLifecycle, type RequestTransitionListener } from './requestLifecycle.js';
import { decodeCompletionBody } from './responseDecoder.js';
import {
  DEFAULT_ENDPOINT_URL,
  type CompletionQueryClient,
  type CompletionRequest,
  type CompletionResult,
  type Continuation,
  type Prompt,
  type RequestParameters,
} from './types.js';

export type FetchImpl = typeof globalThis.fetch;

function resolveFetch(): FetchImpl {
  if (typeof globalThis.fetch === 'function') {
    return globalThis.fetch;
  }

  throw new Error(
    'Global fetch API is not available in this runtime. Provide fetchImpl when constructing CompletionClient.',
  );
}

function reportContinuationFailure(error: unknown): void {
  console.error('Completion continuation failed:', error);
}

export interface CompletionClientOptions {
  fetchImpl?: FetchImpl;
  /**
   * Receives errors thrown by a continuation or by `onTransition`; the result
   * is never re-delivered and a failing listener never blocks delivery.
   */
  onContinuationError?: (error: unknown) => void;
  onTransition?: RequestTransitionListener;
}

export class CompletionClient implements CompletionQueryClient {
  private readonly endpointUrl: string;

  private readonly fetchImpl: FetchImpl;

  private readonly onContinuationError: (error: unknown) => void;

  private readonly onTransition?: RequestTransitionListener;

  private requestCounter = 0;

  constructor(endpointUrl: string = DEFAULT_ENDPOINT_URL, options: CompletionClientOptions = {}) {
    this.endpointUrl = endpointUrl;
    this.fetchImpl = options.fetchImpl ?? resolveFetch();
    this.onContinuationError = options.onContinuationError ?? reportContinuationFailure;
    this.onTransition = options.onTransition;
  }

  /**
   * Sends the prompt and returns before the response arrives. The continuation
   * runs exactly once, later, with either the trimmed completion or an error.
   * A missing credential or invalid parameters throw synchronously instead.
   */
  query(
    prompt: Prompt,
    params: RequestParameters,
    credential: string,
    continuation: Continuation,
  ): void {
    const token = requireCredential(credential);
    const request = buildRequest(prompt, params);

    this.requestCounter += 1;
    const lifecycle = new RequestLifecycle(
      this.requestCounter,
      this.onTransition,
      this.onContinuationError,
    );
    const pending = this.send(request, token);
    lifecycle.advance('Dispatched');

    pending
      .then((result) => {
        lifecycle.advance('Decoded');
        deliver(lifecycle, continuation, result);
      })
      .catch(this.onContinuationError);
  }

  complete(prompt: Prompt, params: RequestParameters, credential: string): Promise<CompletionResult> {
    return new Promise((resolve) => {
      this.query(prompt, params, credential, resolve);
    });
  }

  private async send(request: CompletionRequest, token: string): Promise<CompletionResult> {
    let response: Response;

    try {
      response = await this.fetchImpl(this.endpointUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${token}`,
        },
        body: JSON.stringify({
          model: request.model,
          prompt: request.prompt,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
        }),
      });
    } catch (error) {
      return failure(
        'TransportError',
        `Completion endpoint ${this.endpointUrl} is unreachable: ${describeCause(error)}`,
        error,
      );
    }

    let body: string;

    try {
      body = await response.text();
    } catch (error) {
      return failure(
        'TransportError',
        `Completion response could not be read: ${describeCause(error)}`,
        error,
      );
    }

    return decodeCompletionBody(body, response.status);
  }
}

function deliver(
  lifecycle: RequestLifecycle,
  continuation: Continuation,
  result: CompletionResult,
): void {
  if (lifecycle.delivered) {
    return;
  }

  lifecycle.advance('Delivered');
  continuation(result);
}

function requireCredential(credential: string): string {
  const token = credential.trim();

  if (token.length === 0) {
    throw new CompletionError(
      'ConfigurationError',
      'API credential is empty. Set the credential environment variable before sending a completion request.',
    );
  }

  return token;
}

function buildRequest(prompt: Prompt, params: RequestParameters): CompletionRequest {
  if (!Number.isInteger(params.maxTokens) || params.maxTokens <= 0) {
    throw new CompletionError(
      'ConfigurationError',
      `maxTokens must be a positive integer (received ${params.maxTokens})`,
    );
  }

  if (!Number.isFinite(params.temperature)) {
    throw new CompletionError(
      'ConfigurationError',
      `temperature must be a finite number (received ${params.temperature})`,
    );
  }

  if (params.model.trim().length === 0) {
    throw new CompletionError('ConfigurationError', 'model identifier is required');
  }

  return {
    model: params.model,
    prompt,
    maxTokens: params.maxTokens,
    temperature: params.temperature,
  };
}

export default CompletionClient;
