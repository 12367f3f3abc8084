export type {
  CompletionErrorKind,
  CompletionQueryClient,
  CompletionRequest,
  CompletionResult,
  Continuation,
  Prompt,
  RequestParameters,
} from './llm/types.js';
export {
  DEFAULT_ENDPOINT_URL,
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
} from './llm/types.js';
export { CompletionError, isCompletionError } from './llm/completionError.js';
export { CompletionClient } from './llm/completionClient.js';
export type { CompletionClientOptions, FetchImpl } from './llm/completionClient.js';
export { decodeCompletionBody, decodeCompletionResponse } from './llm/responseDecoder.js';
export { RequestLifecycle } from './llm/requestLifecycle.js';
export type {
  ListenerErrorHandler,
  RequestState,
  RequestTransitionListener,
} from './llm/requestLifecycle.js';
export {
  DEFAULT_COMMENT_MARKER,
  TASK_INSTRUCTIONS,
  buildPrompt,
} from './prompt/promptBuilder.js';
export type { RegionTask } from './prompt/promptBuilder.js';
export type { DisplaySurface, EditingSurface, Span } from './surfaces/types.js';
export { assertSpan, splitsSurrogatePair } from './surfaces/types.js';
export { TextDocument } from './surfaces/textDocument.js';
export { DEFAULT_DISPLAY_NAME, ResultsBuffer } from './surfaces/resultsBuffer.js';
export type { ResultsBufferOptions } from './surfaces/resultsBuffer.js';
export { DisplaySurfaceRegistry } from './surfaces/displaySurfaceRegistry.js';
export {
  createDisplayContinuation,
  createReplaceContinuation,
} from './routing/resultRouter.js';
export type {
  DisplayRoutingOptions,
  ErrorReporter,
  RoutingOptions,
} from './routing/resultRouter.js';
export { CompletionCommands } from './usecases/completionCommands.js';
export type {
  CompletionCommandsDependencies,
  CompletionSettings,
  DisplayCommandOptions,
  ReplaceCommandOptions,
} from './usecases/completionCommands.js';
