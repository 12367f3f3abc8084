import type {
  CompletionQueryClient,
  CompletionResult,
  Continuation,
  Prompt,
  RequestParameters,
} from '../llm/types.js';
import { TASK_INSTRUCTIONS, buildPrompt, type RegionTask } from '../prompt/promptBuilder.js';
import {
  createDisplayContinuation,
  createReplaceContinuation,
  type ErrorReporter,
} from '../routing/resultRouter.js';
import type { DisplaySurfaceRegistry } from '../surfaces/displaySurfaceRegistry.js';
import type { DisplaySurface, EditingSurface, Span } from '../surfaces/types.js';

export interface CompletionSettings extends RequestParameters {
  credential: string;
}

export interface CompletionCommandsDependencies {
  client: CompletionQueryClient;
  settings: CompletionSettings;
  displays: DisplaySurfaceRegistry;
  reportError: ErrorReporter;
  displayName?: string;
}

export interface DisplayCommandOptions {
  interactive?: boolean;
  onResult?: (text: string) => void;
  onSettled?: (result: CompletionResult) => void;
}

export interface ReplaceCommandOptions {
  onSettled?: (result: CompletionResult) => void;
}

/**
 * The editor-facing entry points. Each builds a prompt, sends it, and routes
 * the outcome to the shared display surface or back into the document.
 */
export class CompletionCommands {
  private readonly deps: CompletionCommandsDependencies;

  constructor(deps: CompletionCommandsDependencies) {
    this.deps = deps;
  }

  promptWithText(text: string, options: DisplayCommandOptions = {}): void {
    this.sendToDisplay(buildPrompt(text), options);
  }

  fixRegion(document: EditingSurface, span: Span, options: DisplayCommandOptions = {}): void {
    this.runRegionTask('fix', document, span, options);
  }

  explainRegion(document: EditingSurface, span: Span, options: DisplayCommandOptions = {}): void {
    this.runRegionTask('explain', document, span, options);
  }

  generateTestsForRegion(
    document: EditingSurface,
    span: Span,
    options: DisplayCommandOptions = {},
  ): void {
    this.runRegionTask('tests', document, span, options);
  }

  refactorRegion(document: EditingSurface, span: Span, options: DisplayCommandOptions = {}): void {
    this.runRegionTask('refactor', document, span, options);
  }

  promptWithRegion(document: EditingSurface, span: Span, options: DisplayCommandOptions = {}): void {
    this.sendToDisplay(buildPrompt(document.getText(span)), options);
  }

  promptWithRegionAndReplace(
    document: EditingSurface,
    span: Span,
    options: ReplaceCommandOptions = {},
  ): void {
    const prompt = buildPrompt(document.getText(span));
    this.send(
      prompt,
      createReplaceContinuation(document, span, {
        reportError: this.deps.reportError,
        onSettled: options.onSettled,
      }),
    );
  }

  displaySurface(): DisplaySurface {
    return this.deps.displays.getOrCreate(this.deps.displayName);
  }

  private runRegionTask(
    task: RegionTask,
    document: EditingSurface,
    span: Span,
    options: DisplayCommandOptions,
  ): void {
    const prompt = buildPrompt(document.getText(span), TASK_INSTRUCTIONS[task], document.commentMarker);
    this.sendToDisplay(prompt, options);
  }

  private sendToDisplay(prompt: Prompt, options: DisplayCommandOptions): void {
    this.send(
      prompt,
      createDisplayContinuation(this.displaySurface(), {
        interactive: options.interactive ?? true,
        reportError: this.deps.reportError,
        onResult: options.onResult,
        onSettled: options.onSettled,
      }),
    );
  }

  private send(prompt: Prompt, continuation: Continuation): void {
    const { credential, model, maxTokens, temperature } = this.deps.settings;
    this.deps.client.query(prompt, { model, maxTokens, temperature }, credential, continuation);
  }
}
