import type { Prompt } from '../llm/types.js';

export const DEFAULT_COMMENT_MARKER = '//';

export type RegionTask = 'fix' | 'explain' | 'tests' | 'refactor';

export const TASK_INSTRUCTIONS: Readonly<Record<RegionTask, string>> = {
  fix: 'Fix the bugs in the code above.',
  explain: 'Explain what the code above does.',
  tests: 'Write unit tests for the code above.',
  refactor: 'Refactor the code above to improve readability.',
};

/**
 * Appends the instruction as a trailing line comment so the model reads it
 * as a directive embedded in the source. Without an instruction the
 * selection is sent verbatim.
 */
export function buildPrompt(
  selectionText: string,
  instruction?: string,
  commentMarker: string = DEFAULT_COMMENT_MARKER,
): Prompt {
  if (instruction === undefined) {
    return selectionText;
  }

  return `${selectionText}\n${commentMarker} ${instruction}`;
}
