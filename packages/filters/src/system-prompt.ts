import type { IOKind } from '@clipfilter/core';

/**
 * Fixed instruction sent as the system prompt of every filter run
 */
export function buildSystemPrompt(input: IOKind, output: IOKind): string {
  return `Follow the instructions strictly and convert the input ${input} to the output ${output}. ` +
    'No additional text or comments are allowed.';
}

/**
 * User prompt: the filter's instruction, a blank line, then the clipboard text
 */
export function buildUserPrompt(filterPrompt: string, inputText: string): string {
  return `${filterPrompt}\n\n${inputText}`;
}
