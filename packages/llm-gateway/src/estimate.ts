// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { AnalysisMessage } from './types.js';

const CHARS_PER_TOKEN = 4;

/**
 * Estimates the number of tokens in a prompt string or messages array.
 * Uses the 4-characters-per-token heuristic as a conservative approximation
 * for callers without a tokenizer. Add the expected completion length
 * before passing the result as `estimatedTokens`.
 */
export function estimatePromptTokens(
  prompt: string | readonly AnalysisMessage[],
  system?: string,
): number {
  let totalChars = system?.length ?? 0;
  if (typeof prompt === 'string') {
    totalChars += prompt.length;
  } else {
    for (const message of prompt) {
      totalChars += message.content.length;
    }
  }
  return Math.ceil(totalChars / CHARS_PER_TOKEN);
}
