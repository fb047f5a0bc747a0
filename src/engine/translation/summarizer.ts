/**
 * Summarizers - keep a bounded abstract of what has been translated so far
 */

import type { ILLMProvider } from '../interfaces/llm-provider.js';
import type { ISummarizer } from '../interfaces/translator.js';
import { SUMMARIZER_SYSTEM_PROMPT, createSummaryPrompt } from '../prompts/summarizer.js';

/**
 * Cut `text` to its last `maxLength` characters, starting at a word boundary
 * when one is available.
 */
export function clampSummary(text: string, maxLength: number): string {
  if (maxLength <= 0) return '';
  if (text.length <= maxLength) return text;

  const cut = text.slice(text.length - maxLength);
  const startsMidWord = !/\s/.test(text.charAt(text.length - maxLength - 1));
  if (startsMidWord) {
    const space = cut.search(/\s/);
    if (space > 0) {
      return cut.slice(space).trim();
    }
  }
  return cut.trim();
}

/**
 * Deterministic summarizer: the most recent translated text, whitespace collapsed.
 * The orchestrator's default.
 */
export class RollingSummarizer implements ISummarizer {
  async summarize(previousSummary: string, newTranslatedText: string, maxLength: number): Promise<string> {
    const combined = `${previousSummary} ${newTranslatedText}`.replace(/\s+/g, ' ').trim();
    return clampSummary(combined, maxLength);
  }
}

export class LLMSummarizer implements ISummarizer {
  constructor(
    private provider: ILLMProvider,
    private temperature = 0.3
  ) {}

  async summarize(previousSummary: string, newTranslatedText: string, maxLength: number): Promise<string> {
    const result = await this.provider.complete(
      [
        { role: 'system', content: SUMMARIZER_SYSTEM_PROMPT },
        { role: 'user', content: createSummaryPrompt(previousSummary, newTranslatedText, maxLength) },
      ],
      {
        temperature: this.temperature,
        // CJK text can take about one token per character
        maxTokens: Math.max(64, maxLength),
      }
    );

    const summary = result.content.trim();
    if (!summary) {
      console.warn('[LLMSummarizer] ⚠️ Empty summary returned, keeping the previous one');
      return previousSummary;
    }
    return summary;
  }
}
