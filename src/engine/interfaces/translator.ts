/**
 * Collaborator interfaces consumed by the orchestrator
 */

import type { Glossary, GlossaryEntry, TranslationOptions } from '../types/common.js';

export interface TranslationContext {
  summary: string;
  glossary: Glossary;
  previousTail: string;
}

/**
 * Outcome of one backend call. Failures carry their retry classification
 * instead of being thrown across the chunk boundary.
 */
export type TranslatorOutcome =
  | {
      status: 'success';
      translatedText: string;
      observedTerms: GlossaryEntry[];
      tokensUsed?: number;
    }
  | { status: 'transient-failure'; error: string }
  | { status: 'permanent-failure'; error: string };

export interface ITranslatorBackend {
  readonly name: string;

  translateChunk(
    text: string,
    context: TranslationContext,
    options: TranslationOptions
  ): Promise<TranslatorOutcome>;
}

export interface ISummarizer {
  summarize(previousSummary: string, newTranslatedText: string, maxLength: number): Promise<string>;
}

/**
 * Finds glossary candidates in a translated chunk (e.g. terms left untranslated)
 */
export interface ITermExtractor {
  extract(sourceText: string, translatedText: string): GlossaryEntry[];
}
