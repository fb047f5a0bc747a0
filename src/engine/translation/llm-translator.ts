/**
 * Translator backend over an LLM provider
 */

import { z } from 'zod';
import type { ILLMProvider } from '../interfaces/llm-provider.js';
import type { ITranslatorBackend, TranslationContext, TranslatorOutcome } from '../interfaces/translator.js';
import type { TranslationOptions } from '../types/common.js';
import { createTranslatorSystemPrompt, createTranslatorPrompt } from '../prompts/translator.js';
import { formatGlossary } from '../context/context-carrier.js';
import { classifyError } from './retry.js';

export const translationResponseSchema = z.object({
  translation: z.string(),
  terms: z
    .array(
      z.object({
        source: z.string(),
        target: z.string(),
      })
    )
    .optional(),
});

export type TranslationResponse = z.infer<typeof translationResponseSchema>;

export interface LLMTranslatorOptions {
  temperature?: number;
  /** Upper bound on completion tokens per chunk */
  maxOutputTokens?: number;
  translateCodeComments?: boolean;
}

export class LLMTranslator implements ITranslatorBackend {
  readonly name: string;

  constructor(
    private provider: ILLMProvider,
    private options: LLMTranslatorOptions = {}
  ) {
    this.name = `${provider.name}:${provider.model}`;
  }

  async translateChunk(
    text: string,
    context: TranslationContext,
    options: TranslationOptions
  ): Promise<TranslatorOutcome> {
    try {
      const { data, tokensUsed } = await this.provider.completeJSON(
        [
          {
            role: 'system',
            content: createTranslatorSystemPrompt(options.sourceLanguage, options.targetLanguage, {
              translateCodeComments: this.options.translateCodeComments,
            }),
          },
          {
            role: 'user',
            content: createTranslatorPrompt(
              text,
              formatGlossary(context.glossary),
              context.summary,
              context.previousTail
            ),
          },
        ],
        translationResponseSchema,
        {
          temperature: this.options.temperature,
          maxTokens: this.options.maxOutputTokens ?? Math.max(1024, this.provider.estimateTokens(text) * 3),
        }
      );

      return {
        status: 'success',
        translatedText: data.translation,
        observedTerms: data.terms ?? [],
        tokensUsed: tokensUsed.total,
      };
    } catch (error) {
      return classifyError(error);
    }
  }
}
