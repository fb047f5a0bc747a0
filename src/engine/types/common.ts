/**
 * Common types used across the translation engine
 */

/** BCP 47-ish language tag, e.g. `en`, `zh`, `zh-TW` */
export type Language = string;

export const PROVIDER_NAMES = ['openai', 'qwen', 'auto'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

export interface TranslationOptions {
  sourceLanguage: Language;
  targetLanguage: Language;
  model: string;
  provider: ProviderName;
}

export interface GlossaryEntry {
  source: string;
  target: string;
}

/** Source term → chosen target term, in first-seen order */
export type Glossary = ReadonlyMap<string, string>;
