/**
 * Prompts for chunk translation
 *
 * The model receives one chunk of Markdown plus the rolling context
 * (summary, glossary, tail of the previous translation).
 */

import type { Language } from '../types/common.js';

const LANGUAGE_NAMES: Record<string, string> = {
  en: 'English',
  zh: 'Simplified Chinese',
  'zh-TW': 'Traditional Chinese',
  ja: 'Japanese',
  ko: 'Korean',
  ru: 'Russian',
  de: 'German',
  fr: 'French',
  es: 'Spanish',
  pt: 'Portuguese',
  it: 'Italian',
};

export function languageName(code: Language): string {
  return LANGUAGE_NAMES[code] ?? code;
}

export interface TranslatorPromptOptions {
  /** Translate comment lines inside fenced code instead of copying the block verbatim */
  translateCodeComments?: boolean;
}

const CODE_VERBATIM_RULE = '- Copy fenced code blocks unchanged, including the fence lines and the info string';

const CODE_COMMENTS_RULE = `- Inside fenced code blocks translate ONLY comment lines (starting with \`#\` or \`//\`), keeping their indentation and comment marker
- Copy every other line of a fenced code block unchanged, including the fence lines and the info string`;

export const createTranslatorSystemPrompt = (
  sourceLanguage: Language,
  targetLanguage: Language,
  options: TranslatorPromptOptions = {}
): string => `You are an expert technical translator. Translate Markdown documents from ${languageName(
  sourceLanguage
)} into ${languageName(targetLanguage)}.

## Translation Rules

### Markdown Structure
- Preserve the Markdown structure EXACTLY: headings, list markers, indentation, table pipes, blank lines
- Never add or remove headings, list items, table rows or thematic breaks
${options.translateCodeComments ? CODE_COMMENTS_RULE : CODE_VERBATIM_RULE}
- Keep inline code, URLs, link targets, image paths and HTML tags unchanged
- Translate link text, image alt text and table cell text

### Names and Terms
- Use EXACTLY the translations from the glossary
- Keep product names, proper nouns and identifiers in their original form unless the glossary says otherwise

### Continuity
- The text continues from the previous translated passage; keep terminology and tone consistent with it
- Do not repeat the previous passage in your answer

## Output Format

**IMPORTANT: Return a JSON object with the following structure:**

{
  "translation": "The translated Markdown chunk",
  "terms": [
    {"source": "term in the original", "target": "term as you translated it"}
  ]
}

- "translation" contains ONLY the translated chunk
- "terms" lists names and domain terms you translated or deliberately kept, so later chunks can reuse them; use [] when there are none`;

export const createTranslatorPrompt = (
  sourceText: string,
  glossary: string,
  summary: string,
  previousTail: string
): string => {
  let prompt = '';

  if (summary) {
    prompt += `## Document So Far (summary)\n${summary}\n\n`;
  }

  prompt += `## Glossary (USE THESE TRANSLATIONS)\n${glossary}\n\n`;

  if (previousTail) {
    prompt += `## End of the Previous Translated Passage\n${previousTail}\n\n`;
  }

  prompt += `## Markdown to Translate\n\n${sourceText}\n\n`;
  prompt += `Translate the above Markdown following all rules. Return the result as a JSON object with the structure specified in the output format section.`;

  return prompt;
};
