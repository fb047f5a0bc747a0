/**
 * Prompts for the rolling document summary
 */

export const SUMMARIZER_SYSTEM_PROMPT = `You maintain a running summary of a document that is being translated chunk by chunk.

The summary helps the translator of the next chunk keep terminology, tone and topic consistent.

Rules:
- Write in the language of the translated text
- Keep the most important topics, names and terms
- Drop details that later chunks are unlikely to need
- Answer with the summary text only, no preamble`;

export const createSummaryPrompt = (
  previousSummary: string,
  newTranslatedText: string,
  maxLength: number
): string => {
  let prompt = '';

  if (previousSummary) {
    prompt += `## Current Summary\n${previousSummary}\n\n`;
  }

  prompt += `## Newly Translated Passage\n${newTranslatedText}\n\n`;
  prompt += `Write the updated summary in at most ${maxLength} characters.`;

  return prompt;
};
