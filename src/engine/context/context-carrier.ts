/**
 * Context Carrier - rolling state threaded from one chunk translation to the next
 *
 * State is never mutated: every update returns a new ContextState. The glossary
 * is append-only and the first translation recorded for a term is kept for the run.
 */

import type { Glossary, GlossaryEntry } from '../types/common.js';
import type { ContextState, TranslationResult } from '../types/pipeline.js';

export const DEFAULT_TAIL_LENGTH = 200;

export function createInitialContext(seed: readonly GlossaryEntry[] = []): ContextState {
  return {
    summary: '',
    glossary: mergeGlossary(new Map(), seed).glossary,
    previousTail: '',
  };
}

/**
 * Insert unseen terms; a term that already has a translation keeps it.
 */
export function mergeGlossary(
  glossary: Glossary,
  entries: readonly GlossaryEntry[]
): { glossary: Glossary; added: GlossaryEntry[] } {
  const added: GlossaryEntry[] = [];
  let next: Map<string, string> | null = null;

  for (const entry of entries) {
    const source = entry.source.trim();
    const target = entry.target.trim();
    if (!source || !target) continue;
    if ((next ?? glossary).has(source)) continue;

    next ??= new Map(glossary);
    next.set(source, target);
    added.push({ source, target });
  }

  return { glossary: next ?? glossary, added };
}

/**
 * Apply a successful chunk translation. The summary is stored as given;
 * producing it is the summarizer's job.
 */
export function updateContext(
  state: ContextState,
  result: TranslationResult,
  summary: string,
  tailLength = DEFAULT_TAIL_LENGTH
): ContextState {
  return {
    summary,
    glossary: mergeGlossary(state.glossary, result.updatedGlossaryEntries).glossary,
    previousTail: tailOf(result.translatedText, tailLength),
  };
}

export function tailOf(text: string, length: number): string {
  if (length <= 0) return '';
  return text.length <= length ? text : text.slice(text.length - length);
}

export function glossaryToEntries(glossary: Glossary): GlossaryEntry[] {
  return Array.from(glossary, ([source, target]) => ({ source, target }));
}

/**
 * Glossary as prompt lines: `- source → target`
 */
export function formatGlossary(glossary: Glossary): string {
  if (glossary.size === 0) {
    return '(empty)';
  }
  return glossaryToEntries(glossary)
    .map((e) => `- ${e.source} → ${e.target}`)
    .join('\n');
}
