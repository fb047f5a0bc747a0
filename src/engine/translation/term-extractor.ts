/**
 * Finds terms a translation deliberately kept in their original form
 * (inline code, acronyms, CamelCase identifiers) so later chunks keep them too.
 */

import type { GlossaryEntry } from '../types/common.js';
import type { ITermExtractor } from '../interfaces/translator.js';

const FENCE_LINE = /^ {0,3}(`{3,}|~{3,})/;
const CODE_SPAN = /`([^`\n]+)`/g;
const ACRONYM = /\b[A-Z][A-Z0-9]*[A-Z][A-Z0-9]*s?\b/g;
const CAMEL_CASE = /\b(?:[A-Z][a-z0-9]+){2,}\b|\b[a-z]+(?:[A-Z][a-z0-9]+)+\b/g;

/**
 * Source text with fenced code blocks removed
 */
export function stripFencedCode(markdown: string): string {
  const kept: string[] = [];
  let fence: string | null = null;

  for (const line of markdown.split('\n')) {
    const match = FENCE_LINE.exec(line);
    if (fence === null) {
      if (match) {
        fence = match[1];
        continue;
      }
      kept.push(line);
    } else if (match && match[1].charAt(0) === fence.charAt(0) && match[1].length >= fence.length) {
      fence = null;
    }
  }

  return kept.join('\n');
}

export class PreservedTermExtractor implements ITermExtractor {
  extract(sourceText: string, translatedText: string): GlossaryEntry[] {
    const prose = stripFencedCode(sourceText);
    const candidates: string[] = [];

    for (const match of prose.matchAll(CODE_SPAN)) {
      candidates.push(match[1].trim());
    }

    const withoutSpans = prose.replace(CODE_SPAN, ' ');
    for (const pattern of [ACRONYM, CAMEL_CASE]) {
      for (const match of withoutSpans.matchAll(pattern)) {
        candidates.push(match[0]);
      }
    }

    const seen = new Set<string>();
    const entries: GlossaryEntry[] = [];
    for (const term of candidates) {
      if (!term || seen.has(term) || !translatedText.includes(term)) continue;
      seen.add(term);
      entries.push({ source: term, target: term });
    }
    return entries;
  }
}
