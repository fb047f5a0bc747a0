/**
 * Translation Orchestrator
 *
 * Translates chunks strictly in order, threading the context state from each
 * chunk into the next. A chunk that cannot be translated aborts the whole run;
 * no partial output is returned.
 */

import type { ISummarizer, ITermExtractor, ITranslatorBackend, TranslatorOutcome } from '../interfaces/translator.js';
import type { TranslationOptions } from '../types/common.js';
import type {
  Chunk,
  ContextState,
  TranslationProgressCallback,
  TranslationResult,
  TranslationRun,
} from '../types/pipeline.js';
import { ChunkingError, TranslationError } from '../errors.js';
import { DEFAULT_TAIL_LENGTH, createInitialContext, mergeGlossary, updateContext } from '../context/context-carrier.js';
import { DEFAULT_RETRY_CONFIG, classifyError, computeBackoffDelay, sleep, type RetryConfig } from './retry.js';
import { RollingSummarizer, clampSummary } from './summarizer.js';

export const DEFAULT_SUMMARY_MAX_LENGTH = 1000;

export interface OrchestratorOptions {
  translation: TranslationOptions;
  summarizer?: ISummarizer;
  termExtractor?: ITermExtractor;
  initialContext?: ContextState;
  retry?: Partial<RetryConfig>;
  summaryMaxLength?: number;
  tailLength?: number;
  signal?: AbortSignal;
  onProgress?: TranslationProgressCallback;
  /** Replaces the backoff timer, mostly for tests. Should resolve early once `signal` aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export async function translateChunks(
  chunks: readonly Chunk[],
  backend: ITranslatorBackend,
  options: OrchestratorOptions
): Promise<TranslationRun> {
  assertOrdered(chunks);

  const retry: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retry };
  if (!Number.isInteger(retry.maxAttempts) || retry.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${retry.maxAttempts}`);
  }
  const summarizer = options.summarizer ?? new RollingSummarizer();
  const summaryMaxLength = options.summaryMaxLength ?? DEFAULT_SUMMARY_MAX_LENGTH;
  const tailLength = options.tailLength ?? DEFAULT_TAIL_LENGTH;
  const wait = options.sleep ?? sleep;
  const total = chunks.length;

  let state = options.initialContext ?? createInitialContext();
  const results: TranslationResult[] = [];

  for (const chunk of chunks) {
    throwIfCancelled(options.signal, chunk.sequenceIndex, 0, results.length);

    let attempt = 0;
    let outcome: TranslatorOutcome = { status: 'transient-failure', error: 'not attempted' };

    while (attempt < retry.maxAttempts) {
      attempt++;
      options.onProgress?.({
        completed: results.length,
        total,
        currentChunkIndex: chunk.sequenceIndex,
        status: attempt === 1 ? 'translating' : 'retrying',
        attempt,
      });

      outcome = await callBackend(backend, chunk, state, options.translation);
      if (outcome.status === 'success') break;

      if (outcome.status === 'permanent-failure') {
        console.error(`[Orchestrator] ❌ Chunk ${chunk.sequenceIndex} failed permanently: ${outcome.error}`);
        options.onProgress?.({
          completed: results.length,
          total,
          currentChunkIndex: chunk.sequenceIndex,
          status: 'error',
          attempt,
        });
        throw new TranslationError(`Chunk ${chunk.sequenceIndex} failed: ${outcome.error}`, {
          sequenceIndex: chunk.sequenceIndex,
          attempts: attempt,
          reason: 'permanent',
          completedChunks: results.length,
        });
      }

      if (attempt < retry.maxAttempts) {
        throwIfCancelled(options.signal, chunk.sequenceIndex, attempt, results.length);
        const delay = computeBackoffDelay(attempt, retry);
        console.warn(
          `[Orchestrator] ⚠️ Chunk ${chunk.sequenceIndex} attempt ${attempt}/${retry.maxAttempts} failed (${outcome.error}), retrying in ${delay}ms`
        );
        await wait(delay, options.signal);
        throwIfCancelled(options.signal, chunk.sequenceIndex, attempt, results.length);
      }
    }

    if (outcome.status !== 'success') {
      console.error(
        `[Orchestrator] ❌ Chunk ${chunk.sequenceIndex} failed after ${attempt} attempts: ${outcome.error}`
      );
      options.onProgress?.({
        completed: results.length,
        total,
        currentChunkIndex: chunk.sequenceIndex,
        status: 'error',
        attempt,
      });
      throw new TranslationError(
        `Chunk ${chunk.sequenceIndex} failed after ${attempt} attempts: ${outcome.error}`,
        {
          sequenceIndex: chunk.sequenceIndex,
          attempts: attempt,
          reason: 'exhausted',
          completedChunks: results.length,
        }
      );
    }

    const observed = [
      ...outcome.observedTerms,
      ...(options.termExtractor?.extract(chunk.text, outcome.translatedText) ?? []),
    ];

    const summary = await summarize(summarizer, state.summary, outcome.translatedText, summaryMaxLength);

    const result: TranslationResult = {
      sequenceIndex: chunk.sequenceIndex,
      translatedText: outcome.translatedText,
      updatedGlossaryEntries: observed,
      attemptCount: attempt,
      tokensUsed: outcome.tokensUsed ?? 0,
    };

    const { added } = mergeGlossary(state.glossary, observed);
    state = updateContext(state, result, summary, tailLength);
    results.push(result);

    console.log(
      `[Orchestrator] ✅ Chunk ${chunk.sequenceIndex + 1}/${total} translated (${outcome.translatedText.length} chars, attempt ${attempt}${added.length > 0 ? `, +${added.length} glossary terms` : ''})`
    );
    options.onProgress?.({
      completed: results.length,
      total,
      currentChunkIndex: chunk.sequenceIndex,
      status: 'success',
      attempt,
    });
  }

  return { results, context: state };
}

async function callBackend(
  backend: ITranslatorBackend,
  chunk: Chunk,
  state: ContextState,
  options: TranslationOptions
): Promise<TranslatorOutcome> {
  let outcome: TranslatorOutcome;
  try {
    outcome = await backend.translateChunk(
      chunk.text,
      { summary: state.summary, glossary: state.glossary, previousTail: state.previousTail },
      options
    );
  } catch (error) {
    return classifyError(error);
  }

  if (outcome.status === 'success' && !outcome.translatedText.trim() && chunk.text.trim()) {
    return { status: 'transient-failure', error: 'empty translation returned' };
  }
  return outcome;
}

async function summarize(
  summarizer: ISummarizer,
  previous: string,
  translated: string,
  maxLength: number
): Promise<string> {
  try {
    return clampSummary(await summarizer.summarize(previous, translated, maxLength), maxLength);
  } catch (error) {
    console.warn(
      `[Orchestrator] ⚠️ Summary update failed, keeping the previous summary: ${error instanceof Error ? error.message : String(error)}`
    );
    return previous;
  }
}

function assertOrdered(chunks: readonly Chunk[]): void {
  const first = chunks[0]?.sequenceIndex ?? 0;
  chunks.forEach((chunk, i) => {
    if (chunk.sequenceIndex !== first + i) {
      throw new ChunkingError(
        `Chunks out of order: expected sequence index ${first + i}, got ${chunk.sequenceIndex}`
      );
    }
  });
}

function throwIfCancelled(
  signal: AbortSignal | undefined,
  sequenceIndex: number,
  attempts: number,
  completedChunks: number
): void {
  if (!signal?.aborted) return;
  throw new TranslationError(`Translation cancelled before chunk ${sequenceIndex}`, {
    sequenceIndex,
    attempts,
    reason: 'cancelled',
    completedChunks,
  });
}
