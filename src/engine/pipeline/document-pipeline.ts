/**
 * Document Pipeline - parse, chunk, translate, reassemble, verify
 *
 * Each call to translateDocument owns its own context state, so one pipeline
 * may serve several documents concurrently.
 */

import type { ISummarizer, ITermExtractor, ITranslatorBackend } from '../interfaces/translator.js';
import type { Glossary, GlossaryEntry, TranslationOptions } from '../types/common.js';
import type { TranslationProgressCallback, TranslationResult } from '../types/pipeline.js';
import type { TokenEstimator } from '../chunking/tokens.js';
import type { RetryConfig } from '../translation/retry.js';
import { parseMarkdown } from '../parser/markdown-parser.js';
import { chunkDocument } from '../chunking/chunker.js';
import { createInitialContext } from '../context/context-carrier.js';
import { translateChunks } from '../translation/orchestrator.js';
import { reassemble, verifyStructure } from '../reassembly/reassembler.js';

export interface PipelineConfig {
  backend: ITranslatorBackend;
  summarizer?: ISummarizer;
  termExtractor?: ITermExtractor;
  estimateTokens?: TokenEstimator;
}

export interface DocumentTranslationOptions {
  translation: TranslationOptions;
  maxTokens: number;
  /** Seed glossary; first entry per term wins */
  glossary?: readonly GlossaryEntry[];
  /** Re-parse the output and compare block kinds (default true) */
  verify?: boolean;
  retry?: Partial<RetryConfig>;
  summaryMaxLength?: number;
  tailLength?: number;
  signal?: AbortSignal;
  onProgress?: TranslationProgressCallback;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface DocumentTranslation {
  markdown: string;
  chunkCount: number;
  results: TranslationResult[];
  /** Seed plus every term learned during the run */
  glossary: Glossary;
  totalAttempts: number;
  tokensUsed: number;
  duration: number;
}

export class DocumentPipeline {
  private backend: ITranslatorBackend;
  private summarizer?: ISummarizer;
  private termExtractor?: ITermExtractor;
  private estimateTokens?: TokenEstimator;

  constructor(config: PipelineConfig) {
    this.backend = config.backend;
    this.summarizer = config.summarizer;
    this.termExtractor = config.termExtractor;
    this.estimateTokens = config.estimateTokens;
  }

  async translateDocument(
    markdown: string,
    options: DocumentTranslationOptions
  ): Promise<DocumentTranslation> {
    const startTime = Date.now();

    // ============ PARSE ============
    const document = parseMarkdown(markdown);
    console.log(`[Pipeline] Parsed ${document.blocks.length} blocks`);

    // ============ CHUNK ============
    const { chunks, layout } = chunkDocument(document, options.maxTokens, {
      estimateTokens: this.estimateTokens,
    });
    const oversize = chunks.filter((c) => c.oversize).length;
    console.log(
      `[Pipeline] Split into ${chunks.length} chunks (budget ${options.maxTokens} tokens${oversize > 0 ? `, ${oversize} oversize` : ''})`
    );

    // ============ TRANSLATE ============
    console.log(
      `[Pipeline] Translating ${options.translation.sourceLanguage} → ${options.translation.targetLanguage} with ${this.backend.name}...`
    );
    const run = await translateChunks(chunks, this.backend, {
      translation: options.translation,
      summarizer: this.summarizer,
      termExtractor: this.termExtractor,
      initialContext: createInitialContext(options.glossary),
      retry: options.retry,
      summaryMaxLength: options.summaryMaxLength,
      tailLength: options.tailLength,
      signal: options.signal,
      onProgress: options.onProgress,
      sleep: options.sleep,
    });

    // ============ REASSEMBLE ============
    const translated = reassemble(run.results, layout);

    if (options.verify ?? true) {
      verifyStructure(layout.blockKinds, translated);
      console.log('[Pipeline] Structure verified');
    }

    const totalAttempts = run.results.reduce((sum, r) => sum + r.attemptCount, 0);
    const tokensUsed = run.results.reduce((sum, r) => sum + r.tokensUsed, 0);
    const duration = Date.now() - startTime;
    console.log(
      `[Pipeline] ✅ Translation complete in ${(duration / 1000).toFixed(1)}s, ${chunks.length} chunks, ${tokensUsed} tokens used.`
    );

    return {
      markdown: translated,
      chunkCount: chunks.length,
      results: run.results,
      glossary: run.context.glossary,
      totalAttempts,
      tokensUsed,
      duration,
    };
  }
}
