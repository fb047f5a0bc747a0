/**
 * Document Service - file-level translation jobs for the CLI and server
 *
 * Wires the engine to the app config, reads and writes files, and runs
 * directory batches with bounded concurrency.
 */

import fs from 'fs/promises';
import path from 'path';
import type { AppConfig } from '../config.js';
import {
  ConfigurationError,
  DocumentPipeline,
  GlossaryStore,
  LLMSummarizer,
  LLMTranslator,
  PreservedTermExtractor,
  RollingSummarizer,
  createProvider,
  isProviderName,
  mergeGlossary,
  glossaryToEntries,
  type DocumentTranslation,
  type DocumentTranslationOptions,
  type Glossary,
  type GlossaryEntry,
  type ILLMProvider,
  type ISummarizer,
  type TranslationOptions,
} from '../engine/index.js';

export interface PipelineOverrides {
  model?: string;
  provider?: string;
  timeoutMs?: number;
}

/**
 * Resolve the translation options from config plus per-job overrides
 */
export function resolveTranslationOptions(
  config: AppConfig,
  overrides: PipelineOverrides & { sourceLanguage?: string; targetLanguage?: string } = {}
): TranslationOptions {
  const provider = overrides.provider ?? config.model.provider;
  if (!isProviderName(provider)) {
    throw new ConfigurationError(`Unknown provider "${provider}" (expected openai, qwen or auto)`);
  }
  return {
    sourceLanguage: overrides.sourceLanguage ?? config.translation.sourceLanguage,
    targetLanguage: overrides.targetLanguage ?? config.translation.targetLanguage,
    model: overrides.model ?? config.model.name,
    provider,
  };
}

/**
 * Build an LLM-backed pipeline for the given options
 */
export function createPipeline(
  config: AppConfig,
  translation: TranslationOptions,
  timeoutMs = config.model.requestTimeoutMs
): DocumentPipeline {
  const provider = createProvider(
    {
      openaiApiKey: config.openai.apiKey,
      openaiBaseUrl: config.openai.baseUrl,
      dashscopeApiKey: config.dashscope.apiKey,
    },
    {
      provider: translation.provider,
      model: translation.model,
      temperature: config.translation.temperature,
      timeoutMs,
    }
  );

  return new DocumentPipeline({
    backend: new LLMTranslator(provider, {
      temperature: config.translation.temperature,
      translateCodeComments: config.translation.translateCodeComments,
    }),
    summarizer: createSummarizer(config.translation.summarizer, provider),
    termExtractor: new PreservedTermExtractor(),
  });
}

export function createSummarizer(kind: string, provider: ILLMProvider): ISummarizer {
  if (kind === 'llm') return new LLMSummarizer(provider);
  if (kind === 'rolling') return new RollingSummarizer();
  throw new ConfigurationError(`Unknown summarizer "${kind}" (expected rolling or llm)`);
}

/**
 * Job settings derived from config (retry, summary, tail)
 */
export function jobDefaults(
  config: AppConfig
): Pick<DocumentTranslationOptions, 'retry' | 'summaryMaxLength' | 'tailLength'> {
  return {
    retry: {
      maxAttempts: config.retry.maxAttempts,
      baseDelayMs: config.retry.baseDelayMs,
    },
    summaryMaxLength: config.translation.summaryMaxLength,
    tailLength: config.translation.tailLength,
  };
}

export interface FileJobOptions extends Omit<DocumentTranslationOptions, 'glossary'> {
  /** Seed glossary file */
  glossaryPath?: string;
  /** Already loaded seed entries; used instead of glossaryPath */
  glossary?: readonly GlossaryEntry[];
  /** Where to write the final glossary */
  glossaryOutPath?: string;
}

export interface ServiceDeps {
  pipeline: DocumentPipeline;
}

export interface FileOutcome {
  input: string;
  output: string;
  translation: DocumentTranslation;
}

/**
 * Write `text` to a temporary file beside `filePath`, then rename it into place
 */
export async function writeFileAtomic(filePath: string, text: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await fs.writeFile(tempPath, text, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export async function loadSeedGlossary(glossaryPath: string | undefined): Promise<GlossaryEntry[]> {
  if (!glossaryPath) return [];
  return glossaryToEntries(await GlossaryStore.fromFile(glossaryPath).load());
}

/**
 * Default output path: `<name>.<target-lang>.md` beside the input
 */
export function defaultOutputPath(input: string, targetLanguage: string): string {
  const ext = path.extname(input);
  const base = path.basename(input, ext);
  return path.join(path.dirname(input), `${base}.${targetLanguage}${ext || '.md'}`);
}

export async function translateFile(
  input: string,
  output: string,
  options: FileJobOptions,
  deps: ServiceDeps
): Promise<FileOutcome> {
  const markdown = await fs.readFile(input, 'utf-8');
  const seed = options.glossary ?? (await loadSeedGlossary(options.glossaryPath));

  console.log(`[DocumentService] 📄 ${input} → ${output}`);
  const translation = await deps.pipeline.translateDocument(markdown, {
    ...options,
    glossary: seed,
  });

  await writeFileAtomic(output, translation.markdown);

  if (options.glossaryOutPath) {
    await GlossaryStore.fromFile(options.glossaryOutPath).save(translation.glossary);
  }

  return { input, output, translation };
}

export type BatchOutcome =
  | { status: 'success'; input: string; output: string; translation: DocumentTranslation }
  | { status: 'failed'; input: string; output: string; error: unknown };

export interface BatchOptions extends FileJobOptions {
  /** File extension to pick up, with the dot (default `.md`) */
  ext?: string;
  concurrency?: number;
}

/**
 * Translate every matching file in `inputDir` (not recursive). Each document
 * gets its own context; a failed document does not stop the others.
 */
export async function translateDirectory(
  inputDir: string,
  outputDir: string,
  options: BatchOptions,
  deps: ServiceDeps
): Promise<BatchOutcome[]> {
  const ext = options.ext ?? '.md';
  const concurrency = Math.max(1, options.concurrency ?? 2);

  const entries = await fs.readdir(inputDir, { withFileTypes: true });
  const files = entries
    .filter((e) => e.isFile() && e.name.endsWith(ext))
    .map((e) => e.name)
    .sort();

  console.log(`[DocumentService] 📁 ${files.length} files in ${inputDir} (concurrency ${concurrency})`);

  const seed = options.glossary ?? (await loadSeedGlossary(options.glossaryPath));
  const { glossaryOutPath, ...fileOptions } = options;
  const outcomes: BatchOutcome[] = new Array<BatchOutcome>(files.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < files.length) {
      const index = next++;
      const name = files[index];
      const input = path.join(inputDir, name);
      const output = path.join(outputDir, name);
      try {
        const result = await translateFile(input, output, { ...fileOptions, glossary: seed }, deps);
        outcomes[index] = { status: 'success', ...result };
      } catch (error) {
        console.error(
          `[DocumentService] ❌ ${input}: ${error instanceof Error ? error.message : String(error)}`
        );
        outcomes[index] = { status: 'failed', input, output, error };
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, files.length) }, () => worker()));

  if (glossaryOutPath) {
    let glossary: Glossary = new Map();
    for (const outcome of outcomes) {
      if (outcome.status === 'success') {
        glossary = mergeGlossary(glossary, glossaryToEntries(outcome.translation.glossary)).glossary;
      }
    }
    await GlossaryStore.fromFile(glossaryOutPath).save(glossary);
  }

  const failed = outcomes.filter((o) => o.status === 'failed').length;
  console.log(`[DocumentService] Batch done: ${files.length - failed}/${files.length} succeeded`);
  return outcomes;
}
