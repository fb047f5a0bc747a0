#!/usr/bin/env node
/**
 * Chunkwise CLI - translate Markdown documents chunk by chunk
 *
 *   chunkwise translate README.md -o README.zh.md
 *   chunkwise batch docs/ docs-zh/ --concurrency 4
 *   chunkwise chunks README.md --max-tokens 500
 */

import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { loadConfig, validateConfig, type AppConfig } from './config.js';
import {
  ConfigurationError,
  chunkDocument,
  describeError,
  exitCodeFor,
  parseMarkdown,
  type TranslationProgress,
} from './engine/index.js';
import {
  createPipeline,
  defaultOutputPath,
  jobDefaults,
  resolveTranslationOptions,
  translateDirectory,
  translateFile,
} from './services/document-service.js';

interface SharedFlags {
  model?: string;
  provider?: string;
  maxTokens?: number;
  sourceLang?: string;
  targetLang?: string;
  glossary?: string;
  glossaryOut?: string;
  timeout?: number;
  summarizer?: string;
  translateCodeComments?: boolean;
  verify: boolean;
}

interface TranslateFlags extends SharedFlags {
  output?: string;
}

interface BatchFlags extends SharedFlags {
  ext: string;
  concurrency: number;
}

interface ChunksFlags {
  maxTokens?: number;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Environment config with command-line overrides, validated
 */
function configFor(
  flags: Pick<SharedFlags, 'maxTokens' | 'timeout' | 'provider' | 'model' | 'summarizer' | 'translateCodeComments'>
): AppConfig {
  const base = loadConfig();
  const config: AppConfig = {
    ...base,
    model: {
      ...base.model,
      name: flags.model ?? base.model.name,
      provider: flags.provider ?? base.model.provider,
      requestTimeoutMs: flags.timeout !== undefined ? flags.timeout * 1000 : base.model.requestTimeoutMs,
    },
    translation: {
      ...base.translation,
      maxTokensPerChunk: flags.maxTokens ?? base.translation.maxTokensPerChunk,
      summarizer: flags.summarizer ?? base.translation.summarizer,
      translateCodeComments: flags.translateCodeComments ?? base.translation.translateCodeComments,
    },
  };

  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new ConfigurationError(`Invalid configuration:\n  - ${validation.errors.join('\n  - ')}`);
  }
  return config;
}

function reportProgress(progress: TranslationProgress): void {
  if (progress.status === 'translating') {
    console.log(`[CLI] ⏳ Chunk ${progress.currentChunkIndex + 1}/${progress.total}...`);
  }
}

/**
 * First SIGINT cancels between chunks; a second one exits immediately
 */
function cancelOnInterrupt(): AbortController {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.warn('\n[CLI] ⚠️ Cancelling after the current chunk (Ctrl+C again to abort now)');
    controller.abort();
    process.once('SIGINT', () => process.exit(130));
  });
  return controller;
}

function withSharedOptions(command: Command): Command {
  return command
    .option('--model <name>', 'model name (default: MODEL_NAME)')
    .option('--provider <name>', 'openai, qwen or auto (default: MODEL_PROVIDER)')
    .option('--max-tokens <n>', 'token budget per chunk', parsePositiveInt)
    .option('--source-lang <code>', 'source language (default: SOURCE_LANGUAGE)')
    .option('--target-lang <code>', 'target language (default: TARGET_LANGUAGE)')
    .option('--glossary <file>', 'seed glossary JSON file')
    .option('--glossary-out <file>', 'write the final glossary to this file')
    .option('--timeout <seconds>', 'request timeout per model call', parsePositiveInt)
    .option('--summarizer <kind>', 'rolling or llm (default: SUMMARIZER)')
    .option('--translate-code-comments', 'translate comment lines inside fenced code')
    .option('--no-verify', 'skip the structural check of the output');
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('chunkwise')
    .description('Translate long Markdown documents chunk by chunk with a carried context')
    .version('0.1.0');

  withSharedOptions(
    program
      .command('translate')
      .description('translate one Markdown file')
      .argument('<input>', 'Markdown file to translate')
      .option('-o, --output <file>', 'output file (default: <name>.<target-lang>.md)')
  ).action(async (input: string, flags: TranslateFlags) => {
    const config = configFor(flags);
    const translation = resolveTranslationOptions(config, {
      sourceLanguage: flags.sourceLang,
      targetLanguage: flags.targetLang,
    });
    const output = flags.output ?? defaultOutputPath(input, translation.targetLanguage);
    const controller = cancelOnInterrupt();

    console.log(`🚀 Translating ${input} (${translation.sourceLanguage} → ${translation.targetLanguage}, ${translation.model})`);
    const { translation: result } = await translateFile(
      input,
      output,
      {
        ...jobDefaults(config),
        translation,
        maxTokens: config.translation.maxTokensPerChunk,
        verify: flags.verify,
        glossaryPath: flags.glossary,
        glossaryOutPath: flags.glossaryOut,
        signal: controller.signal,
        onProgress: reportProgress,
      },
      { pipeline: createPipeline(config, translation) }
    );

    console.log(`\n📊 Translation report:`);
    console.log(`   Chunks: ${result.chunkCount}`);
    console.log(`   Attempts: ${result.totalAttempts}`);
    console.log(`   Glossary terms: ${result.glossary.size}`);
    console.log(`   Tokens used: ${result.tokensUsed}`);
    console.log(`   Duration: ${(result.duration / 1000).toFixed(1)}s`);
    console.log(`✅ Written to ${output}`);
  });

  withSharedOptions(
    program
      .command('batch')
      .description('translate every Markdown file in a directory')
      .argument('<inputDir>', 'directory with Markdown files')
      .argument('<outputDir>', 'directory for translated files')
      .option('--ext <ext>', 'file extension to translate', '.md')
      .option('--concurrency <n>', 'documents translated in parallel', parsePositiveInt, 2)
  ).action(async (inputDir: string, outputDir: string, flags: BatchFlags) => {
    const config = configFor(flags);
    const translation = resolveTranslationOptions(config, {
      sourceLanguage: flags.sourceLang,
      targetLanguage: flags.targetLang,
    });
    const controller = cancelOnInterrupt();

    console.log(`🚀 Batch translation ${inputDir} → ${outputDir}`);
    const outcomes = await translateDirectory(
      inputDir,
      outputDir,
      {
        ...jobDefaults(config),
        translation,
        maxTokens: config.translation.maxTokensPerChunk,
        verify: flags.verify,
        glossaryPath: flags.glossary,
        glossaryOutPath: flags.glossaryOut,
        signal: controller.signal,
        ext: flags.ext,
        concurrency: flags.concurrency,
      },
      { pipeline: createPipeline(config, translation) }
    );

    const succeeded = outcomes.filter((o) => o.status === 'success').length;
    console.log(`\n📊 Batch translation done: ${succeeded}/${outcomes.length} files`);

    const firstFailure = outcomes.find((o) => o.status === 'failed');
    if (firstFailure?.status === 'failed') {
      for (const outcome of outcomes) {
        if (outcome.status === 'failed') {
          console.error(`   ❌ ${outcome.input}: ${describeError(outcome.error)}`);
        }
      }
      process.exitCode = exitCodeFor(firstFailure.error);
    }
  });

  program
    .command('chunks')
    .description('show how a document would be chunked, without translating')
    .argument('<input>', 'Markdown file')
    .option('--max-tokens <n>', 'token budget per chunk', parsePositiveInt)
    .action((input: string, flags: ChunksFlags) => {
      const config = configFor(flags);
      const maxTokens = config.translation.maxTokensPerChunk;
      const document = parseMarkdown(fs.readFileSync(input, 'utf-8'));
      const { chunks } = chunkDocument(document, maxTokens);

      console.log(`${input}: ${document.blocks.length} blocks, ${chunks.length} chunks (budget ${maxTokens})`);
      for (const chunk of chunks) {
        const kinds = chunk.blocks.map((b) => b.kind).join(', ');
        console.log(
          `  #${chunk.sequenceIndex}  ~${chunk.tokenEstimate} tokens  [${kinds}]${chunk.oversize ? '  ⚠️ oversize' : ''}`
        );
      }
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    console.error(`❌ ${describeError(error)}`);
    process.exitCode = exitCodeFor(error);
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return fs.realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return path.resolve(entry) === fileURLToPath(import.meta.url);
  }
}

if (isEntryPoint()) {
  await main();
}
