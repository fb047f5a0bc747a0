import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  createPipeline,
  createSummarizer,
  defaultOutputPath,
  resolveTranslationOptions,
  translateDirectory,
  translateFile,
  writeFileAtomic,
} from './document-service.js';
import { loadConfig } from '../config.js';
import {
  ConfigurationError,
  DocumentPipeline,
  LLMSummarizer,
  RollingSummarizer,
  TranslationError,
  createProvider,
  type ITranslatorBackend,
  type TranslatorOutcome,
} from '../engine/index.js';

const TRANSLATION = resolveTranslationOptions(loadConfig({}));

class UpperBackend implements ITranslatorBackend {
  readonly name = 'upper';

  async translateChunk(text: string): Promise<TranslatorOutcome> {
    if (text.includes('FAIL')) {
      return { status: 'permanent-failure', error: 'refused' };
    }
    return {
      status: 'success',
      translatedText: text.replace(/[a-z]/g, (c) => c.toUpperCase()),
      observedTerms: [{ source: 'doc', target: 'DOC' }],
    };
  }
}

const deps = { pipeline: new DocumentPipeline({ backend: new UpperBackend() }) };

describe('document service', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'chunkwise-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('names the default output after the target language', () => {
    expect(defaultOutputPath(path.join('docs', 'readme.md'), 'zh')).toBe(path.join('docs', 'readme.zh.md'));
    expect(defaultOutputPath('notes', 'ja')).toBe(path.join('.', 'notes.ja.md'));
  });

  it('rejects an unknown provider', () => {
    expect(() => resolveTranslationOptions(loadConfig({}), { provider: 'claude' })).toThrow(ConfigurationError);
  });

  it('writes files atomically', async () => {
    const target = path.join(dir, 'nested', 'out.md');

    await writeFileAtomic(target, '# Out\n');

    expect(await fs.readFile(target, 'utf-8')).toBe('# Out\n');
    expect(await fs.readdir(path.dirname(target))).toEqual(['out.md']);
  });

  it('translates a file and saves the glossary', async () => {
    const input = path.join(dir, 'doc.md');
    const output = path.join(dir, 'doc.zh.md');
    const glossaryOut = path.join(dir, 'glossary.json');
    await fs.writeFile(input, '# title\n\nsome text.\n');

    const { translation } = await translateFile(
      input,
      output,
      { translation: TRANSLATION, maxTokens: 100, glossaryOutPath: glossaryOut },
      deps
    );

    expect(await fs.readFile(output, 'utf-8')).toBe('# TITLE\n\nSOME TEXT.\n');
    expect(translation.chunkCount).toBe(1);
    expect(JSON.parse(await fs.readFile(glossaryOut, 'utf-8'))).toEqual({
      entries: [{ source: 'doc', target: 'DOC' }],
    });
  });

  it('picks the summarizer by kind', () => {
    const provider = createProvider(
      { openaiApiKey: 'test-key', dashscopeApiKey: '' },
      { provider: 'openai', model: 'gpt-4o-mini' }
    );

    expect(createSummarizer('llm', provider)).toBeInstanceOf(LLMSummarizer);
    expect(createSummarizer('rolling', provider)).toBeInstanceOf(RollingSummarizer);
    expect(() => createSummarizer('gpt', provider)).toThrow(ConfigurationError);
  });

  it('builds a pipeline with the model summarizer from config', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-key', SUMMARIZER: 'llm', TRANSLATE_CODE_COMMENTS: 'true' });

    expect(createPipeline(config, resolveTranslationOptions(config))).toBeInstanceOf(DocumentPipeline);
  });

  it('reads a seed glossary file', async () => {
    const input = path.join(dir, 'doc.md');
    const seed = path.join(dir, 'seed.json');
    await fs.writeFile(input, 'text.\n');
    await fs.writeFile(seed, JSON.stringify({ doc: '文档' }));

    const { translation } = await translateFile(
      input,
      path.join(dir, 'out.md'),
      { translation: TRANSLATION, maxTokens: 100, glossaryPath: seed },
      deps
    );

    expect(translation.glossary.get('doc')).toBe('文档');
  });

  it('writes nothing when translation fails', async () => {
    const input = path.join(dir, 'doc.md');
    const output = path.join(dir, 'doc.zh.md');
    await fs.writeFile(input, 'FAIL here.\n');

    await expect(
      translateFile(input, output, { translation: TRANSLATION, maxTokens: 100 }, deps)
    ).rejects.toThrow(TranslationError);
    expect(await fs.readdir(dir)).toEqual(['doc.md']);
  });

  it('translates a directory and reports each file', async () => {
    const inputDir = path.join(dir, 'in');
    const outputDir = path.join(dir, 'out');
    await fs.mkdir(inputDir);
    await fs.writeFile(path.join(inputDir, 'a.md'), 'alpha.\n');
    await fs.writeFile(path.join(inputDir, 'b.md'), 'FAIL beta.\n');
    await fs.writeFile(path.join(inputDir, 'notes.txt'), 'skip me\n');

    const outcomes = await translateDirectory(
      inputDir,
      outputDir,
      { translation: TRANSLATION, maxTokens: 100, concurrency: 2 },
      deps
    );

    expect(outcomes.map((o) => [path.basename(o.input), o.status])).toEqual([
      ['a.md', 'success'],
      ['b.md', 'failed'],
    ]);
    expect(await fs.readdir(outputDir)).toEqual(['a.md']);
    expect(await fs.readFile(path.join(outputDir, 'a.md'), 'utf-8')).toBe('ALPHA.\n');
  });
});
