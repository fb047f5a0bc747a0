/**
 * Chunkwise - HTTP API for Markdown translation
 *
 * Every request runs its own pipeline with its own context state.
 */

import 'dotenv/config';
import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { loadConfig, validateConfig, hasAIProvider, type AppConfig } from './config.js';
import {
  ChunkingError,
  ChunkwiseError,
  ConfigurationError,
  ParseError,
  ReassemblyError,
  TranslationError,
  describeError,
  glossaryToEntries,
  PROVIDER_NAMES,
  type DocumentPipeline,
  type TranslationOptions,
} from './engine/index.js';
import { createPipeline, jobDefaults, resolveTranslationOptions } from './services/document-service.js';

export interface ServerDeps {
  createPipeline?: (translation: TranslationOptions) => DocumentPipeline;
}

const translateRequestSchema = z.object({
  markdown: z.string(),
  glossary: z.array(z.object({ source: z.string(), target: z.string() })).optional(),
  sourceLanguage: z.string().min(1).optional(),
  targetLanguage: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  provider: z.enum(PROVIDER_NAMES).optional(),
  maxTokens: z.number().int().positive().optional(),
  verify: z.boolean().optional(),
});

// Multipart fields arrive as strings
const translateFileFieldsSchema = z.object({
  sourceLanguage: z.string().min(1).optional(),
  targetLanguage: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  provider: z.enum(PROVIDER_NAMES).optional(),
  maxTokens: z.coerce.number().int().positive().optional(),
});

type TranslateRequest = z.infer<typeof translateRequestSchema>;

const MARKDOWN_EXTENSIONS = ['.md', '.markdown'];

export function statusFor(error: unknown): number {
  if (error instanceof ParseError || error instanceof ChunkingError) return 422;
  if (error instanceof TranslationError) return 502;
  if (error instanceof ConfigurationError) return 503;
  return 500;
}

function errorBody(error: unknown): { error: string; code?: string; chunk?: number } {
  const body: { error: string; code?: string; chunk?: number } = { error: describeError(error) };
  if (error instanceof ChunkwiseError) {
    body.code = error.code;
  }
  if (error instanceof TranslationError || error instanceof ReassemblyError) {
    body.chunk = error.sequenceIndex;
  }
  return body;
}

export function createApp(config: AppConfig, deps: ServerDeps = {}): express.Express {
  const app = express();
  const configValidation = validateConfig(config);

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: 5 * 1024 * 1024 }, // 5MB limit
    fileFilter: (_req, file, cb) => {
      const ext = path.extname(file.originalname).toLowerCase();
      if (file.mimetype === 'text/markdown' || MARKDOWN_EXTENSIONS.includes(ext)) {
        cb(null, true);
      } else {
        cb(new Error('Only .md files are allowed'));
      }
    },
  });

  const pipelineFor = (translation: TranslationOptions): DocumentPipeline =>
    deps.createPipeline ? deps.createPipeline(translation) : createPipeline(config, translation);

  const runTranslation = async (request: TranslateRequest) => {
    if (!configValidation.valid) {
      throw new ConfigurationError(`Invalid configuration: ${configValidation.errors.join('; ')}`);
    }
    const translation = resolveTranslationOptions(config, request);
    const result = await pipelineFor(translation).translateDocument(request.markdown, {
      ...jobDefaults(config),
      translation,
      maxTokens: request.maxTokens ?? config.translation.maxTokensPerChunk,
      glossary: request.glossary,
      verify: request.verify,
    });

    return {
      markdown: result.markdown,
      glossary: glossaryToEntries(result.glossary),
      chunkCount: result.chunkCount,
      totalAttempts: result.totalAttempts,
      tokensUsed: result.tokensUsed,
      duration: result.duration,
    };
  };

  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  // ============ API Routes ============

  // System status
  app.get('/api/status', (_req, res) => {
    res.json({
      version: '0.1.0',
      ready: configValidation.valid && hasAIProvider(config),
      ai: {
        provider: config.model.provider,
        model: config.model.name,
        configured: hasAIProvider(config),
      },
      translation: {
        sourceLanguage: config.translation.sourceLanguage,
        targetLanguage: config.translation.targetLanguage,
        maxTokensPerChunk: config.translation.maxTokensPerChunk,
      },
      config: {
        valid: configValidation.valid,
        errors: configValidation.errors,
      },
    });
  });

  // Translate Markdown sent as JSON
  app.post('/api/translate', async (req, res) => {
    const parsed = translateRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request', details: parsed.error.issues });
      return;
    }

    try {
      res.json(await runTranslation(parsed.data));
    } catch (error) {
      console.error('[Server] ❌ Translation failed:', describeError(error));
      res.status(statusFor(error)).json(errorBody(error));
    }
  });

  // Translate an uploaded Markdown file
  app.post('/api/translate/file', upload.single('file'), async (req, res) => {
    if (!req.file) {
      res.status(400).json({ error: 'No file uploaded' });
      return;
    }

    const fields = translateFileFieldsSchema.safeParse(req.body);
    if (!fields.success) {
      res.status(400).json({ error: 'Invalid request', details: fields.error.issues });
      return;
    }

    try {
      const result = await runTranslation({
        ...fields.data,
        markdown: req.file.buffer.toString('utf-8'),
      });
      res.json({ ...result, filename: req.file.originalname });
    } catch (error) {
      console.error('[Server] ❌ File translation failed:', describeError(error));
      res.status(statusFor(error)).json(errorBody(error));
    }
  });

  // Upload and body-parser errors
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    const tooLarge = error instanceof multer.MulterError && error.code === 'LIMIT_FILE_SIZE';
    res.status(tooLarge ? 413 : 400).json({ error: message });
  });

  return app;
}

// ============ Start Server ============

async function startServer(): Promise<void> {
  const config = loadConfig();
  const validation = validateConfig(config);
  if (!validation.valid) {
    console.warn(`[Server] ⚠️ Configuration problems:\n  - ${validation.errors.join('\n  - ')}`);
  }

  const app = createApp(config);
  app.listen(config.port, () => {
    console.log(`
╔═══════════════════════════════════════════════════════════╗
║                                                           ║
║   Chunkwise - Markdown translation                        ║
║                                                           ║
╠═══════════════════════════════════════════════════════════╣
║                                                           ║
║   🌐 Server: http://localhost:${config.port}
║   🤖 AI: ${hasAIProvider(config) ? `${config.model.name} ✅` : 'Not configured ⚠️'}
║                                                           ║
╚═══════════════════════════════════════════════════════════╝
`);
  });
}

const entry = process.argv[1];
if (entry && fs.realpathSync(entry) === fileURLToPath(import.meta.url)) {
  startServer().catch(console.error);
}
