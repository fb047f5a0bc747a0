/**
 * Chunkwise Engine - context-carrying Markdown translation
 *
 * parse → chunk → translate (sequential, with rolling context) → reassemble
 *
 * @module chunkwise-engine
 */

// Types
export type { Language, ProviderName, TranslationOptions, GlossaryEntry, Glossary } from './types/common.js';
export { PROVIDER_NAMES, isProviderName } from './types/common.js';
export type { BlockKind, Block, ParsedDocument } from './types/document.js';
export { createBlock, isAtomicKind, renderDocument, blockKinds } from './types/document.js';
export type {
  Chunk,
  ChunkLayout,
  ContextState,
  TranslationResult,
  TranslationRun,
  ChunkStatus,
  TranslationProgress,
  TranslationProgressCallback,
} from './types/pipeline.js';

// Errors
export {
  ChunkwiseError,
  ConfigurationError,
  ParseError,
  ChunkingError,
  TranslationError,
  ReassemblyError,
  GENERIC_EXIT_CODE,
  exitCodeFor,
  describeError,
  type ErrorCode,
  type TranslationFailureReason,
} from './errors.js';

// Interfaces
export type {
  ILLMProvider,
  LLMProviderConfig,
  Message,
  CompletionOptions,
  CompletionResult,
  TokenUsage,
} from './interfaces/llm-provider.js';
export type {
  ITranslatorBackend,
  ISummarizer,
  ITermExtractor,
  TranslationContext,
  TranslatorOutcome,
} from './interfaces/translator.js';

// Parsing and chunking
export { parseMarkdown, countCells } from './parser/markdown-parser.js';
export { estimateTokens, type TokenEstimator } from './chunking/tokens.js';
export {
  chunkBlocks,
  chunkDocument,
  describeLayout,
  SMALLEST_ATOMIC_BLOCK,
  type ChunkerOptions,
  type ChunkedDocument,
} from './chunking/chunker.js';

// Context
export {
  DEFAULT_TAIL_LENGTH,
  createInitialContext,
  mergeGlossary,
  updateContext,
  tailOf,
  glossaryToEntries,
  formatGlossary,
} from './context/context-carrier.js';

// Translation
export {
  DEFAULT_RETRY_CONFIG,
  computeBackoffDelay,
  classifyError,
  isRetryableError,
  isRateLimitError,
  type RetryConfig,
} from './translation/retry.js';
export {
  translateChunks,
  DEFAULT_SUMMARY_MAX_LENGTH,
  type OrchestratorOptions,
} from './translation/orchestrator.js';
export { RollingSummarizer, LLMSummarizer, clampSummary } from './translation/summarizer.js';
export { PreservedTermExtractor, stripFencedCode } from './translation/term-extractor.js';
export {
  LLMTranslator,
  translationResponseSchema,
  type LLMTranslatorOptions,
  type TranslationResponse,
} from './translation/llm-translator.js';

// Providers
export { OpenAIProvider, MalformedResponseError, parseJSONResponse } from './providers/openai.js';
export {
  createProvider,
  resolveProviderName,
  DASHSCOPE_BASE_URL,
  type ProviderCredentials,
  type ProviderSelection,
} from './providers/provider-factory.js';

// Reassembly
export { reassemble, verifyStructure, normalizeChunk } from './reassembly/reassembler.js';

// Pipeline
export {
  DocumentPipeline,
  type PipelineConfig,
  type DocumentTranslationOptions,
  type DocumentTranslation,
} from './pipeline/document-pipeline.js';

// Glossary
export { GlossaryStore, type GlossaryFile } from './glossary/glossary-store.js';

// Prompts
export { createTranslatorSystemPrompt, createTranslatorPrompt, languageName } from './prompts/translator.js';
export { SUMMARIZER_SYSTEM_PROMPT, createSummaryPrompt } from './prompts/summarizer.js';
