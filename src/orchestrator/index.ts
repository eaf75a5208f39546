/**
 * Orchestrator Module
 */

export {
  RagOrchestrator,
  DEFAULT_SEARCH_LIMIT,
  DEFAULT_MAX_LENGTH,
  DEFAULT_TEMPERATURE,
} from './RagOrchestrator';
export { DEFAULT_ORCHESTRATOR_OPTIONS } from './types';
export type {
  SearchResult,
  SearchResponse,
  GenerationSource,
  GenerateResponse,
  GenerateOptions,
  IngestFailure,
  IngestResponse,
  HealthReport,
  OrchestratorStats,
  OrchestratorOptions,
  RagOrchestratorDeps,
} from './types';
export {
  RAG_PROMPT_TEMPLATE,
  CHARS_PER_TOKEN,
  buildPrompt,
  buildSnippet,
  composeContext,
  estimateTokenCount,
} from './prompt';
export type { ContextBlock } from './prompt';
export {
  validateQuery,
  validateLimit,
  validateMaxLength,
  validateTemperature,
  validateDocumentId,
  parseDocument,
} from './validation';
export { generateRequestId, isValidRequestId } from './request-id';
