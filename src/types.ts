/**
 * Paper Digest Core Types
 *
 * Foundational types shared by the pipeline, storage and API layers.
 */

// ============================================================================
// COMPLEXITY TIERS
// ============================================================================

export const COMPLEXITY_TIERS = ['LOW', 'MEDIUM', 'HIGH'] as const;

export type ComplexityTier = (typeof COMPLEXITY_TIERS)[number];

export function isComplexityTier(value: string): value is ComplexityTier {
  return (COMPLEXITY_TIERS as readonly string[]).includes(value);
}

// ============================================================================
// MODEL CONFIGURATION
// ============================================================================

export type ModelProvider = 'gemini' | 'anthropic' | 'openrouter';

export interface ModelConfig {
  provider: ModelProvider;
  apiKey: string;
  /** Provider-specific model name; each client has its own default */
  model?: string;
}

// ============================================================================
// DOCUMENTS
// ============================================================================

export type SourceKind = 'pdf' | 'html';

export interface ExtractedDocument {
  text: string;
  sourceKind: SourceKind;
}

export interface SummaryRecord {
  /** Final reduce-phase output */
  text: string;
  tier: ComplexityTier;
  /** Number of chunks the map phase ran over */
  chunkCount: number;
  /** Chunks replaced by a placeholder because their map call failed */
  failedChunks: number;
  degraded: boolean;
  /** ISO timestamp */
  generatedAt: string;
}

export interface CachedPaper {
  /** Canonical source URL, also the cache identity */
  url: string;
  text: string;
  sourceKind: SourceKind;
  /** ISO timestamp */
  extractedAt: string;
  summaries: Partial<Record<ComplexityTier, SummaryRecord>>;
}

// ============================================================================
// CHAT
// ============================================================================

export type ChatRole = 'user' | 'assistant';

export interface NewChatTurn {
  role: ChatRole;
  text: string;
}

export interface ChatTurn extends NewChatTurn {
  /** Position in the session history, starting at 0 */
  index: number;
  /** ISO timestamp */
  createdAt: string;
}

// ============================================================================
// API
// ============================================================================

export interface SummarizeRequest {
  paper_url: string;
  complexity?: string;
}

export interface SummarizeResponse {
  success: true;
  summary: string;
  level: ComplexityTier;
  paper_url: string;
  chunk_count: number;
  cached: boolean;
  degraded: boolean;
  notice?: string;
}

export interface ChatRequest {
  paper_url: string;
  message: string;
  session_id?: string;
}

export interface ChatResponse {
  success: true;
  answer: string;
  session_id: string;
}

export interface ErrorResponse {
  success: false;
  error: string;
  code: string;
}
