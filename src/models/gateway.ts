/**
 * ModelGateway - Narrow adapter around the summarization/chat model
 *
 * All model calls go through here. The gateway owns the retry/backoff policy
 * and the per-attempt timeout, and turns every provider failure into a typed
 * GatewayFailure instead of throwing.
 * Includes usage tracking and a bounded call log for transparency.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { ModelConfig, ModelProvider } from '../types.js';
import { sleep as defaultSleep } from '../utils/sleep.js';

export interface GenerationOptions {
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
  stopSequences?: string[];
}

export interface UsageStats {
  inputTokens: number;
  outputTokens: number;
}

export interface GenerationResult {
  text: string;
  usage: UsageStats;
  durationMs: number;
}

export interface ModelClient {
  readonly provider: ModelProvider;
  readonly model: string;
  generate(prompt: string, options: GenerationOptions, signal: AbortSignal): Promise<GenerationResult>;
}

// =============================================================================
// FAILURES
// =============================================================================

export type GatewayErrorKind = 'RATE_LIMITED' | 'TIMEOUT' | 'UPSTREAM_ERROR' | 'EMPTY_RESPONSE';

export interface GatewayFailure {
  kind: GatewayErrorKind;
  message: string;
  /** Attempts made before giving up */
  attempts: number;
  status?: number;
}

export type GatewayResult =
  | { ok: true; text: string; attempts: number }
  | { ok: false; error: GatewayFailure };

/**
 * The capability every pipeline component depends on.
 */
export interface TextGenerator {
  generate(prompt: string, options?: GenerationOptions, purpose?: string): Promise<GatewayResult>;
}

export class ModelHttpError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'ModelHttpError';
  }
}

export class ModelTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModelTimeoutError';
  }
}

interface ClassifiedError {
  kind: Exclude<GatewayErrorKind, 'EMPTY_RESPONSE'>;
  retryable: boolean;
  message: string;
  status?: number;
}

function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map a thrown provider error onto the gateway taxonomy.
 * Client errors (4xx other than 408/429) are malformed requests and fail fast.
 */
export function classifyError(error: unknown): ClassifiedError {
  const message = errorMessage(error);
  const name = errorName(error);

  if (error instanceof ModelTimeoutError || name === 'TimeoutError' || name === 'AbortError') {
    return { kind: 'TIMEOUT', retryable: true, message };
  }

  if (error instanceof ModelHttpError) {
    const status = error.status;
    if (status === 429) return { kind: 'RATE_LIMITED', retryable: true, message, status };
    if (status === 408) return { kind: 'TIMEOUT', retryable: true, message, status };
    if (status >= 500) return { kind: 'UPSTREAM_ERROR', retryable: true, message, status };
    return { kind: 'UPSTREAM_ERROR', retryable: false, message, status };
  }

  // Network-level failures (DNS, reset connections) are transient
  return { kind: 'UPSTREAM_ERROR', retryable: true, message };
}

// =============================================================================
// MODEL CLIENTS
// =============================================================================

class ClaudeClient implements ModelClient {
  readonly provider = 'anthropic' as const;
  private client: Anthropic;

  constructor(
    apiKey: string,
    readonly model: string = 'claude-haiku-4-5-20251001'
  ) {
    // Retries are the gateway's job
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
  }

  async generate(prompt: string, options: GenerationOptions, signal: AbortSignal): Promise<GenerationResult> {
    const startTime = Date.now();
    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: options.maxTokens ?? 2048,
          messages: [{ role: 'user', content: prompt }],
          system: options.systemPrompt,
          temperature: options.temperature ?? 0.3,
          stop_sequences: options.stopSequences,
        },
        { signal }
      );

      let text = '';
      for (const block of response.content) {
        if (block.type === 'text') text += block.text;
      }

      return {
        text,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      if (error instanceof Anthropic.APIConnectionTimeoutError) {
        throw new ModelTimeoutError(`Anthropic request timed out: ${error.message}`);
      }
      if (error instanceof Anthropic.APIError && typeof error.status === 'number') {
        throw new ModelHttpError(error.status, `Anthropic API error (${error.status}): ${error.message}`);
      }
      throw error;
    }
  }
}

class GeminiClient implements ModelClient {
  readonly provider = 'gemini' as const;

  constructor(
    private readonly apiKey: string,
    readonly model: string = 'gemini-2.5-flash'
  ) {}

  async generate(prompt: string, options: GenerationOptions, signal: AbortSignal): Promise<GenerationResult> {
    const startTime = Date.now();
    const url = `https://generativelanguage.googleapis.com/v1beta/models/${this.model}:generateContent`;

    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-goog-api-key': this.apiKey,
      },
      body: JSON.stringify({
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        systemInstruction: options.systemPrompt
          ? { parts: [{ text: options.systemPrompt }] }
          : undefined,
        generationConfig: {
          maxOutputTokens: options.maxTokens ?? 8192,
          temperature: options.temperature ?? 0.3,
          stopSequences: options.stopSequences,
        },
      }),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new ModelHttpError(response.status, `Gemini API error (${response.status}): ${error.slice(0, 300)}`);
    }

    const data = (await response.json()) as {
      candidates?: Array<{ content?: { parts?: Array<{ text?: string }> } }>;
      usageMetadata?: { promptTokenCount?: number; candidatesTokenCount?: number };
    };

    const parts = data.candidates?.[0]?.content?.parts ?? [];
    const text = parts.map((part) => part.text ?? '').join('');

    return {
      text,
      usage: {
        inputTokens: data.usageMetadata?.promptTokenCount ?? estimateTokens(prompt),
        outputTokens: data.usageMetadata?.candidatesTokenCount ?? estimateTokens(text),
      },
      durationMs: Date.now() - startTime,
    };
  }
}

class OpenRouterClient implements ModelClient {
  readonly provider = 'openrouter' as const;

  constructor(
    private readonly apiKey: string,
    readonly model: string = 'google/gemini-2.5-flash'
  ) {}

  async generate(prompt: string, options: GenerationOptions, signal: AbortSignal): Promise<GenerationResult> {
    const startTime = Date.now();
    const response = await fetch('https://openrouter.ai/api/v1/chat/completions', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
        'X-Title': 'Paper Digest',
      },
      body: JSON.stringify({
        model: this.model,
        messages: [
          ...(options.systemPrompt
            ? [{ role: 'system', content: options.systemPrompt }]
            : []),
          { role: 'user', content: prompt },
        ],
        max_tokens: options.maxTokens ?? 4096,
        temperature: options.temperature ?? 0.3,
        stop: options.stopSequences,
      }),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new ModelHttpError(response.status, `OpenRouter API error (${response.status}): ${error.slice(0, 300)}`);
    }

    const data = (await response.json()) as {
      choices?: Array<{ message?: { content?: string | null } }>;
      usage?: { prompt_tokens: number; completion_tokens: number };
    };

    const text = data.choices?.[0]?.message?.content ?? '';

    return {
      text,
      usage: {
        inputTokens: data.usage?.prompt_tokens ?? estimateTokens(prompt),
        outputTokens: data.usage?.completion_tokens ?? estimateTokens(text),
      },
      durationMs: Date.now() - startTime,
    };
  }
}

/**
 * Rough estimate: ~4 characters per token
 */
function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

// =============================================================================
// GATEWAY
// =============================================================================

export interface GatewayOptions {
  /** Total attempts per call, including the first */
  maxAttempts?: number;
  /** Per-attempt timeout */
  timeoutMs?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface ModelCallLog {
  timestamp: Date;
  model: string;
  attempt: number;
  inputTokens: number;
  outputTokens: number;
  durationMs: number;
  success: boolean;
  error?: string;
  purpose?: string;
}

export interface CumulativeUsage {
  totalInputTokens: number;
  totalOutputTokens: number;
  callCount: number;
  failedCallCount: number;
}

const MAX_CALL_LOG = 1000;

export class ModelGateway implements TextGenerator {
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private callLog: ModelCallLog[] = [];
  private cumulativeUsage: CumulativeUsage = {
    totalInputTokens: 0,
    totalOutputTokens: 0,
    callCount: 0,
    failedCallCount: 0,
  };

  constructor(
    private readonly client: ModelClient,
    options: GatewayOptions = {}
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs ?? 10_000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get model(): string {
    return this.client.model;
  }

  async generate(
    prompt: string,
    options: GenerationOptions = {},
    purpose?: string
  ): Promise<GatewayResult> {
    const label = purpose ? ` (${purpose})` : '';
    let lastError: ClassifiedError | undefined;
    let attempts = 0;

    while (attempts < this.maxAttempts) {
      attempts += 1;
      const startTime = Date.now();

      try {
        const result = await this.callWithTimeout(prompt, options);

        if (!result.text.trim()) {
          this.recordFailure(attempts, Date.now() - startTime, 'empty response', purpose);
          console.warn(`[Gateway] Empty response from ${this.client.model}${label}`);
          return {
            ok: false,
            error: { kind: 'EMPTY_RESPONSE', message: 'Model returned an empty response', attempts },
          };
        }

        this.recordSuccess(attempts, result, purpose);
        console.log(
          `[Gateway] ${this.client.model}: ${result.usage.inputTokens}in/${result.usage.outputTokens}out tokens, ` +
            `${result.durationMs}ms${label}`
        );
        return { ok: true, text: result.text, attempts };
      } catch (error) {
        lastError = classifyError(error);
        this.recordFailure(attempts, Date.now() - startTime, lastError.message, purpose);

        if (!lastError.retryable) {
          console.error(`[Gateway] ${lastError.kind} on ${this.client.model}${label}, not retrying: ${lastError.message}`);
          break;
        }
        if (attempts < this.maxAttempts) {
          const backoff = this.getBackoffMs(attempts);
          console.warn(
            `[Gateway] ${lastError.kind} on ${this.client.model}${label}, waiting ${backoff}ms ` +
              `(attempt ${attempts}/${this.maxAttempts})`
          );
          await this.sleep(backoff);
        }
      }
    }

    const failure: GatewayFailure = {
      kind: lastError?.kind ?? 'UPSTREAM_ERROR',
      message: lastError?.message ?? 'Max attempts exceeded',
      attempts,
      status: lastError?.status,
    };
    console.error(`[Gateway] Giving up on ${this.client.model}${label} after ${attempts} attempt(s): ${failure.kind}`);
    return { ok: false, error: failure };
  }

  /**
   * Get cumulative usage statistics.
   */
  getCumulativeUsage(): CumulativeUsage {
    return { ...this.cumulativeUsage };
  }

  /**
   * Get the call log for debugging/monitoring.
   */
  getCallLog(): ModelCallLog[] {
    return [...this.callLog];
  }

  // ===========================================================================
  // PRIVATE METHODS
  // ===========================================================================

  /**
   * Enforces the timeout even for clients that ignore the abort signal.
   */
  private async callWithTimeout(prompt: string, options: GenerationOptions): Promise<GenerationResult> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new ModelTimeoutError(`Model call timed out after ${this.timeoutMs}ms`);
        controller.abort(error);
        reject(error);
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([this.client.generate(prompt, options, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private getBackoffMs(attempt: number): number {
    return Math.min(this.maxDelayMs, this.baseDelayMs * Math.pow(2, attempt - 1));
  }

  private recordSuccess(attempt: number, result: GenerationResult, purpose?: string): void {
    this.logCall({
      timestamp: new Date(),
      model: this.client.model,
      attempt,
      inputTokens: result.usage.inputTokens,
      outputTokens: result.usage.outputTokens,
      durationMs: result.durationMs,
      success: true,
      purpose,
    });
    this.cumulativeUsage.totalInputTokens += result.usage.inputTokens;
    this.cumulativeUsage.totalOutputTokens += result.usage.outputTokens;
    this.cumulativeUsage.callCount += 1;
  }

  private recordFailure(attempt: number, durationMs: number, error: string, purpose?: string): void {
    this.logCall({
      timestamp: new Date(),
      model: this.client.model,
      attempt,
      inputTokens: 0,
      outputTokens: 0,
      durationMs,
      success: false,
      error,
      purpose,
    });
    this.cumulativeUsage.callCount += 1;
    this.cumulativeUsage.failedCallCount += 1;
  }

  private logCall(log: ModelCallLog): void {
    this.callLog.push(log);
    if (this.callLog.length > MAX_CALL_LOG) {
      this.callLog.shift();
    }
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export function createModelClient(config: ModelConfig): ModelClient {
  switch (config.provider) {
    case 'anthropic':
      return new ClaudeClient(config.apiKey, config.model);
    case 'openrouter':
      return new OpenRouterClient(config.apiKey, config.model);
    case 'gemini':
      return new GeminiClient(config.apiKey, config.model);
  }
}

export function createModelGateway(config: ModelConfig, options: GatewayOptions = {}): ModelGateway {
  const client = createModelClient(config);
  console.log(`[Gateway] Initialized ${client.provider} client with model ${client.model}`);
  return new ModelGateway(client, options);
}
