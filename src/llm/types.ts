/** Chat message forwarded to the model provider. */
export interface LlmMessage {
  role: string;
  content: string;
}

export interface LlmUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LlmRequest {
  model: string;
  messages: LlmMessage[];
  /** Credential resolved for this call, if any. */
  apiKey?: string;
  /** Aborted when the calling branch is cancelled. */
  signal: AbortSignal;
  /** Provider-specific parameters (temperature, max tokens, ...). */
  options: Record<string, unknown>;
}

export interface LlmCompletion {
  text: string;
  finishReason: string | null;
  usage?: LlmUsage;
  /** Monetary cost reported by the provider. */
  cost?: number;
}

/** One streamed increment. `usage` and `cost` are cumulative when present. */
export interface LlmChunk {
  delta: string;
  finishReason?: string | null;
  usage?: LlmUsage;
  cost?: number;
}

/**
 * Provider binding used by the LLM node. Streaming is optional; nodes asking
 * for a stream against a client without {@link stream} are a programming error.
 */
export interface LlmClient {
  complete(request: LlmRequest): Promise<LlmCompletion>;
  stream?(request: LlmRequest): AsyncIterable<LlmChunk>;
}
