import { z } from "zod";

import type { Context } from "../engine/context.js";
import { getDefaults } from "../engine/defaults.js";
import { TreeProgrammingError } from "../engine/errors.js";
import { LeafNode } from "../engine/node.js";
import { Result } from "../engine/result.js";
import type { Tracer } from "../engine/tracer.js";
import { describeError } from "../utils/serialize.js";

import type { LlmClient, LlmMessage, LlmRequest, LlmUsage } from "./types.js";

const LlmMessagesSchema = z.array(z.object({ role: z.string().min(1), content: z.string() }));

export type MessagesFactory<B> = (blackboard: B) => LlmMessage[] | Promise<LlmMessage[]>;

/**
 * Streaming observer. Called once per chunk with `finished = false` and once
 * more with an empty delta and `finished = true` when the stream ends.
 * `finishReason` is empty until the provider reports one.
 */
export type DeltaCallback<B> = (
  blackboard: B,
  fullText: string,
  delta: string,
  finished: boolean,
  finishReason: string,
) => void | Promise<void>;

export interface LlmNodeOptions<B> {
  name?: string;
  /** Streams the completion. Implied by {@link onDelta}. */
  stream?: boolean;
  onDelta?: DeltaCallback<B>;
  /** Defaults to the process-wide client. */
  client?: LlmClient;
  /** Literal key or resolver. Defaults to the process-wide key factory. */
  apiKey?: string | ((blackboard: B) => string | undefined);
  /** Provider parameters forwarded verbatim. */
  options?: Record<string, unknown>;
}

/**
 * Calls a language model with messages built from the blackboard and returns
 * `OK(text)`. Usage is recorded on the span (`prompt_tokens`,
 * `completion_tokens`, `total_tokens` and a `tokens` summary) and the reported
 * cost is added to it.
 */
export class LlmNode<B> extends LeafNode {
  readonly kind: string = "LLM";

  constructor(
    private readonly model: string,
    private readonly messages: MessagesFactory<B>,
    private readonly options: LlmNodeOptions<B> = {},
  ) {
    super(options.name);
    if (model.trim().length === 0) {
      throw new TreeProgrammingError("LLM model identifier must not be empty");
    }
  }

  protected async evaluate(context: Context): Promise<Result> {
    const client = this.options.client ?? getDefaults().llmClient;
    if (!client) {
      throw new TreeProgrammingError(`LLM node ${this.fullname} has no client configured`);
    }
    const blackboard = context.board<B>();
    const messages = LlmMessagesSchema.parse(await context.guard(this.messages(blackboard)));
    const apiKey = this.resolveApiKey(blackboard);
    const request: LlmRequest = {
      model: this.model,
      messages,
      signal: context.signal,
      options: { ...(this.options.options ?? {}) },
      ...(apiKey !== undefined ? { apiKey } : {}),
    };

    const span = context.tracer;
    span.setAttribute("model", this.model);
    if (apiKey !== undefined) {
      span.setAttribute("api_key", "***");
    }

    if (this.options.stream || this.options.onDelta) {
      return this.streamCompletion(context, client, request, blackboard);
    }

    const completion = await context.guard(client.complete(request));
    recordUsage(span, completion.usage, completion.cost);
    span.setAttribute("finish_reason", completion.finishReason);
    return Result.OK(completion.text);
  }

  private async streamCompletion(context: Context, client: LlmClient, request: LlmRequest, blackboard: B): Promise<Result> {
    if (!client.stream) {
      throw new TreeProgrammingError(`LLM node ${this.fullname} requested streaming from a client without stream support`);
    }
    const onDelta = this.options.onDelta;
    let text = "";
    let finishReason = "";
    let usage: LlmUsage | undefined;
    let cost: number | undefined;

    const iterator = client.stream(request)[Symbol.asyncIterator]();
    try {
      for (;;) {
        const step = await context.guard(iterator.next());
        if (step.done) {
          break;
        }
        const chunk = step.value;
        text += chunk.delta;
        finishReason = chunk.finishReason ?? finishReason;
        usage = chunk.usage ?? usage;
        cost = chunk.cost ?? cost;
        if (onDelta) {
          await context.guard(onDelta(blackboard, text, chunk.delta, false, finishReason));
        }
      }
    } finally {
      // A cancelled stream may never settle its pending chunk, so closing is not awaited.
      if (context.cancelled && iterator.return) {
        iterator.return().then(undefined, (error: unknown) => {
          context.logger.debug("llm_stream_close_failed", { node: this.fullname, error: describeError(error) });
        });
      }
    }

    if (onDelta) {
      await context.guard(onDelta(blackboard, text, "", true, finishReason));
    }
    recordUsage(context.tracer, usage, cost);
    context.tracer.setAttribute("finish_reason", finishReason || null);
    return Result.OK(text);
  }

  private resolveApiKey(blackboard: B): string | undefined {
    const configured = this.options.apiKey;
    if (typeof configured === "string") {
      return configured;
    }
    if (configured) {
      return configured(blackboard);
    }
    return getDefaults().llmApiKeyFactory?.(blackboard);
  }
}

function recordUsage(span: Tracer, usage: LlmUsage | undefined, cost: number | undefined): void {
  if (usage) {
    span.setAttributes({
      prompt_tokens: usage.promptTokens,
      completion_tokens: usage.completionTokens,
      total_tokens: usage.totalTokens,
      tokens: { prompt: usage.promptTokens, completion: usage.completionTokens, total: usage.totalTokens },
    });
  }
  if (cost !== undefined) {
    span.addCost(cost);
  }
}
