import OpenAI from "openai";
import { config } from "../../config/index.js";
import { log, emit, TelemetryEvents } from "../../utils/telemetry.js";
import { withRetry } from "../../utils/retry.js";
import type { LLMAdapter, CompletionArgs, CompletionResult, CallOpts } from "./types.js";
import { UpstreamTimeoutError, UpstreamHTTPError } from "./errors.js";

// Use centralized config for API key (lazy access via getter)
function getApiKey(): string | undefined {
  return config.llm.openaiApiKey;
}

// Lazy initialization to allow testing without API key
let client: OpenAI | null = null;

/**
 * Shared OpenAI client for completions and embeddings.
 * SDK-level retries are disabled; callers go through withRetry().
 */
export function getOpenAIClient(): OpenAI {
  const apiKey = getApiKey();
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY environment variable is required but not set");
  }
  if (!client) {
    client = new OpenAI({ apiKey, maxRetries: 0 });
  }
  return client;
}

/**
 * Translate an SDK failure into the typed upstream errors.
 * Returns the original error when it is neither a timeout nor an HTTP failure.
 */
export function toUpstreamError(
  error: unknown,
  operation: string,
  aborted: boolean,
  elapsedMs: number
): unknown {
  if (error instanceof OpenAI.APIUserAbortError || error instanceof OpenAI.APIConnectionTimeoutError || aborted) {
    return new UpstreamTimeoutError(`OpenAI ${operation} timed out`, "openai", operation, elapsedMs, error);
  }

  if (error instanceof OpenAI.APIError && typeof error.status === "number") {
    const requestId = error.headers?.["x-request-id"] ?? undefined;
    log.error(
      { status: error.status, request_id: requestId, elapsed_ms: elapsedMs, operation },
      "OpenAI API returned non-2xx status"
    );
    return new UpstreamHTTPError(
      `OpenAI ${operation} failed: ${error.message || "unknown error"}`,
      "openai",
      error.status,
      error.code ?? error.type ?? undefined,
      requestId,
      elapsedMs,
      error
    );
  }

  return error;
}

/**
 * OpenAI adapter implementing the LLMAdapter interface.
 * Uses the chat completions API, with JSON mode when structured output is requested.
 */
export class OpenAIAdapter implements LLMAdapter {
  readonly name = "openai" as const;
  readonly model: string;

  constructor(model?: string) {
    this.model = model || config.llm.model || "gpt-4o-mini";
  }

  async complete(args: CompletionArgs, opts: CallOpts = {}): Promise<CompletionResult> {
    const timeoutMs = opts.timeoutMs ?? config.llm.timeoutMs;
    const startTime = Date.now();

    log.info(
      { task: args.task, prompt_chars: args.prompt.length, model: this.model, provider: "openai", request_id: opts.requestId },
      "calling OpenAI"
    );

    try {
      const result = await withRetry(
        () => this.completeOnce(args, timeoutMs),
        { provider: "openai", model: this.model, operation: args.task }
      );

      emit(TelemetryEvents.LlmCallCompleted, {
        task: args.task,
        provider: "openai",
        model: this.model,
        latency_ms: Date.now() - startTime,
        input_tokens: result.usage.input_tokens,
        output_tokens: result.usage.output_tokens,
      });

      return result;
    } catch (error) {
      emit(TelemetryEvents.LlmCallFailed, {
        task: args.task,
        provider: "openai",
        model: this.model,
        latency_ms: Date.now() - startTime,
        error: error instanceof Error ? error.name : "unknown",
      });
      throw error;
    }
  }

  private async completeOnce(args: CompletionArgs, timeoutMs: number): Promise<CompletionResult> {
    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), timeoutMs);
    const startTime = Date.now();

    try {
      const response = await getOpenAIClient().chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: args.system },
            { role: "user", content: args.prompt },
          ],
          temperature: args.temperature,
          ...(args.responseFormat === "json" ? { response_format: { type: "json_object" as const } } : {}),
          ...(args.maxTokens ? { max_tokens: args.maxTokens } : {}),
        },
        { signal: abortController.signal }
      );

      clearTimeout(timeoutId);

      const content = response.choices[0]?.message?.content;
      if (!content) {
        log.error({ task: args.task, finish_reason: response.choices[0]?.finish_reason }, "OpenAI returned empty content");
        throw new Error("openai_empty_response");
      }

      return {
        content,
        usage: {
          input_tokens: response.usage?.prompt_tokens ?? 0,
          output_tokens: response.usage?.completion_tokens ?? 0,
        },
      };
    } catch (error) {
      clearTimeout(timeoutId);
      throw toUpstreamError(error, args.task, abortController.signal.aborted, Date.now() - startTime);
    }
  }
}
