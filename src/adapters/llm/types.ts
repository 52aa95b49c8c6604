/**
 * Provider-agnostic LLM adapter interface.
 *
 * The alignment core only ever asks for a single completion and parses the
 * content itself, so adapters stay thin: prompt in, raw text out.
 */

export type LlmProviderName = "openai" | "fixtures";

/**
 * Tasks the service issues completions for. Used for routing, telemetry and
 * by the fixtures adapter to pick a canned response.
 */
export type LlmTask =
  | "proposals_objective"
  | "proposals_finding"
  | "proposals_entity_tracking"
  | "insights_strengths"
  | "insights_weaknesses"
  | "insights_recommendations"
  | "document_qa";

/**
 * Usage metrics returned by LLM calls for cost tracking and telemetry.
 */
export interface UsageMetrics {
  input_tokens: number;
  output_tokens: number;
}

export interface CompletionArgs {
  task: LlmTask;
  system: string;
  prompt: string;
  temperature: number;
  /** "json" requests the provider's JSON mode */
  responseFormat: "json" | "text";
  maxTokens?: number;
}

export interface CompletionResult {
  content: string;
  usage: UsageMetrics;
}

/**
 * Per-call options shared by all adapter methods.
 */
export interface CallOpts {
  requestId?: string;
  timeoutMs?: number;
}

export interface LLMAdapter {
  readonly name: LlmProviderName;
  readonly model: string;
  complete(args: CompletionArgs, opts?: CallOpts): Promise<CompletionResult>;
}
