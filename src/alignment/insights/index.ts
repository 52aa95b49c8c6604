import type { LLMAdapter } from "../../adapters/llm/types.js";
import { LlmInsightGenerator } from "./llm.js";
import { RuleBasedInsightGenerator } from "./rules.js";
import type { InsightGenerator } from "./types.js";

export type { InsightContext, InsightGenerator } from "./types.js";
export { RuleBasedInsightGenerator } from "./rules.js";
export { LlmInsightGenerator } from "./llm.js";

export function createInsightGenerator(
  mode: "rules" | "llm",
  adapter: LLMAdapter,
  temperature: number
): InsightGenerator {
  return mode === "llm" ? new LlmInsightGenerator(adapter, temperature) : new RuleBasedInsightGenerator();
}
