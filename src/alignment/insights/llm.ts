import { z } from "zod";
import type { LLMAdapter } from "../../adapters/llm/types.js";
import { Recommendation } from "../../schemas/analysis.js";
import type { RecommendationT } from "../../schemas/analysis.js";
import {
  INSIGHT_SYSTEM_PROMPT,
  buildRecommendationsPrompt,
  buildStrengthsPrompt,
  buildWeaknessesPrompt,
} from "../../prompts/alignment.js";
import { log, emit, TelemetryEvents } from "../../utils/telemetry.js";
import { describeError } from "../errors.js";
import { completeJson } from "../llm-json.js";
import type { InsightContext, InsightGenerator } from "./types.js";

const StrengthsResponse = z.object({ strengths: z.array(z.string()).default([]) });
const WeaknessesResponse = z.object({ weaknesses: z.array(z.string()).default([]) });
const RecommendationsResponse = z.object({ recommendations: z.array(z.unknown()).default([]) });

/**
 * LLM-written insights. Any call or parse failure falls back to a short
 * data-derived summary for that section only.
 */
export class LlmInsightGenerator implements InsightGenerator {
  readonly name = "llm";

  constructor(
    private readonly adapter: LLMAdapter,
    private readonly temperature: number
  ) {}

  async identifyStrengths(ctx: InsightContext): Promise<string[]> {
    const strong = ctx.objectives.filter((o) => o.has_strong_support).length;
    try {
      const raw = await completeJson(this.adapter, {
        task: "insights_strengths",
        system: INSIGHT_SYSTEM_PROMPT,
        prompt: buildStrengthsPrompt(ctx),
        temperature: this.temperature,
      });
      const { strengths } = StrengthsResponse.parse(raw);
      if (strengths.length > 0) return strengths;
      return [`${strong}/${ctx.objectives.length} strategic objectives demonstrate strong alignment`];
    } catch (error) {
      this.fallback("strengths", error);
      return [`${strong}/${ctx.objectives.length} strategic objectives have strong supporting actions`];
    }
  }

  async identifyWeaknesses(ctx: InsightContext): Promise<string[]> {
    const weak = ctx.objectives.filter((o) => !o.has_strong_support).length;
    try {
      const raw = await completeJson(this.adapter, {
        task: "insights_weaknesses",
        system: INSIGHT_SYSTEM_PROMPT,
        prompt: buildWeaknessesPrompt(ctx),
        temperature: this.temperature,
      });
      return WeaknessesResponse.parse(raw).weaknesses;
    } catch (error) {
      this.fallback("weaknesses", error);
      return weak > 0 ? [`${weak} strategic objectives lack strong supporting actions`] : [];
    }
  }

  async generateRecommendations(ctx: InsightContext, weaknesses: readonly string[]): Promise<RecommendationT[]> {
    const weak = ctx.objectives.filter((o) => !o.has_strong_support);
    if (ctx.overallScore > 90 && weak.length === 0) return [];

    try {
      const raw = await completeJson(this.adapter, {
        task: "insights_recommendations",
        system: INSIGHT_SYSTEM_PROMPT,
        prompt: buildRecommendationsPrompt(ctx, weaknesses),
        temperature: this.temperature,
      });
      const items = RecommendationsResponse.parse(raw).recommendations;
      const valid: RecommendationT[] = [];
      for (const item of items) {
        const parsed = Recommendation.safeParse(item);
        if (parsed.success) valid.push(parsed.data);
      }
      return valid;
    } catch (error) {
      this.fallback("recommendations", error);
      const first = weak[0];
      if (!first) return [];
      return [
        {
          priority: "high",
          objective: first.objective_title,
          current_score: first.combined_score,
          actions: ["Review and strengthen action plan to better address this objective"],
        },
      ];
    }
  }

  private fallback(section: string, error: unknown): void {
    log.warn({ section, error: describeError(error) }, "LLM insight generation failed, using fallback");
    emit(TelemetryEvents.InsightFallback, { section, error: error instanceof Error ? error.name : "unknown" });
  }
}
