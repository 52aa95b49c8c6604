import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret redaction
 *
 * SECURITY: Redaction paths centralized in src/utils/logger-config.ts
 * so the Fastify and standalone loggers stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

/**
 * Test sink for capturing telemetry events in tests.
 * Only used when NODE_ENV=test or VITEST=true
 */
let testSink: ((eventName: string, data: Record<string, unknown>) => void) | null = null;

export function setTestSink(sink: ((eventName: string, data: Record<string, unknown>) => void) | null): void {
  // Direct env check avoids a config import cycle during module initialization
  const isTestEnv = env.NODE_ENV === "test" || env.VITEST === "true" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT rename without updating dashboards
 */
export const TelemetryEvents = {
  AnalysisStarted: "alignment.analysis.started",
  AnalysisCompleted: "alignment.analysis.completed",
  AnalysisFailed: "alignment.analysis.failed",

  EntitiesMatched: "alignment.entities.matched",
  SimilarityAggregated: "alignment.similarity.aggregated",
  ObjectiveQueryFailed: "alignment.similarity.query_failed",
  FindingsDetected: "alignment.findings.detected",

  ProposalsGenerated: "alignment.proposals.generated",
  ProposalRequestFailed: "alignment.proposals.request_failed",
  ProposalAccepted: "alignment.proposal.accepted",
  ProposalRejected: "alignment.proposal.rejected",

  InsightFallback: "alignment.insights.fallback",

  LlmCallCompleted: "llm.call.completed",
  LlmCallFailed: "llm.call.failed",
  JsonExtractionRequired: "llm.json_extraction.required",
  RetryAttempt: "llm.retry.attempt",

  QuestionAnswered: "alignment.qa.answered",
} as const;

/**
 * StatsD client (Datadog agent) when DD_AGENT_HOST is configured
 */
let datadogClient: StatsD | null = null;

if (env.DD_AGENT_HOST) {
  datadogClient = new StatsD({
    host: env.DD_AGENT_HOST,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "plan_alignment.",
    globalTags: {
      service: env.DD_SERVICE || "plan-alignment-service",
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "Datadog StatsD client initialized");
}

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type Event = Record<string, unknown>;
type TelemetryValue = TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;

function sanitizeTelemetryValue(value: unknown): TelemetryValue | undefined {
  if (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    const sanitizedObj: TelemetryShape = {};
    for (const [key, child] of Object.entries(value)) {
      const sanitizedChild = sanitizeTelemetryValue(child);
      if (sanitizedChild !== undefined) {
        sanitizedObj[key] = sanitizedChild;
      }
    }
    return sanitizedObj;
  }

  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

/**
 * Emit telemetry event (logs + StatsD metrics)
 *
 * @param event Event name (use TelemetryEvents)
 * @param data Event data
 */
export function emit(event: string, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });

  if (!datadogClient) return;

  try {
    switch (event) {
      case TelemetryEvents.AnalysisCompleted: {
        if (typeof eventData.latency_ms === "number") {
          datadogClient.histogram("analysis.latency_ms", eventData.latency_ms);
        }
        if (typeof eventData.overall_score === "number") {
          datadogClient.gauge("analysis.overall_score", eventData.overall_score);
        }
        break;
      }
      case TelemetryEvents.AnalysisFailed:
        datadogClient.increment("analysis.failed");
        break;
      case TelemetryEvents.ProposalsGenerated:
        if (typeof eventData.count === "number") {
          datadogClient.increment("proposals.generated", eventData.count);
        }
        break;
      case TelemetryEvents.ProposalAccepted:
        datadogClient.increment("proposals.accepted");
        break;
      case TelemetryEvents.ProposalRejected:
        datadogClient.increment("proposals.rejected");
        break;
      case TelemetryEvents.LlmCallCompleted:
        if (typeof eventData.latency_ms === "number") {
          datadogClient.histogram("llm.latency_ms", eventData.latency_ms, {
            task: String(eventData.task ?? "unknown"),
          });
        }
        break;
      case TelemetryEvents.LlmCallFailed:
        datadogClient.increment("llm.failed", { task: String(eventData.task ?? "unknown") });
        break;
      default:
        break;
    }
  } catch (error) {
    log.warn({ error, event }, "Failed to forward telemetry metric");
  }
}
