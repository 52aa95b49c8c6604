/**
 * JSON Extractor Utility
 *
 * Extracts valid JSON from LLM responses that may contain conversational
 * preamble, suffix text, or markdown code blocks, even when JSON mode was
 * requested.
 */

import { log, emit, TelemetryEvents } from "./telemetry.js";

export interface JsonExtractionResult {
  json: unknown;
  /** Whether extraction was needed (true if raw content wasn't valid JSON) */
  wasExtracted: boolean;
  extractionMethod: "fast_path" | "code_block" | "bracket_matching";
}

export interface JsonExtractionOptions {
  /** Task name for telemetry (e.g., "proposals") */
  task?: string;
  model?: string;
}

/**
 * Extract JSON from an LLM response.
 *
 * Strategy (in order):
 * 1. Parse raw content as-is
 * 2. Parse each markdown code block (```json ... ```)
 * 3. Bracket-match from each `{` or `[` until a valid structure parses
 *
 * @throws Error if no valid JSON can be extracted
 */
export function extractJsonFromResponse(
  content: string,
  options: JsonExtractionOptions = {}
): JsonExtractionResult {
  const { task, model } = options;
  const trimmed = content.trim();

  if (trimmed.startsWith("{") || trimmed.startsWith("[")) {
    try {
      return { json: JSON.parse(trimmed), wasExtracted: false, extractionMethod: "fast_path" };
    } catch {
      // fall through to extraction
    }
  }

  const codeBlockRegex = /```(?:json)?\s*([\s\S]*?)```/g;
  let codeBlockMatch: RegExpExecArray | null;
  while ((codeBlockMatch = codeBlockRegex.exec(trimmed)) !== null) {
    const blockContent = (codeBlockMatch[1] ?? "").trim();
    try {
      const json = JSON.parse(blockContent);
      report(task, model, "code_block", codeBlockMatch.index);
      return { json, wasExtracted: true, extractionMethod: "code_block" };
    } catch {
      continue;
    }
  }

  let candidatesTried = 0;
  for (let i = 0; i < trimmed.length; i++) {
    const char = trimmed[i];
    if (char !== "{" && char !== "[") continue;
    candidatesTried++;

    const json = extractJsonWithBracketMatching(trimmed, i);
    if (json !== undefined) {
      report(task, model, "bracket_matching", i);
      return { json, wasExtracted: true, extractionMethod: "bracket_matching" };
    }
  }

  if (candidatesTried === 0) {
    throw new Error("No JSON structure found in response: missing opening delimiter");
  }

  throw new Error(
    `Failed to extract valid JSON from response: tried ${candidatesTried} candidate position(s)`
  );
}

function report(
  task: string | undefined,
  model: string | undefined,
  method: JsonExtractionResult["extractionMethod"],
  preambleLength: number
): void {
  log.warn({ task, model, extraction_method: method, preamble_length: preambleLength }, "JSON extraction required");
  emit(TelemetryEvents.JsonExtractionRequired, {
    task,
    model,
    extraction_method: method,
    preamble_length: preambleLength,
  });
}

/**
 * Scan from `startIndex`, counting brackets outside of strings, and parse the
 * first balanced structure. Returns undefined when unbalanced or invalid.
 */
function extractJsonWithBracketMatching(content: string, startIndex: number): unknown {
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = startIndex; i < content.length; i++) {
    const char = content[i];

    if (escape) {
      escape = false;
      continue;
    }

    if (char === "\\") {
      escape = true;
      continue;
    }

    if (char === '"') {
      inString = !inString;
      continue;
    }

    if (inString) continue;

    if (char === "{" || char === "[") depth++;
    if (char === "}" || char === "]") depth--;

    if (depth === 0) {
      try {
        return JSON.parse(content.slice(startIndex, i + 1));
      } catch {
        return undefined;
      }
    }
  }

  return undefined;
}

/**
 * Convenience function that returns just the parsed JSON.
 */
export function extractJson(content: string, options?: JsonExtractionOptions): unknown {
  return extractJsonFromResponse(content, options).json;
}
