import type { LLMAdapter, CompletionArgs, CallOpts } from "../adapters/llm/types.js";
import { extractJson } from "../utils/json-extractor.js";
import { ExternalServiceError, MalformedResponseError, describeError } from "./errors.js";

const RAW_PREVIEW_CHARS = 200;

/**
 * Issue one JSON-mode completion and parse it leniently.
 *
 * @throws ExternalServiceError when the call itself fails
 * @throws MalformedResponseError when no JSON can be recovered from the content
 */
export async function completeJson(
  adapter: LLMAdapter,
  args: Omit<CompletionArgs, "responseFormat">,
  opts?: CallOpts
): Promise<unknown> {
  let content: string;
  try {
    ({ content } = await adapter.complete({ ...args, responseFormat: "json" }, opts));
  } catch (error) {
    throw new ExternalServiceError(`LLM ${args.task} call failed: ${describeError(error)}`, "llm", args.task, error);
  }

  try {
    return extractJson(content, { task: args.task, model: adapter.model });
  } catch (error) {
    throw new MalformedResponseError(
      `LLM ${args.task} returned no parseable JSON: ${describeError(error)}`,
      args.task,
      content.slice(0, RAW_PREVIEW_CHARS)
    );
  }
}
