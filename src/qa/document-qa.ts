import type { EmbeddingProvider } from "../adapters/embeddings/types.js";
import type { CallOpts, LLMAdapter } from "../adapters/llm/types.js";
import type { VectorIndex, VectorMetadataValue, VectorRecord } from "../adapters/vector/types.js";
import { ExternalServiceError, describeError } from "../alignment/errors.js";
import type { AnalysisRecordT } from "../schemas/analysis.js";
import type { PlanDocumentT } from "../schemas/plan.js";
import { QA_SYSTEM_PROMPT, buildQuestionPrompt } from "../prompts/alignment.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { chunkAnalysis, chunkPlan } from "./chunker.js";
import type { ChunkKind, DocumentChunk } from "./chunker.js";

export const RAG_NAMESPACE = "rag";

export const NOTHING_INDEXED_ANSWER =
  "Nothing has been indexed yet. Run an analysis first, then ask again.";

export const NO_CONTEXT_ANSWER =
  "I couldn't find relevant information to answer this question. Try asking about specific objectives, actions or findings.";

/** Passage text kept in index metadata */
const STORED_TEXT_CHARS = 1000;

const CHUNK_KINDS: readonly ChunkKind[] = ["section", "summary", "objective", "finding", "proposal"];

export interface AnswerSource {
  id: string;
  kind: ChunkKind;
  title: string;
  score: number;
}

export interface Answer {
  answer: string;
  sources: AnswerSource[];
}

export interface DocumentQAOptions {
  topK: number;
  temperature: number;
}

function asString(value: VectorMetadataValue | undefined): string {
  return typeof value === "string" ? value : "";
}

function asKind(value: VectorMetadataValue | undefined): ChunkKind {
  return CHUNK_KINDS.find((k) => k === value) ?? "section";
}

/**
 * Retrieval-augmented Q&A over both plans and the latest analysis record.
 */
export class DocumentQA {
  constructor(
    private readonly embedder: EmbeddingProvider,
    private readonly index: VectorIndex,
    private readonly adapter: LLMAdapter,
    private readonly options: DocumentQAOptions
  ) {}

  /**
   * Replace the indexed corpus. Returns the number of chunks indexed.
   */
  async rebuild(strategic: PlanDocumentT, action: PlanDocumentT, record: AnalysisRecordT): Promise<number> {
    const chunks: DocumentChunk[] = [...chunkPlan(strategic), ...chunkPlan(action), ...chunkAnalysis(record)];

    const records: VectorRecord[] = [];
    for (const chunk of chunks) {
      records.push({
        id: chunk.id,
        values: await this.embed(chunk.text, "index_chunk"),
        metadata: {
          kind: chunk.kind,
          source: chunk.source,
          title: chunk.title,
          text: chunk.text.slice(0, STORED_TEXT_CHARS),
        },
      });
    }

    await this.index.clear(RAG_NAMESPACE);
    await this.index.upsert(RAG_NAMESPACE, records);
    log.debug({ chunks: records.length }, "Rebuilt Q&A index");
    return records.length;
  }

  get indexed(): boolean {
    return this.index.count(RAG_NAMESPACE) > 0;
  }

  async ask(question: string, opts: CallOpts = {}): Promise<Answer> {
    if (!this.indexed) {
      return { answer: NOTHING_INDEXED_ANSWER, sources: [] };
    }

    const vector = await this.embed(question, "embed_question");
    const matches = await this.index.query(RAG_NAMESPACE, vector, this.options.topK);
    if (matches.length === 0) {
      return { answer: NO_CONTEXT_ANSWER, sources: [] };
    }

    const passages = matches.map((m) => ({ title: asString(m.metadata.title), text: asString(m.metadata.text) }));

    let content: string;
    try {
      const result = await this.adapter.complete(
        {
          task: "document_qa",
          system: QA_SYSTEM_PROMPT,
          prompt: buildQuestionPrompt(question, passages),
          temperature: this.options.temperature,
          responseFormat: "text",
        },
        opts
      );
      content = result.content.trim();
    } catch (error) {
      throw new ExternalServiceError(`Question answering failed: ${describeError(error)}`, "llm", "document_qa", error);
    }

    const sources = matches.map((m) => ({
      id: m.id,
      kind: asKind(m.metadata.kind),
      title: asString(m.metadata.title),
      score: m.score,
    }));

    emit(TelemetryEvents.QuestionAnswered, {
      request_id: opts.requestId,
      sources: sources.length,
      top_score: sources[0]?.score ?? 0,
    });

    return { answer: content, sources };
  }

  private async embed(text: string, operation: string): Promise<number[]> {
    try {
      return await this.embedder.embed(text);
    } catch (error) {
      throw new ExternalServiceError(`Embedding failed: ${describeError(error)}`, "embeddings", operation, error);
    }
  }
}
