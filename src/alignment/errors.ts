/**
 * Error taxonomy for the alignment core.
 *
 * ConfigurationError is fatal at construction. NotFoundError and
 * ProposalStateError are fatal for a single lifecycle operation.
 * ExternalServiceError and MalformedResponseError are recovered locally by the
 * stage that called the collaborator (empty result + log), except embedding
 * failures which abort the run.
 */

export class ConfigurationError extends Error {
  readonly name = "ConfigurationError";

  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}

export class NotFoundError extends Error {
  readonly name = "NotFoundError";

  constructor(
    message: string,
    public readonly resource: string,
    public readonly resourceId?: string
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NotFoundError);
    }
  }
}

/**
 * Failure of an embedding, vector-index or LLM call.
 */
export class ExternalServiceError extends Error {
  readonly name = "ExternalServiceError";

  constructor(
    message: string,
    public readonly service: "embeddings" | "vector_index" | "llm",
    public readonly operation: string,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ExternalServiceError);
    }
  }
}

/**
 * LLM output that is not valid structured data.
 */
export class MalformedResponseError extends Error {
  readonly name = "MalformedResponseError";

  constructor(
    message: string,
    public readonly operation: string,
    public readonly rawPreview?: string
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MalformedResponseError);
    }
  }
}

/**
 * Transition attempted out of a terminal proposal state.
 */
export class ProposalStateError extends Error {
  readonly name = "ProposalStateError";

  constructor(
    message: string,
    public readonly proposalId: string,
    public readonly currentStatus: string
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ProposalStateError);
    }
  }
}

/**
 * Stringify an unknown thrown value for logs.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
