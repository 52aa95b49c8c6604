import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  buildErrorV1,
  zodErrorToErrorV1,
  toErrorV1,
  getStatusCodeForErrorCode,
  type ErrorCode,
} from "../../src/utils/errors.js";
import {
  ConfigurationError,
  ExternalServiceError,
  MalformedResponseError,
  NotFoundError,
  ProposalStateError,
} from "../../src/alignment/errors.js";

function zodError(): z.ZodError {
  const result = z.object({ question: z.string().min(1) }).safeParse({ question: 5 });
  if (result.success) throw new Error("expected validation failure");
  return result.error;
}

describe("error utilities", () => {
  describe("buildErrorV1", () => {
    it("builds a bare error with code and message", () => {
      expect(buildErrorV1("BAD_INPUT", "Invalid request")).toEqual({
        schema: "error.v1",
        code: "BAD_INPUT",
        message: "Invalid request",
      });
    });

    it("drops empty details and keeps request_id", () => {
      expect(buildErrorV1("INTERNAL", "Server error", {}, "req-123")).toEqual({
        schema: "error.v1",
        code: "INTERNAL",
        message: "Server error",
        request_id: "req-123",
      });
    });
  });

  describe("zodErrorToErrorV1", () => {
    it("reports flattened validation errors", () => {
      const error = zodErrorToErrorV1(zodError(), "req-456");

      expect(error.code).toBe("BAD_INPUT");
      expect(error.message).toBe("Validation failed");
      expect(error.request_id).toBe("req-456");
      expect(error.details).toEqual({
        validation_errors: { formErrors: [], fieldErrors: { question: ["Expected string, received number"] } },
      });
    });
  });

  describe("toErrorV1", () => {
    it("maps missing resources to NOT_FOUND", () => {
      expect(toErrorV1(new NotFoundError("Proposal p1 not found", "proposal", "p1"))).toEqual({
        schema: "error.v1",
        code: "NOT_FOUND",
        message: "Proposal p1 not found",
        details: { resource: "proposal", id: "p1" },
      });
      expect(toErrorV1(new NotFoundError("Action plan not found", "action_plan")).details).toEqual({
        resource: "action_plan",
      });
    });

    it("maps terminal proposal transitions to CONFLICT", () => {
      const error = toErrorV1(new ProposalStateError("Proposal p1 is already accepted", "p1", "accepted"));

      expect(error.code).toBe("CONFLICT");
      expect(error.details).toEqual({ proposal_id: "p1", status: "accepted" });
    });

    it("maps collaborator failures to UPSTREAM_FAILED without leaking keys", () => {
      const error = toErrorV1(
        new ExternalServiceError("Embedding failed with key sk-test-secret-123", "embeddings", "embed")
      );

      expect(error).toEqual({
        schema: "error.v1",
        code: "UPSTREAM_FAILED",
        message: "Embedding failed with key [KEY_REDACTED]",
        details: { service: "embeddings", operation: "embed" },
      });
      expect(toErrorV1(new MalformedResponseError("No JSON", "document_qa")).code).toBe("UPSTREAM_FAILED");
    });

    it("maps configuration problems to MISCONFIGURED", () => {
      const error = toErrorV1(new ConfigurationError("Weights must sum to 1", { sum: 1.2 }));

      expect(error.code).toBe("MISCONFIGURED");
      expect(error.details).toEqual({ sum: 1.2 });
    });

    it("maps status-coded errors", () => {
      const limited = Object.assign(new Error("Rate limit exceeded"), { statusCode: 429 });
      const tooLarge = Object.assign(new Error("Request body is too large"), { statusCode: 413 });

      expect(toErrorV1(limited)).toMatchObject({ code: "RATE_LIMITED", message: "Too many requests" });
      expect(toErrorV1(tooLarge)).toMatchObject({ code: "BAD_INPUT", message: "Request body is too large" });
    });

    it("sanitizes internal errors", () => {
      expect(toErrorV1(new Error("API_KEY=placeholder failed")).message).toBe("[KEY_REDACTED] failed");
      expect(toErrorV1(new Error("Failed at /srv/app/data/results.json")).message).toBe("Failed at [path]");
    });

    it("handles non-Error values", () => {
      expect(toErrorV1("String error message")).toMatchObject({ code: "INTERNAL", message: "String error message" });
      expect(toErrorV1(null).message).toBe("An unexpected error occurred");
      expect(toErrorV1(zodError()).code).toBe("BAD_INPUT");
    });
  });

  describe("getStatusCodeForErrorCode", () => {
    it.each<[ErrorCode, number]>([
      ["BAD_INPUT", 400],
      ["NOT_FOUND", 404],
      ["CONFLICT", 409],
      ["RATE_LIMITED", 429],
      ["UPSTREAM_FAILED", 502],
      ["MISCONFIGURED", 500],
      ["INTERNAL", 500],
    ])("maps %s to %i", (code, status) => {
      expect(getStatusCodeForErrorCode(code)).toBe(status);
    });
  });
});
