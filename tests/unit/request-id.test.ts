import { describe, it, expect } from "vitest";
import { generateRequestId, getOrGenerateRequestId, REQUEST_ID_HEADER_LOWER } from "../../src/utils/request-id.js";

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe("request id", () => {
  it("generates UUID v4 values", () => {
    expect(generateRequestId()).toMatch(UUID_V4);
    expect(generateRequestId()).not.toBe(generateRequestId());
  });

  it("reuses a trimmed incoming header", () => {
    expect(getOrGenerateRequestId({ headers: { [REQUEST_ID_HEADER_LOWER]: "  req-abc  " } })).toBe("req-abc");
  });

  it("generates when the header is missing or blank", () => {
    expect(getOrGenerateRequestId({ headers: {} })).toMatch(UUID_V4);
    expect(getOrGenerateRequestId({ headers: { [REQUEST_ID_HEADER_LOWER]: "   " } })).toMatch(UUID_V4);
  });
});
