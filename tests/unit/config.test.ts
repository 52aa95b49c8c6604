/**
 * Configuration Module Tests
 *
 * The config is parsed lazily from the environment; the setup file resets
 * the cache before every test so stubs take effect.
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { config, _resetConfigCache } from "../../src/config/index.js";
import { buildAlignmentSettings } from "../../src/config/alignment.js";
import { DEFAULT_ALIGNMENT_SETTINGS } from "../../src/alignment/settings.js";

describe("Configuration Module", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    _resetConfigCache();
  });

  it("applies defaults", () => {
    expect(config.server.port).toBe(3000);
    expect(config.llm.provider).toBe("openai");
    expect(config.llm.model).toBe("gpt-4o-mini");
    expect(config.embeddings.model).toBe("text-embedding-3-large");
    expect(config.alignment.insights).toBe("rules");
    expect(config.storage.dataDir).toBe("data");
  });

  it("coerces numbers and booleans", () => {
    vi.stubEnv("PORT", "8080");
    vi.stubEnv("ALIGNMENT_TOP_K", "8");
    vi.stubEnv("STORAGE_BACKUP_ENABLED", "true");

    expect(config.server.port).toBe(8080);
    expect(config.alignment.topK).toBe(8);
    expect(config.storage.backupEnabled).toBe(true);
  });

  it("splits allowed origins", () => {
    vi.stubEnv("ALLOWED_ORIGINS", "https://a.example, https://b.example,");
    expect(config.server.allowedOrigins).toEqual(["https://a.example", "https://b.example"]);
  });

  it("rejects out-of-range values", () => {
    vi.stubEnv("ALIGNMENT_SIMILARITY_THRESHOLD", "1.5");
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => undefined);

    expect(() => config.alignment).toThrow("Invalid configuration. Please check environment variables.");
    errorLog.mockRestore();
  });

  it("rejects an unknown provider", () => {
    vi.stubEnv("LLM_PROVIDER", "other");
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => undefined);

    expect(() => config.llm).toThrow("Invalid configuration");
    errorLog.mockRestore();
  });

  it("builds alignment settings matching the documented defaults", () => {
    expect(buildAlignmentSettings(config)).toEqual(DEFAULT_ALIGNMENT_SETTINGS);
  });

  it("passes overrides through to alignment settings", () => {
    vi.stubEnv("ALIGNMENT_EMBEDDING_WEIGHT", "0.5");
    vi.stubEnv("ALIGNMENT_ENTITY_WEIGHT", "0.5");

    const settings = buildAlignmentSettings(config);
    expect(settings.embeddingWeight).toBe(0.5);
    expect(settings.entityWeight).toBe(0.5);
  });
});
