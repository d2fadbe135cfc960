import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";
import { DEFAULT_TTS_URL } from "./providers/http-tts.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.stt.provider).toBe("deepgram");
    expect(config.stt.deepgramApiKey).toBeUndefined();
    expect(config.llm.model).toBe("gpt-4o-mini");
    expect(config.tts).toMatchObject({
      provider: "murf",
      backupProvider: null,
      murfUrl: DEFAULT_TTS_URL,
      voiceId: "en-US-natalie",
    });
    expect(config.pipeline).toEqual({ maxRetries: 2, backoffMs: 0, timeoutMs: 30_000, historyWindow: 6 });
    expect(config.maxUploadBytes).toBe(25 * 1024 * 1024);
    expect(config.audioCacheSize).toBe(100);
  });

  it("reads provider choices case-insensitively and trims keys", () => {
    const config = loadConfig({
      STT_PROVIDER: "OpenAI",
      TTS_PROVIDER: "openai",
      TTS_BACKUP_PROVIDER: "murf",
      OPENAI_API_KEY: "  test-secret  ",
      MURF_API_KEY: "test-murf-key",
    });

    expect(config.stt.provider).toBe("openai");
    expect(config.tts.provider).toBe("openai");
    expect(config.tts.backupProvider).toBe("murf");
    expect(config.openaiApiKey).toBe("test-secret");
    expect(config.tts.murfApiKey).toBe("test-murf-key");
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ DEEPGRAM_API_KEY: "   ", PORT: "" });
    expect(config.stt.deepgramApiKey).toBeUndefined();
    expect(config.port).toBe(3000);
  });

  it("parses the retry policy and limits", () => {
    const config = loadConfig({
      PIPELINE_MAX_RETRIES: "0",
      PIPELINE_RETRY_BACKOFF_MS: "250",
      PROVIDER_TIMEOUT_MS: "5000",
      HISTORY_WINDOW: "10",
      MAX_UPLOAD_MB: "2",
      AUDIO_CACHE_SIZE: "7",
    });

    expect(config.pipeline).toEqual({ maxRetries: 0, backoffMs: 250, timeoutMs: 5000, historyWindow: 10 });
    expect(config.maxUploadBytes).toBe(2 * 1024 * 1024);
    expect(config.audioCacheSize).toBe(7);
  });

  it("names the variable when a number is invalid", () => {
    expect(() => loadConfig({ PIPELINE_MAX_RETRIES: "two" })).toThrow(
      'PIPELINE_MAX_RETRIES must be an integer, got "two"',
    );
    expect(() => loadConfig({ PIPELINE_MAX_RETRIES: "-1" })).toThrow("PIPELINE_MAX_RETRIES must be >= 0, got -1");
  });

  it("rejects a provider timeout beyond what a timer can hold", () => {
    expect(() => loadConfig({ PROVIDER_TIMEOUT_MS: "3000000000" })).toThrow(
      "PROVIDER_TIMEOUT_MS must be <= 2147483647, got 3000000000",
    );
    expect(loadConfig({ PROVIDER_TIMEOUT_MS: "2147483647" }).pipeline.timeoutMs).toBe(2_147_483_647);
  });

  it("rejects unknown providers", () => {
    expect(() => loadConfig({ TTS_PROVIDER: "polly" })).toThrow('TTS_PROVIDER must be one of murf, openai, got "polly"');
  });
});
