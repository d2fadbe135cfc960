// Voice Relay - Configuration
// Reads the process environment (populated from .env by dotenv in the entry
// point) into a typed AppConfig. Missing provider credentials are allowed:
// the affected stage reports api_unavailable instead of the process exiting.

import { DEFAULT_AUDIO_CACHE_SIZE } from "./audio-cache.js";
import { DEFAULT_HISTORY_WINDOW } from "./conversation-formatter.js";
import { DEFAULT_TTS_URL } from "./providers/http-tts.js";
import { DEFAULT_LLM_MODEL } from "./reply-stage.js";
import { DEFAULT_RETRY_POLICY, MAX_TIMER_MS, type RetryPolicy } from "./stage-runner.js";
import { DEFAULT_VOICE_ID } from "./synthesis-stage.js";

export type SttProviderName = "deepgram" | "openai";
export type TtsProviderName = "murf" | "openai";

export interface AppConfig {
  port: number;
  publicBaseUrl: string;
  stt: {
    provider: SttProviderName;
    deepgramApiKey: string | undefined;
    deepgramModel: string;
    openaiModel: string;
  };
  llm: {
    model: string;
  };
  tts: {
    provider: TtsProviderName;
    backupProvider: TtsProviderName | null;
    murfApiKey: string | undefined;
    murfUrl: string;
    voiceId: string;
    openaiModel: string;
    openaiVoice: string;
  };
  openaiApiKey: string | undefined;
  pipeline: RetryPolicy & { historyWindow: number };
  maxUploadBytes: number;
  audioCacheSize: number;
}

// ─── Parsing helpers ────────────────────────────────────────────────────────────

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;
  if (!/^-?\d+$/.test(raw)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min) {
    throw new Error(`${name} must be >= ${min}, got ${value}`);
  }
  if (value > max) {
    throw new Error(`${name} must be <= ${max}, got ${value}`);
  }
  return value;
}

function readChoice<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T;
function readChoice<T extends string>(env: Env, name: string, choices: readonly T[], fallback: null): T | null;
function readChoice<T extends string>(
  env: Env,
  name: string,
  choices: readonly T[],
  fallback: T | null,
): T | null {
  const raw = readString(env, name)?.toLowerCase();
  if (raw === undefined) return fallback;
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new Error(`${name} must be one of ${choices.join(", ")}, got "${raw}"`);
  }
  return match;
}

// ─── loadConfig ─────────────────────────────────────────────────────────────────

/**
 * @throws Error naming the variable when a numeric or enum value is invalid.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const port = readInt(env, "PORT", 3000, 0);
  const sttProviders = ["deepgram", "openai"] as const;
  const ttsProviders = ["murf", "openai"] as const;

  return {
    port,
    publicBaseUrl: readString(env, "PUBLIC_BASE_URL") ?? "",
    stt: {
      provider: readChoice(env, "STT_PROVIDER", sttProviders, "deepgram"),
      deepgramApiKey: readString(env, "DEEPGRAM_API_KEY"),
      deepgramModel: readString(env, "DEEPGRAM_MODEL") ?? "nova-2",
      openaiModel: readString(env, "OPENAI_TRANSCRIBE_MODEL") ?? "gpt-4o-transcribe",
    },
    llm: {
      model: readString(env, "LLM_MODEL") ?? DEFAULT_LLM_MODEL,
    },
    tts: {
      provider: readChoice(env, "TTS_PROVIDER", ttsProviders, "murf"),
      backupProvider: readChoice(env, "TTS_BACKUP_PROVIDER", ttsProviders, null),
      murfApiKey: readString(env, "MURF_API_KEY"),
      murfUrl: readString(env, "MURF_API_URL") ?? DEFAULT_TTS_URL,
      voiceId: readString(env, "TTS_VOICE_ID") ?? DEFAULT_VOICE_ID,
      openaiModel: readString(env, "OPENAI_TTS_MODEL") ?? "tts-1",
      openaiVoice: readString(env, "OPENAI_TTS_VOICE") ?? "nova",
    },
    openaiApiKey: readString(env, "OPENAI_API_KEY"),
    pipeline: {
      maxRetries: readInt(env, "PIPELINE_MAX_RETRIES", DEFAULT_RETRY_POLICY.maxRetries, 0),
      backoffMs: readInt(env, "PIPELINE_RETRY_BACKOFF_MS", DEFAULT_RETRY_POLICY.backoffMs, 0, MAX_TIMER_MS),
      timeoutMs: readInt(env, "PROVIDER_TIMEOUT_MS", DEFAULT_RETRY_POLICY.timeoutMs, 1, MAX_TIMER_MS),
      historyWindow: readInt(env, "HISTORY_WINDOW", DEFAULT_HISTORY_WINDOW, 0),
    },
    maxUploadBytes: readInt(env, "MAX_UPLOAD_MB", 25, 1) * 1024 * 1024,
    audioCacheSize: readInt(env, "AUDIO_CACHE_SIZE", DEFAULT_AUDIO_CACHE_SIZE, 1),
  };
}
