// Voice Relay - OpenAI speech synthesis adapter
// OpenAI returns raw audio bytes rather than a URL, so the bytes go into the
// in-process AudioCache and the adapter reports the cache's serving URL.

import type { AudioCache } from "../audio-cache.js";
import type { SynthesisRequest, SynthesisResponse, TextToSpeechProvider } from "./types.js";

export const OPENAI_VOICES = new Set([
  "alloy",
  "ash",
  "coral",
  "echo",
  "fable",
  "nova",
  "onyx",
  "sage",
  "shimmer",
]);

/**
 * Minimal interface for the OpenAI audio speech API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAITTSClient {
  audio: {
    speech: {
      create(
        params: {
          model: string;
          voice: string;
          input: string;
        },
        options?: { signal?: AbortSignal },
      ): Promise<Response>;
    };
  };
}

export interface OpenAISpeechSynthesisOptions {
  model?: string;
  /** Used when the requested voice id is not an OpenAI voice. */
  defaultVoice?: string;
  /** Prefix for served audio URLs, e.g. "http://localhost:3000". */
  publicBaseUrl?: string;
}

export class OpenAISpeechSynthesis implements TextToSpeechProvider {
  readonly name = "openai-tts";
  private readonly client: OpenAITTSClient | null;
  private readonly cache: AudioCache;
  private readonly model: string;
  private readonly defaultVoice: string;
  private readonly publicBaseUrl: string;

  constructor(client: OpenAITTSClient | null, cache: AudioCache, options: OpenAISpeechSynthesisOptions = {}) {
    this.client = client;
    this.cache = cache;
    this.model = options.model ?? "tts-1";
    this.defaultVoice = options.defaultVoice ?? "nova";
    this.publicBaseUrl = (options.publicBaseUrl ?? "").replace(/\/+$/, "");
  }

  isConfigured(): boolean {
    return this.client !== null;
  }

  async synthesize(request: SynthesisRequest): Promise<SynthesisResponse> {
    if (!this.client) {
      throw new Error("OpenAI client not configured");
    }

    const voice = OPENAI_VOICES.has(request.voiceId) ? request.voiceId : this.defaultVoice;
    const response = await this.client.audio.speech.create(
      { model: this.model, voice, input: request.text },
      { signal: request.signal },
    );

    const audio = Buffer.from(await response.arrayBuffer());
    if (audio.length === 0) {
      return { statusCode: 200 };
    }

    const id = this.cache.put(audio, "audio/mpeg");
    return { statusCode: 200, audioFile: `${this.publicBaseUrl}/audio/${id}` };
  }
}
