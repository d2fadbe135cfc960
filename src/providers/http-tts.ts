// Voice Relay - JSON-over-HTTP speech synthesis adapter
// Talks to a Murf-style endpoint: POST {text, voice_id} with an `api-key`
// header, answered by a JSON body whose `audioFile` field is the audio URL.

import type { SynthesisRequest, SynthesisResponse, TextToSpeechProvider } from "./types.js";

export const DEFAULT_TTS_URL = "https://api.murf.ai/v1/speech/generate";

/** Max characters of an error body kept for diagnostics. */
const ERROR_PREVIEW_LENGTH = 300;

export interface HttpSpeechSynthesisOptions {
  apiKey?: string;
  url?: string;
  /** Injected for tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch;
}

export class HttpSpeechSynthesis implements TextToSpeechProvider {
  readonly name = "murf";
  private readonly apiKey: string;
  private readonly url: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpSpeechSynthesisOptions = {}) {
    this.apiKey = options.apiKey ?? "";
    this.url = options.url ?? DEFAULT_TTS_URL;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async synthesize(request: SynthesisRequest): Promise<SynthesisResponse> {
    const response = await this.fetchImpl(this.url, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        "api-key": this.apiKey,
      },
      body: JSON.stringify({ text: request.text, voice_id: request.voiceId }),
      signal: request.signal,
    });

    if (response.status !== 200) {
      const body = await response.text();
      const detail = body.length > ERROR_PREVIEW_LENGTH ? `${body.slice(0, ERROR_PREVIEW_LENGTH)}...` : body;
      return { statusCode: response.status, detail };
    }

    const data: unknown = await response.json();
    const audioFile =
      typeof data === "object" && data !== null && "audioFile" in data && typeof data.audioFile === "string"
        ? data.audioFile
        : undefined;

    return { statusCode: response.status, audioFile };
  }
}
