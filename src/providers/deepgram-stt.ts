// Voice Relay - Deepgram prerecorded transcription adapter

import type {
  SpeechToTextProvider,
  TranscriptionRequest,
  TranscriptionResponse,
} from "./types.js";

// ─── Deepgram client interface (for testability / dependency injection) ─────────

/**
 * Shape of a prerecorded transcription result. Mirrors the parts of the
 * SDK's SyncPrerecordedResponse we read, defined locally to avoid tight
 * coupling with SDK internals.
 */
export interface DeepgramPrerecordedResult {
  results: {
    channels: Array<{
      alternatives: Array<{
        transcript: string;
        confidence: number;
      }>;
    }>;
  };
}

/**
 * Minimal interface for `deepgram.listen.prerecorded.transcribeFile()`.
 * The SDK reports failures in the `error` field rather than by throwing.
 */
export interface DeepgramPrerecordedClient {
  listen: {
    prerecorded: {
      transcribeFile(
        source: Buffer,
        options?: {
          model?: string;
          language?: string;
          smart_format?: boolean;
          punctuate?: boolean;
          mimetype?: string;
        },
      ): Promise<{
        result: DeepgramPrerecordedResult | null;
        error: { message: string } | null;
      }>;
    };
  };
}

export interface DeepgramSpeechToTextOptions {
  model?: string;
  language?: string;
}

export class DeepgramSpeechToText implements SpeechToTextProvider {
  readonly name = "deepgram";
  private readonly client: DeepgramPrerecordedClient | null;
  private readonly model: string;
  private readonly language: string;

  /** @param client `null` when no API key is configured. */
  constructor(client: DeepgramPrerecordedClient | null, options: DeepgramSpeechToTextOptions = {}) {
    this.client = client;
    this.model = options.model ?? "nova-2";
    this.language = options.language ?? "en";
  }

  isConfigured(): boolean {
    return this.client !== null;
  }

  async transcribe(request: TranscriptionRequest): Promise<TranscriptionResponse> {
    if (!this.client) {
      throw new Error("Deepgram client not configured");
    }

    const { result, error } = await this.client.listen.prerecorded.transcribeFile(request.audio, {
      model: this.model,
      language: this.language,
      smart_format: true,
      punctuate: true,
      mimetype: request.mimeType,
    });

    if (error || !result) {
      return { status: "error", text: "", error: error?.message ?? "empty response" };
    }

    // Silence comes back as an alternative with an empty transcript. A response
    // without any alternative is malformed and worth another attempt.
    const alternative = result.results?.channels?.[0]?.alternatives?.[0];
    if (!alternative) {
      return { status: "error", text: "", error: "no transcript alternatives in response" };
    }
    return {
      status: "ok",
      text: alternative.transcript ?? "",
      confidence: alternative.confidence,
    };
  }
}
