// Voice Relay - OpenAI audio transcription adapter

import type {
  SpeechToTextProvider,
  TranscriptionRequest,
  TranscriptionResponse,
} from "./types.js";

// ─── OpenAI transcription client interface (for testability / dependency injection) ──

/**
 * Minimal interface for the OpenAI audio transcriptions API surface we use.
 * Mirrors `audio.transcriptions.create()` with the JSON response format,
 * which every transcription model supports.
 */
export interface OpenAITranscriptionClient {
  audio: {
    transcriptions: {
      create(
        params: {
          file: File;
          model: string;
          response_format?: "json";
          language?: string;
        },
        options?: { signal?: AbortSignal },
      ): Promise<{ text: string }>;
    };
  };
}

export interface OpenAISpeechToTextOptions {
  model?: string;
  language?: string;
}

export class OpenAISpeechToText implements SpeechToTextProvider {
  readonly name = "openai-transcribe";
  private readonly client: OpenAITranscriptionClient | null;
  private readonly model: string;
  private readonly language: string;

  constructor(client: OpenAITranscriptionClient | null, options: OpenAISpeechToTextOptions = {}) {
    this.client = client;
    this.model = options.model ?? "gpt-4o-transcribe";
    this.language = options.language ?? "en";
  }

  isConfigured(): boolean {
    return this.client !== null;
  }

  async transcribe(request: TranscriptionRequest): Promise<TranscriptionResponse> {
    if (!this.client) {
      throw new Error("OpenAI client not configured");
    }

    // Wrap the bytes as a File; the SDK needs a filename to infer the format.
    const audioFile = new File([request.audio], request.filename, { type: request.mimeType });

    const response = await this.client.audio.transcriptions.create(
      {
        file: audioFile,
        model: this.model,
        language: this.language,
        response_format: "json",
      },
      { signal: request.signal },
    );

    return { status: "ok", text: response.text ?? "" };
  }
}
