// Voice Relay - Provider contracts
// The narrow interfaces the stages call. Concrete adapters for Deepgram,
// OpenAI and JSON-over-HTTP speech services live beside this file; tests
// substitute plain objects.

// ─── Speech-to-text ─────────────────────────────────────────────────────────────

export interface TranscriptionRequest {
  audio: Buffer;
  filename: string;
  mimeType: string;
  signal?: AbortSignal;
}

export interface TranscriptionResponse {
  status: "ok" | "error";
  text: string;
  confidence?: number;
  /** Provider-reported failure detail when status is "error". */
  error?: string;
}

export interface SpeechToTextProvider {
  readonly name: string;
  /** False when the credential needed to call the provider is missing. */
  isConfigured(): boolean;
  transcribe(request: TranscriptionRequest): Promise<TranscriptionResponse>;
}

// ─── Language model ─────────────────────────────────────────────────────────────

export interface CompletionRequest {
  prompt: string;
  model: string;
  /** When false the provider should skip extended/chain-of-thought reasoning. */
  extendedReasoning: boolean;
  signal?: AbortSignal;
}

export interface LanguageModelProvider {
  readonly name: string;
  isConfigured(): boolean;
  complete(request: CompletionRequest): Promise<string>;
}

// ─── Text-to-speech ─────────────────────────────────────────────────────────────

export interface SynthesisRequest {
  text: string;
  voiceId: string;
  signal?: AbortSignal;
}

export interface SynthesisResponse {
  statusCode: number;
  /** URL of the generated audio. Missing means the call produced nothing usable. */
  audioFile?: string;
  /** Response body excerpt for diagnostics on non-200 responses. */
  detail?: string;
}

export interface TextToSpeechProvider {
  readonly name: string;
  isConfigured(): boolean;
  synthesize(request: SynthesisRequest): Promise<SynthesisResponse>;
}
