// Voice Relay - Shared TypeScript interfaces and types
//
// Session history, stage outcomes, and the response payload assembled by
// the pipeline. Runtime helpers live in their own modules to keep this file
// a pure type barrel.

// ─── Conversation History ───────────────────────────────────────────────────────

export type MessageRole = "user" | "assistant";

export interface Message {
  readonly role: MessageRole;
  readonly content: string;
}

export interface SessionHistory {
  messages: readonly Message[];
  /** True when the store has never seen this session id. */
  isNew: boolean;
}

export interface SessionSummary {
  sessionId: string;
  messageCount: number;
  lastMessagePreview: string | null;
}

// ─── Reason Codes ───────────────────────────────────────────────────────────────

export type StageFailureCode = "stt_error" | "llm_error" | "tts_error";

export type ReasonCode =
  | "api_unavailable"
  | StageFailureCode
  | "empty_transcription"
  | "general_error"
  | "invalid_request";

export type StageName = "transcription" | "reply" | "synthesis";

// ─── Stage Outcome ──────────────────────────────────────────────────────────────

/**
 * Tri-state result of one provider-backed stage.
 * `attempts` counts provider calls actually made (0 when short-circuited).
 */
export type StageOutcome<T> =
  | { kind: "success"; value: T; attempts: number }
  | { kind: "degraded"; value: T; reason: ReasonCode; attempts: number }
  | { kind: "fatal"; reason: ReasonCode; fallbackMessage: string; attempts: number };

// ─── Pipeline State Machine ─────────────────────────────────────────────────────

export enum PipelineState {
  START = "start",
  TRANSCRIBING = "transcribing",
  REPLYING = "replying",
  SYNTHESIZING = "synthesizing",
  DONE = "done",
}

// ─── Pipeline Result (wire format) ──────────────────────────────────────────────

export type PipelineStatus = "success" | "partial_success" | "error";

export type PipelineStatusCode = 200 | 206 | 500 | 503;

export interface PipelineResult {
  status: PipelineStatus;
  session_id: string;
  transcription?: string;
  ai_response?: string;
  audio_url: string | null;
  message_count: number;
  /** Human-readable summary, present when status is not "success". */
  error?: string;
  error_type?: ReasonCode;
  fallback_message?: string;
  /** Set on partial_success when speech synthesis failed. */
  tts_failed?: boolean;
  /** Reason codes of stages that fell back to a degraded value. */
  warnings?: ReasonCode[];
}

export interface PipelineResponse {
  statusCode: PipelineStatusCode;
  body: PipelineResult;
}

export interface SpeechResult {
  status: "success" | "error";
  audio_url: string | null;
  error?: string;
  error_type?: ReasonCode;
  fallback_message?: string;
}

export interface SpeechResponse {
  statusCode: 200 | 500 | 503;
  body: SpeechResult;
}

// ─── Audio Input ────────────────────────────────────────────────────────────────

export interface AudioInput {
  data: Buffer;
  filename: string;
  mimeType: string;
}

export interface ProviderStatus {
  speech_to_text: boolean;
  language_model: boolean;
  text_to_speech: boolean;
}
