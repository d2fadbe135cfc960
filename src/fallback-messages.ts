// Voice Relay - Fallback message catalog
// User-facing text substituted when a stage cannot produce its real output.
// These strings are part of the API contract; clients match on them.

import type { ReasonCode } from "./types.js";

export const FALLBACK_MESSAGES: Readonly<Record<ReasonCode, string>> = {
  stt_error: "I'm having trouble hearing you right now. Could you please try again?",
  empty_transcription: "No speech detected in the audio file",
  llm_error:
    "I'm having trouble processing your request at the moment. Please try again in a few moments.",
  tts_error:
    "I understand your question but I'm having trouble speaking right now. Please check back soon.",
  api_unavailable:
    "Some of my services are temporarily unavailable. I apologize for the inconvenience.",
  general_error: "Something unexpected went wrong on my end. Please try again.",
  invalid_request: "I didn't receive any audio. Please record your message and try again.",
};

/** Short operator-facing descriptions used in the `error` field of responses. */
export const ERROR_SUMMARIES: Readonly<Record<ReasonCode, string>> = {
  stt_error: "Speech-to-text failed",
  empty_transcription: "No speech detected",
  llm_error: "Language model failed",
  tts_error: "Text-to-speech failed",
  api_unavailable: "Required service is not configured",
  general_error: "Unexpected internal error",
  invalid_request: "Invalid request",
};

export function fallbackMessageFor(reason: ReasonCode): string {
  return FALLBACK_MESSAGES[reason];
}
