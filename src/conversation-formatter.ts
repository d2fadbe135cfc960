// Voice Relay - Conversation Formatter
// Turns a bounded window of session history plus the new user utterance into
// a single prompt string for the language model.

import type { Message } from "./types.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_HISTORY_WINDOW = 6;

export const SYSTEM_PREAMBLE =
  "You are a helpful AI assistant. Please provide clear, concise, and friendly responses. " +
  "Keep your responses conversational and not too lengthy since they will be converted to speech.";

export interface FormatOptions {
  /** Number of most recent messages to include. Older turns are dropped, not summarized. */
  historyWindow?: number;
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

function isMessage(value: unknown): value is Message {
  if (typeof value !== "object" || value === null) return false;
  if (!("role" in value) || !("content" in value)) return false;
  return (value.role === "user" || value.role === "assistant") && typeof value.content === "string";
}

export function minimalPrompt(newMessage: string): string {
  return `User: ${newMessage}\n\nAssistant:`;
}

// ─── formatConversation ─────────────────────────────────────────────────────────

/**
 * Build the LLM prompt.
 *
 * History may come from an external store, so it is validated here rather
 * than trusted. Any malformed entry collapses the prompt to the minimal
 * one-line form; this function never throws.
 */
export function formatConversation(
  history: readonly Message[],
  newMessage: string,
  options: FormatOptions = {},
): string {
  const windowSize = Math.max(0, Math.floor(options.historyWindow ?? DEFAULT_HISTORY_WINDOW));

  if (!Array.isArray(history) || !history.every(isMessage)) {
    return minimalPrompt(newMessage);
  }

  let prompt = `${SYSTEM_PREAMBLE}\n\n`;

  const recent = windowSize > 0 ? history.slice(-windowSize) : [];
  if (recent.length > 0) {
    prompt += "Previous conversation:\n";
    for (const message of recent) {
      const speaker = message.role === "user" ? "User" : "Assistant";
      prompt += `${speaker}: ${message.content}\n`;
    }
    prompt += "\n";
  }

  prompt += minimalPrompt(newMessage);
  return prompt;
}
