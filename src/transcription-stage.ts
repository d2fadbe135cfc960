// Voice Relay - Transcription Stage
// Wraps the speech-to-text provider in the shared retry-with-classification
// runner.
//
// A provider that answers successfully with no text is reporting silence or
// noise, not a fault, so it ends the stage at once with empty_transcription
// instead of consuming the retry budget.

import { createConsoleLogger, type Logger } from "./logger.js";
import type { SpeechToTextProvider, TranscriptionResponse } from "./providers/types.js";
import {
  DEFAULT_RETRY_POLICY,
  runClassifiedStage,
  type AttemptVerdict,
  type RetryPolicy,
} from "./stage-runner.js";
import type { AudioInput, StageOutcome } from "./types.js";

export interface TranscriptionStageOptions {
  policy?: Partial<RetryPolicy>;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export function classifyTranscription(response: TranscriptionResponse): AttemptVerdict<string> {
  if (response.status === "error") {
    return { kind: "retry", detail: `provider reported error: ${response.error ?? "unknown"}` };
  }
  if (typeof response.text !== "string") {
    return { kind: "retry", detail: "provider returned no transcript field" };
  }
  const text = response.text.trim();
  if (text.length === 0) {
    return { kind: "stop", reason: "empty_transcription", detail: "transcript is empty" };
  }
  return { kind: "accept", value: text };
}

export class TranscriptionStage {
  private readonly provider: SpeechToTextProvider;
  private readonly policy: RetryPolicy;
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(provider: SpeechToTextProvider, options: TranscriptionStageOptions = {}) {
    this.provider = provider;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
    this.logger = options.logger ?? createConsoleLogger("TranscriptionStage");
    this.sleep = options.sleep;
  }

  get providerName(): string {
    return this.provider.name;
  }

  isAvailable(): boolean {
    return this.provider.isConfigured();
  }

  /**
   * Transcribe one recording. Each attempt receives its own copy of the
   * audio bytes, so a provider that drains or mutates its input cannot
   * affect the next attempt.
   */
  async run(audio: AudioInput): Promise<StageOutcome<string>> {
    this.logger.info(
      `Transcribing ${audio.data.length} bytes (${audio.mimeType}) via ${this.provider.name}`,
    );

    return runClassifiedStage({
      stage: "transcription",
      available: this.provider.isConfigured(),
      failureReason: "stt_error",
      policy: this.policy,
      logger: this.logger,
      sleep: this.sleep,
      call: (signal) =>
        this.provider.transcribe({
          audio: Buffer.from(audio.data),
          filename: audio.filename,
          mimeType: audio.mimeType,
          signal,
        }),
      classify: classifyTranscription,
    });
  }
}
