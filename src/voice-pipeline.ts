// Voice Relay - Pipeline Orchestrator
// Sequences transcription → reply → synthesis for one request, decides at
// each stage boundary whether to continue, degrade or stop, and assembles the
// response.
//
//   START → TRANSCRIBING → REPLYING → SYNTHESIZING → DONE
//
// Any fatal outcome exits straight to DONE. The user's message is recorded
// before the reply stage runs, so a failed reply still leaves the user's turn
// in history. A synthesis failure is not a pipeline failure: the text is
// already recorded and is returned as partial_success.

import { ERROR_SUMMARIES, FALLBACK_MESSAGES } from "./fallback-messages.js";
import { createConsoleLogger, errorMessage, type Logger } from "./logger.js";
import type { ReplyStage } from "./reply-stage.js";
import type { SessionStore } from "./session-store.js";
import type { SynthesisStage } from "./synthesis-stage.js";
import type { TranscriptionStage } from "./transcription-stage.js";
import {
  PipelineState,
  type AudioInput,
  type PipelineResponse,
  type PipelineResult,
  type PipelineStatusCode,
  type ProviderStatus,
  type ReasonCode,
  type SpeechResponse,
} from "./types.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface VoicePipelineDeps {
  sessionStore: SessionStore;
  transcription: TranscriptionStage;
  reply: ReplyStage;
  synthesis: SynthesisStage;
  logger?: Logger;
}

export interface PipelineRequest {
  sessionId: string;
  audio: AudioInput;
}

type ResultExtras = Pick<PipelineResult, "transcription" | "ai_response" | "warnings">;

export class VoicePipeline {
  private readonly deps: VoicePipelineDeps;
  private readonly logger: Logger;

  constructor(deps: VoicePipelineDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createConsoleLogger("VoicePipeline");
  }

  get sessionStore(): SessionStore {
    return this.deps.sessionStore;
  }

  providerStatus(): ProviderStatus {
    return {
      speech_to_text: this.deps.transcription.isAvailable(),
      language_model: this.deps.reply.isAvailable(),
      text_to_speech: this.deps.synthesis.isAvailable(),
    };
  }

  // ── handle ─────────────────────────────────────────────────────────────────

  /**
   * Runs the full pipeline for one recording. Never rejects: unexpected
   * defects become a 500 general_error response.
   */
  async handle(request: PipelineRequest): Promise<PipelineResponse> {
    const { sessionId, audio } = request;
    const store = this.deps.sessionStore;
    const warnings: ReasonCode[] = [];
    let state = PipelineState.START;
    let messageCount = 0;

    const enter = (next: PipelineState) => {
      this.logger.debug?.(`Session ${sessionId}: ${state} → ${next}`);
      state = next;
    };

    try {
      messageCount = (await store.get(sessionId)).messages.length;

      // ── TRANSCRIBING ──
      enter(PipelineState.TRANSCRIBING);
      const heard = await this.deps.transcription.run(audio);
      if (heard.kind === "fatal") {
        enter(PipelineState.DONE);
        return this.failure(503, sessionId, heard.reason, heard.fallbackMessage, messageCount, {});
      }
      if (heard.kind === "degraded") warnings.push(heard.reason);
      const transcription = heard.value;

      // ── REPLYING ──
      enter(PipelineState.REPLYING);
      const history = await store.getOrCreate(sessionId);
      messageCount = await store.append(sessionId, "user", transcription);

      const replied = await this.deps.reply.run(history, transcription);
      if (replied.kind === "fatal") {
        enter(PipelineState.DONE);
        return this.failure(503, sessionId, replied.reason, replied.fallbackMessage, messageCount, {
          transcription,
        });
      }
      if (replied.kind === "degraded") warnings.push(replied.reason);
      const aiResponse = replied.value;
      messageCount = await store.append(sessionId, "assistant", aiResponse);

      // ── SYNTHESIZING ──
      enter(PipelineState.SYNTHESIZING);
      const spoken = await this.deps.synthesis.run(aiResponse);
      enter(PipelineState.DONE);

      switch (spoken.kind) {
        case "success":
        case "degraded": {
          if (spoken.kind === "degraded") warnings.push(spoken.reason);
          this.logger.info(`Session ${sessionId}: success (${messageCount} messages)`);
          return {
            statusCode: 200,
            body: {
              status: "success",
              session_id: sessionId,
              transcription,
              ai_response: aiResponse,
              audio_url: spoken.value,
              message_count: messageCount,
              ...(warnings.length > 0 ? { warnings } : {}),
            },
          };
        }
        case "fatal": {
          this.logger.warn(`Session ${sessionId}: speech synthesis failed (${spoken.reason}), returning text only`);
          return {
            statusCode: 206,
            body: {
              status: "partial_success",
              session_id: sessionId,
              transcription,
              ai_response: aiResponse,
              audio_url: null,
              message_count: messageCount,
              tts_failed: true,
              error: ERROR_SUMMARIES[spoken.reason],
              error_type: spoken.reason,
              fallback_message: spoken.fallbackMessage,
              ...(warnings.length > 0 ? { warnings } : {}),
            },
          };
        }
        default: {
          const exhaustiveCheck: never = spoken;
          throw new Error(`Unhandled synthesis outcome: ${JSON.stringify(exhaustiveCheck)}`);
        }
      }
    } catch (err) {
      this.logger.error(`Session ${sessionId}: unexpected error in ${state} state: ${errorMessage(err)}`);
      return this.failure(500, sessionId, "general_error", FALLBACK_MESSAGES.general_error, messageCount, {});
    }
  }

  // ── speak ──────────────────────────────────────────────────────────────────

  /** Standalone synthesis for arbitrary text, outside any session. */
  async speak(text: string, voiceId?: string): Promise<SpeechResponse> {
    try {
      const outcome = await this.deps.synthesis.run(text, { voiceId });
      if (outcome.kind === "fatal") {
        return {
          statusCode: 503,
          body: {
            status: "error",
            audio_url: null,
            error: ERROR_SUMMARIES[outcome.reason],
            error_type: outcome.reason,
            fallback_message: outcome.fallbackMessage,
          },
        };
      }
      return { statusCode: 200, body: { status: "success", audio_url: outcome.value } };
    } catch (err) {
      this.logger.error(`Standalone synthesis failed unexpectedly: ${errorMessage(err)}`);
      return {
        statusCode: 500,
        body: {
          status: "error",
          audio_url: null,
          error: ERROR_SUMMARIES.general_error,
          error_type: "general_error",
          fallback_message: FALLBACK_MESSAGES.general_error,
        },
      };
    }
  }

  // ── Helpers ────────────────────────────────────────────────────────────────

  private async failure(
    statusCode: PipelineStatusCode,
    sessionId: string,
    reason: ReasonCode,
    fallbackMessage: string,
    messageCount: number,
    extras: ResultExtras,
  ): Promise<PipelineResponse> {
    this.logger.warn(`Session ${sessionId}: pipeline stopped with ${reason} (HTTP ${statusCode})`);
    const audioUrl = await this.speakFallback(fallbackMessage);
    return {
      statusCode,
      body: {
        status: "error",
        session_id: sessionId,
        ...extras,
        audio_url: audioUrl,
        message_count: messageCount,
        error: ERROR_SUMMARIES[reason],
        error_type: reason,
        fallback_message: fallbackMessage,
      },
    };
  }

  /**
   * Best-effort voice version of a fallback message: a single attempt, and
   * any failure just means the response carries no audio.
   */
  async speakFallback(message: string): Promise<string | null> {
    try {
      const outcome = await this.deps.synthesis.run(message, { maxRetries: 0 });
      return outcome.kind === "fatal" ? null : outcome.value;
    } catch (err) {
      this.logger.warn(`Fallback speech failed: ${errorMessage(err)}`);
      return null;
    }
  }
}
