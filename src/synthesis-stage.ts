// Voice Relay - Synthesis Stage
// Converts reply text to an audio reference via the text-to-speech provider.
//
// An optional backup provider gets a single attempt once the primary has
// given up; audio from the backup is reported as a degraded outcome so the
// response can flag it.

import { createConsoleLogger, type Logger } from "./logger.js";
import type { SynthesisResponse, TextToSpeechProvider } from "./providers/types.js";
import {
  DEFAULT_RETRY_POLICY,
  runClassifiedStage,
  type AttemptVerdict,
  type RetryPolicy,
} from "./stage-runner.js";
import type { StageOutcome } from "./types.js";

export const DEFAULT_VOICE_ID = "en-US-natalie";

export interface SynthesisStageOptions {
  voiceId?: string;
  /** Voice used when calling the backup provider. Defaults to its own default. */
  backupVoiceId?: string;
  backup?: TextToSpeechProvider;
  policy?: Partial<RetryPolicy>;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface SynthesisRunOptions {
  voiceId?: string;
  /** Overrides the configured retry budget for this call only. */
  maxRetries?: number;
}

export function classifySynthesis(response: SynthesisResponse): AttemptVerdict<string> {
  if (response.statusCode !== 200) {
    const detail = response.detail ? `: ${response.detail}` : "";
    return { kind: "retry", detail: `provider returned status ${response.statusCode}${detail}` };
  }
  if (typeof response.audioFile !== "string" || response.audioFile.length === 0) {
    return { kind: "retry", detail: "audioFile missing from provider response" };
  }
  return { kind: "accept", value: response.audioFile };
}

export class SynthesisStage {
  private readonly provider: TextToSpeechProvider;
  private readonly backup: TextToSpeechProvider | null;
  private readonly voiceId: string;
  private readonly backupVoiceId: string | undefined;
  private readonly policy: RetryPolicy;
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(provider: TextToSpeechProvider, options: SynthesisStageOptions = {}) {
    this.provider = provider;
    this.backup = options.backup ?? null;
    this.voiceId = options.voiceId ?? DEFAULT_VOICE_ID;
    this.backupVoiceId = options.backupVoiceId;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
    this.logger = options.logger ?? createConsoleLogger("SynthesisStage");
    this.sleep = options.sleep;
  }

  /** True when either the primary or the backup provider can be called. */
  isAvailable(): boolean {
    return this.provider.isConfigured() || (this.backup?.isConfigured() ?? false);
  }

  async run(text: string, options: SynthesisRunOptions = {}): Promise<StageOutcome<string>> {
    const policy: RetryPolicy =
      options.maxRetries === undefined ? this.policy : { ...this.policy, maxRetries: options.maxRetries };
    const voiceId = options.voiceId ?? this.voiceId;

    const primary = await this.attempt(this.provider, text, voiceId, policy);
    if (primary.kind !== "fatal" || !this.backup) {
      return primary;
    }

    this.logger.warn(`Primary TTS (${this.provider.name}) failed with ${primary.reason}, trying backup ${this.backup.name}`);
    const backup = await this.attempt(
      this.backup,
      text,
      this.backupVoiceId ?? voiceId,
      { ...policy, maxRetries: 0, backoffMs: 0 },
    );
    const attempts = primary.attempts + backup.attempts;

    switch (backup.kind) {
      case "success":
      case "degraded":
        return { kind: "degraded", value: backup.value, reason: primary.reason, attempts };
      case "fatal":
        return { ...primary, attempts };
    }
  }

  private attempt(
    provider: TextToSpeechProvider,
    text: string,
    voiceId: string,
    policy: RetryPolicy,
  ): Promise<StageOutcome<string>> {
    return runClassifiedStage({
      stage: "synthesis",
      available: provider.isConfigured(),
      failureReason: "tts_error",
      policy,
      logger: this.logger,
      sleep: this.sleep,
      call: (signal) => provider.synthesize({ text, voiceId, signal }),
      classify: classifySynthesis,
    });
  }
}
