// Voice Relay - Reply Stage
// Builds the prompt from recent history and asks the language model for the
// assistant's reply. Blank replies count as failed attempts.

import { DEFAULT_HISTORY_WINDOW, formatConversation } from "./conversation-formatter.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { LanguageModelProvider } from "./providers/types.js";
import {
  DEFAULT_RETRY_POLICY,
  runClassifiedStage,
  type AttemptVerdict,
  type RetryPolicy,
} from "./stage-runner.js";
import type { Message, StageOutcome } from "./types.js";

export const DEFAULT_LLM_MODEL = "gpt-4o-mini";

export interface ReplyStageOptions {
  model?: string;
  historyWindow?: number;
  policy?: Partial<RetryPolicy>;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export function classifyReply(reply: string): AttemptVerdict<string> {
  const text = typeof reply === "string" ? reply.trim() : "";
  if (text.length === 0) {
    return { kind: "retry", detail: "language model returned an empty reply" };
  }
  return { kind: "accept", value: text };
}

export class ReplyStage {
  private readonly provider: LanguageModelProvider;
  private readonly model: string;
  private readonly historyWindow: number;
  private readonly policy: RetryPolicy;
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(provider: LanguageModelProvider, options: ReplyStageOptions = {}) {
    this.provider = provider;
    this.model = options.model ?? DEFAULT_LLM_MODEL;
    this.historyWindow = options.historyWindow ?? DEFAULT_HISTORY_WINDOW;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
    this.logger = options.logger ?? createConsoleLogger("ReplyStage");
    this.sleep = options.sleep;
  }

  isAvailable(): boolean {
    return this.provider.isConfigured();
  }

  /**
   * @param history   Session history *before* the new utterance was recorded.
   * @param utterance The user's transcribed message.
   */
  async run(history: readonly Message[], utterance: string): Promise<StageOutcome<string>> {
    const prompt = formatConversation(history, utterance, { historyWindow: this.historyWindow });
    this.logger.info(
      `Requesting reply from ${this.provider.name} (${this.model}), ${history.length} prior message(s)`,
    );

    return runClassifiedStage({
      stage: "reply",
      available: this.provider.isConfigured(),
      failureReason: "llm_error",
      policy: this.policy,
      logger: this.logger,
      sleep: this.sleep,
      call: (signal) =>
        this.provider.complete({
          prompt,
          model: this.model,
          extendedReasoning: false,
          signal,
        }),
      classify: classifyReply,
    });
  }
}
