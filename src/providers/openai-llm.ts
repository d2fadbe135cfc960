// Voice Relay - OpenAI chat completions adapter

import type { CompletionRequest, LanguageModelProvider } from "./types.js";

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(
        params: {
          model: string;
          messages: Array<{ role: "user"; content: string }>;
          reasoning_effort?: "minimal" | "low";
        },
        options?: { signal?: AbortSignal },
      ): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

/**
 * Lowest reasoning effort accepted by the model family, or undefined for
 * models that do not reason (and reject the parameter).
 */
export function minimalReasoningEffort(model: string): "minimal" | "low" | undefined {
  if (model.startsWith("gpt-5")) return "minimal";
  if (/^o\d/.test(model)) return "low";
  return undefined;
}

export class OpenAIChatModel implements LanguageModelProvider {
  readonly name = "openai-chat";
  private readonly client: OpenAIChatClient | null;

  constructor(client: OpenAIChatClient | null) {
    this.client = client;
  }

  isConfigured(): boolean {
    return this.client !== null;
  }

  async complete(request: CompletionRequest): Promise<string> {
    if (!this.client) {
      throw new Error("OpenAI client not configured");
    }

    const effort = request.extendedReasoning ? undefined : minimalReasoningEffort(request.model);
    const response = await this.client.chat.completions.create(
      {
        model: request.model,
        messages: [{ role: "user", content: request.prompt }],
        ...(effort ? { reasoning_effort: effort } : {}),
      },
      { signal: request.signal },
    );

    return response.choices[0]?.message?.content ?? "";
  }
}
