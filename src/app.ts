// Voice Relay - Application wiring
// Builds providers, stages, stores and the pipeline from an AppConfig and the
// SDK clients that could be created. A null client means its credential is
// missing; the matching provider then reports itself as unconfigured.

import { AudioCache } from "./audio-cache.js";
import type { AppConfig, TtsProviderName } from "./config.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { DeepgramSpeechToText, type DeepgramPrerecordedClient } from "./providers/deepgram-stt.js";
import { HttpSpeechSynthesis } from "./providers/http-tts.js";
import { OpenAIChatModel, type OpenAIChatClient } from "./providers/openai-llm.js";
import { OpenAISpeechToText, type OpenAITranscriptionClient } from "./providers/openai-stt.js";
import { OpenAISpeechSynthesis, type OpenAITTSClient } from "./providers/openai-tts.js";
import type { SpeechToTextProvider, TextToSpeechProvider } from "./providers/types.js";
import { ReplyStage } from "./reply-stage.js";
import { InMemorySessionStore, type SessionStore } from "./session-store.js";
import { SynthesisStage } from "./synthesis-stage.js";
import { TranscriptionStage } from "./transcription-stage.js";
import { VoicePipeline } from "./voice-pipeline.js";

/** The slice of the OpenAI SDK used across transcription, chat and speech. */
export type OpenAIServices = OpenAITranscriptionClient & OpenAIChatClient & OpenAITTSClient;

export interface ProviderClients {
  deepgram: DeepgramPrerecordedClient | null;
  openai: OpenAIServices | null;
}

export interface VoiceRelay {
  pipeline: VoicePipeline;
  sessionStore: SessionStore;
  audioCache: AudioCache;
}

export interface BuildOptions {
  logger?: Logger;
  /** Injected into the Murf adapter; tests use it to avoid the network. */
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export function buildVoiceRelay(
  config: AppConfig,
  clients: ProviderClients,
  options: BuildOptions = {},
): VoiceRelay {
  const logger = options.logger;
  const audioCache = new AudioCache(config.audioCacheSize);
  const sessionStore = new InMemorySessionStore();
  const { historyWindow, ...policy } = config.pipeline;

  const stt: SpeechToTextProvider =
    config.stt.provider === "deepgram"
      ? new DeepgramSpeechToText(clients.deepgram, { model: config.stt.deepgramModel })
      : new OpenAISpeechToText(clients.openai, { model: config.stt.openaiModel });

  const makeTts = (name: TtsProviderName): TextToSpeechProvider => {
    switch (name) {
      case "murf":
        return new HttpSpeechSynthesis({
          apiKey: config.tts.murfApiKey,
          url: config.tts.murfUrl,
          fetchImpl: options.fetchImpl,
        });
      case "openai":
        return new OpenAISpeechSynthesis(clients.openai, audioCache, {
          model: config.tts.openaiModel,
          defaultVoice: config.tts.openaiVoice,
          publicBaseUrl: config.publicBaseUrl,
        });
      default: {
        const exhaustiveCheck: never = name;
        throw new Error(`Unknown TTS provider: ${String(exhaustiveCheck)}`);
      }
    }
  };

  const backupName =
    config.tts.backupProvider && config.tts.backupProvider !== config.tts.provider
      ? config.tts.backupProvider
      : null;

  const transcription = new TranscriptionStage(stt, {
    policy,
    logger: logger ?? createConsoleLogger("TranscriptionStage"),
    sleep: options.sleep,
  });
  const reply = new ReplyStage(new OpenAIChatModel(clients.openai), {
    model: config.llm.model,
    historyWindow,
    policy,
    logger: logger ?? createConsoleLogger("ReplyStage"),
    sleep: options.sleep,
  });
  const synthesis = new SynthesisStage(makeTts(config.tts.provider), {
    voiceId: config.tts.voiceId,
    backup: backupName ? makeTts(backupName) : undefined,
    backupVoiceId: backupName === "openai" ? config.tts.openaiVoice : undefined,
    policy,
    logger: logger ?? createConsoleLogger("SynthesisStage"),
    sleep: options.sleep,
  });

  const pipeline = new VoicePipeline({ sessionStore, transcription, reply, synthesis, logger });
  return { pipeline, sessionStore, audioCache };
}
