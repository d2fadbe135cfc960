// Voice Relay - Entry point
// Loads configuration, creates the SDK clients whose keys are present, wires
// the pipeline and starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { buildVoiceRelay, type OpenAIServices } from "./app.js";
import { loadConfig, type AppConfig } from "./config.js";
import type { DeepgramPrerecordedClient } from "./providers/deepgram-stt.js";
import { createAppServer } from "./server.js";

export const APP_NAME = "Voice Relay";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logWarn = (msg: string) => console.warn(`[WARN] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Load configuration ─────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  logFatal(`Invalid configuration: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

// ─── Initialize API clients ─────────────────────────────────────────────────────
// A missing key is not fatal: the affected stage answers api_unavailable.

const deepgramKey = config.stt.deepgramApiKey;
const openaiKey = config.openaiApiKey;

if (!deepgramKey && config.stt.provider === "deepgram") {
  logWarn("DEEPGRAM_API_KEY is not set; speech-to-text will be unavailable.");
}
if (!openaiKey) {
  logWarn("OPENAI_API_KEY is not set; the language model will be unavailable.");
}
if (!config.tts.murfApiKey && (config.tts.provider === "murf" || config.tts.backupProvider === "murf")) {
  logWarn("MURF_API_KEY is not set; Murf text-to-speech will be unavailable.");
}

const deepgramClient = deepgramKey
  ? (createDeepgramClient(deepgramKey) as unknown as DeepgramPrerecordedClient)
  : null;
const openaiClient = openaiKey
  ? (new OpenAI({ apiKey: openaiKey }) as unknown as OpenAIServices)
  : null;

logInit(`Speech-to-text: ${config.stt.provider}`);
logInit(`Language model: ${config.llm.model}`);
logInit(
  `Text-to-speech: ${config.tts.provider}${config.tts.backupProvider ? ` (backup: ${config.tts.backupProvider})` : ""}`,
);

// ─── Wire pipeline and start server ─────────────────────────────────────────────

const { pipeline, audioCache } = buildVoiceRelay(config, {
  deepgram: deepgramClient,
  openai: openaiClient,
});

const server = createAppServer({
  pipeline,
  audioCache,
  maxUploadBytes: config.maxUploadBytes,
});

server
  .listen(config.port)
  .then((port) => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);
  })
  .catch((err: unknown) => {
    logFatal(`Failed to start server: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });

const shutdown = (signal: string) => {
  logInit(`${signal} received, shutting down`);
  server
    .close()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logFatal(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
