import { describe, it, expect, vi } from "vitest";
import { AudioCache } from "../audio-cache.js";
import { OpenAISpeechSynthesis, type OpenAITTSClient } from "./openai-tts.js";

function createMockClient(bytes: Uint8Array) {
  const create = vi.fn<OpenAITTSClient["audio"]["speech"]["create"]>(async () => new Response(bytes));
  const client: OpenAITTSClient = { audio: { speech: { create } } };
  return { client, create };
}

describe("OpenAISpeechSynthesis", () => {
  it("caches the audio and returns its serving URL", async () => {
    const cache = new AudioCache(10);
    const { client } = createMockClient(new Uint8Array([1, 2, 3]));
    const tts = new OpenAISpeechSynthesis(client, cache, { publicBaseUrl: "http://localhost:3000/" });

    const result = await tts.synthesize({ text: "Hi", voiceId: "nova" });

    expect(result.statusCode).toBe(200);
    const match = /^http:\/\/localhost:3000\/audio\/(.+)$/.exec(result.audioFile ?? "");
    expect(match).not.toBeNull();
    const entry = cache.get(match?.[1] ?? "");
    expect([...(entry?.data ?? [])]).toEqual([1, 2, 3]);
    expect(entry?.contentType).toBe("audio/mpeg");
  });

  it("substitutes the default voice for non-OpenAI voice ids", async () => {
    const { client, create } = createMockClient(new Uint8Array([1]));
    const tts = new OpenAISpeechSynthesis(client, new AudioCache(), { defaultVoice: "alloy", model: "tts-1-hd" });

    await tts.synthesize({ text: "Hi", voiceId: "en-US-natalie" });

    expect(create.mock.calls[0]?.[0]).toEqual({ model: "tts-1-hd", voice: "alloy", input: "Hi" });
  });

  it("reports no audio for an empty body", async () => {
    const cache = new AudioCache();
    const { client } = createMockClient(new Uint8Array([]));

    const result = await new OpenAISpeechSynthesis(client, cache).synthesize({ text: "Hi", voiceId: "nova" });

    expect(result).toEqual({ statusCode: 200 });
    expect(cache.size).toBe(0);
  });
});
