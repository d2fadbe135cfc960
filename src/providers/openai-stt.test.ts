import { describe, it, expect, vi } from "vitest";
import { OpenAISpeechToText, type OpenAITranscriptionClient } from "./openai-stt.js";

describe("OpenAISpeechToText", () => {
  it("uploads the audio as a named file", async () => {
    const create = vi.fn<OpenAITranscriptionClient["audio"]["transcriptions"]["create"]>(async () => ({
      text: "good morning",
    }));
    const client: OpenAITranscriptionClient = { audio: { transcriptions: { create } } };
    const stt = new OpenAISpeechToText(client);

    const result = await stt.transcribe({ audio: Buffer.from("RIFF"), filename: "clip.wav", mimeType: "audio/wav" });

    expect(result).toEqual({ status: "ok", text: "good morning" });
    const params = create.mock.calls[0]?.[0];
    expect(params?.model).toBe("gpt-4o-transcribe");
    expect(params?.response_format).toBe("json");
    expect(params?.file.name).toBe("clip.wav");
    expect(params?.file.type).toBe("audio/wav");
    expect(await params?.file.text()).toBe("RIFF");
  });

  it("refuses to run without a client", async () => {
    const stt = new OpenAISpeechToText(null);
    expect(stt.isConfigured()).toBe(false);
    await expect(stt.transcribe({ audio: Buffer.alloc(1), filename: "a.wav", mimeType: "audio/wav" })).rejects.toThrow(
      "OpenAI client not configured",
    );
  });
});
