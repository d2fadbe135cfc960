import { describe, it, expect, vi, afterEach } from "vitest";
import {
  backoffDelay,
  MAX_TIMER_MS,
  runClassifiedStage,
  withTimeout,
  type AttemptVerdict,
  type RetryPolicy,
} from "./stage-runner.js";
import { FALLBACK_MESSAGES } from "./fallback-messages.js";

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

const policy = (overrides: Partial<RetryPolicy> = {}): RetryPolicy => ({
  maxRetries: 2,
  backoffMs: 0,
  timeoutMs: 0,
  ...overrides,
});

const acceptNonEmpty = (raw: string): AttemptVerdict<string> =>
  raw ? { kind: "accept", value: raw } : { kind: "retry", detail: "empty" };

describe("backoffDelay", () => {
  it("doubles per retry", () => {
    expect(backoffDelay(100, 1)).toBe(100);
    expect(backoffDelay(100, 2)).toBe(200);
    expect(backoffDelay(100, 3)).toBe(400);
  });

  it("never exceeds the largest timer delay", () => {
    expect(backoffDelay(1_000_000_000, 4)).toBe(MAX_TIMER_MS);
  });

  it("is zero before the first attempt or without a base delay", () => {
    expect(backoffDelay(100, 0)).toBe(0);
    expect(backoffDelay(0, 3)).toBe(0);
  });
});

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the callee's value", async () => {
    await expect(withTimeout(async () => "ok", 1000)).resolves.toBe("ok");
  });

  it("rejects and aborts the signal at the deadline", async () => {
    vi.useFakeTimers();
    let seen: AbortSignal | undefined;
    const pending = withTimeout((signal) => {
      seen = signal;
      return new Promise<string>(() => {});
    }, 50);
    const assertion = expect(pending).rejects.toThrow("Provider call timed out after 50ms");

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    expect(seen?.aborted).toBe(true);
  });

  it("caps an oversized timeout instead of firing at once", async () => {
    const slow = () =>
      new Promise<string>((resolve) => {
        setTimeout(() => resolve("ok"), 20);
      });

    await expect(withTimeout(slow, 3_000_000_000)).resolves.toBe("ok");
  });

  it("runs unbounded when the timeout is zero", async () => {
    await expect(withTimeout(async (signal) => signal.aborted, 0)).resolves.toBe(false);
  });
});

describe("runClassifiedStage", () => {
  it("short-circuits to api_unavailable without calling the provider", async () => {
    const call = vi.fn(async () => "never");

    const outcome = await runClassifiedStage({
      stage: "reply",
      available: false,
      failureReason: "llm_error",
      call,
      classify: acceptNonEmpty,
      policy: policy(),
      logger: createSilentLogger(),
    });

    expect(outcome).toEqual({
      kind: "fatal",
      reason: "api_unavailable",
      fallbackMessage: FALLBACK_MESSAGES.api_unavailable,
      attempts: 0,
    });
    expect(call).not.toHaveBeenCalled();
  });

  it("retries thrown errors and succeeds on a later attempt", async () => {
    const call = vi
      .fn<(signal: AbortSignal, attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("boom"))
      .mockResolvedValueOnce("")
      .mockResolvedValueOnce("done");

    const outcome = await runClassifiedStage({
      stage: "reply",
      available: true,
      failureReason: "llm_error",
      call,
      classify: acceptNonEmpty,
      policy: policy(),
      logger: createSilentLogger(),
    });

    expect(outcome).toEqual({ kind: "success", value: "done", attempts: 3 });
    expect(call.mock.calls.map(([, attempt]) => attempt)).toEqual([1, 2, 3]);
  });

  it("makes exactly maxRetries + 1 attempts before giving up", async () => {
    const call = vi.fn(async () => "");

    const outcome = await runClassifiedStage({
      stage: "synthesis",
      available: true,
      failureReason: "tts_error",
      call,
      classify: acceptNonEmpty,
      policy: policy({ maxRetries: 4 }),
      logger: createSilentLogger(),
    });

    expect(call).toHaveBeenCalledTimes(5);
    expect(outcome).toEqual({
      kind: "fatal",
      reason: "tts_error",
      fallbackMessage: FALLBACK_MESSAGES.tts_error,
      attempts: 5,
    });
  });

  it("stops immediately on a stop verdict", async () => {
    const call = vi.fn(async () => "silence");

    const outcome = await runClassifiedStage<string, string>({
      stage: "transcription",
      available: true,
      failureReason: "stt_error",
      call,
      classify: () => ({ kind: "stop", reason: "empty_transcription", detail: "nothing heard" }),
      policy: policy(),
      logger: createSilentLogger(),
    });

    expect(call).toHaveBeenCalledTimes(1);
    expect(outcome.kind).toBe("fatal");
    expect(outcome.attempts).toBe(1);
  });

  it("sleeps an exponential backoff between attempts", async () => {
    const sleep = vi.fn(async (_ms: number) => {});

    await runClassifiedStage({
      stage: "reply",
      available: true,
      failureReason: "llm_error",
      call: async () => "",
      classify: acceptNonEmpty,
      policy: policy({ maxRetries: 3, backoffMs: 10 }),
      logger: createSilentLogger(),
      sleep,
    });

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 20, 40]);
  });

  it("treats a timed-out attempt as retryable", async () => {
    let calls = 0;
    const outcome = await runClassifiedStage({
      stage: "reply",
      available: true,
      failureReason: "llm_error",
      call: (signal) => {
        calls++;
        if (calls === 1) {
          // Hangs until aborted by the timeout.
          return new Promise<string>((_resolve, reject) => {
            signal.addEventListener("abort", () => reject(new Error("aborted")));
          });
        }
        return Promise.resolve("late but fine");
      },
      classify: acceptNonEmpty,
      policy: policy({ timeoutMs: 20 }),
      logger: createSilentLogger(),
    });

    expect(outcome).toEqual({ kind: "success", value: "late but fine", attempts: 2 });
  });
});
