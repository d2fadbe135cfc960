// Voice Relay - Retry-with-classification runner
// The one retry loop shared by the transcription, reply and synthesis stages.
// Each stage supplies the provider call and a classifier that decides whether
// a response is usable, worth retrying, or a terminal outcome of its own.
//
// Provider exceptions are absorbed here and never cross the stage boundary.

import { fallbackMessageFor } from "./fallback-messages.js";
import { errorMessage, type Logger } from "./logger.js";
import type { ReasonCode, StageFailureCode, StageName, StageOutcome } from "./types.js";

// ─── Retry policy ───────────────────────────────────────────────────────────────

export interface RetryPolicy {
  /** Additional attempts after the first; total attempts = maxRetries + 1. */
  maxRetries: number;
  /** Base delay before a retry. Doubles on each subsequent retry. 0 = immediate. */
  backoffMs: number;
  /** Upper bound for a single provider call. */
  timeoutMs: number;
}

/** Largest delay `setTimeout` honours; Node fires anything above it after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  backoffMs: 0,
  timeoutMs: 30_000,
};

// ─── Classification ─────────────────────────────────────────────────────────────

export type AttemptVerdict<T> =
  | { kind: "accept"; value: T }
  | { kind: "retry"; detail: string }
  | { kind: "stop"; reason: ReasonCode; detail: string };

export interface ClassifiedStageOptions<TRaw, T> {
  stage: StageName;
  /** False short-circuits to api_unavailable without calling the provider. */
  available: boolean;
  /** Reason reported once every attempt has failed. */
  failureReason: StageFailureCode;
  call(signal: AbortSignal, attempt: number): Promise<TRaw>;
  classify(raw: TRaw): AttemptVerdict<T>;
  policy: RetryPolicy;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Delay before the given retry (1-based): backoffMs, 2×backoffMs, 4×backoffMs…
 */
export function backoffDelay(backoffMs: number, retryNumber: number): number {
  if (backoffMs <= 0 || retryNumber < 1) return 0;
  return Math.min(backoffMs * 2 ** (retryNumber - 1), MAX_TIMER_MS);
}

export function fatal<T>(reason: ReasonCode, attempts: number): StageOutcome<T> {
  return { kind: "fatal", reason, fallbackMessage: fallbackMessageFor(reason), attempts };
}

/**
 * Runs `run` with an AbortSignal that fires after `timeoutMs`. The returned
 * promise rejects at the deadline even if the callee ignores the signal.
 * A non-positive or non-finite timeout disables the bound; larger values
 * are capped at MAX_TIMER_MS.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return run(controller.signal);
  }

  const boundMs = Math.min(timeoutMs, MAX_TIMER_MS);
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const err = new Error(`Provider call timed out after ${boundMs}ms`);
      controller.abort(err);
      reject(err);
    }, boundMs);
  });

  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

// ─── runClassifiedStage ─────────────────────────────────────────────────────────

export async function runClassifiedStage<TRaw, T>(
  options: ClassifiedStageOptions<TRaw, T>,
): Promise<StageOutcome<T>> {
  const { stage, policy, logger } = options;
  const sleep = options.sleep ?? defaultSleep;

  if (!options.available) {
    logger.error(`${stage}: provider credentials not configured, skipping call`);
    return fatal("api_unavailable", 0);
  }

  const totalAttempts = Math.max(0, Math.floor(policy.maxRetries)) + 1;

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    const delay = backoffDelay(policy.backoffMs, attempt - 1);
    if (delay > 0) {
      await sleep(delay);
    }

    logger.info(`${stage} attempt ${attempt}/${totalAttempts}`);

    let verdict: AttemptVerdict<T>;
    try {
      const raw = await withTimeout((signal) => options.call(signal, attempt), policy.timeoutMs);
      verdict = options.classify(raw);
    } catch (err) {
      verdict = { kind: "retry", detail: errorMessage(err) };
    }

    switch (verdict.kind) {
      case "accept":
        logger.info(`${stage} succeeded on attempt ${attempt}`);
        return { kind: "success", value: verdict.value, attempts: attempt };
      case "stop":
        logger.warn(`${stage} stopped on attempt ${attempt} (${verdict.reason}): ${verdict.detail}`);
        return fatal(verdict.reason, attempt);
      case "retry":
        logger.warn(`${stage} attempt ${attempt} failed: ${verdict.detail}`);
        break;
    }
  }

  logger.error(`${stage} failed after ${totalAttempts} attempt(s)`);
  return fatal(options.failureReason, totalAttempts);
}
