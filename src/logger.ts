// Voice Relay - Logging
// Components receive a Logger through their options so tests can inject a
// silent or spying implementation.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug?(message: string, ...args: unknown[]): void;
}

const ts = () => new Date().toISOString();

/**
 * Console-backed logger. Lines look like
 * `[WARN] [2026-01-01T00:00:00.000Z] [ReplyStage] attempt 1 failed`.
 */
export function createConsoleLogger(component?: string): Logger {
  const tag = component ? ` [${component}]` : "";
  return {
    info: (msg, ...args) => console.log(`[INFO] [${ts()}]${tag} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] [${ts()}]${tag} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] [${ts()}]${tag} ${msg}`, ...args),
    debug: (msg, ...args) => {
      if (process.env.LOG_LEVEL === "debug") {
        console.debug(`[DEBUG] [${ts()}]${tag} ${msg}`, ...args);
      }
    },
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
