/**
 * Debug logging utility
 *
 * Disabled loggers are no-ops, so call sites do not need to guard.
 */

export interface DebugLogger {
  (message: string, ...args: unknown[]): void;
}

export function createDebugLogger(label: string, enabled: boolean): DebugLogger {
  if (!enabled) {
    return () => undefined;
  }
  return (message, ...args) => {
    console.debug(`[${label}] ${message}`, ...args);
  };
}

export function debugFromEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.KMERGE_DEBUG?.trim().toLowerCase();
  return value === "1" || value === "true";
}
