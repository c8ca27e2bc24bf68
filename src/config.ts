// Merge configuration with validation and defaults
// Plain option objects, resolved once at construction

import { ConfigurationError } from "./errors";
import { defaultQueueMicrotask } from "./microtask";
import type { QueueMicrotask } from "./microtask";
import { debugFromEnv } from "./debug";

export interface MergeOptions {
  /**
   * Schedules the revisit of sources that were not ready, defaults to the runtime microtask queue
   */
  queueMicrotask?: QueueMicrotask;
  /**
   * Defaults to the KMERGE_DEBUG environment variable
   */
  debug?: boolean;
  label?: string;
}

export interface MergeConfig {
  readonly queueMicrotask: QueueMicrotask;
  readonly debug: boolean;
  readonly label: string;
}

export const DEFAULT_LABEL = "kmerge";

export function validateConfig(config: MergeConfig): void {
  if (typeof config.queueMicrotask !== "function") {
    throw new ConfigurationError("queueMicrotask must be a function");
  }

  if (config.label.trim().length === 0) {
    throw new ConfigurationError("label cannot be empty");
  }
}

export function createMergeConfig(options: MergeOptions = {}): MergeConfig {
  const config: MergeConfig = {
    queueMicrotask: options.queueMicrotask ?? defaultQueueMicrotask,
    debug: options.debug ?? debugFromEnv(),
    label: options.label ?? DEFAULT_LABEL
  };

  validateConfig(config);

  return config;
}
