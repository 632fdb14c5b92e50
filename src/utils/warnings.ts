import { config } from '../config';

// Keys of advisories already emitted by warnOnce().
const seen = new Set<string>();

/** Emit a warning when `config.warnings` is enabled. */
export function warn(message: string): void {
  // eslint-disable-next-line no-console
  if (config.warnings) console.warn(message);
}

/**
 * Emit a warning at most once per `key` for the lifetime of the process.
 * Keys are only consumed while warnings are enabled.
 */
export function warnOnce(key: string, message: string): void {
  if (!config.warnings || seen.has(key)) return;
  seen.add(key);
  // eslint-disable-next-line no-console
  console.warn(message);
}

/** Forget which once-only advisories were emitted (test helper). */
export function resetWarnings(): void {
  seen.clear();
}
