import { config } from '../config';

const seen = new Set<string>();

/**
 * Emit `message` once per `key` when `config.warnings` is enabled.
 */
export function onceWarn(key: string, message: string): void {
  if (!config.warnings || seen.has(key)) return;
  // eslint-disable-next-line no-console
  console.warn(message);
  seen.add(key);
}

/** Forget which keys have already warned. */
export function resetWarnings(): void {
  seen.clear();
}
