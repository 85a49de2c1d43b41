import { readFile } from 'node:fs/promises';
import type { DuelConfig } from './schema';
import { deepMerge, validateConfig } from '@content/validate';

let current: DuelConfig = validateConfig({});
const subs = new Set<(cfg: DuelConfig) => void>();

function notify(cfg: DuelConfig) {
  for (const fn of subs) fn(cfg);
}

/** Applies a partial override on top of the current configuration. */
export function configure(patch: unknown): DuelConfig {
  current = validateConfig(deepMerge(current, patch));
  notify(current);
  return current;
}

export async function loadConfigFile(path: string): Promise<DuelConfig> {
  const text = await readFile(path, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new Error(`config file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  current = validateConfig(parsed);
  notify(current);
  return current;
}

export function resetConfig(): DuelConfig {
  current = validateConfig({});
  notify(current);
  return current;
}

export function subscribe(fn: (cfg: DuelConfig) => void) {
  subs.add(fn);
  fn(current);
  return () => {
    subs.delete(fn);
  };
}

export const CONFIG = () => current;
