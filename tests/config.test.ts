import { afterEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULTS } from '@config/defaults';
import { CONFIG, configure, loadConfigFile, resetConfig, subscribe } from '@config/store';
import { deepMerge, validateConfig } from '@content/validate';
import { createDuel } from '@engine/duel/state';
import { createSide } from '@engine/duel/side';

afterEach(() => {
  resetConfig();
});

describe('validateConfig', () => {
  it('returns the defaults for an empty object', () => {
    expect(validateConfig({})).toEqual(DEFAULTS);
  });

  it('clamps percentages and repairs bad numbers', () => {
    const cfg = validateConfig({
      chances: { focusBand: 150, quickClaw: -5 },
      durations: { weather: 'abc', terrain: 0 },
    });
    expect(cfg.chances.focusBand).toBe(100);
    expect(cfg.chances.quickClaw).toBe(0);
    expect(cfg.chances.harvest).toBe(DEFAULTS.chances.harvest);
    expect(cfg.durations.weather).toBe(5);
    expect(cfg.durations.terrain).toBe(1);
  });

  it('puts an inverted turn range back in order', () => {
    expect(validateConfig({ sleepTurns: { min: 6, max: 3 } }).sleepTurns).toEqual({ min: 3, max: 6 });
  });

  it('reads boolean strings', () => {
    expect(validateConfig({ inverseBattle: 'true' }).inverseBattle).toBe(true);
    expect(validateConfig({ inverseBattle: 'maybe' }).inverseBattle).toBe(false);
  });
});

describe('deepMerge', () => {
  it('merges nested records and skips null values', () => {
    expect(deepMerge({ a: { b: 1, c: 2 }, d: 3 }, { a: { c: 5 }, d: null })).toEqual({ a: { b: 1, c: 5 }, d: 3 });
  });
});

describe('config store', () => {
  it('layers overrides onto the current config', () => {
    configure({ chances: { quickClaw: 50 } });
    configure({ durations: { weather: 3 } });
    expect(CONFIG().chances.quickClaw).toBe(50);
    expect(CONFIG().chances.focusBand).toBe(10);
    expect(CONFIG().durations.weather).toBe(3);
  });

  it('notifies subscribers until they unsubscribe', () => {
    const seen: number[] = [];
    const stop = subscribe((cfg) => seen.push(cfg.durations.terrain));
    configure({ durations: { terrain: 7 } });
    stop();
    configure({ durations: { terrain: 2 } });
    expect(seen).toEqual([5, 7]);
  });

  it('loads overrides from a json file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'duel-config-'));
    const file = join(dir, 'config.json');
    await writeFile(file, JSON.stringify({ confusionTurns: { min: 1, max: 1 } }));

    const cfg = await loadConfigFile(file);

    expect(cfg.confusionTurns).toEqual({ min: 1, max: 1 });
    expect(cfg.sleepTurns).toEqual(DEFAULTS.sleepTurns);
  });

  it('rejects a file that is not json', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'duel-config-'));
    const file = join(dir, 'broken.json');
    await writeFile(file, '{ nope');

    await expect(loadConfigFile(file)).rejects.toThrow(`config file ${file} is not valid JSON`);
    expect(CONFIG()).toEqual(DEFAULTS);
  });

  it('starts duels in inverse mode when configured', () => {
    configure({ inverseBattle: true });
    const state = createDuel([createSide('Red', []), createSide('Blue', [])], { seed: 1 });
    expect(state.inverse).toBe(true);
  });

  it('does not warn for well formed overrides', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    configure({ chances: { cursedBody: 40 } });
    expect(warn).not.toHaveBeenCalled();
    warn.mockRestore();
  });
});
