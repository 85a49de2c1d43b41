import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  Species,
  findItem,
  loadBundledCatalog,
  loadCatalog,
  loadTypeChart,
  moveOf,
  speciesOf,
} from '@content/registry';
import { InvalidReferenceDataError, MissingReferenceError } from '@engine/duel/errors';
import { makeCombatant } from './helpers/duel';

afterEach(() => {
  loadBundledCatalog();
  vi.restoreAllMocks();
});

describe('bundled catalog', () => {
  it('resolves species, moves and items by name', () => {
    expect(speciesOf('Pikachu').types).toEqual(['electric']);
    expect(moveOf('tackle').power).toBe(40);
    expect(findItem('focus-sash')?.removable).toBe(true);
    expect(findItem('mega-stone')?.removable).toBe(false);
  });

  it('raises a missing reference for unknown names', () => {
    expect(() => speciesOf('Nobody')).toThrow(MissingReferenceError);
    expect(() => moveOf('nothing')).toThrow('missing move nothing');
    expect(findItem('nothing')).toBeNull();
  });

  it('refuses roster entries naming an unknown ability or item', () => {
    expect(() => makeCombatant({ ability: 'made-up' })).toThrow('missing ability made-up');
    expect(() => makeCombatant({ item: 'made-up' })).toThrow('missing item made-up');
  });

  it('ships a complete type chart', () => {
    const chart = loadTypeChart();
    expect(chart.water?.fire).toBe(200);
    expect(chart.ground?.flying).toBe(0);
  });
});

describe('loadCatalog', () => {
  it('keeps valid entries, coerces numbers and skips the rest', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const catalog = loadCatalog({
      species: [
        { name: 'Sprout', types: ['grass'], baseStats: { hp: '45', attack: 49, defense: 49, spatk: 65, spdef: 65, speed: 45 } },
        { name: 'Glitch', types: ['cosmic'], baseStats: {} },
      ],
      moves: [{ name: 'zap', type: 'electric', damageClass: 'special' }],
    });

    expect(Object.keys(catalog.species)).toEqual(['Sprout']);
    expect(Species().Sprout.baseStats.hp).toBe(45);
    expect(Species().Sprout.abilities).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe('skipping invalid species entry');

    const zap = moveOf('zap');
    expect(zap.power).toBeNull();
    expect(zap.accuracy).toBeNull();
    expect(zap.pp).toBe(10);
    expect(zap.target).toBe('opponent');
    expect(zap.substitute).toBe(true);
    expect(zap.statChanges).toEqual([]);
  });

  it('replaces the active catalog', () => {
    loadCatalog({ species: [] });
    expect(() => speciesOf('Pikachu')).toThrow(MissingReferenceError);
  });

  it('refuses a malformed type chart instead of treating every matchup as neutral', () => {
    const load = () => loadTypeChart({ fire: { grass: 'x' } });
    expect(load).toThrow(InvalidReferenceDataError);
    expect(load).toThrow(/^invalid type chart at fire\.grass: /);
  });

  it('refuses a type chart keyed by an unknown type', () => {
    expect(() => loadTypeChart({ plasma: { fire: 100 } })).toThrow(InvalidReferenceDataError);
  });
});
