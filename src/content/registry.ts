import type { AbilityDef, Catalog, ItemDef, MoveDef, SpeciesDef } from '@config/schema';
import { MissingReferenceError } from '@engine/duel/errors';
import type { TypeChart } from '@engine/duel/types';
import { validateCatalog, validateTypeChart } from './validate';
import type { RawCatalog } from './validate';
import abilitiesData from './data/abilities.json';
import itemsData from './data/items.json';
import movesData from './data/moves.json';
import speciesData from './data/species.json';
import typeChartData from './data/typeChart.json';

type SpeciesMap = Record<string, SpeciesDef>;
type MoveMap = Record<string, MoveDef>;
type ItemMap = Record<string, ItemDef>;
type AbilityMap = Record<string, AbilityDef>;

let species: SpeciesMap = {};
let moves: MoveMap = {};
let items: ItemMap = {};
let abilities: AbilityMap = {};

export function installCatalog(catalog: Catalog) {
  species = { ...catalog.species };
  moves = { ...catalog.moves };
  items = { ...catalog.items };
  abilities = { ...catalog.abilities };
}

/** Validates raw reference data and makes it the active catalog. */
export function loadCatalog(raw: RawCatalog): Catalog {
  const catalog = validateCatalog(raw);
  installCatalog(catalog);
  return catalog;
}

export function loadBundledCatalog(): Catalog {
  return loadCatalog({
    species: speciesData,
    moves: movesData,
    items: itemsData,
    abilities: abilitiesData,
  });
}

export function loadTypeChart(raw: unknown = typeChartData): TypeChart {
  return validateTypeChart(raw);
}

export const Species = () => species;
export const Moves = () => moves;
export const Items = () => items;
export const Abilities = () => abilities;

export function findSpecies(name: string): SpeciesDef | null {
  return Object.hasOwn(species, name) ? species[name] : null;
}

export function speciesOf(name: string): SpeciesDef {
  const entry = findSpecies(name);
  if (!entry) throw new MissingReferenceError('species', name);
  return entry;
}

export function moveOf(name: string): MoveDef {
  if (!Object.hasOwn(moves, name)) throw new MissingReferenceError('move', name);
  return moves[name];
}

export function findItem(identifier: string): ItemDef | null {
  return Object.hasOwn(items, identifier) ? items[identifier] : null;
}

export function findAbility(identifier: string): AbilityDef | null {
  return Object.hasOwn(abilities, identifier) ? abilities[identifier] : null;
}

loadBundledCatalog();
