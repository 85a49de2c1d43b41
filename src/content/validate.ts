import { DEFAULTS } from '@config/defaults';
import type {
  AbilityDef,
  Catalog,
  DuelConfig,
  ItemDef,
  MoveDef,
  SpeciesDef,
  TurnRange,
} from '@config/schema';
import { InvalidReferenceDataError } from '@engine/duel/errors';
import type { ElementType, StatName, StatusName, TypeChart } from '@engine/duel/types';
import { z } from 'zod';

export const ELEMENT_TYPES = [
  'normal', 'fighting', 'flying', 'poison', 'ground', 'rock', 'bug', 'ghost', 'steel',
  'fire', 'water', 'grass', 'electric', 'psychic', 'ice', 'dragon', 'dark', 'fairy', 'typeless',
] as const satisfies readonly ElementType[];

const statNames = [
  'attack', 'defense', 'special attack', 'special defense', 'speed', 'accuracy', 'evasion',
] as const satisfies readonly StatName[];
const statuses = ['burn', 'sleep', 'poison', 'b-poison', 'paralysis', 'freeze'] as const satisfies readonly StatusName[];
const ailments = [...statuses, 'confusion', 'flinch', 'infatuation'] as const;
const damageClasses = ['physical', 'special', 'status'] as const;
const moveTargets = ['opponent', 'user', 'field'] as const;
const flavors = ['spicy', 'sour', 'sweet', 'dry', 'bitter'] as const;

const coerceNumber = () =>
  z.preprocess((val) => {
    if (val === '' || val === null || val === undefined) return undefined;
    const num = Number(val);
    return Number.isFinite(num) ? num : undefined;
  }, z.number().finite().optional());

const numberOr = (fallback: number) => coerceNumber().transform((val) => val ?? fallback);

const intAtLeast = (min: number, fallback: number) =>
  numberOr(fallback).transform((val) => Math.max(min, Math.trunc(val)));

const percent = (fallback: number) =>
  numberOr(fallback).transform((val) => Math.min(100, Math.max(0, val)));

const coerceBoolean = () =>
  z.preprocess((val) => {
    if (val === '' || val === null || val === undefined) return undefined;
    if (typeof val === 'boolean') return val;
    if (val === 'true') return true;
    if (val === 'false') return false;
    return undefined;
  }, z.boolean().optional());

const booleanOr = (fallback: boolean) => coerceBoolean().transform((val) => val ?? fallback);

const stringValue = () =>
  z.preprocess((val) => {
    if (val === null || val === undefined) return undefined;
    return String(val);
  }, z.string());

const nullableNumber = () =>
  z.preprocess((val) => {
    if (val === '' || val === undefined) return null;
    if (val === null) return null;
    const num = Number(val);
    return Number.isFinite(num) ? num : null;
  }, z.number().nullable());

/* ---------------------------- configuration ---------------------------- */

const rangeSchema = (fallback: TurnRange) =>
  z
    .object({
      min: intAtLeast(1, fallback.min),
      max: intAtLeast(1, fallback.max),
    })
    .strip()
    .transform((r) => (r.min <= r.max ? r : { min: r.max, max: r.min }))
    .catch(fallback);

const DurationsSchema = z
  .object({
    weather: intAtLeast(1, DEFAULTS.durations.weather),
    weatherExtended: intAtLeast(1, DEFAULTS.durations.weatherExtended),
    terrain: intAtLeast(1, DEFAULTS.durations.terrain),
    terrainExtended: intAtLeast(1, DEFAULTS.durations.terrainExtended),
  })
  .strip()
  .catch(DEFAULTS.durations);

const ChancesSchema = z
  .object({
    focusBand: percent(DEFAULTS.chances.focusBand),
    contactStatus: percent(DEFAULTS.chances.contactStatus),
    effectSpore: percent(DEFAULTS.chances.effectSpore),
    cursedBody: percent(DEFAULTS.chances.cursedBody),
    toxicChain: percent(DEFAULTS.chances.toxicChain),
    poisonTouch: percent(DEFAULTS.chances.poisonTouch),
    harvest: percent(DEFAULTS.chances.harvest),
    quickClaw: percent(DEFAULTS.chances.quickClaw),
    quickDraw: percent(DEFAULTS.chances.quickDraw),
    shedSkinOneIn: intAtLeast(1, DEFAULTS.chances.shedSkinOneIn),
  })
  .strip()
  .catch(DEFAULTS.chances);

const DuelConfigSchema: z.ZodType<DuelConfig, z.ZodTypeDef, unknown> = z
  .object({
    __version: numberOr(DEFAULTS.__version),
    durations: DurationsSchema,
    chances: ChancesSchema,
    confusionTurns: rangeSchema(DEFAULTS.confusionTurns),
    sleepTurns: rangeSchema(DEFAULTS.sleepTurns),
    inverseBattle: booleanOr(DEFAULTS.inverseBattle),
  })
  .strip();

function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val);
}

export function deepMerge(base: unknown, patch: unknown): unknown {
  if (patch === undefined || patch === null) return base;
  if (!isRecord(base) || !isRecord(patch)) return patch;
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined || value === null) continue;
    result[key] = isRecord(value) ? deepMerge(base[key], value) : value;
  }
  return result;
}

export function migrate(cfg: DuelConfig): DuelConfig {
  if (!cfg.__version || cfg.__version === 1) {
    return { ...cfg, __version: 1 };
  }
  return cfg;
}

/** Merges `input` onto the defaults; anything malformed falls back to its default. */
export function validateConfig(input: unknown): DuelConfig {
  const parsed = DuelConfigSchema.safeParse(deepMerge(DEFAULTS, input ?? {}));
  if (!parsed.success) {
    console.warn('duel config rejected, using defaults', parsed.error.issues);
    return DEFAULTS;
  }
  return migrate(parsed.data);
}

/* ------------------------------- catalogs ------------------------------- */

const StatBlockSchema = z
  .object({
    hp: numberOr(1),
    attack: numberOr(1),
    defense: numberOr(1),
    spatk: numberOr(1),
    spdef: numberOr(1),
    speed: numberOr(1),
  })
  .strip();

const SpeciesSchema: z.ZodType<SpeciesDef, z.ZodTypeDef, unknown> = z
  .object({
    name: stringValue(),
    types: z.array(z.enum(ELEMENT_TYPES)).min(1),
    baseStats: StatBlockSchema,
    abilities: z.array(stringValue()).default([]),
    weight: numberOr(1),
    canStillEvolve: booleanOr(false),
  })
  .strip();

const StatChangeSchema = z
  .object({
    stat: z.enum(statNames),
    change: z.number().int(),
    target: z.enum(['user', 'target']).catch('target'),
  })
  .strip();

const MoveSchema: z.ZodType<MoveDef, z.ZodTypeDef, unknown> = z
  .object({
    id: numberOr(0),
    name: stringValue(),
    effect: numberOr(1),
    type: z.enum(ELEMENT_TYPES),
    damageClass: z.enum(damageClasses),
    power: nullableNumber(),
    accuracy: nullableNumber(),
    pp: intAtLeast(1, 10),
    priority: numberOr(0),
    effectChance: nullableNumber(),
    critRate: numberOr(0),
    minHits: nullableNumber(),
    maxHits: nullableNumber(),
    target: z.enum(moveTargets).catch('opponent'),
    contact: booleanOr(false),
    sound: booleanOr(false),
    substitute: booleanOr(true),
    wind: booleanOr(false),
    healBlock: booleanOr(false),
    statChanges: z.array(StatChangeSchema).catch([]).default([]),
    ailment: z.enum(ailments).nullable().catch(null).default(null),
    drain: numberOr(0),
    healing: numberOr(0),
  })
  .strip();

const ItemSchema: z.ZodType<ItemDef, z.ZodTypeDef, unknown> = z
  .object({
    identifier: stringValue(),
    flingPower: nullableNumber(),
    removable: booleanOr(true),
    berry: booleanOr(false),
    plateType: z.enum(ELEMENT_TYPES).nullable().catch(null).default(null),
    memoryType: z.enum(ELEMENT_TYPES).nullable().catch(null).default(null),
    flavor: z.enum(flavors).nullable().catch(null).default(null),
  })
  .strip();

const AbilitySchema: z.ZodType<AbilityDef, z.ZodTypeDef, unknown> = z
  .object({
    id: numberOr(0),
    identifier: stringValue(),
    name: stringValue(),
  })
  .strip();

const TypeChartSchema: z.ZodType<TypeChart, z.ZodTypeDef, unknown> = z.record(
  z.enum(ELEMENT_TYPES),
  z.record(z.enum(ELEMENT_TYPES), z.number().int().min(0)),
);

/** Keeps every entry that validates and reports the ones that do not. */
function recordOf<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, kind: string, input: unknown, keyOf: (entry: T) => string): Record<string, T> {
  const out: Record<string, T> = {};
  const entries = Array.isArray(input) ? input : isRecord(input) ? Object.values(input) : [];
  for (const raw of entries) {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`skipping invalid ${kind} entry`, parsed.error.issues);
      continue;
    }
    out[keyOf(parsed.data)] = parsed.data;
  }
  return out;
}

export interface RawCatalog {
  species?: unknown;
  moves?: unknown;
  items?: unknown;
  abilities?: unknown;
}

export function validateCatalog(input: RawCatalog): Catalog {
  return {
    species: recordOf(SpeciesSchema, 'species', input.species, (s) => s.name),
    moves: recordOf(MoveSchema, 'move', input.moves, (m) => m.name),
    items: recordOf(ItemSchema, 'item', input.items, (i) => i.identifier),
    abilities: recordOf(AbilitySchema, 'ability', input.abilities, (a) => a.identifier),
  };
}

export function validateTypeChart(input: unknown): TypeChart {
  const parsed = TypeChartSchema.safeParse(input);
  if (!parsed.success) throw new InvalidReferenceDataError('type chart', parsed.error.issues);
  return parsed.data;
}
