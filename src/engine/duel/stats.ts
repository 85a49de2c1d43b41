import { abilityOf } from './combatant'
import { InvalidStatError } from './errors'
import { terrainOf, weatherOf } from './field'
import { itemOf, useItem } from './items'
import { actives } from './state'
import { active } from './timers'
import type { Combatant, DuelState, StatName } from './types'

export const STAGE_MULTIPLIERS = [2 / 8, 2 / 7, 2 / 6, 2 / 5, 2 / 4, 2 / 3, 1, 1.5, 2, 2.5, 3, 3.5, 4] as const

export const STAT_NAMES: readonly StatName[] = [
  'attack', 'defense', 'special attack', 'special defense', 'speed', 'accuracy', 'evasion',
]

export type Crop = 'bottom' | 'top' | null

type BattleStat = 'attack' | 'defense' | 'special attack' | 'special defense' | 'speed'

export function parseStat(stat: string): StatName {
  const match = STAT_NAMES.find(s => s === stat)
  if (!match) throw new InvalidStatError(stat)
  return match
}

export function rawStat(base: number, iv: number, ev: number, nature: number, level: number): number {
  const points = 2 * base + iv + Math.floor(ev / 4)
  return Math.floor(Math.floor(points * level / 100 + 5) * nature)
}

export function rawHp(base: number, iv: number, ev: number, level: number): number {
  const points = 2 * base + iv + Math.floor(ev / 4)
  return Math.floor(points * level / 100) + level + 10
}

/**
 * Applies a stage to a raw stat. `bottom` ignores drops and `top` ignores boosts,
 * which is how critical hits see stages.
 */
export function stagedStat(raw: number, stage: number, crop: Crop = null): number {
  let s = clamp(stage, -6, 6)
  if (crop === 'bottom') s = Math.max(s, 0)
  if (crop === 'top') s = Math.min(s, 0)
  return raw * STAGE_MULTIPLIERS[s + 6]
}

function splitWith(stat: number, split: number | null): number {
  return split === null ? stat : Math.floor((stat + split) / 2)
}

function physicalSwapped(c: Combatant): boolean {
  return c.v.powerTrick !== c.v.powerShift
}

export function rawAttack(c: Combatant): number {
  if (physicalSwapped(c)) return plainDefense(c)
  return plainAttack(c)
}

export function rawDefense(c: Combatant): number {
  if (physicalSwapped(c)) return plainAttack(c)
  return plainDefense(c)
}

export function rawSpAtk(c: Combatant): number {
  if (c.v.powerShift) return plainSpDef(c)
  return plainSpAtk(c)
}

export function rawSpDef(c: Combatant): number {
  if (c.v.powerShift) return plainSpAtk(c)
  return plainSpDef(c)
}

export function rawSpeed(c: Combatant): number {
  return rawStat(c.base.speed, c.ivs.speed, c.evs.speed, c.nature.speed, c.level)
}

function plainAttack(c: Combatant) {
  return splitWith(rawStat(c.base.attack, c.ivs.attack, c.evs.attack, c.nature.attack, c.level), c.v.attackSplit)
}

function plainDefense(c: Combatant) {
  return splitWith(rawStat(c.base.defense, c.ivs.defense, c.evs.defense, c.nature.defense, c.level), c.v.defenseSplit)
}

function plainSpAtk(c: Combatant) {
  return splitWith(rawStat(c.base.spatk, c.ivs.spatk, c.evs.spatk, c.nature.spatk, c.level), c.v.spAtkSplit)
}

function plainSpDef(c: Combatant) {
  return splitWith(rawStat(c.base.spdef, c.ivs.spdef, c.evs.spdef, c.nature.spdef, c.level), c.v.spDefSplit)
}

/** The stat a "highest stat" ability or beast boost targets. Ties go to the earlier stat. */
export function highestStat(c: Combatant): BattleStat {
  const candidates: [BattleStat, number][] = [
    ['attack', rawAttack(c)],
    ['defense', rawDefense(c)],
    ['special attack', rawSpAtk(c)],
    ['special defense', rawSpDef(c)],
    ['speed', rawSpeed(c)],
  ]
  let best = candidates[0]
  for (const entry of candidates) {
    if (entry[1] > best[1]) best = entry
  }
  return best[0]
}

/**
 * Protosynthesis and quark drive. When the field does not power them, a held
 * booster energy is consumed once and keeps them powered until switch-out.
 */
function paradoxBoost(state: DuelState, c: Combatant, stat: BattleStat): boolean {
  const ability = abilityOf(c)
  if (ability !== 'protosynthesis' && ability !== 'quark-drive') return false
  if (highestStat(c) !== stat) return false
  const fieldPowered = ability === 'protosynthesis'
    ? weatherOf(state) === 'sun' || weatherOf(state) === 'h-sun'
    : terrainOf(state) === 'electric'
  if (fieldPowered || c.v.boosterEnergy) return true
  if (itemOf(state, c) === 'booster-energy') {
    useItem(c)
    c.v.boosterEnergy = true
    return true
  }
  return false
}

function ruinedBy(state: DuelState, c: Combatant, ability: string): boolean {
  return actives(state).some(o => o !== c && abilityOf(o) === ability)
}

function sunny(state: DuelState) {
  const w = weatherOf(state)
  return w === 'sun' || w === 'h-sun'
}

export function getAttack(state: DuelState, c: Combatant, critical = false): number {
  let attack = stagedStat(rawAttack(c), c.stages.attack, critical ? 'bottom' : null)
  const ability = abilityOf(c)
  const item = itemOf(state, c)
  if (ability === 'guts' && c.status.current) attack *= 1.5
  if (ability === 'slow-start' && c.activeTurns < 5) attack *= 0.5
  if (ability === 'huge-power' || ability === 'pure-power') attack *= 2
  if (ability === 'hustle') attack *= 1.5
  if (ability === 'defeatist' && c.hp <= c.startingHp / 2) attack *= 0.5
  if (ability === 'gorilla-tactics') attack *= 1.5
  if (ability === 'flower-gift' && sunny(state)) attack *= 1.5
  if (ability === 'orichalcum-pulse' && sunny(state)) attack *= 4 / 3
  if (item === 'choice-band') attack *= 1.5
  if (item === 'light-ball' && c.species === 'Pikachu') attack *= 2
  if (item === 'thick-club' && ['Cubone', 'Marowak', 'Marowak-alola'].includes(c.species)) attack *= 2
  if (ruinedBy(state, c, 'tablets-of-ruin')) attack *= 0.75
  if (paradoxBoost(state, c, 'attack')) attack *= 1.3
  return Math.trunc(attack)
}

export function getDefense(state: DuelState, c: Combatant, critical = false): number {
  const raw = active(state.field.wonderRoom) ? rawSpDef(c) : rawDefense(c)
  let defense = stagedStat(raw, c.stages.defense, critical ? 'top' : null)
  const ability = abilityOf(c)
  const item = itemOf(state, c)
  if (ability === 'marvel-scale' && c.status.current) defense *= 1.5
  if (ability === 'fur-coat') defense *= 2
  if (ability === 'grass-pelt' && terrainOf(state) === 'grassy') defense *= 1.5
  if (item === 'eviolite' && c.canStillEvolve) defense *= 1.5
  if (ruinedBy(state, c, 'sword-of-ruin')) defense *= 0.75
  if (paradoxBoost(state, c, 'defense')) defense *= 1.3
  return Math.trunc(defense)
}

export function getSpAtk(state: DuelState, c: Combatant, critical = false): number {
  let spatk = stagedStat(rawSpAtk(c), c.stages['special attack'], critical ? 'bottom' : null)
  const ability = abilityOf(c)
  const item = itemOf(state, c)
  if (ability === 'defeatist' && c.hp <= c.startingHp / 2) spatk *= 0.5
  if (ability === 'solar-power' && sunny(state)) spatk *= 1.5
  if (ability === 'hadron-engine' && terrainOf(state) === 'electric') spatk *= 4 / 3
  if (item === 'choice-specs') spatk *= 1.5
  if (item === 'deep-sea-tooth' && c.species === 'Clamperl') spatk *= 2
  if (item === 'light-ball' && c.species === 'Pikachu') spatk *= 2
  if (ruinedBy(state, c, 'vessel-of-ruin')) spatk *= 0.75
  if (paradoxBoost(state, c, 'special attack')) spatk *= 1.3
  return Math.trunc(spatk)
}

export function getSpDef(state: DuelState, c: Combatant, critical = false): number {
  const raw = active(state.field.wonderRoom) ? rawDefense(c) : rawSpDef(c)
  let spdef = stagedStat(raw, c.stages['special defense'], critical ? 'top' : null)
  const ability = abilityOf(c)
  const item = itemOf(state, c)
  if (weatherOf(state) === 'sandstorm' && c.types.includes('rock')) spdef *= 1.5
  if (ability === 'flower-gift' && sunny(state)) spdef *= 1.5
  if (item === 'deep-sea-scale' && c.species === 'Clamperl') spdef *= 2
  if (item === 'assault-vest') spdef *= 1.5
  if (item === 'eviolite' && c.canStillEvolve) spdef *= 1.5
  if (ruinedBy(state, c, 'beads-of-ruin')) spdef *= 0.75
  if (paradoxBoost(state, c, 'special defense')) spdef *= 1.3
  return Math.trunc(spdef)
}

export function getSpeed(state: DuelState, c: Combatant): number {
  let speed = stagedStat(rawSpeed(c), c.stages.speed)
  const ability = abilityOf(c)
  const item = itemOf(state, c)
  const weather = weatherOf(state)
  if (c.status.current === 'paralysis' && ability !== 'quick-feet') speed /= 2
  if (item === 'iron-ball') speed /= 2
  if (active(state.sides[c.owner].tailwind)) speed *= 2
  if (ability === 'slush-rush' && weather === 'hail') speed *= 2
  if (ability === 'sand-rush' && weather === 'sandstorm') speed *= 2
  if (ability === 'swift-swim' && (weather === 'rain' || weather === 'h-rain')) speed *= 2
  if (ability === 'chlorophyll' && (weather === 'sun' || weather === 'h-sun')) speed *= 2
  if (ability === 'slow-start' && c.activeTurns < 5) speed *= 0.5
  if (ability === 'unburden' && !c.heldItem.item && c.heldItem.everHadItem) speed *= 2
  if (ability === 'quick-feet' && c.status.current) speed *= 1.5
  if (ability === 'surge-surfer' && terrainOf(state) === 'electric') speed *= 2
  if (item === 'choice-scarf') speed *= 1.5
  if (paradoxBoost(state, c, 'speed')) speed *= 1.5
  return Math.trunc(speed)
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max)
}
