import { CONFIG } from '@config/store'
import { abilityOf } from './combatant'
import { eatBerry, itemOf, shouldEatBerryStatus } from './items'
import { from } from './narration'
import { randInt } from './rng'
import { appendStat } from './stages'
import { active, setTurns } from './timers'
import type { Combatant, DuelState, Move } from './types'

function shielded(target: Combatant, move: Move | null): boolean {
  return target.v.substitute > 0 && (move === null || move.substitute)
}

export function confuse(
  state: DuelState,
  target: Combatant,
  attacker: Combatant | null = null,
  move: Move | null = null,
  source = '',
): string {
  if (shielded(target, move)) return ''
  if (active(target.v.confusion)) return ''
  if (abilityOf(target, attacker, move) === 'own-tempo') return ''
  const { min, max } = CONFIG().confusionTurns
  setTurns(target.v.confusion, randInt(state.rng, min, max))
  let msg = `${target.name} is confused${from(source)}!\n`
  if (shouldEatBerryStatus(state, target)) msg += eatBerry(state, target, target, attacker, move)
  return msg
}

export function flinch(
  state: DuelState,
  target: Combatant,
  attacker: Combatant | null = null,
  move: Move | null = null,
  source = '',
): string {
  if (shielded(target, move)) return ''
  if (abilityOf(target, attacker, move) === 'inner-focus') {
    return `${target.name} resisted the urge to flinch with its inner focus!\n`
  }
  target.v.flinched = true
  let msg = `${target.name} flinched${from(source)}!\n`
  if (abilityOf(target) === 'steadfast') msg += appendStat(state, target, 1, target, null, 'speed', 'its steadfast')
  return msg
}

/**
 * Makes `target` fall for `attacker`. A destiny knot sends it back once;
 * the returned infatuation passes `checkLooping = false`.
 */
export function infatuate(
  state: DuelState,
  target: Combatant,
  attacker: Combatant,
  move: Move | null = null,
  source = '',
  checkLooping = true,
): string {
  if (target.gender.includes('-x') || attacker.gender.includes('-x')) return ''
  if (target.gender === attacker.gender) return ''
  const ability = abilityOf(target, attacker, move)
  if (ability === 'oblivious') return `${target.name} is too oblivious to fall in love!\n`
  if (ability === 'aroma-veil') return `${target.name}'s aroma veil protects it from being infatuated!\n`
  target.v.infatuated = attacker.id
  let msg = `${target.name} fell in love${from(source)}!\n`
  if (checkLooping && itemOf(state, target) === 'destiny-knot') {
    msg += infatuate(state, attacker, target, null, `${target.name}'s destiny knot`, false)
  }
  return msg
}
