import { abilityName } from './narration'
import { abilityOf, hasType } from './combatant'
import { itemOf, useItem } from './items'
import { remove } from './lifecycle'
import { validSwaps } from './side'
import { parseStat } from './stats'
import { actives, sideOf } from './state'
import { active } from './timers'
import type { Combatant, DuelState, Move, StatName } from './types'

const CLEAR_BODIES = new Set(['clear-body', 'white-smoke', 'full-metal-body'])

/** Abilities that shield one named stat, and what they say when they do. */
const STAT_GUARDS: Partial<Record<string, { stat: StatName; message: (name: string) => string }>> = {
  'hyper-cutter': { stat: 'attack', message: n => `${n}'s claws stayed sharp because of its hyper cutter!\n` },
  'keen-eye': { stat: 'accuracy', message: n => `${n}'s aim stayed true because of its keen eye!\n` },
  'minds-eye': { stat: 'accuracy', message: n => `${n}'s aim stayed true because of its mind's eye!\n` },
  'big-pecks': { stat: 'defense', message: n => `${n}'s defense stayed strong because of its big pecks!\n` },
}

function deltaMessage(name: string, stat: StatName, delta: number, src: string): string {
  switch (Math.min(Math.max(delta, -3), 3)) {
    case -3: return `${name}'s ${stat} severely fell${src}!\n`
    case -2: return `${name}'s ${stat} harshly fell${src}!\n`
    case -1: return `${name}'s ${stat} fell${src}!\n`
    case 1: return `${name}'s ${stat} rose${src}!\n`
    case 2: return `${name}'s ${stat} rose sharply${src}!\n`
    default: return `${name}'s ${stat} rose drastically${src}!\n`
  }
}

/**
 * Moves one of `target`'s stat stages by `delta`, keeping it within [-6, 6].
 *
 * `checkLooping` is false on calls made from inside another stat change
 * (mirror armor, opportunist) so those abilities cannot answer each other.
 */
export function appendStat(
  state: DuelState,
  target: Combatant,
  delta: number,
  attacker: Combatant | null,
  move: Move | null,
  stat: string,
  source = '',
  checkLooping = true,
): string {
  const name = target.name
  const key = parseStat(stat)
  if (target.v.substitute > 0 && attacker !== null && attacker !== target && (move === null || move.substitute)) {
    return ''
  }
  const src = source ? ` from ${source}` : ''
  const ability = abilityOf(target, attacker, move)
  if (ability === 'simple') delta *= 2
  if (ability === 'contrary') delta *= -1

  const current = target.stages[key]
  if (delta < 0) {
    delta = Math.max(delta, -6 - current)
    if (delta === 0) return `${name}'s ${key} won't go any lower!\n`
  } else {
    delta = Math.min(delta, 6 - current)
    if (delta === 0) return `${name}'s ${key} won't go any higher!\n`
  }

  let msg = ''
  if (delta < 0 && attacker !== target) {
    if (CLEAR_BODIES.has(ability)) {
      return `${name}'s ${abilityName(ability)} prevented its ${key} from being lowered!\n`
    }
    const guard = STAT_GUARDS[ability]
    if (guard && guard.stat === key) return guard.message(name)
    if (active(sideOf(state, target).mist) && (attacker === null || abilityOf(attacker) !== 'infiltrator')) {
      return `The mist around ${name}'s feet prevented its ${key} from being lowered!\n`
    }
    if (ability === 'flower-veil' && hasType(target, 'grass')) return ''
    if (ability === 'mirror-armor' && attacker !== null && checkLooping) {
      msg += `${name} reflected the stat change with its mirror armor!\n`
      msg += appendStat(state, attacker, delta, target, null, key, '', false)
      return msg
    }
  }

  if (delta > 0) target.v.statIncreased = true
  else target.v.statDecreased = true
  target.stages[key] += delta
  msg += deltaMessage(name, key, delta, src)

  if (delta < 0) {
    if (attacker !== target) {
      if (ability === 'defiant') msg += appendStat(state, target, 2, target, null, 'attack', 'its defiance')
      if (ability === 'competitive') {
        msg += appendStat(state, target, 2, target, null, 'special attack', 'its competitiveness')
      }
    }
    if (itemOf(state, target) === 'eject-pack' && validSwaps(state, target.owner, null, false).length > 0) {
      msg += `${name} is switched out by its eject pack!\n`
      useItem(target)
      msg += remove(state, target)
      sideOf(state, target).midTurnRemove = true
    }
    return msg
  }

  if (checkLooping) {
    for (const other of actives(state)) {
      if (other === target || abilityOf(other) !== 'opportunist') continue
      msg += `${other.name} seizes the opportunity to boost its stat with its opportunist!\n`
      msg += appendStat(state, other, delta, other, null, key, '', false)
    }
  }
  return msg
}
