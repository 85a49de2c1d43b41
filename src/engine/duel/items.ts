import { findItem } from '@content/registry'
import { abilityOf } from './combatant'
import { confuse } from './conditions'
import { heal } from './damage'
import { ItemLockedError } from './errors'
import { resetStatus } from './nonvolatile'
import { pick } from './rng'
import { appendStat } from './stages'
import { opponentOf } from './state'
import { active, setTurns } from './timers'
import type { Combatant, DuelState, Flavor, Move, StatName, StatusName } from './types'

/** Berries eaten once HP drops to a quarter. */
const PINCH_BERRIES = new Set([
  'figy-berry', 'wiki-berry', 'mago-berry', 'aguav-berry', 'iapapa-berry', 'apicot-berry',
  'ganlon-berry', 'lansat-berry', 'liechi-berry', 'micle-berry', 'petaya-berry',
  'salac-berry', 'starf-berry',
])

const FLAVOR_HEALERS: Record<string, Flavor> = {
  'figy-berry': 'spicy',
  'wiki-berry': 'dry',
  'mago-berry': 'sweet',
  'aguav-berry': 'bitter',
  'iapapa-berry': 'sour',
}

const STAT_BERRIES: Record<string, StatName> = {
  'apicot-berry': 'special defense',
  'ganlon-berry': 'defense',
  'liechi-berry': 'attack',
  'petaya-berry': 'special attack',
  'salac-berry': 'speed',
}

const STATUS_CURES: Record<string, { cures: StatusName[]; done: string }> = {
  'aspear-berry': { cures: ['freeze'], done: 'is no longer frozen' },
  'cheri-berry': { cures: ['paralysis'], done: 'is no longer paralyzed' },
  'chesto-berry': { cures: ['sleep'], done: 'woke up' },
  'pecha-berry': { cures: ['poison', 'b-poison'], done: 'is no longer poisoned' },
  'rawst-berry': { cures: ['burn'], done: 'is no longer burned' },
}

const STARF_STATS: readonly StatName[] = ['attack', 'defense', 'special attack', 'special defense', 'speed']

export function removable(item: string | null): boolean {
  if (item === null) return true
  return findItem(item)?.removable ?? true
}

function berryId(item: string | null): boolean {
  if (item === null) return false
  return findItem(item)?.berry ?? item.endsWith('-berry')
}

/** The held item as it currently takes effect, or null when suppressed. */
export function itemOf(state: DuelState, c: Combatant): string | null {
  const item = c.heldItem.item
  if (item === null) return null
  if (!removable(item)) return item
  if (active(c.v.embargo)) return null
  if (active(state.field.magicRoom)) return null
  if (abilityOf(c) === 'klutz') return null
  if (c.corrosiveGas) return null
  return item
}

export function hasItem(c: Combatant): boolean {
  return c.heldItem.item !== null
}

export function isBerry(state: DuelState, c: Combatant, onlyActive = true): boolean {
  return berryId(onlyActive ? itemOf(state, c) : c.heldItem.item)
}

function assertRemovable(c: Combatant) {
  const item = c.heldItem.item
  if (item !== null && !removable(item)) throw new ItemLockedError(item)
}

export function removeItem(c: Combatant): void {
  assertRemovable(c)
  c.heldItem.item = null
}

/** Consumes the held item, remembering it for recycle-style recovery. */
export function useItem(c: Combatant): void {
  assertRemovable(c)
  c.heldItem.lastUsed = c.heldItem.item
  c.v.choiceMove = null
  c.heldItem.item = null
}

export function giveItem(c: Combatant, item: string): void {
  c.heldItem.item = item
  c.heldItem.everHadItem = true
}

export function transferItem(from: Combatant, to: Combatant): void {
  assertRemovable(from)
  assertRemovable(to)
  to.heldItem.item = from.heldItem.item
  to.heldItem.everHadItem = to.heldItem.everHadItem || to.heldItem.item !== null
  from.heldItem.item = null
}

export function swapItems(a: Combatant, b: Combatant): void {
  assertRemovable(a)
  assertRemovable(b)
  const held = a.heldItem.item
  a.heldItem.item = b.heldItem.item
  b.heldItem.item = held
  a.v.choiceMove = null
  b.v.choiceMove = null
  a.heldItem.everHadItem = a.heldItem.everHadItem || a.heldItem.item !== null
  b.heldItem.everHadItem = b.heldItem.everHadItem || b.heldItem.item !== null
}

/** Takes back the last item `from` used up. `from` may be the same combatant. */
export function recoverItem(c: Combatant, from: Combatant): void {
  c.heldItem.item = from.heldItem.lastUsed
  from.heldItem.lastUsed = null
  c.heldItem.everHadItem = c.heldItem.everHadItem || c.heldItem.item !== null
}

function canEatBerry(state: DuelState, c: Combatant): boolean {
  if (c.hp === 0) return false
  const other = opponentOf(state, c)
  if (other) {
    const blocker = abilityOf(other)
    if (blocker === 'unnerve' || blocker === 'as-one-shadow' || blocker === 'as-one-ice') return false
  }
  return isBerry(state, c)
}

export function shouldEatBerryDamage(state: DuelState, c: Combatant): boolean {
  if (!canEatBerry(state, c)) return false
  const item = itemOf(state, c)
  if (c.hp <= Math.floor(c.startingHp / 4) && item !== null && PINCH_BERRIES.has(item)) return true
  if (c.hp <= Math.floor(c.startingHp / 2)) {
    if (abilityOf(c) === 'gluttony') return true
    if (item === 'sitrus-berry') return true
  }
  return false
}

export function shouldEatBerryStatus(state: DuelState, c: Combatant): boolean {
  if (!canEatBerry(state, c)) return false
  const status = c.status.current
  switch (itemOf(state, c)) {
    case 'lum-berry':
      return status !== null || active(c.v.confusion)
    case 'aspear-berry':
      return status === 'freeze'
    case 'cheri-berry':
      return status === 'paralysis'
    case 'chesto-berry':
      return status === 'sleep'
    case 'pecha-berry':
      return status === 'poison' || status === 'b-poison'
    case 'rawst-berry':
      return status === 'burn'
    case 'persim-berry':
      return active(c.v.confusion)
    default:
      return false
  }
}

export function shouldEatBerry(state: DuelState, c: Combatant): boolean {
  return shouldEatBerryDamage(state, c) || shouldEatBerryStatus(state, c)
}

function cureMessage(consumer: Combatant, cured: boolean, done: string): string {
  if (!cured) return `${consumer.name}'s berry had no effect!\n`
  return `${consumer.name} ${done} after eating its berry!\n`
}

/**
 * Eats `owner`'s berry. The consumer is the owner unless a move such as bug bite
 * lets another combatant eat it.
 */
export function eatBerry(
  state: DuelState,
  owner: Combatant,
  consumer: Combatant = owner,
  attacker: Combatant | null = null,
  move: Move | null = null,
): string {
  if (!isBerry(state, owner)) return ''
  const berry = itemOf(state, owner)
  if (berry === null) return ''
  let msg = consumer === owner ? '' : `${consumer.name} eats ${owner.name}'s berry!\n`
  const ripe = abilityOf(consumer, attacker, move) === 'ripen' ? 2 : 1
  const status = consumer.status.current

  if (berry === 'sitrus-berry') {
    msg += heal(state, consumer, Math.floor(ripe * consumer.startingHp / 4), 'eating its berry')
  } else if (Object.hasOwn(FLAVOR_HEALERS, berry)) {
    msg += heal(state, consumer, Math.floor(ripe * consumer.startingHp / 3), 'eating its berry')
  } else if (Object.hasOwn(STAT_BERRIES, berry)) {
    msg += appendStat(state, consumer, ripe, attacker, move, STAT_BERRIES[berry], 'eating its berry')
  } else if (berry === 'lansat-berry') {
    consumer.v.lansatBerryAte = true
    msg += `${consumer.name} is powered up by eating its berry.\n`
  } else if (berry === 'micle-berry') {
    consumer.v.micleBerryAte = true
    msg += `${consumer.name} is powered up by eating its berry.\n`
  } else if (berry === 'starf-berry') {
    const stat = pick(state.rng, STARF_STATS)
    msg += appendStat(state, consumer, ripe * 2, attacker, move, stat, 'eating its berry', false)
  } else if (Object.hasOwn(STATUS_CURES, berry)) {
    const { cures, done } = STATUS_CURES[berry]
    const cured = status !== null && cures.includes(status)
    if (cured) resetStatus(consumer)
    msg += cureMessage(consumer, cured, done)
  } else if (berry === 'persim-berry') {
    const confused = active(consumer.v.confusion)
    if (confused) setTurns(consumer.v.confusion, 0)
    msg += cureMessage(consumer, confused, 'is no longer confused')
  } else if (berry === 'lum-berry') {
    resetStatus(consumer)
    setTurns(consumer.v.confusion, 0)
    msg += `${consumer.name}'s statuses were cleared from eating its berry!\n`
  }
  const flavor = Object.hasOwn(FLAVOR_HEALERS, berry) ? FLAVOR_HEALERS[berry] : null
  if (flavor !== null && consumer.dislikedFlavor === flavor) {
    msg += confuse(state, consumer, attacker, move, "disliking its berry's flavor")
  }
  if (abilityOf(consumer, attacker, move) === 'cheek-pouch') {
    msg += heal(state, consumer, Math.floor(consumer.startingHp / 3), 'its cheek pouch')
  }

  consumer.lastBerry = berry
  consumer.ateBerry = true
  if (abilityOf(consumer, attacker, move) === 'cud-chew') setTurns(consumer.v.cudChew, 2)
  if (consumer === owner) useItem(owner)
  else removeItem(owner)
  return msg
}
