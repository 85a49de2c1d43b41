import { CONFIG } from '@config/store'
import {
  AFTER_HIT, ATTACKER_AFTER_HIT, ATTACKER_CONTACT, CONTACT, CONTACT_AFTER_STEAL, CONTACT_STEAL, ON_HIT, fire,
  type ContactContext, type HitContext, type StrikeContext,
} from './abilities'
import { abilityOf, form } from './combatant'
import { eatBerry, itemOf, removeItem, shouldEatBerryDamage, useItem } from './items'
import { remove } from './lifecycle'
import { makesContact } from './moves'
import { from, moveName } from './narration'
import { applyStatus, resetStatus } from './nonvolatile'
import { chance } from './rng'
import { hasAlive } from './side'
import { appendStat } from './stages'
import { actives, sideOf } from './state'
import { highestStat } from './stats'
import { active, setTurns } from './timers'
import type { Combatant, DuelState, ElementType, Move } from './types'

export interface DamageOptions {
  move?: Move | null
  /** The type the move hit with, after any type-changing effects. */
  moveType?: ElementType | null
  attacker?: Combatant | null
  critical?: boolean
  /** Fraction of the damage dealt the attacker recovers. */
  drainHealRatio?: number | null
  source?: string
}

export interface DamageResult {
  msg: string
  /** HP actually removed from the target or its substitute. */
  dealt: number
}

export interface FaintOptions {
  move?: Move | null
  attacker?: Combatant | null
  source?: string
}

const RETREATERS: Partial<Record<string, string>> = {
  'wimp-out': 'wimped out and retreated',
  'emergency-exit': 'used the emergency exit and retreated',
}

export function damage(state: DuelState, target: Combatant, amount: number, opts: DamageOptions = {}): string {
  return dealDamage(state, target, amount, opts).msg
}

export function dealDamage(state: DuelState, target: Combatant, amount: number, opts: DamageOptions = {}): DamageResult {
  const move = opts.move ?? null
  const attacker = opts.attacker ?? null
  const src = from(opts.source)
  const name = target.name
  let msg = ''

  if (target.hp <= 0) return { msg: '', dealt: 0 }
  const previousHp = target.hp
  amount = Math.max(1, amount)

  if (abilityOf(target, attacker, move) === 'magic-guard' && move === null && attacker !== target) {
    return { msg: `${name}'s magic guard protected it from damage!\n`, dealt: 0 }
  }

  if (
    target.v.substitute > 0
    && move !== null && move.substitute && !move.sound
    && (attacker === null || abilityOf(attacker) !== 'infiltrator')
  ) {
    msg += `${name}'s substitute took ${amount} damage${src}!\n`
    const left = Math.max(0, target.v.substitute - amount)
    const absorbed = target.v.substitute - left
    target.v.substitute = left
    if (left === 0) msg += `${name}'s substitute broke!\n`
    return { msg, dealt: absorbed }
  }

  if (move !== null) {
    const ability = abilityOf(target, attacker, move)
    if (ability === 'disguise' && target.species === 'Mimikyu' && form(target, 'Mimikyu-busted')) {
      msg += `${target.name}'s disguise was busted!\n`
      msg += damage(state, target, Math.floor(target.startingHp / 8), { source: 'losing its disguise' })
      return { msg, dealt: 0 }
    }
    if (
      ability === 'ice-face' && target.species === 'Eiscue' && move.damageClass === 'physical'
      && form(target, 'Eiscue-noice')
    ) {
      return { msg: `${target.name}'s ice face was busted!\n`, dealt: 0 }
    }
  }

  target.v.dmgThisTurn = true
  if (amount >= target.hp && move !== null) {
    if (target.v.endure) {
      msg += `${name} endured the hit!\n`
      amount = target.hp - 1
    } else if (target.hp === target.startingHp && abilityOf(target, attacker, move) === 'sturdy') {
      msg += `${name} endured the hit with its Sturdy!\n`
      amount = target.hp - 1
    } else if (target.hp === target.startingHp && itemOf(state, target) === 'focus-sash') {
      msg += `${name} held on using its focus sash!\n`
      amount = target.hp - 1
      useItem(target)
    } else if (itemOf(state, target) === 'focus-band' && chance(state.rng, CONFIG().chances.focusBand)) {
      msg += `${name} held on using its focus band!\n`
      amount = target.hp - 1
    }
  }

  const half = Math.floor(target.startingHp / 2)
  const wasAboveHalf = target.hp > half
  const hp = Math.max(0, target.hp - amount)
  const dealt = target.hp - hp
  target.hp = hp
  const droppedBelowHalf = wasAboveHalf && hp <= half
  msg += `${name} took ${amount} damage${src}!\n`
  target.numHits++

  if (move !== null && hp > 0 && target.illusion) {
    msg += breakIllusion(target)
  }

  if (opts.drainHealRatio != null && attacker !== null) {
    let restored = Math.floor(dealt * opts.drainHealRatio)
    if (itemOf(state, attacker) === 'big-root') restored = Math.floor(restored * 1.3)
    if (abilityOf(target) === 'liquid-ooze') {
      msg += damage(state, attacker, restored, { source: `${name}'s liquid ooze` })
    } else {
      msg += heal(state, attacker, restored, opts.source || `${name}'s drained energy`)
    }
  }

  if (hp === 0) {
    msg += faint(state, target, { move, attacker })
    msg += afterKnockOut(state, target, attacker, move, previousHp)
    return { msg, dealt }
  }

  if (move !== null && opts.moveType != null) {
    const moveType = opts.moveType
    if (target.status.current === 'freeze' && (moveType === 'fire' || move.effect === 458 || move.effect === 500)) {
      resetStatus(target)
      msg += `${target.name} thawed out!\n`
    }
    const ctx: HitContext = {
      state, defender: target, attacker, move, moveType,
      critical: opts.critical ?? false,
      droppedBelowHalf,
    }
    msg += fire(ON_HIT, abilityOf(target), ctx)
    if (itemOf(state, target) === 'air-balloon') {
      removeItem(target)
      msg += `${target.name}'s air balloon popped!\n`
    }
  }

  if (move !== null) {
    target.v.lastMoveDamage = { amount, damageClass: move.damageClass }
    if (target.v.bide !== null) target.v.bide += amount
    if (target.v.rage) msg += appendStat(state, target, 1, target, null, 'attack', 'its rage')
    if (attacker !== null) {
      const ctx: StrikeContext = { state, defender: target, attacker, move, amount }
      msg += fire(AFTER_HIT, abilityOf(target), ctx)
      msg += fire(ATTACKER_AFTER_HIT, abilityOf(attacker), ctx)
      if (itemOf(state, attacker) === 'shell-bell' && (abilityOf(attacker) !== 'sheer-force' || move.effectChance === null)) {
        msg += heal(state, attacker, Math.floor(amount / 8), 'its shell bell')
      }
    }
  }

  const retreat = RETREATERS[abilityOf(target)]
  if (droppedBelowHalf && retreat && sideOf(state, target).party.filter(c => c.hp > 0).length > 1) {
    msg += `${target.name} ${retreat}!\n`
    msg += remove(state, target)
    sideOf(state, target).midTurnRemove = true
  }

  msg += spitPrey(state, target, attacker)

  if (shouldEatBerryDamage(state, target)) msg += eatBerry(state, target, target, attacker, move)

  if (move !== null && attacker !== null && makesContact(move, attacker)) {
    msg += contact(state, target, attacker, move, amount)
  }

  return { msg, dealt }
}

function breakIllusion(target: Combatant): string {
  if (!target.illusion) return ''
  target.species = target.illusion.species
  target.name = target.illusion.name
  target.illusion = null
  return `${target.name}'s illusion broke!\n`
}

function spitPrey(state: DuelState, target: Combatant, attacker: Combatant | null): string {
  if (attacker === null || !hasAlive(sideOf(state, target))) return ''
  const prey = target.species === 'Cramorant-gorging' ? 'pikachu'
    : target.species === 'Cramorant-gulping' ? 'arrokuda'
      : null
  if (prey === null || !form(target, 'Cramorant')) return ''
  const source = `${target.name} spitting out its ${prey}`
  let msg = damage(state, attacker, Math.floor(attacker.startingHp / 4), { source })
  if (prey === 'arrokuda') msg += appendStat(state, attacker, -1, target, null, 'defense', source)
  else msg += applyStatus(state, attacker, 'paralysis', { attacker: target, source })
  return msg
}

function contact(state: DuelState, target: Combatant, attacker: Combatant, move: Move, amount: number): string {
  const padded = itemOf(state, attacker) === 'protective-pads'
  const ctx: ContactContext = { state, defender: target, attacker, move, amount, padded }
  let msg = ''
  if (!padded) {
    if (target.v.beakBlast) {
      msg += applyStatus(state, attacker, 'burn', { attacker, source: `${target.name}'s charging beak blast` })
    }
    msg += fire(CONTACT, abilityOf(target), ctx)
    if (itemOf(state, target) === 'rocky-helmet' && hasAlive(sideOf(state, target))) {
      msg += damage(state, attacker, Math.floor(attacker.startingHp / 6), { source: `${target.name}'s rocky helmet` })
    }
  }
  msg += fire(CONTACT_STEAL, abilityOf(target), ctx)
  msg += fire(ATTACKER_CONTACT, abilityOf(attacker), ctx)
  msg += fire(CONTACT_AFTER_STEAL, abilityOf(target), ctx)
  return msg
}

function afterKnockOut(
  state: DuelState,
  target: Combatant,
  attacker: Combatant | null,
  move: Move | null,
  previousHp: number,
): string {
  if (attacker === null) return ''
  let msg = ''
  const ability = abilityOf(target)
  if (
    ability === 'aftermath' && attacker !== target && abilityOf(attacker) !== 'damp'
    && move !== null && makesContact(move, attacker)
  ) {
    msg += damage(state, attacker, Math.floor(attacker.startingHp / 4), { source: `${target.name}'s aftermath` })
  }
  if (abilityOf(attacker) === 'moxie') msg += appendStat(state, attacker, 1, attacker, null, 'attack', 'its moxie')
  if (abilityOf(attacker) === 'beast-boost') {
    msg += appendStat(state, attacker, 1, attacker, null, highestStat(attacker), 'its beast boost', false)
  }
  if (ability === 'innards-out') {
    msg += damage(state, attacker, previousHp, { attacker: target, source: `${target.name}'s innards out` })
  }
  return msg
}

/** Sets HP to zero regardless of survival effects, then clears the combatant off the field. */
export function faint(state: DuelState, c: Combatant, opts: FaintOptions = {}): string {
  const move = opts.move ?? null
  const attacker = opts.attacker ?? null
  c.hp = 0
  let msg = `${c.name} fainted${from(opts.source)}!\n`

  if (move !== null && attacker !== null && c.v.destinyBond && hasAlive(sideOf(state, attacker))) {
    msg += faint(state, attacker, { source: `${c.name}'s destiny bond` })
  }
  if (
    move !== null && attacker !== null && attacker.species === 'Greninja'
    && abilityOf(attacker) === 'battle-bond' && form(attacker, 'Greninja-ash')
  ) {
    msg += `${attacker.name}'s bond with its trainer has strengthened it!\n`
  }
  if (move !== null && c.v.grudge) {
    move.pp = 0
    msg += `${moveName(move.name)}'s pp was depleted!\n`
  }
  if (attacker !== null) {
    const ability = abilityOf(attacker)
    if (ability === 'chilling-neigh' || ability === 'as-one-ice') {
      msg += appendStat(state, attacker, 1, attacker, null, 'attack', 'its chilling neigh')
    }
    if (ability === 'grim-neigh' || ability === 'as-one-shadow') {
      msg += appendStat(state, attacker, 1, attacker, null, 'special attack', 'its grim neigh')
    }
  }
  for (const other of actives(state)) {
    if (other !== c && abilityOf(other) === 'soul-heart') {
      msg += appendStat(state, other, 1, other, null, 'special attack', 'its soul heart')
    }
  }

  const side = sideOf(state, c)
  setTurns(side.retaliate, 2)
  side.numFainted++
  msg += remove(state, c, true)
  return msg
}

export function heal(state: DuelState, c: Combatant, amount: number, source = ''): string {
  amount = Math.max(1, amount)
  if (c.hp >= c.startingHp) return ''
  if (c.hp === 0) return ''
  if (active(c.v.healBlock)) return ''
  amount = Math.min(c.startingHp - c.hp, amount)
  c.hp += amount
  return `${c.name} healed ${amount} hp${from(source)}!\n`
}
