import { abilityOf, hasType } from './combatant'
import { confuse, flinch, infatuate } from './conditions'
import { damage, dealDamage, heal } from './damage'
import { effectiveness } from './effectiveness'
import { weatherOf } from './field'
import { itemOf } from './items'
import { moveName } from './narration'
import { applyStatus, resetStatus } from './nonvolatile'
import { chance, randInt } from './rng'
import { hasAlive } from './side'
import { appendStat } from './stages'
import { sideOf } from './state'
import { getAttack, getDefense, getSpAtk, getSpDef } from './stats'
import { active, tick } from './timers'
import type { Combatant, DuelState, ElementType, Move, MoveTemplate } from './types'

export const STRUGGLE_ID = 165
const STRUGGLE_EFFECT = 255
const OHKO = 39
const ALWAYS_CRIT = 289

const CRIT_ODDS = [24, 8, 2, 1] as const
const ACCURACY_MULTIPLIERS = [
  3 / 9, 3 / 8, 3 / 7, 3 / 6, 3 / 5, 3 / 4, 1, 4 / 3, 5 / 3, 2, 7 / 3, 8 / 3, 3,
] as const
/** Two and three hits are the likeliest for a two-to-five hit move. */
const HIT_WEIGHTS = [2, 2, 2, 2, 2, 2, 2, 3, 3, 3, 3, 3, 3, 3, 4, 4, 4, 5, 5, 5] as const

const CHOICE_ITEMS = new Set(['choice-scarf', 'choice-band', 'choice-specs'])
/** Moves that thaw their user before it tries to act. */
const THAWING_EFFECTS = new Set([5, 126, 168, 254, 336, 398, 458, 500])

export function makeMove(template: MoveTemplate): Move {
  return {
    ...template,
    statChanges: template.statChanges.map(s => ({ ...s })),
    startingPp: template.pp,
    used: false,
  }
}

export function copyMove(move: Move): Move {
  return { ...move, statChanges: move.statChanges.map(s => ({ ...s })) }
}

export function struggle(): Move {
  return makeMove({
    id: STRUGGLE_ID,
    name: 'struggle',
    effect: STRUGGLE_EFFECT,
    type: 'typeless',
    damageClass: 'physical',
    power: 50,
    accuracy: null,
    pp: 1 << 30,
    priority: 0,
    effectChance: null,
    critRate: 0,
    minHits: null,
    maxHits: null,
    target: 'opponent',
    contact: true,
    sound: false,
    substitute: true,
    wind: false,
    healBlock: false,
    statChanges: [],
    ailment: null,
    drain: 0,
    healing: 0,
  })
}

export function makesContact(move: Move, attacker: Combatant): boolean {
  return move.contact && abilityOf(attacker) !== 'long-reach'
}

/** Tracks consecutive uses for the metronome item. */
export function useMetronome(c: Combatant, name: string): void {
  if (c.v.metronome.move === name) {
    c.v.metronome.count++
  } else {
    c.v.metronome.move = name
    c.v.metronome.count = 1
  }
}

export function metronomeBuff(c: Combatant, name: string): number {
  if (c.v.metronome.move !== name) return 1
  return Math.min(2, 1 + 0.2 * c.v.metronome.count)
}

/** The type the move strikes with once the attacker's ability has had its say. */
export function moveTypeOf(move: Move, attacker: Combatant): ElementType {
  if (abilityOf(attacker) === 'normalize' && move.type !== 'typeless') return 'normal'
  return move.type
}

export function priorityOf(attacker: Combatant, move: Move): number {
  let priority = move.priority
  const ability = abilityOf(attacker)
  if (ability === 'prankster' && move.damageClass === 'status') priority++
  if (ability === 'gale-wings' && move.type === 'flying' && attacker.hp === attacker.startingHp) priority++
  if (ability === 'triage' && (move.healing > 0 || move.drain > 0)) priority += 3
  return priority
}

function checkHit(state: DuelState, attacker: Combatant, defender: Combatant, move: Move): boolean {
  if (move.accuracy === null) return true
  if (abilityOf(attacker) === 'no-guard' || abilityOf(defender, attacker, move) === 'no-guard') return true
  if (defender.v.mindReader.item === attacker.id && active(defender.v.mindReader)) return true
  if (move.effect === OHKO) return chance(state.rng, 30 + attacker.level - defender.level)

  let stage = abilityOf(defender, attacker, move) === 'unaware' ? 0 : attacker.stages.accuracy
  const ignoresEvasion = defender.v.foresight || defender.v.miracleEye
    || ['unaware', 'keen-eye', 'minds-eye'].includes(abilityOf(attacker))
  if (!ignoresEvasion) stage -= defender.stages.evasion
  stage = Math.min(6, Math.max(-6, stage))

  let accuracy = move.accuracy * ACCURACY_MULTIPLIERS[stage + 6]
  const weather = weatherOf(state)
  const defAbility = abilityOf(defender, attacker, move)
  if (defAbility === 'sand-veil' && weather === 'sandstorm') accuracy *= 0.8
  if (defAbility === 'snow-cloak' && weather === 'hail') accuracy *= 0.8
  if (abilityOf(attacker) === 'compound-eyes') accuracy *= 1.3
  if (abilityOf(attacker) === 'hustle' && move.damageClass === 'physical') accuracy *= 0.8
  if (active(state.field.gravity)) accuracy *= 5 / 3
  if (itemOf(state, attacker) === 'wide-lens') accuracy *= 1.1
  if (itemOf(state, defender) === 'bright-powder') accuracy *= 0.9
  return chance(state.rng, accuracy)
}

function rollHits(state: DuelState, attacker: Combatant, move: Move): number {
  if (move.minHits === null || move.maxHits === null) return 1
  let min = move.minHits
  const max = move.maxHits
  if (abilityOf(attacker) === 'skill-link') min = max
  else if (itemOf(state, attacker) === 'loaded-dice' && max >= 4 && min < 4) min = 4
  if (min === 2 && max === 5) return HIT_WEIGHTS[randInt(state.rng, 0, HIT_WEIGHTS.length - 1)]
  return randInt(state.rng, min, max)
}

function rollCritical(state: DuelState, attacker: Combatant, defender: Combatant, move: Move): boolean {
  const defAbility = abilityOf(defender, attacker, move)
  if (defAbility === 'shell-armor' || defAbility === 'battle-armor') return false
  if (active(defender.v.luckyChant)) return false
  if (move.effect === ALWAYS_CRIT || active(attacker.v.laserFocus)) return true
  let stage = move.critRate
  const item = itemOf(state, attacker)
  if (item === 'scope-lens' || item === 'razor-claw') stage++
  if (abilityOf(attacker) === 'super-luck') stage++
  if (attacker.v.focusEnergy) stage += 2
  if (attacker.v.lansatBerryAte) stage += 2
  stage = Math.min(3, Math.max(0, stage))
  return randInt(state.rng, 1, CRIT_ODDS[stage]) === 1
}

/** Damage for one hit before the defender's survival checks. */
function hitDamage(
  state: DuelState,
  attacker: Combatant,
  defender: Combatant,
  move: Move,
  moveType: ElementType,
  eff: number,
  critical: boolean,
): number {
  const physical = move.damageClass === 'physical'
  const a = physical ? getAttack(state, attacker, critical) : getSpAtk(state, attacker, critical)
  const d = Math.max(1, physical ? getDefense(state, defender, critical) : getSpDef(state, defender, critical))
  const power = move.power ?? 0

  let dmg = ((2 * attacker.level) / 5 + 2) * power * (a / d) / 50 + 2
  if (critical) dmg *= 1.5

  const weather = weatherOf(state)
  const rainy = weather === 'rain' || weather === 'h-rain'
  const sunny = weather === 'sun' || weather === 'h-sun'
  if (moveType === 'water' && rainy) dmg *= 1.5
  if (moveType === 'fire' && rainy) dmg *= 0.5
  if (moveType === 'fire' && sunny) dmg *= 1.5
  if (moveType === 'water' && sunny) dmg *= 0.5

  if (hasType(attacker, moveType)) dmg *= abilityOf(attacker) === 'adaptability' ? 2 : 1.5
  dmg *= eff

  if (attacker.status.current === 'burn' && physical && abilityOf(attacker) !== 'guts') dmg *= 0.5

  const screens = sideOf(state, defender)
  if (!critical && abilityOf(attacker) !== 'infiltrator') {
    if (active(screens.auroraVeil)) dmg *= 0.5
    else if (active(screens.lightScreen) && !physical) dmg *= 0.5
    else if (active(screens.reflect) && physical) dmg *= 0.5
  }

  const defAbility = abilityOf(defender, attacker, move)
  if (['filter', 'prism-armor', 'solid-rock'].includes(defAbility) && eff > 1) dmg *= 0.75
  if (defAbility === 'thick-fat' && (moveType === 'fire' || moveType === 'ice')) dmg *= 0.5
  if (abilityOf(attacker) === 'tinted-lens' && eff < 1) dmg *= 2
  if ((defAbility === 'multiscale' || defAbility === 'shadow-shield') && defender.hp === defender.startingHp) {
    dmg *= 0.5
  }

  const item = itemOf(state, attacker)
  if (item === 'expert-belt' && eff > 1) dmg *= 1.2
  if (item === 'life-orb') dmg *= 1.3
  if (item === 'metronome') dmg *= metronomeBuff(attacker, move.name)

  dmg *= randInt(state.rng, 85, 100) / 100
  return Math.max(1, Math.trunc(dmg))
}

function secondaryEffects(state: DuelState, attacker: Combatant, defender: Combatant, move: Move): string {
  if (move.statChanges.length === 0 && move.ailment === null) return ''
  if (move.damageClass !== 'status') {
    if (abilityOf(attacker) === 'sheer-force' && move.effectChance !== null) return ''
    if (move.effectChance !== null) {
      const odds = abilityOf(attacker) === 'serene-grace' ? move.effectChance * 2 : move.effectChance
      if (!chance(state.rng, odds)) return ''
    }
  }
  let msg = ''
  for (const change of move.statChanges) {
    const target = change.target === 'user' ? attacker : defender
    if (target.hp === 0) continue
    if (target !== attacker && abilityOf(target, attacker, move) === 'shield-dust') continue
    msg += appendStat(state, target, change.change, attacker, move, change.stat, '')
  }
  if (move.ailment !== null && defender.hp > 0) {
    if (move.damageClass !== 'status' && abilityOf(defender, attacker, move) === 'shield-dust') return msg
    switch (move.ailment) {
      case 'confusion':
        msg += confuse(state, defender, attacker, move)
        break
      case 'flinch':
        msg += flinch(state, defender, attacker, move)
        break
      case 'infatuation':
        msg += infatuate(state, defender, attacker, move)
        break
      default:
        msg += applyStatus(state, defender, move.ailment, { attacker, move })
    }
  }
  return msg
}

/** Typeless physical hit a confused combatant lands on itself. */
const CONFUSION_HIT: Move = makeMove({
  id: 0xcfcf,
  name: 'confusion damage',
  effect: 1,
  type: 'typeless',
  damageClass: 'physical',
  power: 40,
  accuracy: null,
  pp: 1,
  priority: 0,
  effectChance: null,
  critRate: 0,
  minHits: null,
  maxHits: null,
  target: 'user',
  contact: false,
  sound: false,
  substitute: false,
  wind: false,
  healBlock: false,
  statChanges: [],
  ailment: null,
  drain: 0,
  healing: 0,
})

export interface ActCheck {
  msg: string
  canAct: boolean
}

/** Conditions that stop a combatant from acting this turn. Sleep and confusion count down here. */
export function checkCanAct(state: DuelState, attacker: Combatant, defender: Combatant | null, move: Move): ActCheck {
  let msg = ''
  const stop = (line: string): ActCheck => {
    if (attacker.v.lockedMove?.move === move) attacker.v.lockedMove = null
    return { msg: msg + line, canAct: false }
  }

  if (attacker.status.current === 'freeze') {
    if (THAWING_EFFECTS.has(move.effect)) {
      resetStatus(attacker)
      msg += `${attacker.name} thawed out!\n`
    } else if (randInt(state.rng, 0, 4) === 0) {
      resetStatus(attacker)
      msg += `${attacker.name} is no longer frozen!\n`
    } else {
      return stop(`${attacker.name} is frozen solid!\n`)
    }
  }
  if (attacker.status.current === 'paralysis' && randInt(state.rng, 0, 3) === 0) {
    return stop(`${attacker.name} is paralyzed! It can't move!\n`)
  }
  if (defender !== null && attacker.v.infatuated === defender.id && randInt(state.rng, 0, 1) === 0) {
    return stop(`${attacker.name} is in love with ${defender.name} and can't bare to hurt them!\n`)
  }
  if (attacker.v.flinched) return stop(`${attacker.name} flinched! It can't move!\n`)
  if (attacker.status.current === 'sleep') {
    if (tick(attacker.status.sleep)) {
      resetStatus(attacker)
      msg += `${attacker.name} woke up!\n`
    } else if (abilityOf(attacker) !== 'comatose') {
      return stop(`${attacker.name} is fast asleep!\n`)
    }
  }
  if (tick(attacker.v.confusion)) msg += `${attacker.name} is no longer confused!\n`
  if (active(attacker.v.confusion) && randInt(state.rng, 0, 2) === 0) {
    msg += `${attacker.name} hurt itself in its confusion!\n`
    const amount = hitDamage(state, attacker, attacker, CONFUSION_HIT, 'typeless', 1, false)
    return stop(damage(state, attacker, amount, { attacker }))
  }
  if (abilityOf(attacker) === 'truant' && attacker.v.truantTurn % 2 === 1) {
    return stop(`${attacker.name} is loafing around!\n`)
  }
  return { msg, canAct: true }
}

function lockChoice(state: DuelState, attacker: Combatant, move: Move): void {
  if (attacker.v.choiceMove !== null) return
  const item = itemOf(state, attacker)
  if ((item !== null && CHOICE_ITEMS.has(item)) || abilityOf(attacker) === 'gorilla-tactics') {
    attacker.v.choiceMove = move
  }
}

/**
 * Resolves one use of `move` by `attacker` against `defender`: PP, accuracy,
 * the damage roll per hit and the move's catalog side effects.
 */
export function useMove(state: DuelState, attacker: Combatant, defender: Combatant | null, move: Move): string {
  attacker.hasMoved = true
  attacker.v.lastMove = move
  attacker.v.lastMoveFailed = false
  const check = checkCanAct(state, attacker, defender, move)
  if (!check.canAct) {
    attacker.v.lastMoveFailed = true
    return check.msg
  }
  let msg = `${check.msg}${attacker.name} used ${moveName(move.name)}!\n`
  useMetronome(attacker, move.name)

  if (move.id !== STRUGGLE_ID) {
    let cost = 1
    if (defender !== null && move.target === 'opponent' && abilityOf(defender) === 'pressure') cost++
    move.pp = Math.max(0, move.pp - cost)
    if (move.pp === 0) msg += 'It ran out of PP!\n'
  }
  move.used = true
  lockChoice(state, attacker, move)

  if (move.damageClass === 'status') {
    if (move.healing > 0) {
      msg += heal(state, attacker, Math.floor((attacker.startingHp * move.healing) / 100))
    }
    if (move.target === 'opponent' && (defender === null || defender.hp === 0)) {
      attacker.v.lastMoveFailed = true
      return `${msg}But it failed!\n`
    }
    if (defender !== null && move.target === 'opponent' && !checkHit(state, attacker, defender, move)) {
      attacker.v.lastMoveFailed = true
      return `${msg}But it missed!\n`
    }
    const target = move.target === 'opponent' && defender !== null ? defender : attacker
    msg += secondaryEffects(state, attacker, target, move)
    return msg
  }

  if (defender === null || defender.hp === 0) {
    attacker.v.lastMoveFailed = true
    return `${msg}But it failed!\n`
  }
  if (defender.v.protect) {
    attacker.v.lastMoveFailed = true
    return `${msg}${defender.name} was protected against the attack!\n`
  }
  if (!checkHit(state, attacker, defender, move)) {
    attacker.v.lastMoveFailed = true
    return `${msg}But it missed!\n`
  }

  const moveType = moveTypeOf(move, attacker)
  const eff = effectiveness(state, moveType, defender, attacker, move)
  if (eff <= 0) {
    attacker.v.lastMoveFailed = true
    return `${msg}The attack had no effect!\n`
  }
  if (eff <= 0.5) msg += "It's not very effective...\n"
  else if (eff >= 2) msg += "It's super effective!\n"

  const drainHealRatio = move.drain > 0 ? move.drain / 100 : null
  const hits = rollHits(state, attacker, move)
  let total = 0
  let landed = 0
  for (let hit = 0; hit < hits; hit++) {
    if (defender.hp === 0 || attacker.hp === 0) break
    const critical = rollCritical(state, attacker, defender, move)
    if (critical) msg += 'A critical hit!\n'
    const amount = hitDamage(state, attacker, defender, move, moveType, eff, critical)
    const result = dealDamage(state, defender, amount, { move, moveType, attacker, critical, drainHealRatio })
    msg += result.msg
    total += result.dealt
    landed++
  }
  if (hits > 1) msg += `Hit ${landed} time(s)!\n`

  if (attacker.hp > 0) {
    if (move.drain < 0 && abilityOf(attacker) !== 'rock-head' && total > 0 && hasAlive(sideOf(state, defender))) {
      msg += damage(state, attacker, Math.floor((total * -move.drain) / 100), { source: 'recoil' })
    }
    if (move.id === STRUGGLE_ID) {
      msg += damage(state, attacker, Math.floor(attacker.startingHp / 4), { source: 'recoil' })
    }
  }
  if (attacker.hp > 0 && defender.hp > 0) msg += secondaryEffects(state, attacker, defender, move)
  if (
    attacker.hp > 0 && total > 0 && itemOf(state, attacker) === 'life-orb'
    && abilityOf(attacker) !== 'magic-guard'
  ) {
    msg += damage(state, attacker, Math.floor(attacker.startingHp / 10), { source: 'its life orb' })
  }
  return msg
}
