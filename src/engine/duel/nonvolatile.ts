import { CONFIG } from '@config/store'
import { abilityOf, grounded, hasType } from './combatant'
import { confuse } from './conditions'
import { damage, heal } from './damage'
import { terrainOf, weatherOf } from './field'
import { eatBerry, shouldEatBerryStatus } from './items'
import { abilityName, from } from './narration'
import { randInt } from './rng'
import { actives, sideOf } from './state'
import { active, setTurns } from './timers'
import type { Combatant, DuelState, Move, StatusName } from './types'

export interface ApplyStatusOptions {
  attacker?: Combatant | null
  move?: Move | null
  /** Fixed sleep length; rolled from config when absent. */
  turns?: number
  /** Overwrites an existing status. */
  force?: boolean
  source?: string
  /** False on the synchronize bounce so it cannot echo back. */
  checkLooping?: boolean
}

export function resetStatus(c: Combatant) {
  c.status.current = null
  c.status.badlyPoisonedTurn = 0
  setTurns(c.status.sleep, 0)
  c.v.nightmare = false
}

export function isAsleep(c: Combatant): boolean {
  return abilityOf(c) === 'comatose' || c.status.current === 'sleep'
}

export function isPoisoned(c: Combatant): boolean {
  return c.status.current === 'poison' || c.status.current === 'b-poison'
}

function rejection(state: DuelState, target: Combatant, status: StatusName, attacker: Combatant | null, move: Move | null): string | null {
  const name = target.name
  const ability = abilityOf(target, attacker, move)
  const weather = weatherOf(state)
  if (ability === 'comatose') return `${name} already has a status, it can't get ${status} too!\n`
  if (ability === 'purifying-salt') return `${name}'s purifying salt protects it from being inflicted with ${status}!\n`
  if (ability === 'leaf-guard' && (weather === 'sun' || weather === 'h-sun')) {
    return `${name}'s leaf guard protects it from being inflicted with ${status}!\n`
  }
  if (target.v.substitute > 0 && attacker !== target && (move === null || move.substitute)) {
    return `${name}'s substitute protects it from being inflicted with ${status}!\n`
  }
  if (
    active(sideOf(state, target).safeguard)
    && attacker !== target
    && (attacker === null || abilityOf(attacker) !== 'infiltrator')
  ) {
    return `${name}'s safeguard protects it from being inflicted with ${status}!\n`
  }
  if (grounded(state, target, attacker, move) && terrainOf(state) === 'misty') {
    return `The misty terrain protects ${name} from being inflicted with ${status}!\n`
  }
  if (ability === 'flower-veil' && hasType(target, 'grass')) {
    return `${name}'s flower veil protects it from being inflicted with ${status}!\n`
  }
  if (target.species === 'Minior') return "Minior's hard shell protects it from status effects!\n"
  return null
}

/**
 * Tries to inflict a non-volatile status. Immunities are reported in the
 * narration and leave the target untouched.
 */
export function applyStatus(state: DuelState, target: Combatant, status: StatusName, opts: ApplyStatusOptions = {}): string {
  const attacker = opts.attacker ?? null
  const move = opts.move ?? null
  const checkLooping = opts.checkLooping ?? true
  const src = from(opts.source)
  const name = target.name
  const ability = abilityOf(target, attacker, move)
  const pretty = abilityName(target.ability)
  let msg = ''

  if (target.status.current && !opts.force) return `${name} already has a status, it can't get ${status} too!\n`
  const blocked = rejection(state, target, status, attacker, move)
  if (blocked) return blocked

  switch (status) {
    case 'burn':
      if (hasType(target, 'fire')) return `${name} is a fire type and can't be burned!\n`
      if (ability === 'water-veil' || ability === 'water-bubble') {
        return `${name}'s ${pretty} prevents it from getting burned!\n`
      }
      target.status.current = status
      msg += `${name} was burned${src}!\n`
      break
    case 'sleep': {
      if (ability === 'insomnia' || ability === 'vital-spirit' || ability === 'sweet-veil') {
        return `${name}'s ${pretty} keeps it awake!\n`
      }
      if (grounded(state, target, attacker, move) && terrainOf(state) === 'electric') {
        return `The terrain is too electric for ${name} to fall asleep!\n`
      }
      if (actives(state).some(c => active(c.v.uproar))) {
        return `An uproar keeps ${name} from falling asleep!\n`
      }
      const range = CONFIG().sleepTurns
      let turns = opts.turns ?? randInt(state.rng, range.min, range.max)
      if (ability === 'early-bird') turns = Math.floor(turns / 2)
      target.status.current = status
      setTurns(target.status.sleep, turns)
      msg += `${name} fell asleep${src}!\n`
      break
    }
    case 'poison':
    case 'b-poison':
      if (attacker === null || abilityOf(attacker) !== 'corrosion') {
        if (hasType(target, 'steel')) return `${name} is a steel type and can't be poisoned!\n`
        if (hasType(target, 'poison')) return `${name} is a poison type and can't be poisoned!\n`
      }
      if (ability === 'immunity' || ability === 'pastel-veil') {
        return `${name}'s ${pretty} keeps it from being poisoned!\n`
      }
      target.status.current = status
      msg += `${name} was${status === 'b-poison' ? ' badly' : ''} poisoned${src}!\n`
      if (move && attacker && abilityOf(attacker) === 'poison-puppeteer') {
        msg += confuse(state, target, attacker, null, `${attacker.name}'s poison puppeteer`)
      }
      break
    case 'paralysis':
      if (hasType(target, 'electric')) return `${name} is an electric type and can't be paralyzed!\n`
      if (ability === 'limber') return `${name}'s limber keeps it from being paralyzed!\n`
      target.status.current = status
      msg += `${name} was paralyzed${src}!\n`
      break
    case 'freeze': {
      if (hasType(target, 'ice')) return `${name} is an ice type and can't be frozen!\n`
      if (ability === 'magma-armor') return `${name}'s magma armor keeps it from being frozen!\n`
      const weather = weatherOf(state)
      if (weather === 'sun' || weather === 'h-sun') return `It's too sunny to freeze ${name}!\n`
      target.status.current = status
      msg += `${name} was frozen solid${src}!\n`
      break
    }
  }

  if (checkLooping && ability === 'synchronize' && attacker && attacker !== target) {
    msg += applyStatus(state, attacker, status, {
      attacker: target,
      source: `${name}'s synchronize`,
      checkLooping: false,
    })
  }
  if (shouldEatBerryStatus(state, target)) {
    msg += eatBerry(state, target, target, attacker, move)
  }
  return msg
}

/** End-of-turn progression: natural cures, then status damage. */
export function statusNextTurn(state: DuelState, c: Combatant): string {
  const current = c.status.current
  if (!current) return ''
  if (current === 'b-poison') c.status.badlyPoisonedTurn++

  const ability = abilityOf(c)
  const weather = weatherOf(state)
  if (ability === 'hydration' && (weather === 'rain' || weather === 'h-rain')) {
    resetStatus(c)
    return `${c.name}'s hydration cured its ${current}!\n`
  }
  if (ability === 'shed-skin' && randInt(state.rng, 1, CONFIG().chances.shedSkinOneIn) === 1) {
    resetStatus(c)
    return `${c.name}'s shed skin cured its ${current}!\n`
  }

  switch (current) {
    case 'burn': {
      let amount = Math.max(1, Math.floor(c.startingHp / 16))
      if (ability === 'heatproof') amount = Math.floor(amount / 2)
      return damage(state, c, amount, { source: 'its burn' })
    }
    case 'b-poison': {
      if (ability === 'poison-heal') return heal(state, c, Math.floor(c.startingHp / 8), 'its poison heal')
      const amount = Math.max(1, Math.floor(c.startingHp / 16) * Math.min(15, c.status.badlyPoisonedTurn))
      return damage(state, c, amount, { source: 'its bad poison' })
    }
    case 'poison': {
      if (ability === 'poison-heal') return heal(state, c, Math.floor(c.startingHp / 8), 'its poison heal')
      return damage(state, c, Math.max(1, Math.floor(c.startingHp / 8)), { source: 'its poison' })
    }
    case 'sleep':
      if (c.v.nightmare) return damage(state, c, Math.floor(c.startingHp / 4), { source: 'its nightmare' })
      return ''
    default:
      return ''
  }
}
