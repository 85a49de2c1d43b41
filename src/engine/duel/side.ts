import { abilityOf, grounded, hasType } from './combatant'
import { heal } from './damage'
import { InvalidSwapError } from './errors'
import { isBerry, itemOf } from './items'
import { activeOf } from './state'
import { active, setTurns, tick, timer } from './timers'
import type { BatonPassSnapshot, Combatant, DuelState, Move, Side, SideIndex } from './types'

export function createSide(name: string, party: Combatant[]): Side {
  return {
    name,
    party,
    current: party.length > 0 ? 0 : null,
    midTurnRemove: false,
    batonPass: null,
    spikes: 0,
    toxicSpikes: 0,
    stealthRock: false,
    stickyWeb: false,
    lastIdx: 0,
    wish: { turns: 0, hp: null },
    auroraVeil: timer(),
    lightScreen: timer(),
    reflect: timer(),
    mist: timer(),
    safeguard: timer(),
    healingWish: false,
    lunarDance: false,
    tailwind: timer(),
    mudSport: timer(),
    waterSport: timer(),
    retaliate: timer(),
    hasMegaEvolved: false,
    numFainted: 0,
    nextSubstitute: 0,
  }
}

export function hasAlive(side: Side): boolean {
  return side.party.some(c => c.hp > 0)
}

export function setWish(side: Side, hp: number): void {
  side.wish.hp = hp
  setTurns(side.wish, 2)
}

/** Ticks the side's timers. A wish landing this turn heals whoever is active. */
export function sideNextTurn(state: DuelState, index: SideIndex): string {
  const side = state.sides[index]
  let msg = ''
  side.midTurnRemove = false
  if (tick(side.wish)) {
    const hp = side.wish.hp ?? 0
    side.wish.hp = null
    const current = activeOf(state, index)
    if (hp > 0 && current) msg += heal(state, current, hp, 'its wish')
  }
  if (tick(side.auroraVeil)) msg += `${side.name}'s aurora veil wore off!\n`
  if (tick(side.lightScreen)) msg += `${side.name}'s light screen wore off!\n`
  if (tick(side.reflect)) msg += `${side.name}'s reflect wore off!\n`
  if (tick(side.mist)) msg += `${side.name}'s mist wore off!\n`
  if (tick(side.safeguard)) msg += `${side.name}'s safeguard wore off!\n`
  if (tick(side.tailwind)) msg += `${side.name}'s tailwind died down!\n`
  if (tick(side.mudSport)) msg += `${side.name}'s mud sport wore off!\n`
  if (tick(side.waterSport)) msg += `${side.name}'s water sport evaporated!\n`
  tick(side.retaliate)
  return msg
}

export function switchPoke(side: Side, slot: number, midTurn = false): Combatant {
  if (slot < 0 || slot >= side.party.length) throw new InvalidSwapError(slot, 'out of bounds')
  const next = side.party[slot]
  if (next.hp <= 0) throw new InvalidSwapError(slot, 'no hp')
  side.current = slot
  side.midTurnRemove = false
  side.lastIdx = slot
  if (midTurn) next.swappedIn = true
  return next
}

function trapped(state: DuelState, current: Combatant, defender: Combatant | null): boolean {
  if (current.v.trapping || current.v.ingrain || current.v.noRetreat) return true
  if (active(current.v.fairyLock) || (defender !== null && active(defender.v.fairyLock))) return true
  if (active(current.v.bind) && current.v.substitute === 0) return true
  if (defender === null) return false
  const holder = abilityOf(defender)
  if (holder === 'shadow-tag' && abilityOf(current) !== 'shadow-tag') return true
  if (holder === 'magnet-pull' && hasType(current, 'steel')) return true
  return holder === 'arena-trap' && grounded(state, current)
}

/** Party slots the side may switch to. The slot last chosen is never offered. */
export function validSwaps(state: DuelState, index: SideIndex, defender: Combatant | null, checkTrap = true): number[] {
  const side = state.sides[index]
  const current = activeOf(state, index)
  if (current) {
    const escapes = hasType(current, 'ghost') || itemOf(state, current) === 'shed-shell'
    if (checkTrap && !escapes && trapped(state, current, defender)) return []
  }
  const slots: number[] = []
  side.party.forEach((c, idx) => {
    if (c.hp > 0 && idx !== side.lastIdx) slots.push(idx)
  })
  return slots
}

export type ValidMoves =
  | { kind: 'forced'; move: Move }
  | { kind: 'struggle' }
  | { kind: 'indexes'; indexes: number[] }

const LAST_RESORT = 247
const STUFF_CHEEKS = 453
const BELCH = 339
/** Moves that cannot be chosen twice in a row unless the first use failed. */
const NO_REPEAT = 492

const CHOICE_ITEMS = new Set(['choice-scarf', 'choice-band', 'choice-specs'])

export function validMoves(state: DuelState, c: Combatant, defender: Combatant | null): ValidMoves {
  if (c.v.lockedMove) return { kind: 'forced', move: c.v.lockedMove.move }
  const item = itemOf(state, c)
  const choiceLocked = (item !== null && CHOICE_ITEMS.has(item)) || abilityOf(c) === 'gorilla-tactics'
  const indexes: number[] = []

  c.moves.forEach((move, idx) => {
    if (move.pp <= 0) return
    if (move.damageClass === 'status' && (item === 'assault-vest' || active(c.v.taunt))) return
    if (move.effect === LAST_RESORT && !c.moves.filter(m => m.effect !== LAST_RESORT).every(m => m.used)) return
    if (active(c.v.disable) && c.v.disable.item === move) return
    if (choiceLocked && c.v.choiceMove !== null && c.v.choiceMove !== move) return
    if (c.v.torment && c.v.lastMove === move) return
    if (c.v.lastMove?.effect === NO_REPEAT && c.v.lastMove.id === move.id && !c.v.lastMoveFailed) return
    if (defender?.v.imprison && defender.moves.some(m => m.id === move.id)) return
    if (active(c.v.healBlock) && move.healBlock) return
    if (active(c.v.silenced) && move.sound) return
    if (move.effect === BELCH && !c.ateBerry) return
    if (move.effect === STUFF_CHEEKS && !isBerry(state, c)) return
    if (active(c.v.encore) && c.v.encore.item !== move) return
    indexes.push(idx)
  })

  if (indexes.length === 0) return { kind: 'struggle' }
  return { kind: 'indexes', indexes }
}

/** Captures what a baton pass hands to the next combatant in. */
export function captureBatonPass(c: Combatant): BatonPassSnapshot {
  return {
    stages: { ...c.stages },
    confusion: { ...c.v.confusion },
    focusEnergy: c.v.focusEnergy,
    mindReader: { ...c.v.mindReader },
    leechSeed: c.v.leechSeed,
    curse: c.v.curse,
    substitute: c.v.substitute,
    ingrain: c.v.ingrain,
    powerTrick: c.v.powerTrick,
    powerShift: c.v.powerShift,
    healBlock: { ...c.v.healBlock },
    embargo: { ...c.v.embargo },
    perishSong: { ...c.v.perishSong },
    magnetRise: { ...c.v.magnetRise },
    aquaRing: c.v.aquaRing,
    telekinesis: { ...c.v.telekinesis },
  }
}

export function applyBatonPass(snapshot: BatonPassSnapshot, c: Combatant): void {
  c.stages = { ...snapshot.stages }
  c.v.confusion = { ...snapshot.confusion }
  c.v.focusEnergy = snapshot.focusEnergy
  c.v.mindReader = { ...snapshot.mindReader }
  c.v.leechSeed = snapshot.leechSeed
  c.v.curse = snapshot.curse
  c.v.substitute = snapshot.substitute
  c.v.ingrain = snapshot.ingrain
  c.v.powerTrick = snapshot.powerTrick
  c.v.powerShift = snapshot.powerShift
  c.v.healBlock = { ...snapshot.healBlock }
  c.v.embargo = { ...snapshot.embargo }
  c.v.perishSong = { ...snapshot.perishSong }
  c.v.magnetRise = { ...snapshot.magnetRise }
  c.v.aquaRing = snapshot.aquaRing
  c.v.telekinesis = { ...snapshot.telekinesis }
}
