import { CONFIG } from '@config/store'
import { abilityOf, forceForm } from './combatant'
import { InvalidActionError, MissingReferenceError, UnknownFormError } from './errors'
import { tickRooms, tickTerrain, tickWeather } from './field'
import { itemOf } from './items'
import { nextTurn, remove, sendOut, sendOutAbility } from './lifecycle'
import { priorityOf, struggle, useMove } from './moves'
import { pushLog } from './narration'
import { chance, pick, randInt } from './rng'
import { hasAlive, sideNextTurn, switchPoke, validMoves, validSwaps } from './side'
import { activeOf, otherSide } from './state'
import { getSpeed, rawSpeed } from './stats'
import { active } from './timers'
import type { Combatant, DuelState, Move, SideIndex } from './types'

export type Action =
  | { kind: 'move'; index: number; mega?: boolean }
  | { kind: 'switch'; slot: number }

/** One action per side; null forfeits. */
export type TurnActions = readonly [Action | null, Action | null]

/**
 * Picks the party slot a side sends in after its active combatant left.
 * Returning null, or a slot not offered, concedes the duel.
 */
export type SwapChooser = (state: DuelState, side: SideIndex, slots: number[], midTurn: boolean) => number | null

export interface TurnOptions {
  chooseSwap?: SwapChooser
}

export type PlannedAction =
  | { kind: 'move'; actor: Combatant; move: Move; mega: boolean }
  | { kind: 'switch'; actor: Combatant; slot: number }

/** Random choice among the offered slots. */
export const npcSwap: SwapChooser = (state, _side, slots) => (slots.length ? pick(state.rng, slots) : null)

/** A random selectable move, or whatever the combatant is locked into. */
export function npcAction(state: DuelState, side: SideIndex): Action {
  const c = activeOf(state, side)
  if (!c) throw new InvalidActionError(side, 'no active combatant')
  const choice = validMoves(state, c, activeOf(state, otherSide(side)))
  if (choice.kind !== 'indexes') return { kind: 'move', index: 0 }
  return { kind: 'move', index: pick(state.rng, choice.indexes) }
}

function end(state: DuelState, winner: SideIndex | null) {
  state.winner = winner
  state.ended = true
}

function finish(state: DuelState, msg: string): string {
  pushLog(state, msg)
  return msg
}

/** Ends the duel when a side has nobody left. Sides are checked in the given order. */
function checkWinner(state: DuelState, order: readonly [SideIndex, SideIndex]): string {
  for (const idx of order) {
    if (hasAlive(state.sides[idx])) continue
    const winner = otherSide(idx)
    end(state, winner)
    return `${state.sides[winner].name} wins!\n`
  }
  return ''
}

function rawOrder(a: Combatant, b: Combatant): [Combatant, Combatant] {
  return rawSpeed(a) > rawSpeed(b) ? [a, b] : [b, a]
}

/** Sends out both leads, faster raw speed first. */
export function startDuel(state: DuelState): string {
  const lead0 = activeOf(state, 0)
  const lead1 = activeOf(state, 1)
  if (!lead0) throw new InvalidActionError(0, 'no lead to send out')
  if (!lead1) throw new InvalidActionError(1, 'no lead to send out')
  let msg = ''
  for (const c of rawOrder(lead0, lead1)) {
    msg += sendOut(state, c)
    msg += checkWinner(state, [c.owner, otherSide(c.owner)])
    if (state.ended) break
  }
  return finish(state, msg)
}

function plan(state: DuelState, side: SideIndex, action: Action): PlannedAction {
  const actor = activeOf(state, side)
  if (!actor) throw new InvalidActionError(side, 'no active combatant')
  const defender = activeOf(state, otherSide(side))

  if (action.kind === 'switch') {
    if (!validSwaps(state, side, defender).includes(action.slot)) {
      throw new InvalidActionError(side, `cannot switch to slot ${action.slot}`)
    }
    return { kind: 'switch', actor, slot: action.slot }
  }

  const mega = action.mega ?? false
  if (mega && (actor.megaAbility === null || state.sides[side].hasMegaEvolved)) {
    throw new InvalidActionError(side, `${actor.name} cannot mega evolve`)
  }
  const choice = validMoves(state, actor, defender)
  switch (choice.kind) {
    case 'forced':
      return { kind: 'move', actor, move: choice.move, mega }
    case 'struggle':
      return { kind: 'move', actor, move: struggle(), mega }
    default: {
      if (!choice.indexes.includes(action.index)) {
        throw new InvalidActionError(side, `move ${action.index} is not selectable`)
      }
      return { kind: 'move', actor, move: actor.moves[action.index], mega }
    }
  }
}

function slowed(c: Combatant, move: Move): boolean {
  const ability = abilityOf(c)
  return ability === 'stall' || (ability === 'mycelium-might' && move.damageClass === 'status')
}

function quick(state: DuelState, c: Combatant, move: Move): boolean {
  let fast = false
  if (abilityOf(c) === 'quick-draw' && move.damageClass !== 'status' && chance(state.rng, CONFIG().chances.quickDraw)) {
    fast = true
  }
  if (itemOf(state, c) === 'quick-claw' && chance(state.rng, CONFIG().chances.quickClaw)) fast = true
  return fast
}

/**
 * Which side acts first. Without planned actions only speed (and trick room)
 * decides, which is the order end-of-turn upkeep runs in.
 */
export function whoFirst(state: DuelState, plans: readonly [PlannedAction, PlannedAction] | null = null): [SideIndex, SideIndex] {
  const c0 = activeOf(state, 0)
  const c1 = activeOf(state, 1)
  if (!c0 || !c1) return [0, 1]
  const speed0 = getSpeed(state, c0)
  const speed1 = getSpeed(state, c1)
  const tie = (): [SideIndex, SideIndex] => (randInt(state.rng, 0, 1) === 0 ? [0, 1] : [1, 0])

  if (plans) {
    const [p0, p1] = plans
    if (p0.kind === 'switch' && p1.kind === 'switch') return rawSpeed(c0) > rawSpeed(c1) ? [0, 1] : [1, 0]
    if (p0.kind === 'switch') return [0, 1]
    if (p1.kind === 'switch') return [1, 0]

    const prio0 = priorityOf(c0, p0.move)
    const prio1 = priorityOf(c1, p1.move)
    if (prio0 > prio1) return [0, 1]
    if (prio1 > prio0) return [1, 0]

    const quick0 = quick(state, c0, p0.move)
    const quick1 = quick(state, c1, p1.move)
    if (quick0 && !quick1) return [0, 1]
    if (quick1 && !quick0) return [1, 0]

    const slow0 = slowed(c0, p0.move)
    const slow1 = slowed(c1, p1.move)
    if (slow0 && slow1) {
      if (speed0 === speed1) return tie()
      return speed0 > speed1 ? [1, 0] : [0, 1]
    }
    if (slow0) return [1, 0]
    if (slow1) return [0, 1]
  }

  if (speed0 === speed1) return tie()
  if (active(state.field.trickRoom)) return speed0 > speed1 ? [1, 0] : [0, 1]
  return speed0 > speed1 ? [0, 1] : [1, 0]
}

function megaForm(c: Combatant): string | null {
  const item = c.heldItem.item
  if (item === 'mega-stone' || c.startingSpecies === 'Rayquaza') return `${c.startingSpecies}-mega`
  if (item === 'mega-stone-x') return `${c.startingSpecies}-mega-x`
  if (item === 'mega-stone-y') return `${c.startingSpecies}-mega-y`
  return null
}

/** Mega evolves every active combatant flagged for it, in the given order. */
export function handleMegas(state: DuelState, order: readonly [SideIndex, SideIndex] = [0, 1]): string {
  let msg = ''
  for (const idx of order) {
    const c = activeOf(state, idx)
    if (!c || !c.shouldMegaEvolve) continue
    const key = megaForm(c)
    if (key === null) throw new UnknownFormError(`${c.species}-mega`)
    forceForm(c, key)
    if (c.megaAbility === null || c.megaTypes === null) throw new MissingReferenceError('mega ability', key)
    msg += `${c.name} evolved!\n`
    c.ability = c.megaAbility
    c.startingAbility = c.megaAbility
    c.types = [...c.megaTypes]
    c.startingTypes = [...c.megaTypes]
    c.shouldMegaEvolve = false
    state.sides[idx].hasMegaEvolved = true
    msg += sendOutAbility(state, c)
  }
  return msg
}

function act(state: DuelState, side: SideIndex, planned: PlannedAction): string {
  const c = activeOf(state, side)
  const other = activeOf(state, otherSide(side))
  if (!c || !other) return ''
  if (planned.kind === 'switch') {
    let msg = remove(state, c)
    const next = switchPoke(state.sides[side], planned.slot, true)
    msg += sendOut(state, next)
    next.hasMoved = true
    return msg
  }
  // The combatant that chose this move may have been forced out already.
  if (planned.actor !== c) return ''
  return useMove(state, c, other, planned.move)
}

/** Brings in a replacement for a side whose active slot is empty. */
function swapIn(state: DuelState, side: SideIndex, choose: SwapChooser, midTurn: boolean): string {
  const slots = validSwaps(state, side, activeOf(state, otherSide(side)), false)
  const slot = choose(state, side, slots, midTurn)
  if (slot === null || !slots.includes(slot)) {
    const winner = otherSide(side)
    end(state, winner)
    return `${state.sides[side].name} did not select a poke, ${state.sides[winner].name} wins!\n`
  }
  const next = switchPoke(state.sides[side], slot, midTurn)
  if (!midTurn) return ''
  const msg = sendOut(state, next)
  next.hasMoved = true
  return msg
}

/** Fills empty active slots at the end of a turn, then sends the newcomers out by raw speed. */
function refill(state: DuelState, choose: SwapChooser): string {
  let msg = ''
  const entering: Combatant[] = []
  for (const idx of [0, 1] as const) {
    if (activeOf(state, idx) || !hasAlive(state.sides[idx])) continue
    msg += swapIn(state, idx, choose, false)
    if (state.ended) return msg
    const c = activeOf(state, idx)
    if (c) entering.push(c)
  }
  const order = entering.length === 2 ? rawOrder(entering[0], entering[1]) : entering
  for (const c of order) {
    msg += sendOut(state, c)
    msg += checkWinner(state, [c.owner, otherSide(c.owner)])
    if (state.ended) return msg
  }
  return msg
}

function forfeit(state: DuelState, actions: TurnActions): string {
  const quitter = actions[0] === null ? 0 : 1
  if (actions[0] === null && actions[1] === null) {
    end(state, null)
    return 'Both players forfeited...\n'
  }
  const winner = otherSide(quitter)
  end(state, winner)
  return `${state.sides[quitter].name} forfeited, ${state.sides[winner].name} wins!\n`
}

/**
 * Resolves one full turn: both actions in order, mid-turn replacements,
 * field and combatant upkeep, and refilling fainted slots. Every narrated
 * line is appended to `state.log`.
 */
export function runTurn(state: DuelState, actions: TurnActions, opts: TurnOptions = {}): string {
  if (state.ended) throw new InvalidActionError(0, 'the duel is over')
  const choose = opts.chooseSwap ?? npcSwap

  const [a0, a1] = actions
  if (a0 === null || a1 === null) return finish(state, forfeit(state, actions))
  // Both actions validate before either one touches the state.
  const plans: [PlannedAction, PlannedAction] = [plan(state, 0, a0), plan(state, 1, a1)]
  for (const p of plans) {
    if (p.kind === 'move' && p.mega) p.actor.shouldMegaEvolve = true
  }

  let msg = ''
  const [first, second] = whoFirst(state, plans)
  let ranMegas = false

  for (const [actor, target] of [[first, second], [second, first]] as const) {
    if (!ranMegas && plans[actor].kind === 'move') {
      msg += handleMegas(state, [first, second])
      ranMegas = true
    }
    msg += act(state, actor, plans[actor])
    msg += checkWinner(state, [target, actor])
    if (state.ended) return finish(state, msg)

    for (const idx of [actor, target]) {
      if (!state.sides[idx].midTurnRemove) continue
      msg += swapIn(state, idx, choose, true)
      if (state.ended) return finish(state, msg)
    }
    // An empty slot gets filled now when the opponent's pending action does not need a target.
    const pending = plans[target]
    if (
      actor === first && activeOf(state, actor) === null && activeOf(state, target) !== null
      && (pending.kind === 'switch' || pending.move.target !== 'opponent')
      && hasAlive(state.sides[actor])
    ) {
      msg += swapIn(state, actor, choose, true)
      if (state.ended) return finish(state, msg)
    }
  }

  if (!ranMegas) msg += handleMegas(state, [first, second])

  state.turn++
  if (tickWeather(state)) msg += 'The weather cleared!\n'
  if (tickTerrain(state)) msg += 'The terrain cleared!\n'

  const [up1, up2] = whoFirst(state)
  for (const idx of [up1, up2]) {
    msg += sideNextTurn(state, idx)
    const c = activeOf(state, idx)
    if (c) msg += nextTurn(state, c)
    msg += checkWinner(state, [idx, otherSide(idx)])
    if (state.ended) return finish(state, msg)
  }
  msg += tickRooms(state)

  msg += refill(state, choose)
  return finish(state, msg)
}
