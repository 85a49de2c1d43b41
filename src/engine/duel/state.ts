import { CONFIG } from '@config/store'
import { loadTypeChart } from '@content/registry'
import { createField } from './field'
import { createRng } from './rng'
import type { Combatant, DuelState, Rng, Side, SideIndex, TypeChart } from './types'

interface DuelSetup {
  typeChart?: TypeChart
  inverse?: boolean
}

/**
 * Every roll in a duel comes from `rng`, or from the seeded generator when
 * only `seed` is given, so a duel replays exactly from the same options.
 */
export type DuelOptions = DuelSetup & ({ rng: Rng; seed?: undefined } | { seed: number; rng?: undefined })

function rngFor(opts: DuelOptions): Rng {
  if (opts.rng) return opts.rng
  return createRng(opts.seed ?? 0)
}

export function createDuel(sides: [Side, Side], opts: DuelOptions): DuelState {
  return {
    sides,
    field: createField(),
    typeChart: opts.typeChart ?? loadTypeChart(),
    inverse: opts.inverse ?? CONFIG().inverseBattle,
    turn: 0,
    rng: rngFor(opts),
    log: [],
    winner: null,
    ended: false,
  }
}

export function activeOf(state: DuelState, side: SideIndex): Combatant | null {
  const s = state.sides[side]
  return s.current === null ? null : s.party[s.current] ?? null
}

/** Active combatants in side order. */
export function actives(state: DuelState): Combatant[] {
  const out: Combatant[] = []
  for (const side of [0, 1] as const) {
    const c = activeOf(state, side)
    if (c) out.push(c)
  }
  return out
}

export function sideOf(state: DuelState, c: Combatant): Side {
  return state.sides[c.owner]
}

export function otherSide(index: SideIndex): SideIndex {
  return index === 0 ? 1 : 0
}

export function opponentOf(state: DuelState, c: Combatant): Combatant | null {
  return activeOf(state, otherSide(c.owner))
}

export function isActive(state: DuelState, c: Combatant): boolean {
  return activeOf(state, c.owner) === c
}
