import { describe, expect, it } from 'vitest'

import { InvalidSwapError } from '@engine/duel/errors'
import { setWish, sideNextTurn, switchPoke, validMoves, validSwaps } from '@engine/duel/side'
import { lockMove, setTurns } from '@engine/duel/timers'
import { makeCombatant, makeDuel, withHp } from './helpers/duel'

describe('switchPoke', () => {
  it('makes the chosen slot current', () => {
    const party = [makeCombatant(), makeCombatant(), makeCombatant()]
    const state = makeDuel(party, [makeCombatant()])
    const side = state.sides[0]

    expect(switchPoke(side, 2, true)).toBe(party[2])
    expect(side.current).toBe(2)
    expect(side.lastIdx).toBe(2)
    expect(party[2].swappedIn).toBe(true)
  })

  it('refuses slots out of range or without hp', () => {
    const party = [makeCombatant(), withHp(makeCombatant(), 0, 90)]
    const state = makeDuel(party, [makeCombatant()])
    const side = state.sides[0]

    expect(() => switchPoke(side, 5)).toThrow(InvalidSwapError)
    expect(() => switchPoke(side, -1)).toThrow('cannot switch to slot -1: out of bounds')
    expect(() => switchPoke(side, 1)).toThrow('cannot switch to slot 1: no hp')
    expect(side.current).toBe(0)
  })
})

describe('validSwaps', () => {
  it('offers every other healthy slot', () => {
    const party = [makeCombatant(), withHp(makeCombatant(), 0, 90), makeCombatant()]
    const state = makeDuel(party, [makeCombatant()])
    expect(validSwaps(state, 0, null)).toEqual([2])
  })

  it('traps grounded combatants next to arena trap unless told not to check', () => {
    const foe = makeCombatant({ ability: 'arena-trap' })
    const state = makeDuel([makeCombatant(), makeCombatant()], [foe])
    expect(validSwaps(state, 0, foe)).toEqual([])
    expect(validSwaps(state, 0, foe, false)).toEqual([1])
  })

  it('lets ghosts and shed shell holders leave', () => {
    const foe = makeCombatant({ ability: 'shadow-tag' })
    const ghost = makeCombatant({ species: 'Gengar', ability: 'cursed-body' })
    const state = makeDuel([ghost, makeCombatant()], [foe])
    expect(validSwaps(state, 0, foe)).toEqual([1])

    const holder = makeCombatant({ item: 'shed-shell' })
    const other = makeDuel([holder, makeCombatant()], [foe])
    expect(validSwaps(other, 0, foe)).toEqual([1])
  })
})

describe('validMoves', () => {
  it('lists moves with pp left', () => {
    const rat = makeCombatant({ moves: ['tackle', 'growl', 'quick-attack'] })
    const state = makeDuel([rat], [makeCombatant()])
    rat.moves[2].pp = 0
    expect(validMoves(state, rat, null)).toEqual({ kind: 'indexes', indexes: [0, 1] })
  })

  it('falls back to struggle when nothing is usable', () => {
    const rat = makeCombatant({ moves: ['tackle'] })
    const state = makeDuel([rat], [makeCombatant()])
    rat.moves[0].pp = 0
    expect(validMoves(state, rat, null)).toEqual({ kind: 'struggle' })
  })

  it('forces a locked move', () => {
    const rat = makeCombatant({ moves: ['tackle', 'growl'] })
    const state = makeDuel([rat], [makeCombatant()])
    rat.v.lockedMove = lockMove(rat.moves[0], 2)
    expect(validMoves(state, rat, null)).toEqual({ kind: 'forced', move: rat.moves[0] })
  })

  it('drops status moves under taunt and other moves under a choice lock', () => {
    const rat = makeCombatant({ moves: ['tackle', 'growl', 'quick-attack'], item: 'choice-band' })
    const state = makeDuel([rat], [makeCombatant()])
    setTurns(rat.v.taunt, 3)
    expect(validMoves(state, rat, null)).toEqual({ kind: 'indexes', indexes: [0, 2] })
    rat.v.choiceMove = rat.moves[2]
    expect(validMoves(state, rat, null)).toEqual({ kind: 'indexes', indexes: [2] })
  })
})

describe('sideNextTurn', () => {
  it('announces screens wearing off', () => {
    const state = makeDuel([makeCombatant()], [makeCombatant()])
    setTurns(state.sides[0].reflect, 2)
    expect(sideNextTurn(state, 0)).toBe('')
    expect(sideNextTurn(state, 0)).toBe("Red's reflect wore off!\n")
  })

  it('lands a wish on whoever is active two turns later', () => {
    const rat = withHp(makeCombatant(), 30, 90)
    const state = makeDuel([rat], [makeCombatant()])
    setWish(state.sides[0], 45)

    expect(sideNextTurn(state, 0)).toBe('')
    expect(sideNextTurn(state, 0)).toBe('Rattata healed 45 hp from its wish!\n')
    expect(rat.hp).toBe(75)
    expect(state.sides[0].wish.hp).toBeNull()
  })
})
