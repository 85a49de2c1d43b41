import { describe, expect, it } from 'vitest'

import { moveOf } from '@content/registry'
import { effectiveness } from '@engine/duel/effectiveness'
import { makeMove } from '@engine/duel/moves'
import { setTurns } from '@engine/duel/timers'
import { makeCombatant, makeDuel } from './helpers/duel'

function setup(species: string, ability: string) {
  const defender = makeCombatant({ species, ability })
  const attacker = makeCombatant()
  const state = makeDuel([attacker], [defender])
  return { state, attacker, defender }
}

describe('effectiveness', () => {
  it('multiplies the chart value of each defending type', () => {
    const { state, defender } = setup('Gyarados', 'intimidate')
    expect(effectiveness(state, 'electric', defender)).toBe(4)
    expect(effectiveness(state, 'fire', defender)).toBe(0.5)
  })

  it('keeps flying types out of reach of ground moves until gravity pulls them down', () => {
    const { state, defender } = setup('Charizard', 'blaze')
    expect(effectiveness(state, 'ground', defender)).toBe(0)
    setTurns(state.field.gravity, 5)
    expect(effectiveness(state, 'ground', defender)).toBe(2)
  })

  it('treats typeless hits as neutral', () => {
    const { state, defender } = setup('Gengar', 'cursed-body')
    expect(effectiveness(state, 'typeless', defender)).toBe(1)
  })

  it('lets scrappy hit ghosts with normal moves', () => {
    const { state, attacker, defender } = setup('Gengar', 'cursed-body')
    expect(effectiveness(state, 'normal', defender, attacker)).toBe(0)
    attacker.ability = 'scrappy'
    expect(effectiveness(state, 'normal', defender, attacker)).toBe(1)
  })

  it('has freeze-dry hit water super effectively', () => {
    const { state, attacker, defender } = setup('Blastoise', 'torrent')
    const freezeDry = makeMove(moveOf('freeze-dry'))
    expect(effectiveness(state, 'ice', defender, attacker)).toBe(0.5)
    expect(effectiveness(state, 'ice', defender, attacker, freezeDry)).toBe(2)
  })

  it('has thousand arrows land neutrally on airborne targets', () => {
    const { state, attacker, defender } = setup('Charizard', 'blaze')
    const arrows = makeMove(moveOf('thousand-arrows'))
    expect(effectiveness(state, 'ground', defender, attacker, arrows)).toBe(1)
  })

  it('flips each multiplier in an inverse duel', () => {
    const { state, defender } = setup('Gengar', 'cursed-body')
    state.inverse = true
    expect(effectiveness(state, 'normal', defender)).toBe(2)
    expect(effectiveness(state, 'psychic', defender)).toBe(0.5)
  })

  it('turns neutral and super effective hits on a full-hp tera shell into resisted ones', () => {
    const { state, defender } = setup('Snorlax', 'tera-shell')
    expect(effectiveness(state, 'fighting', defender)).toBe(0.5)
    expect(effectiveness(state, 'normal', defender)).toBe(0.5)
    expect(effectiveness(state, 'ghost', defender)).toBe(0)
    defender.hp -= 1
    expect(effectiveness(state, 'fighting', defender)).toBe(2)
  })
})
