import { describe, expect, it } from 'vitest'

import { appendStat } from '@engine/duel/stages'
import { InvalidStatError } from '@engine/duel/errors'
import { getAttack, getSpDef, getSpeed, rawStat, rawHp } from '@engine/duel/stats'
import { makeCombatant, makeDuel } from './helpers/duel'

describe('stat formulas', () => {
  it('computes raw stats at level 50 with no investment', () => {
    expect(rawStat(56, 0, 0, 1, 50)).toBe(61)
    expect(rawHp(30, 0, 0, 50)).toBe(90)
    expect(rawStat(100, 31, 252, 1.1, 100)).toBe(328)
  })

  it('builds a combatant with its computed hp', () => {
    const c = makeCombatant()
    expect(c.hp).toBe(90)
    expect(c.startingHp).toBe(90)
    expect(c.name).toBe('Rattata')
  })

  it('applies stages and guts on top of the raw attack', () => {
    const champ = makeCombatant({ species: 'Machamp', ability: 'guts' })
    const state = makeDuel([champ], [makeCombatant()])
    expect(getAttack(state, champ)).toBe(135)
    champ.status.current = 'burn'
    expect(getAttack(state, champ)).toBe(202)
    champ.status.current = null
    champ.stages.attack = -2
    expect(getAttack(state, champ)).toBe(67)
  })

  it('halves speed under paralysis', () => {
    const rat = makeCombatant()
    const state = makeDuel([rat], [makeCombatant()])
    expect(getSpeed(state, rat)).toBe(77)
    rat.status.current = 'paralysis'
    expect(getSpeed(state, rat)).toBe(38)
  })

  it('weakens everyone but the holder of a ruin ability', () => {
    const rat = makeCombatant()
    const ruin = makeCombatant({ nickname: 'Tablet', ability: 'tablets-of-ruin' })
    const state = makeDuel([rat], [ruin])

    expect(getAttack(state, rat)).toBe(45)
    expect(getAttack(state, ruin)).toBe(61)
    expect(getSpDef(state, rat)).toBe(40)
  })

  it('spends a booster energy once and keeps the boost', () => {
    const rat = makeCombatant({ ability: 'quark-drive', item: 'booster-energy' })
    const state = makeDuel([rat], [makeCombatant()])

    expect(getSpeed(state, rat)).toBe(115)
    expect(rat.heldItem.item).toBeNull()
    expect(rat.heldItem.lastUsed).toBe('booster-energy')
    expect(rat.v.boosterEnergy).toBe(true)
    expect(getSpeed(state, rat)).toBe(115)
    expect(getAttack(state, rat)).toBe(61)
  })
})

describe('appendStat', () => {
  it('raises a stat up to +6 and then refuses', () => {
    const rat = makeCombatant()
    const state = makeDuel([rat], [makeCombatant()])
    const lines: string[] = []
    for (let i = 0; i < 7; i++) lines.push(appendStat(state, rat, 1, rat, null, 'attack'))

    expect(rat.stages.attack).toBe(6)
    expect(lines.slice(0, 6)).toEqual(Array(6).fill("Rattata's attack rose!\n"))
    expect(lines[6]).toBe("Rattata's attack won't go any higher!\n")
  })

  it('clamps a large drop at -6', () => {
    const rat = makeCombatant()
    const state = makeDuel([rat], [makeCombatant()])
    rat.stages.speed = -4
    expect(appendStat(state, rat, -3, rat, null, 'speed')).toBe("Rattata's speed harshly fell!\n")
    expect(rat.stages.speed).toBe(-6)
    expect(appendStat(state, rat, -1, rat, null, 'speed')).toBe("Rattata's speed won't go any lower!\n")
    expect(rat.stages.speed).toBe(-6)
  })

  it('names the size of the change and its source', () => {
    const rat = makeCombatant()
    const state = makeDuel([rat], [makeCombatant()])
    expect(appendStat(state, rat, 2, rat, null, 'defense', 'its weakness policy'))
      .toBe("Rattata's defense rose sharply from its weakness policy!\n")
    expect(appendStat(state, rat, 3, rat, null, 'special attack'))
      .toBe("Rattata's special attack rose drastically!\n")
  })

  it('doubles changes for simple and inverts them for contrary', () => {
    const simple = makeCombatant({ ability: 'simple' })
    const contrary = makeCombatant({ ability: 'contrary' })
    const state = makeDuel([simple], [contrary])
    appendStat(state, simple, 1, simple, null, 'attack')
    appendStat(state, contrary, 1, contrary, null, 'attack')
    expect(simple.stages.attack).toBe(2)
    expect(contrary.stages.attack).toBe(-1)
  })

  it('lets clear body stop drops from an opponent but not from itself', () => {
    const body = makeCombatant({ ability: 'clear-body' })
    const foe = makeCombatant()
    const state = makeDuel([body], [foe])
    expect(appendStat(state, body, -1, foe, null, 'attack'))
      .toBe("Rattata's clear body prevented its attack from being lowered!\n")
    expect(body.stages.attack).toBe(0)
    appendStat(state, body, -1, body, null, 'attack')
    expect(body.stages.attack).toBe(-1)
  })

  it('is blocked by a substitute when an opponent causes it', () => {
    const rat = makeCombatant()
    const foe = makeCombatant()
    const state = makeDuel([rat], [foe])
    rat.v.substitute = 20
    expect(appendStat(state, rat, -1, foe, null, 'defense')).toBe('')
    expect(rat.stages.defense).toBe(0)
  })

  it('reflects a drop with mirror armor exactly once', () => {
    const ava = makeCombatant({ species: 'Corviknight', nickname: 'Ava', ability: 'mirror-armor' })
    const bo = makeCombatant({ species: 'Corviknight', nickname: 'Bo', ability: 'mirror-armor' })
    const state = makeDuel([ava], [bo])

    const msg = appendStat(state, bo, -1, ava, null, 'attack')

    expect(msg).toBe(
      'Bo (Corviknight) reflected the stat change with its mirror armor!\n'
      + "Ava (Corviknight)'s attack fell!\n",
    )
    expect(bo.stages.attack).toBe(0)
    expect(ava.stages.attack).toBe(-1)
  })

  it('lets an opportunist copy a boost without the copy being copied back', () => {
    const ava = makeCombatant({ nickname: 'Ava', ability: 'opportunist' })
    const bo = makeCombatant({ nickname: 'Bo', ability: 'opportunist' })
    const state = makeDuel([ava], [bo])

    const msg = appendStat(state, ava, 1, ava, null, 'attack')

    expect(msg).toBe(
      "Ava (Rattata)'s attack rose!\n"
      + 'Bo (Rattata) seizes the opportunity to boost its stat with its opportunist!\n'
      + "Bo (Rattata)'s attack rose!\n",
    )
    expect(ava.stages.attack).toBe(1)
    expect(bo.stages.attack).toBe(1)
  })

  it('does not let an opportunist copy a drop', () => {
    const ava = makeCombatant({ nickname: 'Ava' })
    const bo = makeCombatant({ nickname: 'Bo', ability: 'opportunist' })
    const state = makeDuel([ava], [bo])

    expect(appendStat(state, ava, -1, bo, null, 'speed')).toBe("Ava (Rattata)'s speed fell!\n")
    expect(bo.stages.speed).toBe(0)
  })

  it('switches the holder out with an eject pack after a drop', () => {
    const rat = makeCombatant({ item: 'eject-pack' })
    const foe = makeCombatant({ nickname: 'Fang' })
    const state = makeDuel([rat, makeCombatant({ species: 'Pikachu' })], [foe])

    expect(appendStat(state, rat, -1, foe, null, 'attack'))
      .toBe("Rattata's attack fell!\nRattata is switched out by its eject pack!\n")
    expect(state.sides[0].current).toBeNull()
    expect(state.sides[0].midTurnRemove).toBe(true)
    expect(rat.heldItem.item).toBeNull()
    expect(rat.heldItem.lastUsed).toBe('eject-pack')
    expect(rat.stages.attack).toBe(0)
  })

  it('keeps the eject pack when there is nobody to switch to', () => {
    const rat = makeCombatant({ item: 'eject-pack' })
    const foe = makeCombatant()
    const state = makeDuel([rat], [foe])

    expect(appendStat(state, rat, -1, foe, null, 'attack')).toBe("Rattata's attack fell!\n")
    expect(state.sides[0].current).toBe(0)
    expect(rat.heldItem.item).toBe('eject-pack')
  })

  it('rejects unknown stat names', () => {
    const rat = makeCombatant()
    const state = makeDuel([rat], [makeCombatant()])
    expect(() => appendStat(state, rat, 1, rat, null, 'luck')).toThrow(InvalidStatError)
  })
})
