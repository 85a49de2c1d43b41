import { describe, expect, it } from 'vitest'

import { confuse, flinch, infatuate } from '@engine/duel/conditions'
import { applyStatus } from '@engine/duel/nonvolatile'
import { scriptedRng } from '@engine/duel/rng'
import { setTurns } from '@engine/duel/timers'
import { makeCombatant, makeDuel } from './helpers/duel'

describe('applyStatus', () => {
  it('refuses a second status', () => {
    const rat = makeCombatant()
    const state = makeDuel([rat], [makeCombatant()])
    expect(applyStatus(state, rat, 'paralysis')).toBe('Rattata was paralyzed!\n')
    expect(applyStatus(state, rat, 'burn')).toBe("Rattata already has a status, it can't get burn too!\n")
    expect(rat.status.current).toBe('paralysis')
  })

  it('respects type immunities', () => {
    const zard = makeCombatant({ species: 'Charizard', ability: 'blaze' })
    const skarm = makeCombatant({ species: 'Skarmory', ability: 'sturdy' })
    const state = makeDuel([zard], [skarm])
    expect(applyStatus(state, zard, 'burn')).toBe("Charizard is a fire type and can't be burned!\n")
    expect(applyStatus(state, skarm, 'b-poison')).toBe("Skarmory is a steel type and can't be poisoned!\n")
  })

  it('lets corrosion poison steel types', () => {
    const corroder = makeCombatant({ ability: 'corrosion' })
    const skarm = makeCombatant({ species: 'Skarmory', ability: 'sturdy' })
    const state = makeDuel([corroder], [skarm])
    expect(applyStatus(state, skarm, 'poison', { attacker: corroder })).toBe('Skarmory was poisoned!\n')
  })

  it('rolls sleep turns from config unless given', () => {
    const rat = makeCombatant()
    const bird = makeCombatant({ ability: 'early-bird' })
    const state = makeDuel([rat], [bird], scriptedRng([0]))

    expect(applyStatus(state, rat, 'sleep', { source: 'its drowsiness' })).toBe('Rattata fell asleep from its drowsiness!\n')
    expect(rat.status.sleep.turns).toBe(2)
    applyStatus(state, bird, 'sleep', { turns: 3 })
    expect(bird.status.sleep.turns).toBe(1)
  })

  it('is stopped by a substitute or safeguard when an opponent causes it', () => {
    const rat = makeCombatant()
    const foe = makeCombatant({ nickname: 'Fang' })
    const state = makeDuel([rat], [foe])
    rat.v.substitute = 10
    setTurns(state.sides[1].safeguard, 5)

    expect(applyStatus(state, rat, 'paralysis', { attacker: foe }))
      .toBe("Rattata's substitute protects it from being inflicted with paralysis!\n")
    expect(applyStatus(state, foe, 'burn', { attacker: rat }))
      .toBe("Fang (Rattata)'s safeguard protects it from being inflicted with burn!\n")
  })

  it('passes the status back once with synchronize', () => {
    const mew = makeCombatant({ species: 'Mew', ability: 'synchronize' })
    const sync = makeCombatant({ species: 'Mew', nickname: 'Echo', ability: 'synchronize' })
    const state = makeDuel([mew], [sync])

    expect(applyStatus(state, mew, 'burn', { attacker: sync }))
      .toBe("Mew was burned!\nEcho (Mew) was burned from Mew's synchronize!\n")
    expect(sync.status.current).toBe('burn')
  })

  it('is cured straight away by a lum berry', () => {
    const rat = makeCombatant({ item: 'lum-berry' })
    const state = makeDuel([rat], [makeCombatant()])

    expect(applyStatus(state, rat, 'poison')).toBe("Rattata was poisoned!\nRattata's statuses were cleared from eating its berry!\n")
    expect(rat.status.current).toBeNull()
    expect(rat.heldItem.item).toBeNull()
    expect(rat.ateBerry).toBe(true)
  })
})

describe('volatile conditions', () => {
  it('confuses for a rolled number of turns, once', () => {
    const rat = makeCombatant()
    const state = makeDuel([rat], [makeCombatant()], scriptedRng([0.99]))

    expect(confuse(state, rat)).toBe('Rattata is confused!\n')
    expect(rat.v.confusion.turns).toBe(5)
    expect(confuse(state, rat)).toBe('')
  })

  it('lets inner focus resist flinching', () => {
    const rat = makeCombatant({ ability: 'inner-focus' })
    const other = makeCombatant({ nickname: 'Fang' })
    const state = makeDuel([rat], [other])

    expect(flinch(state, rat)).toBe('Rattata resisted the urge to flinch with its inner focus!\n')
    expect(flinch(state, other)).toBe('Fang (Rattata) flinched!\n')
    expect(other.v.flinched).toBe(true)
  })

  it('needs opposite genders to infatuate, and a destiny knot sends it back', () => {
    const rat = makeCombatant({ gender: 'male', item: 'destiny-knot' })
    const fang = makeCombatant({ nickname: 'Fang', gender: 'female' })
    const unknown = makeCombatant()
    const state = makeDuel([rat], [fang, unknown])

    expect(infatuate(state, unknown, rat)).toBe('')
    expect(infatuate(state, rat, fang)).toBe("Rattata fell in love!\nFang (Rattata) fell in love from Rattata's destiny knot!\n")
    expect(rat.v.infatuated).toBe(fang.id)
    expect(fang.v.infatuated).toBe(rat.id)
  })
})
