import { describe, expect, it } from 'vitest'

import { nextTurn, remove, sendOut } from '@engine/duel/lifecycle'
import { captureBatonPass } from '@engine/duel/side'
import { makeCombatant, makeDuel, withHp } from './helpers/duel'

describe('sendOut', () => {
  it('announces the newcomer', () => {
    const rat = makeCombatant()
    const state = makeDuel([rat], [makeCombatant()])
    expect(sendOut(state, rat)).toBe('Red sent out Rattata!\n')
    expect(rat.everSentOut).toBe(true)
  })

  it('has pikachu answer the call', () => {
    const pika = makeCombatant({ species: 'Pikachu', ability: 'static' })
    const state = makeDuel([pika], [makeCombatant()])
    expect(sendOut(state, pika)).toBe('Pikachu, I choose you!\n')
  })

  it('hurts grounded entrants with spikes', () => {
    const rat = makeCombatant()
    const state = makeDuel([rat], [makeCombatant()])
    state.sides[0].spikes = 3

    expect(sendOut(state, rat)).toBe('Red sent out Rattata!\nRattata took 22 damage from spikes!\n')
    expect(rat.hp).toBe(68)
  })

  it('scales stealth rock by effectiveness and skips spikes for flyers', () => {
    const zard = makeCombatant({ species: 'Charizard', ability: 'blaze' })
    const state = makeDuel([zard], [makeCombatant()])
    state.sides[0].spikes = 1
    state.sides[0].stealthRock = true

    expect(sendOut(state, zard)).toBe('Red sent out Charizard!\nCharizard took 69 damage from stealth rock!\n')
    expect(zard.hp).toBe(69)
  })

  it('ignores hazards in heavy-duty boots', () => {
    const rat = makeCombatant({ item: 'heavy-duty-boots' })
    const state = makeDuel([rat], [makeCombatant()])
    state.sides[0].spikes = 2
    state.sides[0].stealthRock = true
    expect(sendOut(state, rat)).toBe('Red sent out Rattata!\n')
  })

  it('runs intimidate against the opponent', () => {
    const gyara = makeCombatant({ species: 'Gyarados', ability: 'intimidate' })
    const rat = makeCombatant()
    const state = makeDuel([gyara], [rat])

    expect(sendOut(state, gyara)).toBe("Red sent out Gyarados!\nRattata's attack fell from Gyarados's Intimidate!\n")
    expect(rat.stages.attack).toBe(-1)
  })

  it('lets inner focus shrug off intimidate', () => {
    const gyara = makeCombatant({ species: 'Gyarados', ability: 'intimidate' })
    const rat = makeCombatant({ ability: 'inner-focus' })
    const state = makeDuel([gyara], [rat])

    expect(sendOut(state, gyara)).toBe('Red sent out Gyarados!\nRattata is too focused to be intimidated!\n')
    expect(rat.stages.attack).toBe(0)
  })
})

describe('entry hazards', () => {
  it('lets a grounded poison type soak up toxic spikes', () => {
    const bulba = makeCombatant({ species: 'Bulbasaur', ability: 'overgrow' })
    const state = makeDuel([bulba], [makeCombatant()])
    state.sides[0].toxicSpikes = 2

    expect(sendOut(state, bulba)).toBe('Red sent out Bulbasaur!\nBulbasaur absorbed the toxic spikes!\n')
    expect(state.sides[0].toxicSpikes).toBe(0)
    expect(bulba.status.current).toBeNull()
  })

  it('badly poisons on two layers of toxic spikes', () => {
    const rat = makeCombatant()
    const state = makeDuel([rat], [makeCombatant()])
    state.sides[0].toxicSpikes = 2

    expect(sendOut(state, rat)).toBe('Red sent out Rattata!\nRattata was badly poisoned from toxic spikes!\n')
    expect(rat.status.current).toBe('b-poison')
    expect(state.sides[0].toxicSpikes).toBe(2)
  })

  it('slows the newcomer with a sticky web', () => {
    const rat = makeCombatant()
    const state = makeDuel([rat], [makeCombatant()])
    state.sides[0].stickyWeb = true

    expect(sendOut(state, rat)).toBe("Red sent out Rattata!\nRattata's speed fell from the sticky web!\n")
    expect(rat.stages.speed).toBe(-1)
  })
})

describe('entry abilities', () => {
  it('traces the opponent and runs the traced ability', () => {
    const tracer = makeCombatant({ ability: 'trace' })
    const gyara = makeCombatant({ species: 'Gyarados', ability: 'intimidate' })
    const state = makeDuel([tracer], [gyara])

    expect(sendOut(state, tracer)).toBe(
      'Red sent out Rattata!\n'
      + "Rattata traced Gyarados's ability!\n"
      + "Gyarados's attack fell from Rattata's Intimidate!\n",
    )
    expect(tracer.ability).toBe('intimidate')
    expect(gyara.stages.attack).toBe(-1)
  })

  it('cannot trace an ability that is not giveable', () => {
    const tracer = makeCombatant({ ability: 'trace' })
    const state = makeDuel([tracer], [makeCombatant({ species: 'Zoroark', ability: 'illusion' })])

    expect(sendOut(state, tracer)).toBe('Red sent out Rattata!\n')
    expect(tracer.ability).toBe('trace')
  })

  it('picks the download boost from the weaker defense', () => {
    const rat = makeCombatant({ ability: 'download' })
    const lax = makeCombatant({ species: 'Snorlax', ability: 'immunity' })
    expect(sendOut(makeDuel([rat], [lax]), rat)).toBe("Red sent out Rattata!\nRattata's attack rose from its download!\n")

    const other = makeCombatant({ ability: 'download' })
    const skarm = makeCombatant({ species: 'Skarmory', ability: 'keen-eye' })
    expect(sendOut(makeDuel([other], [skarm]), other))
      .toBe("Red sent out Rattata!\nRattata's special attack rose from its download!\n")
  })

  it('changes arceus to the type of its plate', () => {
    const arceus = makeCombatant({ species: 'Arceus', ability: 'multitype', item: 'flame-plate' })
    const state = makeDuel([arceus], [makeCombatant()])

    expect(sendOut(state, arceus))
      .toBe('Red sent out Arceus!\nArceus fire transformed into a fire type using its multitype!\n')
    expect(arceus.species).toBe('Arceus-fire')
    expect(arceus.types).toEqual(['fire'])
  })
})

describe('hand-offs', () => {
  it('carries baton pass stages and substitute to the next combatant', () => {
    const rat = makeCombatant()
    const pika = makeCombatant({ species: 'Pikachu' })
    const state = makeDuel([rat, pika], [makeCombatant()])
    rat.stages.attack = 2
    rat.v.substitute = 20
    state.sides[0].batonPass = captureBatonPass(rat)
    remove(state, rat)
    state.sides[0].current = 1

    expect(sendOut(state, pika)).toBe('Pikachu, I choose you!\nPikachu carries on the baton!\n')
    expect(pika.stages.attack).toBe(2)
    expect(pika.v.substitute).toBe(20)
    expect(state.sides[0].batonPass).toBeNull()
  })

  it('restores hp and status with healing wish', () => {
    const pika = withHp(makeCombatant({ species: 'Pikachu' }), 30, 95)
    const state = makeDuel([pika], [makeCombatant()])
    pika.status.current = 'burn'
    state.sides[0].healingWish = true

    expect(sendOut(state, pika)).toBe('Pikachu, I choose you!\nPikachu was restored by healing wish!\n')
    expect(pika.hp).toBe(95)
    expect(pika.status.current).toBeNull()
    expect(state.sides[0].healingWish).toBe(false)
  })

  it('saves healing wish for someone who needs it', () => {
    const rat = makeCombatant()
    const state = makeDuel([rat], [makeCombatant()])
    state.sides[0].healingWish = true

    expect(sendOut(state, rat)).toBe('Red sent out Rattata!\n')
    expect(state.sides[0].healingWish).toBe(true)
  })

  it('also refills pp with lunar dance', () => {
    const rat = withHp(makeCombatant(), 40, 90)
    const state = makeDuel([rat], [makeCombatant()])
    rat.moves[0].pp = 10
    state.sides[0].lunarDance = true

    expect(sendOut(state, rat)).toBe('Red sent out Rattata!\nRattata was restored by lunar dance\n')
    expect(rat.hp).toBe(90)
    expect(rat.moves[0].pp).toBe(35)
    expect(state.sides[0].lunarDance).toBe(false)
  })
})

describe('remove', () => {
  it('resets battle state but keeps hp and status', () => {
    const rat = withHp(makeCombatant(), 40, 90)
    const state = makeDuel([rat], [makeCombatant()])
    rat.stages.attack = 2
    rat.v.substitute = 10
    rat.status.current = 'burn'

    expect(remove(state, rat)).toBe('')
    expect(rat.stages.attack).toBe(0)
    expect(rat.v.substitute).toBe(0)
    expect(rat.status.current).toBe('burn')
    expect(rat.hp).toBe(40)
    expect(state.sides[0].current).toBeNull()
  })

  it('heals with regenerator and cures with natural cure', () => {
    const regen = withHp(makeCombatant({ ability: 'regenerator' }), 40, 90)
    const cure = makeCombatant({ ability: 'natural-cure' })
    const state = makeDuel([regen], [cure])
    cure.status.current = 'paralysis'

    expect(remove(state, regen)).toBe('Rattata healed 30 hp from its regenerator!\n')
    expect(remove(state, cure)).toBe("Rattata's paralysis was cured by its natural cure!\n")
    expect(cure.status.current).toBeNull()
  })
})

describe('nextTurn', () => {
  it('restores hp with leftovers', () => {
    const rat = withHp(makeCombatant({ item: 'leftovers' }), 40, 90)
    const state = makeDuel([rat], [makeCombatant()])
    expect(nextTurn(state, rat)).toBe('Rattata healed 5 hp from its leftovers!\n')
    expect(rat.hp).toBe(45)
  })

  it('burns for a sixteenth of max hp', () => {
    const rat = makeCombatant()
    const state = makeDuel([rat], [makeCombatant()])
    rat.status.current = 'burn'
    expect(nextTurn(state, rat)).toBe('Rattata took 5 damage from its burn!\n')
    expect(rat.hp).toBe(85)
  })

  it('makes bad poison worse each turn', () => {
    const rat = makeCombatant()
    const state = makeDuel([rat], [makeCombatant()])
    rat.status.current = 'b-poison'

    expect(nextTurn(state, rat)).toBe('Rattata took 5 damage from its bad poison!\n')
    expect(nextTurn(state, rat)).toBe('Rattata took 10 damage from its bad poison!\n')
    expect(rat.hp).toBe(75)
  })

  it('counts turns on the field', () => {
    const rat = makeCombatant()
    const state = makeDuel([rat], [makeCombatant()])
    nextTurn(state, rat)
    nextTurn(state, rat)
    expect(rat.activeTurns).toBe(2)
  })

  it('drains hp to the opponent with leech seed', () => {
    const rat = makeCombatant()
    const foe = withHp(makeCombatant({ nickname: 'Fang' }), 40, 90)
    const state = makeDuel([rat], [foe])
    rat.v.leechSeed = true

    expect(nextTurn(state, rat)).toBe('Rattata took 11 damage from leech seed!\nFang (Rattata) healed 11 hp from leech seed!\n')
    expect(rat.hp).toBe(79)
    expect(foe.hp).toBe(51)
  })

  it('drains more into a big root', () => {
    const rat = makeCombatant()
    const foe = withHp(makeCombatant({ nickname: 'Fang', item: 'big-root' }), 40, 90)
    const state = makeDuel([rat], [foe])
    rat.v.leechSeed = true

    expect(nextTurn(state, rat)).toBe('Rattata took 11 damage from leech seed!\nFang (Rattata) healed 14 hp from leech seed!\n')
    expect(foe.hp).toBe(54)
  })

  it('boosts ingrain healing with a big root', () => {
    const rat = withHp(makeCombatant({ item: 'big-root' }), 40, 90)
    const state = makeDuel([rat], [makeCombatant()])
    rat.v.ingrain = true

    expect(nextTurn(state, rat)).toBe('Rattata healed 6 hp from ingrain!\n')
    expect(rat.hp).toBe(46)
  })

  it('hurts a sleeping combatant facing bad dreams', () => {
    const rat = makeCombatant()
    const dusk = makeCombatant({ nickname: 'Dusk', ability: 'bad-dreams' })
    const state = makeDuel([rat], [dusk])
    rat.status.current = 'sleep'

    expect(nextTurn(state, rat)).toBe("Rattata took 11 damage from Dusk (Rattata)'s bad dreams!\n")
    expect(rat.hp).toBe(79)
    expect(nextTurn(state, dusk)).toBe('')
  })
})
