import { describe, expect, it } from 'vitest'

import { damage } from '@engine/duel/damage'
import { ItemLockedError } from '@engine/duel/errors'
import { itemOf, recoverItem, removeItem, swapItems, transferItem } from '@engine/duel/items'
import { setTurns } from '@engine/duel/timers'
import { makeCombatant, makeDuel } from './helpers/duel'

describe('held items', () => {
  it('cannot take away a mega stone', () => {
    const zard = makeCombatant({ species: 'Charizard', ability: 'blaze', item: 'mega-stone-x' })
    expect(() => removeItem(zard)).toThrow(ItemLockedError)
    expect(() => removeItem(zard)).toThrow('mega-stone-x cannot be removed.')
    expect(zard.heldItem.item).toBe('mega-stone-x')
  })

  it('moves and swaps items between combatants', () => {
    const rat = makeCombatant({ item: 'leftovers' })
    const fang = makeCombatant({ nickname: 'Fang' })

    swapItems(rat, fang)
    expect(rat.heldItem.item).toBeNull()
    expect(fang.heldItem.item).toBe('leftovers')

    transferItem(fang, rat)
    expect(rat.heldItem.item).toBe('leftovers')
    expect(fang.heldItem.item).toBeNull()
    expect(fang.heldItem.everHadItem).toBe(true)
  })

  it('is suppressed by magic room unless it cannot be removed', () => {
    const rat = makeCombatant({ item: 'leftovers' })
    const zard = makeCombatant({ species: 'Charizard', ability: 'blaze', item: 'mega-stone-x' })
    const state = makeDuel([rat], [zard])
    setTurns(state.field.magicRoom, 5)

    expect(itemOf(state, rat)).toBeNull()
    expect(itemOf(state, zard)).toBe('mega-stone-x')
  })
})

describe('berries', () => {
  it('eats a sitrus berry once hp falls to half', () => {
    const rat = makeCombatant({ item: 'sitrus-berry' })
    const state = makeDuel([rat], [makeCombatant()])

    expect(damage(state, rat, 50)).toBe('Rattata took 50 damage!\nRattata healed 22 hp from eating its berry!\n')
    expect(rat.hp).toBe(62)
    expect(rat.heldItem.item).toBeNull()
    expect(rat.heldItem.lastUsed).toBe('sitrus-berry')

    recoverItem(rat, rat)
    expect(rat.heldItem.item).toBe('sitrus-berry')
    expect(rat.heldItem.lastUsed).toBeNull()
  })

  it('stays uneaten while the opponent is unnerving', () => {
    const rat = makeCombatant({ item: 'sitrus-berry' })
    const state = makeDuel([rat], [makeCombatant({ ability: 'unnerve' })])

    expect(damage(state, rat, 50)).toBe('Rattata took 50 damage!\n')
    expect(rat.heldItem.item).toBe('sitrus-berry')
  })
})
