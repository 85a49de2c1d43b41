import { abilityOf, grounded } from './combatant'
import { weatherOf } from './field'
import type { Combatant, DuelState, ElementType, Move } from './types'

/** Moves whose effect code is super effective on water regardless of the chart. */
const FREEZE_DRY = 380
/** Moves that only ever hit airborne targets neutrally. */
const THOUSAND_ARROWS = 373

export function chartValue(state: DuelState, attacking: ElementType, defending: ElementType): number | null {
  const value = state.typeChart[attacking]?.[defending]
  return value === undefined ? null : value / 100
}

/**
 * Damage multiplier for `type` hitting `defender`. Inverse duels flip each
 * per-type multiplier before it joins the product.
 */
export function effectiveness(
  state: DuelState,
  type: ElementType,
  defender: Combatant,
  attacker: Combatant | null = null,
  move: Move | null = null,
): number {
  if (type === 'typeless') return 1
  let product = 1
  const isGrounded = grounded(state, defender, attacker, move)
  const attackerAbility = attacker ? abilityOf(attacker) : ''

  for (const defending of defender.types) {
    if (defending === 'typeless') continue
    if (move && move.effect === FREEZE_DRY && defending === 'water') {
      product *= 2
      continue
    }
    if (move && move.effect === THOUSAND_ARROWS && defending === 'flying' && !isGrounded) {
      return 1
    }
    if (defending === 'flying' && defender.v.roost) continue
    if (defender.v.foresight && defending === 'ghost' && (type === 'fighting' || type === 'normal')) continue
    if (defender.v.miracleEye && defending === 'dark' && type === 'psychic') continue
    if (
      (attackerAbility === 'scrappy' || attackerAbility === 'minds-eye')
      && defending === 'ghost'
      && (type === 'fighting' || type === 'normal')
    ) continue
    if (type === 'ground' && defending === 'flying' && isGrounded) continue

    let e = chartValue(state, type, defending)
    if (e === null) continue
    if (move && weatherOf(state) === 'h-wind' && defending === 'flying' && e > 1) e = 1
    if (state.inverse) {
      if (e < 1) e = 2
      else if (e > 1) e = 0.5
    }
    product *= e
  }

  if (type === 'fire' && defender.v.tarShot) product *= 2
  if (abilityOf(defender, attacker, move) === 'tera-shell' && defender.hp === defender.startingHp && product >= 1) {
    product = 0.5
  }
  return product
}
