export * from '@engine/duel/types'
export * from '@engine/duel/errors'
export { createRng, scriptedRng, randInt, chance, pick } from '@engine/duel/rng'
export { createDuel, activeOf, actives, opponentOf, sideOf, otherSide, isActive } from '@engine/duel/state'
export type { DuelOptions } from '@engine/duel/state'
export {
  createCombatant, abilityOf, form, forceForm, transform, grounded, weight, hasType, isFainted,
  abilityChangeable, abilityGiveable, abilityIgnorable,
} from '@engine/duel/combatant'
export {
  createSide, hasAlive, setWish, sideNextTurn, switchPoke, validSwaps, validMoves,
} from '@engine/duel/side'
export type { ValidMoves } from '@engine/duel/side'
export {
  createField, weatherOf, terrainOf, setWeather, setTerrain, endTerrain, tickWeather, tickTerrain, tickRooms,
} from '@engine/duel/field'
export { getAttack, getDefense, getSpAtk, getSpDef, getSpeed, parseStat, STAT_NAMES } from '@engine/duel/stats'
export { effectiveness } from '@engine/duel/effectiveness'
export { appendStat } from '@engine/duel/stages'
export { damage, dealDamage, faint, heal } from '@engine/duel/damage'
export type { DamageOptions, DamageResult, FaintOptions } from '@engine/duel/damage'
export { applyStatus, resetStatus, statusNextTurn } from '@engine/duel/nonvolatile'
export { confuse, flinch, infatuate } from '@engine/duel/conditions'
export { itemOf, giveItem, removeItem, transferItem, swapItems, recoverItem, eatBerry } from '@engine/duel/items'
export { sendOut, sendOutAbility, remove, nextTurn } from '@engine/duel/lifecycle'
export { makeMove, struggle, useMove, checkCanAct, priorityOf } from '@engine/duel/moves'
export { startDuel, runTurn, whoFirst, handleMegas, npcAction, npcSwap } from '@engine/duel/turn'
export type { Action, TurnActions, SwapChooser, TurnOptions, PlannedAction } from '@engine/duel/turn'
export { CONFIG, configure, loadConfigFile, resetConfig, subscribe } from '@config/store'
export type { DuelConfig, RosterEntry, Catalog, SpeciesDef, MoveDef, ItemDef, AbilityDef } from '@config/schema'
export { loadCatalog, loadTypeChart, speciesOf, moveOf, findSpecies, Species, Moves, Items, Abilities } from '@content/registry'
