import type { DuelConfig } from './schema'

export const DEFAULTS: DuelConfig = {
  __version: 1,
  durations: { weather: 5, weatherExtended: 8, terrain: 5, terrainExtended: 8 },
  chances: {
    focusBand: 10,
    contactStatus: 30,
    effectSpore: 30,
    cursedBody: 30,
    toxicChain: 30,
    poisonTouch: 30,
    harvest: 50,
    quickClaw: 20,
    quickDraw: 30,
    shedSkinOneIn: 3,
  },
  confusionTurns: { min: 2, max: 5 },
  sleepTurns: { min: 2, max: 4 },
  inverseBattle: false,
}
