import type { ElementType, Flavor, MoveTemplate, StatBlock } from '@engine/duel/types'

export interface TurnRange { min: number; max: number }

export interface Durations {
  weather: number
  /** Weather set while holding the matching rock. */
  weatherExtended: number
  terrain: number
  terrainExtended: number
}

/** Percent rolls, except shed skin which is "one in N". */
export interface Chances {
  focusBand: number
  contactStatus: number
  effectSpore: number
  cursedBody: number
  toxicChain: number
  poisonTouch: number
  harvest: number
  quickClaw: number
  quickDraw: number
  shedSkinOneIn: number
}

export interface DuelConfig {
  __version: number
  durations: Durations
  chances: Chances
  confusionTurns: TurnRange
  sleepTurns: TurnRange
  inverseBattle: boolean
}

export interface SpeciesDef {
  name: string
  types: ElementType[]
  baseStats: StatBlock
  abilities: string[]
  weight: number
  canStillEvolve: boolean
}

export type MoveDef = MoveTemplate

export interface ItemDef {
  identifier: string
  flingPower: number | null
  removable: boolean
  berry: boolean
  /** Arceus plates and Silvally memories name the type they grant. */
  plateType: ElementType | null
  memoryType: ElementType | null
  flavor: Flavor | null
}

export interface AbilityDef {
  id: number
  identifier: string
  name: string
}

export interface Catalog {
  species: Record<string, SpeciesDef>
  moves: Record<string, MoveDef>
  items: Record<string, ItemDef>
  abilities: Record<string, AbilityDef>
}

/** One roster entry as the hosting application hands it to a duel. */
export interface RosterEntry {
  id: number
  species: string
  nickname?: string | null
  level: number
  gender?: string
  ivs?: Partial<StatBlock>
  evs?: Partial<StatBlock>
  nature?: Partial<Omit<StatBlock, 'hp'>>
  dislikedFlavor?: Flavor | null
  ability?: string
  item?: string | null
  moves: string[]
}
