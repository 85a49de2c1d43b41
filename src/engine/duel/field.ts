import { CONFIG } from '@config/store'
import { abilityOf, form } from './combatant'
import { itemOf, useItem } from './items'
import { appendStat } from './stages'
import { actives } from './state'
import { endItem, expiring, setItem, setTurns, tick, tickItem, timer } from './timers'
import type { Combatant, DuelState, ElementType, Field, StatName, TerrainKind, WeatherKind } from './types'

const EXTREME: readonly WeatherKind[] = ['h-rain', 'h-sun', 'h-wind']

interface WeatherInfo {
  message: string
  /** Type and form forecast switches to. */
  type: ElementType
  castform: string
  rock: string | null
}

const WEATHER: Record<WeatherKind, WeatherInfo> = {
  hail: { message: 'It starts to hail!\n', type: 'ice', castform: 'Castform-snowy', rock: 'icy-rock' },
  sandstorm: { message: 'A sandstorm is brewing up!\n', type: 'normal', castform: 'Castform', rock: 'smooth-rock' },
  rain: { message: 'It starts to rain!\n', type: 'water', castform: 'Castform-rainy', rock: 'damp-rock' },
  sun: { message: 'The sunlight is strong!\n', type: 'fire', castform: 'Castform-sunny', rock: 'heat-rock' },
  'h-rain': { message: 'Heavy rain begins to fall!\n', type: 'water', castform: 'Castform-rainy', rock: null },
  'h-sun': { message: 'The sunlight is extremely harsh!\n', type: 'fire', castform: 'Castform-sunny', rock: null },
  'h-wind': { message: 'The winds are extremely strong!\n', type: 'normal', castform: 'Castform', rock: null },
}

/** Which ability keeps each extreme weather alive. */
const WEATHER_HOLDERS: Partial<Record<WeatherKind, string>> = {
  'h-wind': 'delta-stream',
  'h-sun': 'desolate-land',
  'h-rain': 'primordial-sea',
}

interface TerrainInfo { type: ElementType; seed: string; stat: StatName }

const TERRAIN: Record<TerrainKind, TerrainInfo> = {
  electric: { type: 'electric', seed: 'electric-seed', stat: 'defense' },
  grassy: { type: 'grass', seed: 'grassy-seed', stat: 'defense' },
  misty: { type: 'fairy', seed: 'misty-seed', stat: 'special defense' },
  psychic: { type: 'psychic', seed: 'psychic-seed', stat: 'special defense' },
}

export function createField(): Field {
  return {
    weather: { kind: null, turns: 0 },
    terrain: expiring(),
    trickRoom: timer(),
    magicRoom: timer(),
    wonderRoom: timer(),
    gravity: timer(),
  }
}

export function isExtreme(kind: WeatherKind | null): boolean {
  return kind !== null && EXTREME.includes(kind)
}

/** The weather in effect. Cloud nine and air lock on any active combatant hide it. */
export function weatherOf(state: DuelState): WeatherKind | null {
  for (const c of actives(state)) {
    const ability = abilityOf(c)
    if (ability === 'cloud-nine' || ability === 'air-lock') return null
  }
  return state.field.weather.kind
}

export function terrainOf(state: DuelState): TerrainKind | null {
  return state.field.terrain.item
}

/** The Castform form and type forecast settles on under `kind`; clear skies give the base form. */
export function forecastFor(kind: WeatherKind | null): { castform: string; type: ElementType } {
  if (kind === null) return { castform: 'Castform', type: 'normal' }
  const { castform, type } = WEATHER[kind]
  return { castform, type }
}

export function setWeather(state: DuelState, kind: WeatherKind, setter: Combatant): string {
  const slot = state.field.weather
  if (slot.kind === kind) return ''
  const info = WEATHER[kind]
  let turns: number | null = null
  if (!isExtreme(kind)) {
    if (isExtreme(slot.kind)) return ''
    const { weather, weatherExtended } = CONFIG().durations
    turns = info.rock !== null && itemOf(state, setter) === info.rock ? weatherExtended : weather
  }

  let msg = info.message
  for (const c of actives(state)) {
    if (abilityOf(c) === 'forecast' && c.species !== info.castform && form(c, info.castform)) {
      c.types = [info.type]
      msg += `${c.name} transformed into a ${info.type} type using its forecast!\n`
    }
  }
  slot.kind = kind
  setTurns(slot, turns)
  return msg
}

function expireWeather(state: DuelState) {
  state.field.weather.kind = null
  setTurns(state.field.weather, 0)
  for (const c of actives(state)) {
    if (abilityOf(c) !== 'forecast') continue
    if (!c.species.startsWith('Castform') || c.species === 'Castform') continue
    if (form(c, 'Castform')) c.types = ['normal']
  }
}

/** True when the weather ran out this turn. */
export function tickWeather(state: DuelState): boolean {
  if (!tick(state.field.weather)) return false
  expireWeather(state)
  return true
}

/** Ends an extreme weather whose holder has left the field. True when it ended. */
export function recheckAbilityWeather(state: DuelState): boolean {
  const kind = state.field.weather.kind
  if (!isExtreme(kind) || kind === null) return false
  const holder = WEATHER_HOLDERS[kind]
  const maintained = actives(state).some(c => abilityOf(c) === holder)
  if (maintained) return false
  expireWeather(state)
  return true
}

export function setTerrain(state: DuelState, kind: TerrainKind, setter: Combatant): string {
  if (state.field.terrain.item === kind) return `There's already a ${kind} terrain!\n`
  const { terrain, terrainExtended } = CONFIG().durations
  setItem(state.field.terrain, kind, itemOf(state, setter) === 'terrain-extender' ? terrainExtended : terrain)
  let msg = `${setter.name} creates a${kind === 'electric' ? 'n' : ''} ${kind} terrain!\n`

  const info = TERRAIN[kind]
  for (const c of actives(state)) {
    if (abilityOf(c) === 'mimicry') {
      c.types = [info.type]
      msg += `${c.name} became a ${info.type} type using its mimicry!\n`
    }
    if (itemOf(state, c) === info.seed) {
      msg += appendStat(state, c, 1, c, null, info.stat, `its ${info.seed.replace('-', ' ')}`)
      useItem(c)
    }
  }
  return msg
}

export function endTerrain(state: DuelState): void {
  endItem(state.field.terrain)
  for (const c of actives(state)) {
    if (abilityOf(c) === 'mimicry') c.types = [...c.startingTypes]
  }
}

export function tickTerrain(state: DuelState): boolean {
  if (!tickItem(state.field.terrain)) return false
  endTerrain(state)
  return true
}

/** The seed matching the current terrain, applied when its holder enters. */
export function terrainSeedOnEntry(state: DuelState, c: Combatant): string {
  const kind = terrainOf(state)
  if (kind === null) return ''
  const info = TERRAIN[kind]
  if (itemOf(state, c) !== info.seed) return ''
  const msg = appendStat(state, c, 1, c, null, info.stat, `its ${info.seed.replace('-', ' ')}`)
  useItem(c)
  return msg
}

export function terrainType(kind: TerrainKind): ElementType {
  return TERRAIN[kind].type
}

export function tickRooms(state: DuelState): string {
  let msg = ''
  const f = state.field
  if (tick(f.trickRoom)) msg += 'The Dimensions returned back to normal!\n'
  if (tick(f.gravity)) msg += 'Gravity returns to normal!\n'
  if (tick(f.magicRoom)) msg += 'The room returns to normal, and held items regain their effect!\n'
  if (tick(f.wonderRoom)) msg += 'The room returns to normal, and stats swap back to what they were before!\n'
  return msg
}
