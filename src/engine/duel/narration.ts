import type { DuelState } from './types'

export function from(source: string | null | undefined): string {
  return source ? ` from ${source}` : ''
}

export function displayName(species: string, nickname: string | null): string {
  const pretty = species.replace(/-/g, ' ')
  return nickname ? `${nickname} (${pretty})` : pretty
}

export function abilityName(id: string): string {
  return id.toLowerCase().replace(/-/g, ' ')
}

export function moveName(id: string): string {
  const spaced = id.replace(/-/g, ' ')
  return spaced.charAt(0).toUpperCase() + spaced.slice(1)
}

export function itemName(id: string): string {
  return id.replace(/-/g, ' ')
}

/** Appends each narrated line to the duel log in emission order. */
export function pushLog(state: DuelState, narration: string) {
  for (const line of narration.split('\n')) {
    if (line) state.log.push(line)
  }
}
