import type { ExpiringItem, LockedMove, Move, Timer } from './types'

export function timer(turns: number | null = 0): Timer {
  return { turns }
}

export function expiring<T>(): ExpiringItem<T> {
  return { turns: 0, item: null }
}

export function active(t: Timer): boolean {
  if (t.turns === null) return true
  return t.turns > 0
}

/** Counts one turn down. True only on the turn the effect runs out. */
export function tick(t: Timer): boolean {
  if (t.turns === null) return false
  if (!active(t)) return false
  t.turns--
  return !active(t)
}

export function setTurns(t: Timer, turns: number | null): void {
  t.turns = turns === null ? null : Math.max(0, turns)
}

export function tickItem<T>(e: ExpiringItem<T>): boolean {
  const expired = tick(e)
  if (expired) e.item = null
  return expired
}

export function setItem<T>(e: ExpiringItem<T>, item: T, turns: number): void {
  e.item = item
  setTurns(e, turns)
}

export function endItem<T>(e: ExpiringItem<T>): void {
  e.item = null
  setTurns(e, 0)
}

export function lockMove(move: Move, turns: number): LockedMove {
  return { move, turns, turn: 0 }
}

export function tickLocked(locked: LockedMove): boolean {
  const expired = tick(locked)
  locked.turn++
  return expired
}
