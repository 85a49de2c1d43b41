import { CONFIG } from '@config/store'
import { findItem, speciesOf } from '@content/registry'
import { abilityChangeable, abilityGiveable, abilityOf, form, hasType, transform } from './combatant'
import { infatuate } from './conditions'
import { damage, heal } from './damage'
import { effectiveness } from './effectiveness'
import { forecastFor, setTerrain, setWeather, terrainOf, terrainType, weatherOf } from './field'
import { giveItem, hasItem, itemOf, recoverItem, removable, transferItem } from './items'
import { sendOutAbility } from './lifecycle'
import { abilityName, itemName, moveName } from './narration'
import { applyStatus, resetStatus } from './nonvolatile'
import { chance, pick } from './rng'
import { hasAlive } from './side'
import { appendStat } from './stages'
import { getDefense, getSpDef } from './stats'
import { sideOf } from './state'
import { active, setItem, setTurns } from './timers'
import type {
  Combatant, DuelState, ElementType, Move, StatName, StatusName, TerrainKind, WeatherKind,
} from './types'

/** One ability's reaction to a trigger event, returning its narration. */
export type Trigger<C> = (ctx: C) => string

/** Handlers for one trigger event, keyed by catalog ability id. */
export type TriggerTable<C> = Partial<Record<string, Trigger<C>>>

export function fire<C>(table: TriggerTable<C>, ability: string, ctx: C): string {
  if (!Object.hasOwn(table, ability)) return ''
  const handler = table[ability]
  return handler ? handler(ctx) : ''
}

/** A damaging move landed on `defender`, which survived it. */
export interface HitContext {
  state: DuelState
  defender: Combatant
  attacker: Combatant | null
  move: Move
  moveType: ElementType
  critical: boolean
  /** HP crossed the half mark on this hit. */
  droppedBelowHalf: boolean
}

export interface StrikeContext {
  state: DuelState
  defender: Combatant
  attacker: Combatant
  move: Move
  amount: number
}

export interface ContactContext extends StrikeContext {
  /** The attacker's protective pads blocked the contact effects. */
  padded: boolean
}

/** `other` is the opposing active combatant, null when its slot is empty. */
export interface FieldContext {
  state: DuelState
  holder: Combatant
  other: Combatant | null
}

/* ------------------------------- on hit -------------------------------- */

function selfBoost(ctx: HitContext, delta: number, stat: StatName, source: string): string {
  return appendStat(ctx.state, ctx.defender, delta, ctx.defender, null, stat, source)
}

function charged(ctx: HitContext, ability: string): string {
  setTurns(ctx.defender.v.charge, 2)
  return `${ctx.defender.name} became charged by its ${ability}!\n`
}

/** Evaluated on the defender's ability after a non-fatal damaging hit. */
export const ON_HIT: TriggerTable<HitContext> = {
  'color-change': ({ defender, moveType }) => {
    if (hasType(defender, moveType)) return ''
    defender.types = [moveType]
    return `${defender.name} changed its color, transforming into a ${moveType} type!\n`
  },
  'anger-point': ctx => (ctx.critical ? selfBoost(ctx, 6, 'attack', 'its anger point') : ''),
  'weak-armor': ctx => {
    if (ctx.move.damageClass !== 'physical' || ctx.attacker === ctx.defender) return ''
    return selfBoost(ctx, -1, 'defense', 'its weak armor') + selfBoost(ctx, 2, 'speed', 'its weak armor')
  },
  justified: ctx => (ctx.moveType === 'dark' ? selfBoost(ctx, 1, 'attack', 'justified') : ''),
  rattled: ctx => {
    const t = ctx.moveType
    return t === 'bug' || t === 'dark' || t === 'ghost' ? selfBoost(ctx, 1, 'speed', 'its rattled') : ''
  },
  stamina: ctx => selfBoost(ctx, 1, 'defense', 'its stamina'),
  'water-compaction': ctx => (ctx.moveType === 'water' ? selfBoost(ctx, 2, 'defense', 'its water compaction') : ''),
  berserk: ctx => (ctx.droppedBelowHalf ? selfBoost(ctx, 1, 'special attack', 'its berserk') : ''),
  'anger-shell': ctx => {
    if (!ctx.droppedBelowHalf) return ''
    const src = 'its anger shell'
    return selfBoost(ctx, 1, 'attack', src)
      + selfBoost(ctx, 1, 'special attack', src)
      + selfBoost(ctx, 1, 'speed', src)
      + selfBoost(ctx, -1, 'defense', src)
      + selfBoost(ctx, -1, 'special defense', src)
  },
  'steam-engine': ctx => {
    const t = ctx.moveType
    return t === 'fire' || t === 'water' ? selfBoost(ctx, 6, 'speed', 'its steam engine') : ''
  },
  'thermal-exchange': ctx => (ctx.moveType === 'fire' ? selfBoost(ctx, 1, 'attack', 'its thermal exchange') : ''),
  'wind-rider': ctx => (ctx.move.wind ? selfBoost(ctx, 1, 'attack', 'its wind rider') : ''),
  'cotton-down': ({ state, defender, attacker }) => {
    if (attacker === null) return ''
    return appendStat(state, attacker, -1, defender, null, 'speed', `${defender.name}'s cotton down`)
  },
  'sand-spit': ({ state, defender }) => setWeather(state, 'sandstorm', defender),
  'seed-sower': ({ state, defender }) => (terrainOf(state) === null ? setTerrain(state, 'grassy', defender) : ''),
  electromorphosis: ctx => charged(ctx, 'electromorphosis'),
  'wind-power': ctx => (ctx.move.wind ? charged(ctx, 'wind power') : ''),
  'toxic-debris': ({ state, defender, attacker, move }) => {
    if (move.damageClass !== 'physical' || attacker === null || attacker === defender) return ''
    const side = sideOf(state, attacker)
    if (side.toxicSpikes >= 2) return ''
    side.toxicSpikes++
    return `Toxic spikes were scattered around the feet of ${side.name}'s team because of ${defender.name}'s toxic debris!\n`
  },
}

/** Defender's ability, after the hit is recorded. */
export const AFTER_HIT: TriggerTable<StrikeContext> = {
  'cursed-body': ({ state, defender, attacker, move }) => {
    if (active(attacker.v.disable) || !attacker.moves.includes(move)) return ''
    if (!chance(state.rng, CONFIG().chances.cursedBody)) return ''
    if (abilityOf(attacker) === 'aroma-veil') {
      return `${attacker.name}'s aroma veil protects its move from being disabled!\n`
    }
    setItem(attacker.v.disable, move, 4)
    return `${attacker.name}'s ${moveName(move.name)} was disabled by ${defender.name}'s cursed body!\n`
  },
}

/** Attacker's ability, after the hit is recorded. */
export const ATTACKER_AFTER_HIT: TriggerTable<StrikeContext> = {
  magician: ({ defender, attacker }) => {
    if (hasItem(attacker) || !hasItem(defender) || !removable(defender.heldItem.item)) return ''
    transferItem(defender, attacker)
    return `${attacker.name} stole ${itemName(attacker.heldItem.item ?? '')} using its magician!\n`
  },
  'toxic-chain': ({ state, defender, attacker }) => {
    if (!chance(state.rng, CONFIG().chances.toxicChain)) return ''
    return applyStatus(state, defender, 'b-poison', { attacker, source: `${attacker.name}'s toxic chain` })
  },
}

/* ------------------------------- contact ------------------------------- */

function contactStatus(status: StatusName, ability: string): Trigger<ContactContext> {
  return ({ state, defender, attacker }) => {
    if (!chance(state.rng, CONFIG().chances.contactStatus)) return ''
    return applyStatus(state, attacker, status, { attacker, source: `${defender.name}'s ${ability}` })
  }
}

function contactRecoil(ability: string): Trigger<ContactContext> {
  return ({ state, defender, attacker }) => {
    if (!hasAlive(sideOf(state, defender))) return ''
    return damage(state, attacker, Math.floor(attacker.startingHp / 8), { source: `${defender.name}'s ${ability}` })
  }
}

function contactSlow(source: (name: string) => string): Trigger<ContactContext> {
  return ({ state, defender, attacker }) => appendStat(state, attacker, -1, defender, null, 'speed', source(defender.name))
}

function spreadAbility(id: string): Trigger<ContactContext> {
  return ({ state, defender, attacker }) => {
    if (abilityOf(attacker) === id || !abilityChangeable(attacker)) return ''
    attacker.ability = id
    return `${attacker.name} gained ${abilityName(id)} from ${defender.name}!\n` + sendOutAbility(state, attacker)
  }
}

const SPORE_STATUSES: readonly StatusName[] = ['paralysis', 'poison', 'sleep']

/** Defender's ability on contact, unless the attacker's protective pads block it. */
export const CONTACT: TriggerTable<ContactContext> = {
  static: contactStatus('paralysis', 'static'),
  'poison-point': contactStatus('poison', 'poison point'),
  'flame-body': contactStatus('burn', 'flame body'),
  'rough-skin': contactRecoil('rough skin'),
  'iron-barbs': contactRecoil('iron barbs'),
  'effect-spore': ({ state, attacker }) => {
    if (abilityOf(attacker) === 'overcoat' || hasType(attacker, 'grass')) return ''
    if (itemOf(state, attacker) === 'safety-goggles') return ''
    if (!chance(state.rng, CONFIG().chances.effectSpore)) return ''
    return applyStatus(state, attacker, pick(state.rng, SPORE_STATUSES), { attacker })
  },
  'cute-charm': ({ state, defender, attacker }) => {
    if (!chance(state.rng, CONFIG().chances.contactStatus)) return ''
    return infatuate(state, attacker, defender, null, `${defender.name}'s cute charm`)
  },
  mummy: spreadAbility('mummy'),
  'lingering-aroma': spreadAbility('lingering-aroma'),
  gooey: contactSlow(n => `touching ${n}'s gooey body`),
  'tangling-hair': contactSlow(n => `touching ${n}'s tangled hair`),
}

/** Defender's ability; protective pads do not stop item theft. */
export const CONTACT_STEAL: TriggerTable<ContactContext> = {
  pickpocket: ({ defender, attacker }) => {
    if (hasItem(defender) || !hasItem(attacker) || !removable(attacker.heldItem.item)) return ''
    if (abilityOf(attacker) === 'sticky-hold') return `${attacker.name}'s sticky hand kept hold of its item!\n`
    transferItem(attacker, defender)
    return `${attacker.name}'s ${itemName(defender.heldItem.item ?? '')} was stolen!\n`
  },
}

/** Attacker's ability when its move makes contact. */
export const ATTACKER_CONTACT: TriggerTable<ContactContext> = {
  'poison-touch': ({ state, defender, attacker, move }) => {
    if (!chance(state.rng, CONFIG().chances.poisonTouch)) return ''
    return applyStatus(state, defender, 'poison', { attacker, move, source: `${attacker.name}'s poison touch` })
  },
}

/** Defender's ability, affecting both sides, evaluated last. */
export const CONTACT_AFTER_STEAL: TriggerTable<ContactContext> = {
  'perish-body': ({ defender, attacker, padded }) => {
    if (padded || active(attacker.v.perishSong)) return ''
    setTurns(attacker.v.perishSong, 4)
    setTurns(defender.v.perishSong, 4)
    return `All pokemon will faint after 3 turns from ${defender.name}'s perish body!\n`
  },
  'wandering-spirit': ({ state, defender, attacker }) => {
    if (!abilityChangeable(attacker) || !abilityGiveable(attacker)) return ''
    let msg = `${attacker.name} swapped abilities with ${defender.name} because of ${defender.name}'s wandering spirit!\n`
    const held = defender.ability
    defender.ability = attacker.ability
    attacker.ability = held
    msg += `${defender.name} acquired ${abilityName(defender.ability)}!\n`
    msg += sendOutAbility(state, defender)
    msg += `${attacker.name} acquired ${abilityName(attacker.ability)}!\n`
    msg += sendOutAbility(state, attacker)
    return msg
  },
}

/* ------------------------------- send out ------------------------------ */

function weatherSetter(kind: WeatherKind): Trigger<FieldContext> {
  return ({ state, holder }) => setWeather(state, kind, holder)
}

function terrainSetter(kind: TerrainKind): Trigger<FieldContext> {
  return ({ state, holder }) => setTerrain(state, kind, holder)
}

function announce(text: string): Trigger<FieldContext> {
  return ({ holder }) => `${holder.name} ${text}\n`
}

function retype(holder: Combatant, type: ElementType, ability: string): string {
  holder.types = [type]
  return `${holder.name} transformed into a ${type} type using its ${ability}!\n`
}

function intimidate({ state, holder, other }: FieldContext): string {
  if (other === null) return ''
  switch (abilityOf(other)) {
    case 'oblivious':
      return `${other.name} is too oblivious to be intimidated!\n`
    case 'own-tempo':
      return `${other.name} keeps walking on its own tempo, and is not intimidated!\n`
    case 'inner-focus':
      return `${other.name} is too focused to be intimidated!\n`
    case 'scrappy':
      return `${other.name} is too scrappy to be intimidated!\n`
    case 'guard-dog':
      return `${other.name}'s guard dog keeps it from being intimidated!\n`
        + appendStat(state, other, 1, other, null, 'attack', 'its guard dog')
  }
  let msg = appendStat(state, other, -1, holder, null, 'attack', `${holder.name}'s Intimidate`)
  if (itemOf(state, other) === 'adrenaline-orb') {
    msg += appendStat(state, other, 1, other, null, 'speed', 'its adrenaline orb')
  }
  if (abilityOf(other) === 'rattled') msg += appendStat(state, other, 1, other, null, 'speed', 'its rattled')
  return msg
}

/** Moves with this effect knock out in one hit. */
const OHKO_EFFECT = 39

function forewarnPower(move: Move): number {
  if (move.damageClass === 'status') return 0
  if (move.effect === OHKO_EFFECT) return 150
  return move.power ?? 80
}

/** Evaluated when a combatant enters, or when its ability changes mid-duel. */
export const SEND_OUT: TriggerTable<FieldContext> = {
  imposter: ({ state, holder, other }) => {
    if (other === null || other.v.substitute > 0 || other.illusion !== null) return ''
    const msg = `${holder.name} transformed into ${other.species}!\n`
    transform(holder, other)
    return holder.ability === 'imposter' ? msg : msg + sendOutAbility(state, holder)
  },
  drizzle: weatherSetter('rain'),
  'primordial-sea': weatherSetter('h-rain'),
  'sand-stream': weatherSetter('sandstorm'),
  'snow-warning': weatherSetter('hail'),
  drought: weatherSetter('sun'),
  'orichalcum-pulse': weatherSetter('sun'),
  'desolate-land': weatherSetter('h-sun'),
  'delta-stream': weatherSetter('h-wind'),
  'grassy-surge': terrainSetter('grassy'),
  'misty-surge': terrainSetter('misty'),
  'electric-surge': terrainSetter('electric'),
  'hadron-engine': terrainSetter('electric'),
  'psychic-surge': terrainSetter('psychic'),
  'mold-breaker': announce('breaks the mold!'),
  turboblaze: announce('is radiating a blazing aura!'),
  teravolt: announce('is radiating a bursting aura!'),
  intimidate,
  'screen-cleaner': ({ state, holder }) => {
    for (const side of state.sides) {
      setTurns(side.auroraVeil, 0)
      setTurns(side.lightScreen, 0)
      setTurns(side.reflect, 0)
    }
    return `${holder.name}'s screen cleaner removed barriers from both sides of the field!\n`
  },
  'intrepid-sword': ({ state, holder }) => appendStat(state, holder, 1, holder, null, 'attack', 'its intrepid sword'),
  'dauntless-shield': ({ state, holder }) => appendStat(state, holder, 1, holder, null, 'defense', 'its dauntless shield'),
  trace: ({ state, holder, other }) => {
    if (other === null || !abilityGiveable(other)) return ''
    holder.ability = other.ability
    return `${holder.name} traced ${other.name}'s ability!\n` + sendOutAbility(state, holder)
  },
  download: ({ state, holder, other }) => {
    if (other === null) return ''
    if (getSpDef(state, other) > getDefense(state, other)) {
      return appendStat(state, holder, 1, holder, null, 'attack', 'its download')
    }
    return appendStat(state, holder, 1, holder, null, 'special attack', 'its download')
  },
  anticipation: ({ state, holder, other }) => {
    if (other === null) return ''
    const threatened = other.moves.some(m => m.effect === OHKO_EFFECT || effectiveness(state, m.type, holder) > 1)
    return threatened ? `${holder.name} shuddered in anticipation!\n` : ''
  },
  forewarn: ({ state, holder, other }) => {
    if (other === null) return ''
    let best: Move[] = []
    let bestPower = 0
    for (const move of other.moves) {
      const power = forewarnPower(move)
      if (power > bestPower) {
        bestPower = power
        best = [move]
      } else if (power === bestPower && power > 0) {
        best.push(move)
      }
    }
    if (best.length === 0) return ''
    const move = pick(state.rng, best)
    return `${holder.name} is forewarned about ${other.name}'s ${moveName(move.name)}!\n`
  },
  frisk: ({ holder, other }) => {
    if (other === null || other.heldItem.item === null) return ''
    return `${holder.name} senses that ${other.name} is holding a ${itemName(other.heldItem.item)} using its frisk!\n`
  },
  multitype: ({ state, holder }) => {
    const item = itemOf(state, holder)
    const type = item === null ? null : findItem(item)?.plateType ?? null
    if (type === null || !form(holder, `Arceus-${type}`)) return ''
    return retype(holder, type, 'multitype')
  },
  'rks-system': ({ state, holder }) => {
    if (holder.species !== 'Silvally') return ''
    const item = itemOf(state, holder)
    const type = item === null ? null : findItem(item)?.memoryType ?? null
    if (type === null || !form(holder, `Silvally-${type}`)) return ''
    return retype(holder, type, 'rks system')
  },
  truant: ({ holder }) => {
    holder.v.truantTurn = 0
    return ''
  },
  forecast: ({ state, holder }) => {
    if (!holder.species.startsWith('Castform')) return ''
    const target = forecastFor(weatherOf(state))
    if (holder.species === target.castform || !form(holder, target.castform)) return ''
    return retype(holder, target.type, 'forecast')
  },
  mimicry: ({ state, holder }) => {
    const kind = terrainOf(state)
    if (kind === null) return ''
    return retype(holder, terrainType(kind), 'mimicry')
  },
  'wind-rider': ({ state, holder }) => {
    if (!active(sideOf(state, holder).tailwind)) return ''
    return appendStat(state, holder, 1, holder, null, 'attack', 'its wind rider')
  },
  'supersweet-syrup': ({ state, holder, other }) => {
    if (holder.supersweetSyrup || other === null) return ''
    holder.supersweetSyrup = true
    return appendStat(state, other, -1, holder, null, 'evasion', `${holder.name}'s supersweet syrup`)
  },
}

/* ------------------------------- turn end ------------------------------ */

function cure(test: (c: Combatant) => boolean, text: string): Trigger<FieldContext> {
  return ({ holder }) => {
    if (!test(holder)) return ''
    resetStatus(holder)
    return `${holder.name}'s ${text}\n`
  }
}

function rainy(state: DuelState) {
  const w = weatherOf(state)
  return w === 'rain' || w === 'h-rain'
}

function sunny(state: DuelState) {
  const w = weatherOf(state)
  return w === 'sun' || w === 'h-sun'
}

const MOODY_STATS: readonly StatName[] = ['attack', 'defense', 'special attack', 'special defense', 'speed']

const MINIOR_CORES = ['red', 'orange', 'yellow', 'green', 'blue', 'indigo', 'violet'] as const

/** Zen mode forms: calm form, zen form, and the type the zen form adds. */
const ZEN_FORMS: readonly [string, string, ElementType][] = [
  ['Darmanitan', 'Darmanitan-zen', 'psychic'],
  ['Darmanitan-galar', 'Darmanitan-zen-galar', 'fire'],
]

function belowHalf(c: Combatant) {
  return c.hp < Math.floor(c.startingHp / 2)
}

/** Passive ability effects run during end-of-turn upkeep. */
export const TURN_END: TriggerTable<FieldContext> = {
  'speed-boost': ({ state, holder }) => {
    if (holder.swappedIn) return ''
    return appendStat(state, holder, 1, holder, null, 'speed', 'its Speed boost')
  },
  limber: cure(c => c.status.current === 'paralysis', 'limber cured it of its paralysis!'),
  insomnia: cure(c => c.status.current === 'sleep', 'insomnia woke it up!'),
  'vital-spirit': cure(c => c.status.current === 'sleep', 'vital spirit woke it up!'),
  immunity: cure(c => c.status.current === 'poison' || c.status.current === 'b-poison', 'immunity cured it of its poison!'),
  'magma-armor': cure(c => c.status.current === 'freeze', 'magma armor thawed it out!'),
  'water-veil': cure(c => c.status.current === 'burn', 'water veil cured it of its burn!'),
  'water-bubble': cure(c => c.status.current === 'burn', 'water bubble cured it of its burn!'),
  'own-tempo': ({ holder }) => {
    if (!active(holder.v.confusion)) return ''
    setTurns(holder.v.confusion, 0)
    return `${holder.name}'s tempo cured it of its confusion!\n`
  },
  oblivious: ({ holder }) => {
    let msg = ''
    if (holder.v.infatuated !== null) {
      holder.v.infatuated = null
      msg += `${holder.name} fell out of love because of its obliviousness!\n`
    }
    if (active(holder.v.taunt)) {
      setTurns(holder.v.taunt, 0)
      msg += `${holder.name} stopped caring about being taunted because of its obliviousness!\n`
    }
    return msg
  },
  'rain-dish': ({ state, holder }) => (rainy(state) ? heal(state, holder, Math.floor(holder.startingHp / 16), 'its rain dish') : ''),
  'ice-body': ({ state, holder }) => {
    if (weatherOf(state) !== 'hail') return ''
    return heal(state, holder, Math.floor(holder.startingHp / 16), 'its ice body')
  },
  'dry-skin': ({ state, holder }) => {
    const amount = Math.floor(holder.startingHp / 8)
    if (rainy(state)) return heal(state, holder, amount, 'its dry skin')
    if (sunny(state)) return damage(state, holder, amount, { source: 'its dry skin' })
    return ''
  },
  'solar-power': ({ state, holder }) => {
    if (!sunny(state)) return ''
    return damage(state, holder, Math.floor(holder.startingHp / 8), { source: 'its solar power' })
  },
  moody: ({ state, holder }) => {
    let msg = ''
    const raisable = MOODY_STATS.filter(s => holder.stages[s] < 6)
    const raised = raisable.length > 0 ? pick(state.rng, raisable) : null
    if (raised !== null) msg += appendStat(state, holder, 2, holder, null, raised, 'its moodiness')
    const lowerable = MOODY_STATS.filter(s => s !== raised && holder.stages[s] > -6)
    if (lowerable.length > 0) {
      msg += appendStat(state, holder, -1, holder, null, pick(state.rng, lowerable), 'its moodiness')
    }
    return msg
  },
  pickup: ({ holder, other }) => {
    if (hasItem(holder) || other === null || other.heldItem.lastUsed === null) return ''
    recoverItem(holder, other)
    return `${holder.name} picked up a ${itemName(holder.heldItem.item ?? '')}!\n`
  },
  'ice-face': ({ state, holder }) => {
    if (holder.iceRepaired || holder.species !== 'Eiscue-noice' || weatherOf(state) !== 'hail') return ''
    if (!form(holder, 'Eiscue')) return ''
    holder.iceRepaired = true
    return `${holder.name}'s ice face was restored by the hail!\n`
  },
  harvest: ({ state, holder }) => {
    if (holder.lastBerry === null || hasItem(holder)) return ''
    if (!chance(state.rng, CONFIG().chances.harvest)) return ''
    giveItem(holder, holder.lastBerry)
    holder.lastBerry = null
    return `${holder.name} harvested a ${itemName(holder.heldItem.item ?? '')}!\n`
  },
  'zen-mode': ({ holder }) => {
    for (const [calm, zen, type] of ZEN_FORMS) {
      if (holder.species === calm && belowHalf(holder) && form(holder, zen)) {
        if (!hasType(holder, type)) holder.types.push(type)
        return `${holder.name} enters a zen state.\n`
      }
      if (holder.species === zen && !belowHalf(holder) && form(holder, calm)) {
        holder.types = holder.types.filter(t => t !== type)
        return `${holder.name}'s zen state ends!\n`
      }
    }
    return ''
  },
  'shields-down': ({ holder }) => {
    if (holder.species === 'Minior' && belowHalf(holder)) {
      const core = MINIOR_CORES[holder.id % MINIOR_CORES.length]
      return form(holder, `Minior-${core}`) ? `${holder.name}'s core was exposed!\n` : ''
    }
    if (holder.species.startsWith('Minior-') && !belowHalf(holder) && form(holder, 'Minior')) {
      return `${holder.name}'s shell returned!\n`
    }
    return ''
  },
  schooling: ({ holder }) => {
    const quarter = Math.floor(holder.startingHp / 4)
    if (holder.species === 'Wishiwashi-school' && holder.hp < quarter && form(holder, 'Wishiwashi')) {
      return `${holder.name}'s school is gone!\n`
    }
    if (holder.species === 'Wishiwashi' && holder.hp >= quarter && holder.level >= 20 && form(holder, 'Wishiwashi-school')) {
      return `${holder.name} schools together!\n`
    }
    return ''
  },
  'power-construct': ({ holder }) => {
    if (holder.species !== 'Zygarde' && holder.species !== 'Zygarde-10') return ''
    if (!belowHalf(holder) || holder.hp <= 0 || !form(holder, 'Zygarde-complete')) return ''
    // The new form's HP stat is larger; the damage taken so far carries over.
    const base = speciesOf('Zygarde-complete').baseStats.hp
    const newHp = Math.round((2 * base + holder.ivs.hp + holder.evs.hp / 4) * holder.level / 100 + holder.level + 10)
    holder.hp = newHp - (holder.startingHp - holder.hp)
    holder.startingHp = newHp
    return `${holder.name} is at full power!\n`
  },
  'hunger-switch': ({ holder }) => {
    if (holder.species === 'Morpeko') form(holder, 'Morpeko-hangry')
    else if (holder.species === 'Morpeko-hangry') form(holder, 'Morpeko')
    return ''
  },
  'flower-gift': ({ state, holder }) => {
    if (holder.species === 'Cherrim' && sunny(state)) form(holder, 'Cherrim-sunshine')
    else if (holder.species === 'Cherrim-sunshine' && !sunny(state)) form(holder, 'Cherrim')
    return ''
  },
}
