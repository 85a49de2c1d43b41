import type { RosterEntry } from '@config/schema'
import { findAbility, findItem, findSpecies, moveOf, speciesOf } from '@content/registry'
import { MissingReferenceError, UnknownFormError } from './errors'
import { itemOf } from './items'
import { copyMove, makeMove } from './moves'
import { displayName } from './narration'
import { rawHp } from './stats'
import { active, expiring, timer } from './timers'
import type {
  Combatant, DuelState, ElementType, Move, SideIndex, StatBlock, Stages, Volatiles,
} from './types'

/** Abilities that cannot be overwritten by skill swap, worry seed and similar. */
const UNCHANGEABLE = new Set([
  'multitype', 'stance-change', 'schooling', 'comatose', 'shields-down', 'disguise',
  'rks-system', 'battle-bond', 'power-construct', 'ice-face', 'gulp-missile', 'zero-to-hero',
])

/** Abilities that cannot be copied onto another combatant. */
const UNGIVEABLE = new Set([
  'trace', 'forecast', 'flower-gift', 'zen-mode', 'illusion', 'imposter', 'power-of-alchemy',
  'receiver', 'disguise', 'stance-change', 'power-construct', 'ice-face', 'hunger-switch',
  'gulp-missile', 'zero-to-hero',
])

/** Abilities a mold breaker class attacker ignores. */
const IGNORABLE = new Set([
  'aroma-veil', 'battle-armor', 'big-pecks', 'bulletproof', 'clear-body', 'contrary', 'damp',
  'dazzling', 'disguise', 'dry-skin', 'filter', 'flash-fire', 'flower-gift', 'flower-veil',
  'fluffy', 'friend-guard', 'fur-coat', 'heatproof', 'heavy-metal', 'hyper-cutter', 'ice-face',
  'ice-scales', 'immunity', 'inner-focus', 'insomnia', 'keen-eye', 'leaf-guard', 'levitate',
  'light-metal', 'lightning-rod', 'limber', 'magic-bounce', 'magma-armor', 'marvel-scale',
  'mirror-armor', 'motor-drive', 'multiscale', 'oblivious', 'overcoat', 'own-tempo',
  'pastel-veil', 'punk-rock', 'queenly-majesty', 'sand-veil', 'sap-sipper', 'shell-armor',
  'shield-dust', 'simple', 'snow-cloak', 'solid-rock', 'soundproof', 'sticky-hold',
  'storm-drain', 'sturdy', 'suction-cups', 'sweet-veil', 'tangled-feet', 'telepathy',
  'thick-fat', 'unaware', 'vital-spirit', 'volt-absorb', 'water-absorb', 'water-bubble',
  'water-veil', 'white-smoke', 'wonder-guard', 'wonder-skin', 'armor-tail', 'earth-eater',
  'good-as-gold', 'purifying-salt', 'well-baked-body',
])

const MOLD_BREAKERS = new Set(['mold-breaker', 'turboblaze', 'teravolt', 'neutralizing-gas'])

/** Move effects that ignore the target's ability outright. */
const ABILITY_IGNORING_EFFECTS = new Set([411, 460])

export function freshStages(): Stages {
  return {
    attack: 0,
    defense: 0,
    'special attack': 0,
    'special defense': 0,
    speed: 0,
    accuracy: 0,
    evasion: 0,
  }
}

export function freshVolatiles(): Volatiles {
  return {
    metronome: { move: '', count: 0 },
    leechSeed: false,
    stockpile: 0,
    flinched: false,
    confusion: timer(),
    lastMove: null,
    lastMoveDamage: null,
    lastMoveFailed: false,
    lockedMove: null,
    choiceMove: null,
    bide: null,
    torment: false,
    imprison: false,
    disable: expiring(),
    taunt: timer(),
    encore: expiring(),
    healBlock: timer(),
    focusEnergy: false,
    perishSong: timer(),
    nightmare: false,
    defenseCurl: false,
    furyCutter: 0,
    bind: timer(),
    substitute: 0,
    silenced: timer(),
    rage: false,
    mindReader: expiring(),
    destinyBond: false,
    destinyBondCooldown: timer(),
    trapping: false,
    ingrain: false,
    infatuated: null,
    aquaRing: false,
    magnetRise: timer(),
    dive: false,
    dig: false,
    fly: false,
    shadowForce: false,
    luckyChant: timer(),
    groundedByMove: false,
    charge: timer(),
    uproar: timer(),
    magicCoat: false,
    powerTrick: false,
    powerShift: false,
    yawn: timer(),
    ionDeluge: false,
    electrify: false,
    protectionUsed: false,
    protectionChance: 1,
    protect: false,
    endure: false,
    wideGuard: false,
    craftyShield: false,
    kingShield: false,
    spikyShield: false,
    matBlock: false,
    banefulBunker: false,
    quickGuard: false,
    obstruct: false,
    silkTrap: false,
    burningBulwark: false,
    laserFocus: timer(),
    powdered: false,
    snatching: false,
    telekinesis: timer(),
    embargo: timer(),
    echoedVoicePower: 40,
    echoedVoiceUsed: false,
    curse: false,
    fairyLock: timer(),
    grudge: false,
    foresight: false,
    miracleEye: false,
    beakBlast: false,
    noRetreat: false,
    dmgThisTurn: false,
    autotomize: 0,
    lansatBerryAte: false,
    micleBerryAte: false,
    flashFire: false,
    truantTurn: 0,
    cudChew: timer(),
    boosterEnergy: false,
    statIncreased: false,
    statDecreased: false,
    roost: false,
    octolock: false,
    attackSplit: null,
    spAtkSplit: null,
    defenseSplit: null,
    spDefSplit: null,
    tarShot: false,
    syrupBomb: timer(),
  }
}

function fillBlock(partial: Partial<StatBlock> | undefined, fallback: number): StatBlock {
  return {
    hp: partial?.hp ?? fallback,
    attack: partial?.attack ?? fallback,
    defense: partial?.defense ?? fallback,
    spatk: partial?.spatk ?? fallback,
    spdef: partial?.spdef ?? fallback,
    speed: partial?.speed ?? fallback,
  }
}

function megaFormOf(entry: RosterEntry): string | null {
  if (entry.item === 'mega-stone' || entry.species === 'Rayquaza') return `${entry.species}-mega`
  if (entry.item === 'mega-stone-x') return `${entry.species}-mega-x`
  if (entry.item === 'mega-stone-y') return `${entry.species}-mega-y`
  return null
}

/**
 * Builds the duel-scoped record for one roster entry. Everything species-derived is
 * copied so the catalog is never mutated, and the starting values are snapshotted.
 */
export function createCombatant(entry: RosterEntry, owner: SideIndex): Combatant {
  const def = speciesOf(entry.species)
  const ivs = fillBlock(entry.ivs, 0)
  const evs = fillBlock(entry.evs, 0)
  const hp = entry.species === 'Shedinja' ? 1 : rawHp(def.baseStats.hp, ivs.hp, evs.hp, entry.level)
  const moves = entry.moves.map(name => makeMove(moveOf(name)))
  const ability = entry.ability ?? def.abilities[0] ?? ''
  if (ability && !findAbility(ability)) throw new MissingReferenceError('ability', ability)
  const megaForm = megaFormOf(entry)
  const mega = megaForm ? findSpecies(megaForm) : null
  const item = entry.item ?? null
  if (item !== null && !findItem(item)) throw new MissingReferenceError('item', item)
  const nickname = entry.nickname ?? null

  return {
    id: entry.id,
    owner,
    species: def.name,
    startingSpecies: def.name,
    nickname,
    name: displayName(def.name, nickname),
    level: entry.level,
    base: {
      attack: def.baseStats.attack,
      defense: def.baseStats.defense,
      spatk: def.baseStats.spatk,
      spdef: def.baseStats.spdef,
      speed: def.baseStats.speed,
    },
    hp,
    startingHp: hp,
    ivs,
    evs,
    startingIvs: { ...ivs },
    startingEvs: { ...evs },
    nature: {
      attack: entry.nature?.attack ?? 1,
      defense: entry.nature?.defense ?? 1,
      spatk: entry.nature?.spatk ?? 1,
      spdef: entry.nature?.spdef ?? 1,
      speed: entry.nature?.speed ?? 1,
    },
    dislikedFlavor: entry.dislikedFlavor ?? null,
    moves,
    startingMoves: [...moves],
    ability,
    startingAbility: ability,
    megaAbility: mega?.abilities[0] ?? null,
    megaTypes: mega ? [...mega.types] : null,
    types: [...def.types],
    startingTypes: [...def.types],
    startingWeight: def.weight,
    gender: entry.gender ?? '-x',
    canStillEvolve: def.canStillEvolve,
    heldItem: { item, lastUsed: null, everHadItem: item !== null },
    status: { current: null, sleep: timer(), badlyPoisonedTurn: 0 },
    stages: freshStages(),
    illusion: null,
    everSentOut: false,
    swappedIn: false,
    hasMoved: false,
    shouldMegaEvolve: false,
    activeTurns: 0,
    minimized: false,
    ateBerry: false,
    corrosiveGas: false,
    numHits: 0,
    iceRepaired: false,
    lastBerry: null,
    supersweetSyrup: false,
    v: freshVolatiles(),
  }
}

export function abilityIgnorable(c: Combatant): boolean {
  return IGNORABLE.has(c.ability)
}

export function abilityChangeable(c: Combatant): boolean {
  return !UNCHANGEABLE.has(c.ability)
}

export function abilityGiveable(c: Combatant): boolean {
  return !UNGIVEABLE.has(c.ability)
}

/**
 * The ability in effect for this combatant. When another combatant's move is
 * being resolved, a mold breaker class attacker suppresses ignorable abilities.
 */
export function abilityOf(c: Combatant, attacker: Combatant | null = null, move: Move | null = null): string {
  if (!move || !attacker || attacker === c) return c.ability
  if (!abilityIgnorable(c)) return c.ability
  if (ABILITY_IGNORING_EFFECTS.has(move.effect)) return ''
  if (MOLD_BREAKERS.has(attacker.ability)) return ''
  if (attacker.ability === 'mycelium-might' && move.damageClass === 'status') return ''
  return c.ability
}

export function hasType(c: Combatant, type: ElementType): boolean {
  return c.types.includes(type)
}

export function weight(c: Combatant, attacker: Combatant | null = null, move: Move | null = null): number {
  let w = c.startingWeight
  const ability = abilityOf(c, attacker, move)
  if (ability === 'heavy-metal') w *= 2
  if (ability === 'light-metal') w = Math.max(1, Math.floor(w / 2))
  w -= c.v.autotomize * 1000
  return Math.max(1, w)
}

export function grounded(
  state: DuelState,
  c: Combatant,
  attacker: Combatant | null = null,
  move: Move | null = null,
): boolean {
  if (active(state.field.gravity)) return true
  if (itemOf(state, c) === 'iron-ball') return true
  if (c.v.groundedByMove) return true
  if (hasType(c, 'flying') && !c.v.roost) return false
  if (abilityOf(c, attacker, move) === 'levitate') return false
  if (itemOf(state, c) === 'air-balloon') return false
  if (active(c.v.magnetRise)) return false
  return !active(c.v.telekinesis)
}

/** Switches to another catalog form. False when the catalog has no such form. */
export function form(c: Combatant, key: string): boolean {
  const def = findSpecies(key)
  if (!def) return false
  c.species = key
  c.name = displayName(key, c.nickname)
  c.base = {
    attack: def.baseStats.attack,
    defense: def.baseStats.defense,
    spatk: def.baseStats.spatk,
    spdef: def.baseStats.spdef,
    speed: def.baseStats.speed,
  }
  c.v.attackSplit = null
  c.v.spAtkSplit = null
  c.v.defenseSplit = null
  c.v.spDefSplit = null
  c.v.autotomize = 0
  return true
}

export function forceForm(c: Combatant, key: string): void {
  if (!form(c, key)) throw new UnknownFormError(key)
}

export function transform(c: Combatant, other: Combatant): void {
  c.v.choiceMove = null
  c.species = other.species
  c.name = displayName(other.species, c.nickname)
  c.base = { ...other.base }
  c.ivs = { ...other.ivs }
  c.evs = { ...other.evs }
  c.moves = other.moves.map(m => ({ ...copyMove(m), pp: 5 }))
  c.ability = other.ability
  c.types = [...other.types]
  c.stages = { ...other.stages }
}

export function isFainted(c: Combatant): boolean {
  return c.hp <= 0
}
