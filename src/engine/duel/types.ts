export type ElementType =
  | 'normal' | 'fighting' | 'flying' | 'poison' | 'ground' | 'rock'
  | 'bug' | 'ghost' | 'steel' | 'fire' | 'water' | 'grass'
  | 'electric' | 'psychic' | 'ice' | 'dragon' | 'dark' | 'fairy'
  | 'typeless'

export type DamageClass = 'physical' | 'special' | 'status'

export type StatName =
  | 'attack' | 'defense' | 'special attack' | 'special defense'
  | 'speed' | 'accuracy' | 'evasion'

export type StatusName = 'burn' | 'sleep' | 'poison' | 'b-poison' | 'paralysis' | 'freeze'
export type WeatherKind = 'hail' | 'sandstorm' | 'rain' | 'sun' | 'h-rain' | 'h-sun' | 'h-wind'
export type TerrainKind = 'electric' | 'grassy' | 'misty' | 'psychic'
export type Flavor = 'spicy' | 'sour' | 'sweet' | 'dry' | 'bitter'
export type MoveTarget = 'opponent' | 'user' | 'field'
export type SideIndex = 0 | 1

/** Six-slot stat block, ordered the way catalogs list base stats. */
export interface StatBlock {
  hp: number; attack: number; defense: number; spatk: number; spdef: number; speed: number
}

export type NatureDeltas = Omit<StatBlock, 'hp'>

/** `turns === null` means the effect lasts until something ends it. */
export interface Timer { turns: number | null }

export interface ExpiringItem<T> extends Timer { item: T | null }

export interface StatChange { stat: StatName; change: number; target: 'user' | 'target' }

export type Ailment = StatusName | 'confusion' | 'flinch' | 'infatuation'

export interface MoveTemplate {
  id: number
  name: string
  effect: number
  type: ElementType
  damageClass: DamageClass
  power: number | null
  accuracy: number | null
  pp: number
  priority: number
  effectChance: number | null
  critRate: number
  minHits: number | null
  maxHits: number | null
  target: MoveTarget
  contact: boolean
  sound: boolean
  substitute: boolean
  wind: boolean
  healBlock: boolean
  statChanges: StatChange[]
  ailment: Ailment | null
  drain: number
  healing: number
}

/** A move owned by one combatant. PP is per copy, never shared with the template. */
export interface Move extends MoveTemplate {
  startingPp: number
  used: boolean
}

export interface LockedMove extends Timer {
  move: Move
  turn: number
}

export interface HeldItem {
  item: string | null
  lastUsed: string | null
  everHadItem: boolean
}

export interface NonVolatile {
  current: StatusName | null
  sleep: Timer
  badlyPoisonedTurn: number
}

export interface MetronomeCounter { move: string; count: number }

export type Stages = Record<StatName, number>

export interface Volatiles {
  metronome: MetronomeCounter
  leechSeed: boolean
  stockpile: number
  flinched: boolean
  confusion: Timer
  lastMove: Move | null
  lastMoveDamage: { amount: number; damageClass: DamageClass } | null
  lastMoveFailed: boolean
  lockedMove: LockedMove | null
  choiceMove: Move | null
  bide: number | null
  torment: boolean
  imprison: boolean
  disable: ExpiringItem<Move>
  taunt: Timer
  encore: ExpiringItem<Move>
  healBlock: Timer
  focusEnergy: boolean
  perishSong: Timer
  nightmare: boolean
  defenseCurl: boolean
  furyCutter: number
  bind: Timer
  substitute: number
  silenced: Timer
  rage: boolean
  mindReader: ExpiringItem<number>
  destinyBond: boolean
  destinyBondCooldown: Timer
  trapping: boolean
  ingrain: boolean
  infatuated: number | null
  aquaRing: boolean
  magnetRise: Timer
  dive: boolean
  dig: boolean
  fly: boolean
  shadowForce: boolean
  luckyChant: Timer
  groundedByMove: boolean
  charge: Timer
  uproar: Timer
  magicCoat: boolean
  powerTrick: boolean
  powerShift: boolean
  yawn: Timer
  ionDeluge: boolean
  electrify: boolean
  protectionUsed: boolean
  protectionChance: number
  protect: boolean
  endure: boolean
  wideGuard: boolean
  craftyShield: boolean
  kingShield: boolean
  spikyShield: boolean
  matBlock: boolean
  banefulBunker: boolean
  quickGuard: boolean
  obstruct: boolean
  silkTrap: boolean
  burningBulwark: boolean
  laserFocus: Timer
  powdered: boolean
  snatching: boolean
  telekinesis: Timer
  embargo: Timer
  echoedVoicePower: number
  echoedVoiceUsed: boolean
  curse: boolean
  fairyLock: Timer
  grudge: boolean
  foresight: boolean
  miracleEye: boolean
  beakBlast: boolean
  noRetreat: boolean
  dmgThisTurn: boolean
  autotomize: number
  lansatBerryAte: boolean
  micleBerryAte: boolean
  flashFire: boolean
  truantTurn: number
  cudChew: Timer
  boosterEnergy: boolean
  statIncreased: boolean
  statDecreased: boolean
  roost: boolean
  octolock: boolean
  attackSplit: number | null
  spAtkSplit: number | null
  defenseSplit: number | null
  spDefSplit: number | null
  tarShot: boolean
  syrupBomb: Timer
}

export interface Combatant {
  /** Roster id; only used where a form depends on it. */
  id: number
  owner: SideIndex
  species: string
  readonly startingSpecies: string
  readonly nickname: string | null
  name: string
  level: number
  base: Omit<StatBlock, 'hp'>
  hp: number
  startingHp: number
  ivs: StatBlock
  evs: StatBlock
  readonly startingIvs: StatBlock
  readonly startingEvs: StatBlock
  nature: NatureDeltas
  dislikedFlavor: Flavor | null
  moves: Move[]
  startingMoves: Move[]
  ability: string
  startingAbility: string
  megaAbility: string | null
  megaTypes: ElementType[] | null
  types: ElementType[]
  startingTypes: ElementType[]
  startingWeight: number
  gender: string
  canStillEvolve: boolean
  heldItem: HeldItem
  status: NonVolatile
  stages: Stages
  illusion: { species: string; name: string } | null
  everSentOut: boolean
  swappedIn: boolean
  hasMoved: boolean
  shouldMegaEvolve: boolean
  activeTurns: number
  minimized: boolean
  // These survive a switch-out.
  ateBerry: boolean
  corrosiveGas: boolean
  numHits: number
  iceRepaired: boolean
  lastBerry: string | null
  supersweetSyrup: boolean
  v: Volatiles
}

export interface BatonPassSnapshot {
  stages: Stages
  confusion: Timer
  focusEnergy: boolean
  mindReader: ExpiringItem<number>
  leechSeed: boolean
  curse: boolean
  substitute: number
  ingrain: boolean
  powerTrick: boolean
  powerShift: boolean
  healBlock: Timer
  embargo: Timer
  perishSong: Timer
  magnetRise: Timer
  aquaRing: boolean
  telekinesis: Timer
}

export interface Wish extends Timer { hp: number | null }

export interface Side {
  name: string
  party: Combatant[]
  current: number | null
  midTurnRemove: boolean
  batonPass: BatonPassSnapshot | null
  spikes: number
  toxicSpikes: number
  stealthRock: boolean
  stickyWeb: boolean
  lastIdx: number
  wish: Wish
  auroraVeil: Timer
  lightScreen: Timer
  reflect: Timer
  mist: Timer
  safeguard: Timer
  healingWish: boolean
  lunarDance: boolean
  tailwind: Timer
  mudSport: Timer
  waterSport: Timer
  retaliate: Timer
  hasMegaEvolved: boolean
  numFainted: number
  nextSubstitute: number
}

export interface WeatherSlot extends Timer { kind: WeatherKind | null }

export interface Field {
  weather: WeatherSlot
  terrain: ExpiringItem<TerrainKind>
  trickRoom: Timer
  magicRoom: Timer
  wonderRoom: Timer
  gravity: Timer
}

/** Integer percentages keyed `[attacking][defending]`; a missing pair is neutral. */
export type TypeChart = Partial<Record<ElementType, Partial<Record<ElementType, number>>>>

export interface Rng { next(): number }

export interface DuelState {
  sides: [Side, Side]
  field: Field
  typeChart: TypeChart
  inverse: boolean
  turn: number
  rng: Rng
  log: string[]
  winner: SideIndex | null
  ended: boolean
}
