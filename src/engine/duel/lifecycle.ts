import { speciesOf } from '@content/registry'
import { SEND_OUT, TURN_END, fire } from './abilities'
import { abilityOf, form, freshStages, freshVolatiles, grounded, hasType } from './combatant'
import { damage, faint, heal } from './damage'
import { effectiveness } from './effectiveness'
import { recheckAbilityWeather, terrainOf, terrainSeedOnEntry, weatherOf } from './field'
import { eatBerry, hasItem, itemOf, recoverItem, useItem } from './items'
import { displayName, moveName } from './narration'
import { applyStatus, resetStatus, statusNextTurn } from './nonvolatile'
import { applyBatonPass } from './side'
import { appendStat } from './stages'
import { STAT_NAMES } from './stats'
import { isActive, opponentOf, sideOf } from './state'
import { active, setTurns, tick, tickItem, tickLocked } from './timers'
import type { Combatant, DuelState } from './types'

/** Species that change shape during a duel and take their own shape back on leaving. */
const REVERTING_SPECIES = new Set(['Ditto', 'Smeargle', 'Mew', 'Aegislash'])

/**
 * Puts `c` on the field. The side must already point at it. Order matters:
 * illusion first since it changes the announced name, then hazards, then
 * the entry ability, then restoratives and items.
 */
export function sendOut(state: DuelState, c: Combatant): string {
  const side = sideOf(state, c)
  const other = opponentOf(state, c)
  c.everSentOut = true
  c.v.flinched = false

  const disguises = side.party.filter(p => p !== c && p.hp > 0)
  const disguise = disguises[disguises.length - 1]
  if (abilityOf(c) === 'illusion' && disguise) {
    c.illusion = { species: c.species, name: c.name }
    c.species = disguise.species
    c.name = disguise.name
  }

  let msg = c.species === 'Pikachu' ? `${c.name}, I choose you!\n` : `${side.name} sent out ${c.name}!\n`

  if (other) {
    other.v.trapping = false
    other.v.octolock = false
    setTurns(other.v.bind, 0)
  }

  if (side.batonPass) {
    msg += `${c.name} carries on the baton!\n`
    applyBatonPass(side.batonPass, c)
    side.batonPass = null
  }
  if (side.nextSubstitute > 0) {
    c.v.substitute = side.nextSubstitute
    side.nextSubstitute = 0
  }

  // Boots do not stop a poison type from soaking up toxic spikes.
  if (side.toxicSpikes > 0 && grounded(state, c) && hasType(c, 'poison')) {
    side.toxicSpikes = 0
    msg += `${c.name} absorbed the toxic spikes!\n`
  }
  if (itemOf(state, c) !== 'heavy-duty-boots') msg += entryHazards(state, c)

  if (c.hp > 0) msg += sendOutAbility(state, c)

  if (side.healingWish) {
    let used = false
    if (c.hp !== c.startingHp) {
      used = true
      c.hp = c.startingHp
    }
    if (c.status.current) {
      used = true
      resetStatus(c)
    }
    if (used) {
      side.healingWish = false
      msg += `${c.name} was restored by healing wish!\n`
    }
  }
  if (side.lunarDance) {
    let used = false
    if (c.hp !== c.startingHp) {
      used = true
      c.hp = c.startingHp
    }
    if (c.status.current) {
      used = true
      resetStatus(c)
    }
    for (const move of c.moves) {
      if (move.pp === move.startingPp) continue
      used = true
      move.pp = move.startingPp
    }
    if (used) {
      side.lunarDance = false
      msg += `${c.name} was restored by lunar dance\n`
    }
  }

  if (itemOf(state, c) === 'air-balloon' && !grounded(state, c)) {
    msg += `${c.name} floats in the air with its air balloon!\n`
  }
  msg += terrainSeedOnEntry(state, c)
  return msg
}

function entryHazards(state: DuelState, c: Combatant): string {
  const side = sideOf(state, c)
  let msg = ''
  if (grounded(state, c)) {
    if (side.spikes > 0) {
      msg += damage(state, c, Math.floor(c.startingHp / (10 - 2 * side.spikes)), { source: 'spikes' })
    }
    if (side.toxicSpikes === 1) msg += applyStatus(state, c, 'poison', { source: 'toxic spikes' })
    if (side.toxicSpikes === 2) msg += applyStatus(state, c, 'b-poison', { source: 'toxic spikes' })
    if (side.stickyWeb) msg += appendStat(state, c, -1, null, null, 'speed', 'the sticky web')
  }
  if (side.stealthRock) {
    const effective = effectiveness(state, 'rock', c)
    if (effective > 0) {
      // 1/8 of max HP scaled by effectiveness
      const divisor = Math.floor(32 / Math.max(1, Math.floor(4 * effective)))
      msg += damage(state, c, Math.floor(c.startingHp / divisor), { source: 'stealth rock' })
    }
  }
  return msg
}

/** Runs the entry effect of `c`'s current ability. Also used after an ability changes mid-duel. */
export function sendOutAbility(state: DuelState, c: Combatant): string {
  return fire(SEND_OUT, abilityOf(c), { state, holder: c, other: opponentOf(state, c) })
}

/**
 * Takes `c` off the field and resets everything battle-scoped to its
 * starting value. HP and status survive.
 */
export function remove(state: DuelState, c: Combatant, fainted = false): string {
  let msg = ''
  if (!fainted) {
    const ability = abilityOf(c)
    if (ability === 'natural-cure' && c.status.current) {
      msg += `${c.name}'s ${c.status.current} was cured by its natural cure!\n`
      resetStatus(c)
    }
    if (ability === 'regenerator') msg += heal(state, c, Math.floor(c.startingHp / 3), 'its regenerator')
    if (ability === 'zero-to-hero' && form(c, 'Palafin-hero')) msg += `${c.name} is ready to be a hero!\n`
  }

  c.status.badlyPoisonedTurn = 0
  c.minimized = false
  c.hasMoved = false
  c.shouldMegaEvolve = false
  c.swappedIn = false
  c.activeTurns = 0
  if (c.illusion) {
    c.species = c.illusion.species
    c.name = c.illusion.name
    c.illusion = null
  }
  if (REVERTING_SPECIES.has(c.startingSpecies)) {
    c.species = c.startingSpecies
    c.name = displayName(c.species, c.nickname)
  }

  const side = sideOf(state, c)
  if (isActive(state, c)) side.current = null
  if (recheckAbilityWeather(state)) msg += 'The weather cleared!\n'

  const def = speciesOf(c.species)
  c.base = {
    attack: def.baseStats.attack,
    defense: def.baseStats.defense,
    spatk: def.baseStats.spatk,
    spdef: def.baseStats.spdef,
    speed: def.baseStats.speed,
  }
  c.ivs = { ...c.startingIvs }
  c.evs = { ...c.startingEvs }
  c.moves = [...c.startingMoves]
  c.ability = c.startingAbility
  c.types = [...c.startingTypes]
  c.stages = freshStages()
  c.v = freshVolatiles()
  c.heldItem.everHadItem = hasItem(c)
  return msg
}

function resetTurnFlags(c: Combatant) {
  const v = c.v
  c.hasMoved = false
  if (!c.swappedIn) c.activeTurns++
  c.shouldMegaEvolve = false
  v.lastMoveDamage = null
  v.lastMoveFailed = false
  v.rage = false
  tickItem(v.mindReader)
  tick(v.charge)
  tick(v.destinyBondCooldown)
  v.magicCoat = false
  v.ionDeluge = false
  v.electrify = false
  if (!v.protectionUsed) v.protectionChance = 1
  v.protectionUsed = false
  v.protect = false
  v.endure = false
  v.wideGuard = false
  v.craftyShield = false
  v.kingShield = false
  v.spikyShield = false
  v.matBlock = false
  v.banefulBunker = false
  v.quickGuard = false
  v.obstruct = false
  v.silkTrap = false
  v.burningBulwark = false
  tick(v.laserFocus)
  v.powdered = false
  v.snatching = false
  if (!v.echoedVoiceUsed) v.echoedVoicePower = 40
  v.grudge = false
  v.beakBlast = false
  v.dmgThisTurn = false
  if (v.lockedMove && tickLocked(v.lockedMove)) {
    v.lockedMove = null
    v.dive = false
    v.dig = false
    v.fly = false
    v.shadowForce = false
  }
  tick(v.fairyLock)
  v.flinched = false
  v.truantTurn++
  v.statIncreased = false
  v.statDecreased = false
  v.roost = false
  tick(v.syrupBomb)
}

function volatileTimers(state: DuelState, c: Combatant): string {
  const v = c.v
  const name = c.name
  let msg = ''
  const disabled = v.disable.item
  if (tickItem(v.disable) && disabled) msg += `${name}'s ${moveName(disabled.name)} is no longer disabled!\n`
  if (tick(v.taunt)) msg += `${name}'s taunt has ended!\n`
  if (tick(v.healBlock)) msg += `${name}'s heal block has ended!\n`
  if (tick(v.silenced)) msg += `${name}'s voice returned!\n`
  if (tick(v.magnetRise)) msg += `${name}'s magnet rise has ended!\n`
  if (tick(v.luckyChant)) msg += `${name} is no longer shielded by lucky chant!\n`
  if (tick(v.uproar)) msg += `${name} calms down!\n`
  if (tick(v.telekinesis)) msg += `${name} was released from telekinesis!\n`
  if (tick(v.embargo)) msg += `${name}'s embargo was lifted!\n`
  if (tick(v.yawn)) msg += applyStatus(state, c, 'sleep', { attacker: c, source: 'drowsiness' })
  if (tickItem(v.encore)) msg += `${name}'s encore is over!\n`
  if (tick(v.perishSong)) msg += faint(state, c, { source: 'perish song' })
  if (c.hp === 0) return msg
  if (active(v.encore) && v.encore.item && v.encore.item.pp === 0) {
    setTurns(v.encore, 0)
    v.encore.item = null
    msg += `${name}'s encore is over!\n`
  }
  if (tick(v.cudChew) && c.heldItem.lastUsed?.endsWith('-berry')) {
    recoverItem(c, c)
    msg += eatBerry(state, c)
    c.heldItem.lastUsed = null
  }
  return msg
}

function heldItemUpkeep(state: DuelState, c: Combatant): string {
  let msg = ''
  if (itemOf(state, c) === 'white-herb') {
    let changed = false
    for (const stat of STAT_NAMES) {
      if (c.stages[stat] < 0) {
        c.stages[stat] = 0
        changed = true
      }
    }
    if (changed) {
      msg += `${c.name}'s white herb reset all negative stat stage changes.\n`
      useItem(c)
    }
  }
  const item = itemOf(state, c)
  if (item === 'toxic-orb') msg += applyStatus(state, c, 'b-poison', { attacker: c, source: 'its toxic orb' })
  if (item === 'flame-orb') msg += applyStatus(state, c, 'burn', { attacker: c, source: 'its flame orb' })
  if (item === 'leftovers') msg += heal(state, c, Math.floor(c.startingHp / 16), 'its leftovers')
  if (item === 'black-sludge') {
    if (hasType(c, 'poison')) msg += heal(state, c, Math.floor(c.startingHp / 16), 'its black sludge')
    else msg += damage(state, c, Math.floor(c.startingHp / 8), { source: 'its black sludge' })
  }
  return msg
}

function opponentUpkeep(state: DuelState, c: Combatant, other: Combatant | null): string {
  let msg = ''
  if (other && abilityOf(other) === 'bad-dreams' && c.status.current === 'sleep') {
    msg += damage(state, c, Math.floor(c.startingHp / 8), { source: `${other.name}'s bad dreams` })
  }
  if (c.v.leechSeed && other) {
    msg += damage(state, c, Math.floor(c.startingHp / 8), { attacker: other, drainHealRatio: 1, source: 'leech seed' })
  }
  if (c.v.curse) msg += damage(state, c, Math.floor(c.startingHp / 4), { source: 'its curse' })
  if (active(c.v.syrupBomb) && other) {
    msg += appendStat(state, c, -1, other, null, 'speed', 'its syrup coating')
  }
  return msg
}

const SAND_PROOF = new Set(['sand-rush', 'sand-veil', 'sand-force'])
const HAIL_PROOF = new Set(['snow-cloak', 'ice-body'])

function weatherChip(state: DuelState, c: Combatant): string {
  const ability = abilityOf(c)
  if (ability === 'overcoat' || itemOf(state, c) === 'safety-goggles') return ''
  const weather = weatherOf(state)
  if (weather === 'sandstorm') {
    if (hasType(c, 'rock') || hasType(c, 'ground') || hasType(c, 'steel') || SAND_PROOF.has(ability)) return ''
    return damage(state, c, Math.floor(c.startingHp / 16), { source: 'the sandstorm' })
  }
  if (weather === 'hail') {
    if (hasType(c, 'ice') || HAIL_PROOF.has(ability)) return ''
    return damage(state, c, Math.floor(c.startingHp / 16), { source: 'the hail' })
  }
  return ''
}

function rooted(state: DuelState, c: Combatant, amount: number): number {
  return itemOf(state, c) === 'big-root' ? Math.trunc(amount * 1.3) : amount
}

/** End-of-turn upkeep for one combatant, in the fixed phase order. */
export function nextTurn(state: DuelState, c: Combatant): string {
  const other = opponentOf(state, c)
  resetTurnFlags(c)

  let msg = volatileTimers(state, c)
  if (c.hp === 0) return msg
  msg += statusNextTurn(state, c)
  if (c.hp === 0) return msg
  msg += heldItemUpkeep(state, c)
  msg += fire(TURN_END, abilityOf(c), { state, holder: c, other })
  if (c.hp === 0) return msg
  msg += opponentUpkeep(state, c, other)
  if (c.hp === 0) return msg
  msg += weatherChip(state, c)
  if (c.hp === 0) return msg

  if (tick(c.v.bind)) {
    msg += `${c.name} is no longer bound!\n`
  } else if (active(c.v.bind) && other) {
    const share = itemOf(state, other) === 'binding-band' ? 6 : 8
    msg += damage(state, c, Math.floor(c.startingHp / share), { source: `${other.name}'s bind` })
  }
  if (c.v.ingrain) msg += heal(state, c, rooted(state, c, Math.floor(c.startingHp / 16)), 'ingrain')
  if (c.v.aquaRing) msg += heal(state, c, rooted(state, c, Math.floor(c.startingHp / 16)), 'aqua ring')
  if (c.v.octolock && other) {
    msg += appendStat(state, c, -1, c, null, 'defense', `${other.name}'s octolock`)
    msg += appendStat(state, c, -1, c, null, 'special defense', `${other.name}'s octolock`)
  }
  if (terrainOf(state) === 'grassy' && grounded(state, c) && !active(c.v.healBlock)) {
    msg += heal(state, c, Math.floor(c.startingHp / 16), 'grassy terrain')
  }

  c.swappedIn = false
  return msg
}

