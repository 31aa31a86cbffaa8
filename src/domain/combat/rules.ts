// Domain layer: Rule formulas
// Pure functions over explicit dice; no state, no I/O

import type {
  AttackOutcome,
  Combatant,
  DamageRoll,
  DiceRoller,
  HitDie,
  MoraleOutcome,
  MortalWoundModifiers,
  MortalWoundOutcome,
  MovementKind,
  TreatmentTiming,
  WoundSeverity,
} from './types.js';

/** A run of natural 20s stops exploding after this many dice */
export const MAX_EXPLODING_DICE = 10;

export const ATTACK_HIT_TARGET = 20;
export const ATTACK_CRITICAL_TARGET = 30;
export const SAVE_TARGET = 20;

export function rollDice(dice: DiceRoller, count: number, sides: number): number[] {
  const rolls: number[] = [];
  for (let i = 0; i < count; i++) {
    rolls.push(dice.roll(sides));
  }
  return rolls;
}

export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

/**
 * d20 that rolls again on a natural 20 and adds the result.
 */
export function rollExplodingD20(dice: DiceRoller): number[] {
  const rolls: number[] = [];
  for (;;) {
    const value = dice.roll(20);
    rolls.push(value);
    if (value !== 20 || rolls.length >= MAX_EXPLODING_DICE) break;
  }
  return rolls;
}

export function attackOutcome(
  rolls: readonly number[],
  attackThrow: number,
  armorClass: number,
  modifier: number
): { total: number; outcome: AttackOutcome } {
  const natural = sum(rolls);
  const total = natural + attackThrow - armorClass + modifier;
  if (natural <= 1) {
    return { total, outcome: 'critical_miss' };
  }
  if (total < ATTACK_HIT_TARGET) {
    return { total, outcome: 'miss' };
  }
  if (total < ATTACK_CRITICAL_TARGET) {
    return { total, outcome: 'hit' };
  }
  return { total, outcome: 'critical_hit' };
}

/**
 * Damage for one attack. A critical doubles the roll with its modifier; the
 * result is never below 1.
 */
export function damageFromRolls(rolls: readonly number[], damage: DamageRoll, critical: boolean): number {
  const rolled = sum(rolls) + damage.modifier;
  return Math.max(1, critical ? rolled * 2 : rolled);
}

export function moraleOutcome(total: number): MoraleOutcome {
  if (total <= 2) return 'surrenders';
  if (total <= 5) return 'flees';
  return 'holds';
}

export function savingThrowPasses(natural: number, bonus: number, modifier: number): boolean {
  return natural >= 20 || natural + bonus + modifier >= SAVE_TARGET;
}

// Mortal wounds

const HIT_DIE_BONUS: Record<HitDie, number> = {
  d4: 0,
  d6: 2,
  d8: 4,
  d10: 6,
  d12: 8,
};

const TREATMENT_MODIFIER: Record<TreatmentTiming, number> = {
  one_round: 2,
  one_turn: -3,
  one_hour: -5,
  one_day: -8,
  over_one_day: -10,
};

export function hitDieBonus(hitDie: HitDie): number {
  return HIT_DIE_BONUS[hitDie];
}

export function hpRatioModifier(hp: number, maxHp: number): number {
  const ratio = maxHp > 0 ? hp / maxHp : Number.NEGATIVE_INFINITY;
  if (ratio >= -0.25) return 5;
  if (ratio >= -0.5) return -2;
  if (ratio >= -1) return -5;
  if (ratio >= -2) return -10;
  return -20;
}

export function mortalWoundTotal(
  natural: number,
  combatant: Pick<Combatant, 'hp' | 'stats'>,
  modifiers: MortalWoundModifiers = {}
): number {
  return (
    natural +
    combatant.stats.constitutionModifier +
    hitDieBonus(combatant.stats.hitDie) +
    hpRatioModifier(combatant.hp, combatant.stats.maxHp) +
    (modifiers.healingMagic ?? 0) +
    (modifiers.healingProficiency ?? 0) +
    (modifiers.treatment ? TREATMENT_MODIFIER[modifiers.treatment] : 0) +
    (modifiers.other ?? 0)
  );
}

export function woundSeverity(total: number): WoundSeverity {
  if (total >= 26) return 'dazed';
  if (total >= 21) return 'knocked_out';
  if (total >= 16) return 'in_shock';
  if (total >= 11) return 'critically_wounded';
  if (total >= 6) return 'grievously_wounded';
  if (total >= 1) return 'mortally_wounded';
  return 'instant_death';
}

export function woundOutcome(severity: WoundSeverity): MortalWoundOutcome {
  switch (severity) {
    case 'instant_death':
      return 'dies';
    case 'mortally_wounded':
    case 'grievously_wounded':
    case 'critically_wounded':
      return 'maimed';
    case 'in_shock':
    case 'knocked_out':
    case 'dazed':
      return 'stable';
  }
}

// Initiative

export function rollInitiative(dice: DiceRoller, combatant: Pick<Combatant, 'stats'>): number {
  return dice.roll(6) + combatant.stats.initiativeModifier;
}

/**
 * Highest initiative first. Ties go to player-controlled combatants, then roster order.
 */
export function initiativeOrder(combatants: readonly Combatant[]): Combatant[] {
  return combatants
    .map((combatant, index) => ({ combatant, index }))
    .sort((a, b) => {
      const byRoll = (b.combatant.initiative ?? 0) - (a.combatant.initiative ?? 0);
      if (byRoll !== 0) return byRoll;
      const aPlayer = a.combatant.source.kind === 'character' ? 0 : 1;
      const bPlayer = b.combatant.source.kind === 'character' ? 0 : 1;
      if (aPlayer !== bPlayer) return aPlayer - bPlayer;
      return a.index - b.index;
    })
    .map(({ combatant }) => combatant);
}

// Movement

/** Moving or a simple action leaves the attack phase to come; the rest use up the turn */
const MOVEMENT_ENDS_TURN: Record<MovementKind, boolean> = {
  move: false,
  simple_action: false,
  run: true,
  charge: true,
  fighting_withdrawal: true,
  full_retreat: true,
};

export function movementEndsTurn(movement: MovementKind): boolean {
  return MOVEMENT_ENDS_TURN[movement];
}

// Status

export function isStanding(combatant: Pick<Combatant, 'flags'>): boolean {
  const { fled, surrendered, dead, mortallyWounded } = combatant.flags;
  return !fled && !surrendered && !dead && !mortallyWounded;
}

export function isDefeated(combatant: Pick<Combatant, 'flags'>): boolean {
  const { surrendered, dead, mortallyWounded } = combatant.flags;
  return surrendered || dead || mortallyWounded;
}

// Experience

/**
 * XP for a finished fight: the defeated combatants' XP values plus one point
 * per coin of treasure. Same inputs, same XP.
 */
export function computeFightXp(
  defeated: ReadonlyArray<{ xpValue: number }>,
  treasureValue: number
): number {
  const fromDefeated = defeated.reduce((total, entry) => total + Math.max(0, entry.xpValue), 0);
  return Math.floor(fromDefeated + Math.max(0, treasureValue));
}
