// Domain layer: Character types
// NO external dependencies - pure TypeScript

import type { DamageRoll, HitDie, SavingThrows } from '@/domain/combat/types.js';

export type LifeStatus = 'alive' | 'mortally_wounded' | 'dead';

/**
 * Character record as held by the Character Sheet Store.
 * The fight engine reads combat stats from it and changes only hit points,
 * life status and banked XP.
 */
export interface Character {
  id: string;
  name: string;
  ownerUsername: string | null;
  level: number;
  maxHp: number;
  currentHp: number;
  armorClass: number;
  attackThrow: number;
  attacks: DamageRoll[];
  initiativeModifier: number;
  saves: SavingThrows;
  constitutionModifier: number;
  hitDie: HitDie;
  bankedXp: number;
  lifeStatus: LifeStatus;
  createdAt: string;
  updatedAt: string;
}

export type CharacterMutation =
  | { kind: 'set_hp'; hp: number }
  /** HP and life status together, as a fight leaves them */
  | { kind: 'set_condition'; hp: number; status: LifeStatus }
  | { kind: 'bank_xp'; amount: number };

/**
 * Narrow interface onto the external Character Sheet Store.
 * `updateCharacter` rejects when the record is missing or the write fails.
 */
export interface CharacterSheetStore {
  getCharacter(id: string): Promise<Character | null>;
  updateCharacter(id: string, mutation: CharacterMutation): Promise<void>;
}
