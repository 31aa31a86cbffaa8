// Domain layer: Building combatants for an encounter

import type { Character } from '@/domain/character/types.js';
import type { Combatant, CombatantStats, Side } from './types.js';

export type EncounterCombatantInput =
  | { kind: 'character'; characterId: string; side?: Side }
  | {
      kind: 'npc';
      templateId: string;
      name: string;
      side?: Side;
      /** Number of identical copies to add */
      count?: number;
      /** Starting HP when below the maximum */
      hp?: number;
      stats: CombatantStats;
    };

const NO_FLAGS = { fled: false, surrendered: false, dead: false, mortallyWounded: false };

export function combatantFromCharacter(character: Character, side: Side = 'party'): Combatant {
  return {
    id: character.id,
    name: character.name,
    side,
    source: { kind: 'character', characterId: character.id },
    hp: character.currentHp,
    stats: {
      maxHp: character.maxHp,
      armorClass: character.armorClass,
      attackThrow: character.attackThrow,
      attacks: character.attacks.map((a) => ({ ...a })),
      initiativeModifier: character.initiativeModifier,
      saves: { ...character.saves },
      morale: 0,
      xpValue: 0,
      hitDie: character.hitDie,
      constitutionModifier: character.constitutionModifier,
    },
    attackIndex: 0,
    initiative: null,
    flags: { ...NO_FLAGS },
    mortalWound: null,
  };
}

/**
 * One combatant per copy. Ids are `<templateId>-<n>`, numbered past any id already taken.
 */
export function combatantsFromTemplate(
  input: Extract<EncounterCombatantInput, { kind: 'npc' }>,
  takenIds: Set<string>
): Combatant[] {
  const count = input.count ?? 1;
  const combatants: Combatant[] = [];
  let n = 0;

  while (combatants.length < count) {
    n += 1;
    const id = `${input.templateId}-${n}`;
    if (takenIds.has(id)) continue;
    takenIds.add(id);
    combatants.push({
      id,
      name: count > 1 ? `${input.name} ${combatants.length + 1}` : input.name,
      side: input.side ?? 'monsters',
      source: { kind: 'npc', templateId: input.templateId },
      hp: Math.min(input.hp ?? input.stats.maxHp, input.stats.maxHp),
      stats: { ...input.stats, attacks: input.stats.attacks.map((a) => ({ ...a })), saves: { ...input.stats.saves } },
      attackIndex: 0,
      initiative: null,
      flags: { ...NO_FLAGS },
      mortalWound: null,
    });
  }
  return combatants;
}
