// Shared test data: a fighter, goblins, a two-room keep and a recording channel

import type { Character } from '@/domain/character/types.js';
import type { Combatant, CombatantStats, Fight, SavingThrows } from '@/domain/combat/types.js';
import type { DungeonMap, Room } from '@/domain/map/types.js';
import type { SessionChannel, SyncEvent } from '@/domain/session/types.js';
import { combatantFromCharacter } from '@/domain/combat/roster.js';
import { beginRounds, createFight, formFight, startFight, type FormOptions } from '@/domain/combat/fightMachine.js';
import { FixedDiceRoller } from '@/infrastructure/game/DiceRoller.js';
import { buildAppConfig, type AppConfig } from '@/utils/config.js';

export const NOW = '2026-01-01T00:00:00.000Z';

export const SAVES: SavingThrows = {
  petrification_paralysis: 12,
  poison_death: 11,
  blast_breath: 14,
  staffs_wands: 13,
  spells: 15,
};

export function goblinStats(overrides: Partial<CombatantStats> = {}): CombatantStats {
  return {
    maxHp: 7,
    armorClass: 6,
    attackThrow: 1,
    attacks: [{ count: 1, sides: 6, modifier: 0, attackType: 'melee' }],
    initiativeModifier: 0,
    saves: { ...SAVES },
    morale: 7,
    xpValue: 5,
    hitDie: 'd8',
    constitutionModifier: 0,
    ...overrides,
  };
}

export function fighterCharacter(overrides: Partial<Character> = {}): Character {
  return {
    id: 'char_fighter',
    name: 'Fighter',
    ownerUsername: 'alice',
    level: 1,
    maxHp: 12,
    currentHp: 12,
    armorClass: 4,
    attackThrow: 10,
    attacks: [{ count: 1, sides: 8, modifier: 0, attackType: 'melee' }],
    initiativeModifier: 0,
    saves: { ...SAVES },
    constitutionModifier: 1,
    hitDie: 'd10',
    bankedXp: 0,
    lifeStatus: 'alive',
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

export function fighter(overrides: Partial<Combatant> = {}): Combatant {
  return { ...combatantFromCharacter(fighterCharacter()), ...overrides };
}

export function goblin(id = 'goblin-1', overrides: Partial<Combatant> = {}): Combatant {
  return {
    id,
    name: id === 'goblin-1' ? 'Goblin' : `Goblin ${id}`,
    side: 'monsters',
    source: { kind: 'npc', templateId: 'goblin' },
    hp: 7,
    stats: goblinStats(),
    attackIndex: 0,
    initiative: null,
    flags: { fled: false, surrendered: false, dead: false, mortallyWounded: false },
    mortalWound: null,
    ...overrides,
  };
}

export function formingFight(combatants: Combatant[], options: Partial<FormOptions> = {}): Fight {
  const fight = createFight('keep:hall:f1', NOW);
  formFight(fight, combatants, { partyId: null, treasureValue: 0, approvalRequired: false, ...options });
  return fight;
}

/**
 * Fight in round 1. `initiative` holds one d6 per combatant in roster order.
 */
export function activeFight(combatants: Combatant[], initiative: number[], options: Partial<FormOptions> = {}): Fight {
  const fight = formingFight(combatants, options);
  startFight(fight, new FixedDiceRoller(initiative));
  beginRounds(fight);
  return fight;
}

export function room(id: string, overrides: Partial<Room> = {}): Room {
  return {
    id,
    name: id[0].toUpperCase() + id.slice(1),
    description: `The ${id}`,
    dmNotes: `Secret of the ${id}`,
    connections: [],
    discoveredBy: [],
    fight: null,
    ...overrides,
  };
}

/**
 * hall <-> cellar, version 0 so saveMap commits it as version 1
 */
export function keepMap(): DungeonMap {
  return {
    id: 'keep',
    name: 'Old Keep',
    summary: 'A ruined keep',
    rooms: {
      hall: room('hall', { connections: ['cellar'] }),
      cellar: room('cellar', { connections: ['hall'] }),
    },
    version: 0,
    updatedAt: NOW,
  };
}

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return buildAppConfig({
    NODE_ENV: 'test',
    DM_KEY: 'test-secret-key',
    BCRYPT_ROUNDS: '4',
    MAP_IDLE_EVICT_MINUTES: '0',
    ...env,
  });
}

export class RecordingChannel implements SessionChannel {
  readonly events: SyncEvent[] = [];
  closed = false;

  send(event: SyncEvent): boolean {
    if (this.closed) return false;
    this.events.push(event);
    return true;
  }

  close(): void {
    this.closed = true;
  }

  named(name: SyncEvent['event']): SyncEvent[] {
    return this.events.filter((e) => e.event === name);
  }
}
