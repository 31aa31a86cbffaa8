import { describe, it, expect, beforeEach } from 'vitest';
import { diceFor, visibleFight } from '../fights.js';
import { ApiError } from '@/api/middleware/errorHandler.js';
import { CampaignFactory, type CampaignServices } from '@/infrastructure/campaign/CampaignFactory.js';
import { DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import { FixedDiceRoller, SeededDiceRoller } from '@/infrastructure/game/DiceRoller.js';
import type { ViewerRole } from '@/domain/session/types.js';
import { fighterCharacter, goblinStats, keepMap, testConfig } from '@/__tests__/fixtures.js';

const DM: ViewerRole = { kind: 'dm' };
const ALICE: ViewerRole = { kind: 'player', username: 'alice', characterIds: ['char_fighter'] };
const BOB: ViewerRole = { kind: 'player', username: 'bob', characterIds: ['char_thief'] };
const DM_REQUESTER = { role: DM, sessionId: 'dm-session' };

function thrown(work: () => unknown): unknown {
  try {
    work();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('diceFor', () => {
  it('refuses dice a player supplies', () => {
    for (const input of [{ kind: 'fixed' as const, values: [20] }, { kind: 'seeded' as const, seed: 7 }]) {
      const error = thrown(() => diceFor(ALICE, input));
      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ statusCode: 403, code: 'FORBIDDEN', message: 'Only the DM can supply dice' });
    }
  });

  it('lets a player ask for server dice', () => {
    expect(() => diceFor(ALICE, { kind: 'server' })).not.toThrow();
    expect(() => diceFor(ALICE, undefined)).not.toThrow();
  });

  it('gives the DM the dice they supply', () => {
    const fixed = diceFor(DM, { kind: 'fixed', values: [4, 17] });
    expect(fixed).toBeInstanceOf(FixedDiceRoller);
    expect([fixed.roll(20), fixed.roll(20)]).toEqual([4, 17]);
    expect(diceFor(DM, { kind: 'seeded', seed: 7 })).toBeInstanceOf(SeededDiceRoller);
  });
});

describe('visibleFight', () => {
  let services: CampaignServices;
  let fightId: string;

  beforeEach(async () => {
    const db = await DatabaseService.inMemory();
    const { createdAt: _c, updatedAt: _u, ...sheet } = fighterCharacter();
    await db.characters.upsert(sheet);
    services = CampaignFactory.create(db, testConfig());
    await services.registry.saveMap(keepMap());
    const attached = await services.fights.attachEncounter(DM_REQUESTER, 'keep', 'hall', {
      combatants: [
        { kind: 'character', characterId: 'char_fighter' },
        { kind: 'npc', templateId: 'goblin', name: 'Goblin', count: 1, stats: goblinStats() },
      ],
      partyId: null,
    });
    fightId = attached.result;
  });

  it('hides a fight in a room the player has not found', async () => {
    const error = await visibleFight(services, BOB, fightId).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ statusCode: 404, code: 'NOT_FOUND', message: 'Fight not found' });
  });

  it('shows the fight to a player whose character is in the room', async () => {
    expect((await visibleFight(services, ALICE, fightId)).id).toBe(fightId);
  });

  it('shows the DM every fight', async () => {
    expect((await visibleFight(services, DM, fightId)).state).toBe('forming');
  });
});
