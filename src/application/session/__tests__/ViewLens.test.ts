import { describe, it, expect } from 'vitest';
import { lensFor, woundBand } from '../ViewLens.js';
import type { DungeonMap } from '@/domain/map/types.js';
import { NOW, activeFight, fighter, goblin, keepMap, room } from '@/__tests__/fixtures.js';

const ALICE = { kind: 'player' as const, username: 'alice', characterIds: ['char_fighter'] };

function discoveredKeep(): DungeonMap {
  const map = keepMap();
  map.rooms.hall.discoveredBy = ['char_fighter', 'char_thief'];
  map.rooms.tower = room('tower', { connections: ['hall'], discoveredBy: ['char_fighter'] });
  map.rooms.hall.connections.push('tower');
  return map;
}

describe('woundBand', () => {
  it.each([
    [7, 'unhurt'],
    [4, 'wounded'],
    [3, 'badly_wounded'],
    [0, 'down'],
    [-2, 'down'],
  ])('%i of 7 HP reads as %s', (hp, band) => {
    expect(woundBand(hp, 7)).toBe(band);
  });
});

describe('player lens', () => {
  const lens = lensFor(ALICE);

  it('shows only discovered rooms without DM notes', () => {
    const view = lens.map(discoveredKeep());

    expect(Object.keys(view.rooms)).toEqual(['hall', 'tower']);
    expect(view.rooms.hall).toEqual({
      id: 'hall',
      name: 'Hall',
      description: 'The hall',
      connections: ['tower'],
      discoveredBy: ['char_fighter'],
      fight: null,
    });
  });

  it('reduces monsters to a summary and hides DM-only history', () => {
    const fight = activeFight([fighter(), goblin('goblin-1', { hp: 3 })], [6, 1]);
    fight.history.push(
      { seq: 1, round: 1, actorId: 'goblin-1', issuedBy: 'dm', kind: 'morale_check', summary: [], rolls: [9], dmOnly: true, at: NOW },
      { seq: 2, round: 1, actorId: 'char_fighter', issuedBy: 'player', kind: 'pass', summary: [], rolls: [], dmOnly: false, at: NOW }
    );
    fight.pendingActions.push(
      { id: 'p1', actorId: 'char_fighter', action: { type: 'pass' }, sessionId: 's1', submittedAt: NOW },
      { id: 'p2', actorId: 'goblin-1', action: { type: 'pass' }, sessionId: 's2', submittedAt: NOW }
    );

    const view = lens.fight(fight);

    expect(view.combatants[1]).toEqual({
      id: 'goblin-1',
      name: 'Goblin',
      side: 'monsters',
      flags: { fled: false, surrendered: false, dead: false, mortallyWounded: false },
      wound: 'badly_wounded',
      initiative: 1,
    });
    expect(view.combatants[0]).toMatchObject({ id: 'char_fighter', hp: 12 });
    expect(view.history.map((e) => e.seq)).toEqual([2]);
    expect(view.pendingActions.map((p) => p.id)).toEqual(['p1']);
  });

  it('reads the player version of a log line that gives away NPC numbers', () => {
    const entry = {
      seq: 3,
      round: 1,
      actorId: 'char_fighter',
      issuedBy: 'player' as const,
      kind: 'attack',
      summary: ['Fighter attacks Goblin: 16 + 10 - 6 + 0 = 20 (hit), 3 damage, HP 7 -> 4'],
      publicSummary: ['Fighter attacks Goblin: hit, 3 damage'],
      rolls: [16, 3],
      dmOnly: false,
      at: NOW,
    };

    expect(lens.entry(entry)).toEqual({
      seq: 3,
      round: 1,
      actorId: 'char_fighter',
      issuedBy: 'player',
      kind: 'attack',
      summary: ['Fighter attacks Goblin: hit, 3 damage'],
      rolls: [16, 3],
      dmOnly: false,
      at: NOW,
    });
    expect(lensFor({ kind: 'dm' }).entry(entry)).toEqual(entry);

    const fight = activeFight([fighter(), goblin()], [6, 1]);
    fight.history.push(entry);
    expect(lens.fight(fight).history[0].summary).toEqual(['Fighter attacks Goblin: hit, 3 damage']);
  });

  it('sees parties its characters belong to', () => {
    const party = { id: 'p', name: 'Lanterns', memberIds: ['char_cleric'], henchmen: [], pendingXp: 0, createdAt: NOW, updatedAt: NOW };
    expect(lens.canSeeParty(party)).toBe(false);
    expect(lens.canSeeParty({ ...party, henchmen: [{ characterId: 'char_fighter', employerId: 'char_cleric' }] })).toBe(true);
  });
});

describe('DM lens', () => {
  it('passes everything through', () => {
    const map = discoveredKeep();
    map.rooms.cellar.discoveredBy = [];
    const view = lensFor({ kind: 'dm' }).map(map);
    expect(view).toEqual(map);
    expect(view.rooms.cellar.dmNotes).toBe('Secret of the cellar');
  });
});
