import { describe, it, expect } from 'vitest';
import type { CombatRules, Fight } from '../types.js';
import { applyForcedResult, rerollMortalWound, resolveAction, type ResolutionContext } from '../resolution.js';
import { currentActorId, startFight } from '../fightMachine.js';
import { FixedDiceRoller } from '@/infrastructure/game/DiceRoller.js';
import { IllegalActionError, ValidationError } from '@/utils/errors.js';
import { NOW, activeFight, fighter, formingFight, goblin, goblinStats } from '@/__tests__/fixtures.js';

const RULES: CombatRules = { npcsDieAtZero: true };
const d8 = { count: 1, sides: 8, modifier: 0, attackType: 'melee' as const };

function ctx(values: number[], overrides: Partial<ResolutionContext> = {}): ResolutionContext {
  return { dice: new FixedDiceRoller(values), rules: RULES, issuedBy: 'player', now: NOW, ...overrides };
}

function combatant(fight: Fight, id: string) {
  const found = fight.combatants.find((c) => c.id === id);
  if (!found) throw new Error(`no combatant ${id}`);
  return found;
}

function expectDownedAreTerminal(fight: Fight): void {
  for (const c of fight.combatants) {
    if (c.hp <= 0) {
      expect(c.flags.dead || c.flags.mortallyWounded).toBe(true);
    }
  }
}

describe('attacks', () => {
  it('fighter kills the goblin and the fight resolves for the party', () => {
    const fight = activeFight([fighter(), goblin()], [6, 1]);

    const { events, entry } = resolveAction(
      fight,
      'char_fighter',
      { type: 'attack', targetId: 'goblin-1' },
      ctx([16, 8])
    );

    expect(events[0]).toEqual({
      type: 'attack',
      attackerId: 'char_fighter',
      targetId: 'goblin-1',
      rolls: [16],
      total: 20,
      outcome: 'hit',
      damage: 8,
      targetHp: -1,
    });
    expect(events.map((e) => e.type)).toEqual(['attack', 'mortal_wound', 'status', 'state', 'resolved']);

    const gob = combatant(fight, 'goblin-1');
    expect(gob.hp).toBe(-1);
    expect(gob.flags.dead).toBe(true);
    expect(gob.mortalWound).toEqual({
      roll: null,
      total: null,
      severity: 'instant_death',
      outcome: 'dies',
      hpAtCheck: -1,
      round: 1,
    });

    expect(fight.state).toBe('resolved');
    expect(fight.resolution?.winner).toBe('party');
    expect(fight.resolution?.xpAwarded).toBe(5);
    expect(entry).toEqual({
      seq: 1,
      round: 1,
      actorId: 'char_fighter',
      issuedBy: 'player',
      kind: 'attack',
      summary: ['Fighter attacks Goblin: 16 + 10 - 6 + 0 = 20 (hit), 8 damage, HP 7 -> -1', 'Goblin mortal wound check: instant_death (dies)'],
      publicSummary: ['Fighter attacks Goblin: hit, 8 damage', 'Goblin mortal wound check: dies'],
      rolls: [16, 8],
      dmOnly: false,
      at: NOW,
    });
    expect(fight.revision).toBe(1);
    expectDownedAreTerminal(fight);
  });

  it('a miss ends the turn without damage', () => {
    const fight = activeFight([fighter(), goblin()], [6, 1]);
    const { events } = resolveAction(fight, 'char_fighter', { type: 'attack', targetId: 'goblin-1' }, ctx([5]));

    expect(events).toEqual([
      { type: 'attack', attackerId: 'char_fighter', targetId: 'goblin-1', rolls: [5], total: 9, outcome: 'miss', damage: 0, targetHp: 7 },
      { type: 'turn', round: 1, combatantId: 'goblin-1' },
    ]);
    expect(currentActorId(fight)).toBe('goblin-1');
  });

  it('shows players the hit points a character loses to an NPC but never the NPC numbers', () => {
    const fight = activeFight(
      [fighter(), goblin('goblin-1', { stats: goblinStats({ attackThrow: 10 }) })],
      [1, 6]
    );
    const { entry } = resolveAction(fight, 'goblin-1', { type: 'attack', targetId: 'char_fighter' }, ctx([14, 5], { issuedBy: 'dm' }));

    expect(entry.summary).toEqual(['Goblin attacks Fighter: 14 + 10 - 4 + 0 = 20 (hit), 5 damage, HP 12 -> 7']);
    expect(entry.publicSummary).toEqual(['Goblin attacks Fighter: hit, 5 damage, HP 12 -> 7']);
  });

  it('keeps a single summary when only characters are involved', () => {
    const rival = fighter({ id: 'char_rival', name: 'Rival', side: 'monsters', source: { kind: 'character', characterId: 'char_rival' } });
    const fight = activeFight([fighter(), rival], [6, 1]);
    const { entry } = resolveAction(fight, 'char_fighter', { type: 'attack', targetId: 'char_rival' }, ctx([5]));
    expect(entry.publicSummary).toBeUndefined();
  });

  it('a natural 1 is a critical miss', () => {
    const fight = activeFight([fighter(), goblin()], [6, 1]);
    const { events } = resolveAction(fight, 'char_fighter', { type: 'attack', targetId: 'goblin-1', modifier: 20 }, ctx([1]));
    expect(events[0]).toMatchObject({ outcome: 'critical_miss', damage: 0 });
  });

  it('works through a multi-attack routine before the turn ends', () => {
    const twoAttacks = fighter();
    twoAttacks.stats.attacks = [d8, d8];
    const fight = activeFight([twoAttacks, goblin('goblin-1', { hp: 20, stats: goblinStats({ maxHp: 20 }) })], [6, 1]);

    const first = resolveAction(fight, 'char_fighter', { type: 'attack', targetId: 'goblin-1' }, ctx([16, 3]));
    expect(first.events.map((e) => e.type)).toEqual(['attack']);
    expect(currentActorId(fight)).toBe('char_fighter');
    expect(combatant(fight, 'char_fighter').attackIndex).toBe(1);

    const second = resolveAction(fight, 'char_fighter', { type: 'attack', targetId: 'goblin-1' }, ctx([16, 4]));
    expect(second.events.map((e) => e.type)).toEqual(['attack', 'turn']);
    expect(combatant(fight, 'goblin-1').hp).toBe(13);
    expect(combatant(fight, 'char_fighter').attackIndex).toBe(0);
    expect(currentActorId(fight)).toBe('goblin-1');
  });

  it('a downed character rolls on the mortal wound table', () => {
    const fight = activeFight(
      [fighter({ hp: 3 }), goblin('goblin-1', { stats: goblinStats({ attackThrow: 10 }) })],
      [1, 6]
    );

    resolveAction(fight, 'goblin-1', { type: 'attack', targetId: 'char_fighter' }, ctx([14, 5, 10], { issuedBy: 'dm' }));

    const hero = combatant(fight, 'char_fighter');
    expect(hero.hp).toBe(-2);
    // 10 + con 1 + d10 6 + ratio 5
    expect(hero.mortalWound).toEqual({
      roll: 10,
      total: 22,
      severity: 'knocked_out',
      outcome: 'stable',
      hpAtCheck: -2,
      round: 1,
    });
    expect(hero.flags).toEqual({ fled: false, surrendered: false, dead: false, mortallyWounded: true });
    expect(fight.resolution).toMatchObject({ winner: 'monsters', xpAwarded: 0, defeatedIds: [] });
    expectDownedAreTerminal(fight);
  });
});

describe('legality', () => {
  it('rejects attacking a combatant who is out and leaves the fight untouched', () => {
    const fight = activeFight([fighter(), goblin('goblin-1'), goblin('goblin-2')], [6, 1, 2]);
    combatant(fight, 'goblin-1').flags.dead = true;
    const before = structuredClone(fight);

    expect(() =>
      resolveAction(fight, 'char_fighter', { type: 'attack', targetId: 'goblin-1' }, ctx([16, 8]))
    ).toThrow(IllegalActionError);
    expect(fight).toEqual(before);
  });

  it('rejects turn actions before the rounds begin', () => {
    const fight = formingFight([fighter(), goblin()]);
    startFight(fight, new FixedDiceRoller([6, 1]));
    expect(() => resolveAction(fight, 'char_fighter', { type: 'pass' }, ctx([]))).toThrow(IllegalActionError);
  });

  it('allows saving throws during initiative', () => {
    const fight = formingFight([fighter(), goblin()]);
    startFight(fight, new FixedDiceRoller([6, 1]));

    const { events, entry } = resolveAction(
      fight,
      'char_fighter',
      { type: 'saving_throw', combatantId: 'char_fighter', saveType: 'spells' },
      ctx([5])
    );
    expect(events).toEqual([
      { type: 'saving_throw', combatantId: 'char_fighter', saveType: 'spells', roll: 5, total: 20, passed: true },
    ]);
    expect(entry.dmOnly).toBe(false);
    expect(fight.state).toBe('active_initiative');
  });
});

describe('turn phases', () => {
  it('moving opens the attack phase without ending the turn', () => {
    const fight = activeFight([fighter(), goblin()], [6, 1]);

    const { events } = resolveAction(fight, 'char_fighter', { type: 'movement', movement: 'move' }, ctx([]));

    expect(events).toEqual([
      { type: 'movement', combatantId: 'char_fighter', movement: 'move' },
      { type: 'phase', combatantId: 'char_fighter', phase: 'attack' },
    ]);
    expect(fight.turnPhase).toBe('attack');
    expect(currentActorId(fight)).toBe('char_fighter');

    const attack = resolveAction(fight, 'char_fighter', { type: 'attack', targetId: 'goblin-1' }, ctx([5]));
    expect(attack.events.map((e) => e.type)).toEqual(['attack', 'turn']);
    expect(currentActorId(fight)).toBe('goblin-1');
    expect(fight.turnPhase).toBe('movement');
  });

  it('refuses a second move in the same turn', () => {
    const fight = activeFight([fighter(), goblin()], [6, 1]);
    resolveAction(fight, 'char_fighter', { type: 'movement', movement: 'move' }, ctx([]));
    const before = structuredClone(fight);

    expect(() =>
      resolveAction(fight, 'char_fighter', { type: 'movement', movement: 'run' }, ctx([]))
    ).toThrow('Fighter has already moved or attacked this turn');
    expect(fight).toEqual(before);
  });

  it('refuses movement once the attacks have started', () => {
    const twoAttacks = fighter();
    twoAttacks.stats.attacks = [d8, d8];
    const fight = activeFight([twoAttacks, goblin('goblin-1', { hp: 20, stats: goblinStats({ maxHp: 20 }) })], [6, 1]);
    resolveAction(fight, 'char_fighter', { type: 'attack', targetId: 'goblin-1' }, ctx([16, 3]));

    expect(() =>
      resolveAction(fight, 'char_fighter', { type: 'movement', movement: 'move' }, ctx([]))
    ).toThrow(IllegalActionError);
  });

  it('running uses the whole turn', () => {
    const fight = activeFight([fighter(), goblin()], [6, 1]);
    const { events } = resolveAction(fight, 'char_fighter', { type: 'movement', movement: 'run' }, ctx([]));
    expect(events).toEqual([
      { type: 'movement', combatantId: 'char_fighter', movement: 'run' },
      { type: 'turn', round: 1, combatantId: 'goblin-1' },
    ]);
  });
});

describe('morale', () => {
  it('a failed check makes the whole group surrender and ends the fight', () => {
    const fight = activeFight([fighter(), goblin('goblin-1'), goblin('goblin-2')], [6, 2, 1]);

    const { events, entry } = resolveAction(
      fight,
      'goblin-1',
      { type: 'morale_check', combatantIds: ['goblin-1', 'goblin-2'], modifier: -7 },
      ctx([1, 1], { issuedBy: 'dm' })
    );

    expect(events[0]).toEqual({
      type: 'morale',
      combatantIds: ['goblin-1', 'goblin-2'],
      rolls: [1, 1],
      total: 2,
      outcome: 'surrenders',
    });
    expect(combatant(fight, 'goblin-2').flags.surrendered).toBe(true);
    expect(entry.dmOnly).toBe(true);
    expect(fight.resolution).toMatchObject({ winner: 'party', xpAwarded: 10 });
  });
});

describe('DM overrides', () => {
  it('setting an NPC to 0 HP kills it', () => {
    const fight = activeFight([fighter(), goblin()], [6, 1]);
    const { events, entry } = applyForcedResult(
      fight,
      { kind: 'set_hp', combatantId: 'goblin-1', hp: 0 },
      ctx([], { issuedBy: 'dm' })
    );

    expect(events.map((e) => e.type)).toEqual(['hp', 'mortal_wound', 'status', 'state', 'resolved']);
    expect(entry).toMatchObject({ kind: 'override:set_hp', issuedBy: 'dm', actorId: 'goblin-1', dmOnly: true, rolls: [] });
    expect(fight.resolution?.winner).toBe('party');
  });

  it('NPCs roll for mortal wounds when they do not die at zero', () => {
    const fight = activeFight([fighter(), goblin()], [6, 1]);
    applyForcedResult(
      fight,
      { kind: 'set_hp', combatantId: 'goblin-1', hp: 0 },
      ctx([15], { issuedBy: 'dm', rules: { npcsDieAtZero: false } })
    );
    // 15 + con 0 + d8 4 + ratio 5
    expect(combatant(fight, 'goblin-1').mortalWound).toMatchObject({ roll: 15, total: 24, outcome: 'stable' });
    expect(combatant(fight, 'goblin-1').flags.mortallyWounded).toBe(true);
  });

  it('clearing both terminal flags at 0 HP runs the mortal wound check again', () => {
    const downed = goblin('goblin-1', { hp: -1, flags: { fled: false, surrendered: false, dead: true, mortallyWounded: false } });
    const fight = activeFight([fighter(), downed, goblin('goblin-2')], [6, 1, 2]);

    const { events } = applyForcedResult(
      fight,
      { kind: 'set_flags', combatantId: 'goblin-1', flags: { dead: false, mortallyWounded: false } },
      ctx([], { issuedBy: 'dm' })
    );

    expect(events.map((e) => e.type)).toEqual(['status', 'mortal_wound', 'status']);
    expect(combatant(fight, 'goblin-1').flags).toEqual({ fled: false, surrendered: false, dead: true, mortallyWounded: false });
    expectDownedAreTerminal(fight);
  });

  it('act_as skips legality and is logged as an override', () => {
    const fight = activeFight([fighter(), goblin('goblin-1'), goblin('goblin-2')], [6, 1, 2]);
    combatant(fight, 'goblin-1').flags.dead = true;

    const { entry } = applyForcedResult(
      fight,
      { kind: 'act_as', actorId: 'char_fighter', action: { type: 'attack', targetId: 'goblin-1' } },
      ctx([16, 8])
    );
    expect(entry.kind).toBe('override:act_as:attack');
    expect(entry.issuedBy).toBe('dm');
    expect(combatant(fight, 'goblin-1').hp).toBe(-1);
  });

  it('act_as still refuses what the state machine cannot represent', () => {
    const fight = formingFight([fighter(), goblin()]);
    expect(() =>
      applyForcedResult(fight, { kind: 'act_as', actorId: 'char_fighter', action: { type: 'pass' } }, ctx([]))
    ).toThrow(ValidationError);
  });

  it('ends the fight with no winner while both sides stand', () => {
    const fight = activeFight([fighter(), goblin()], [6, 1]);
    const { entry } = applyForcedResult(fight, { kind: 'end_fight' }, ctx([]));
    expect(fight.resolution).toMatchObject({ winner: 'none', reason: 'dm_forced', xpAwarded: 0 });
    expect(entry.kind).toBe('override:end_fight');
  });

  it('refuses to touch a resolved fight', () => {
    const fight = activeFight([fighter(), goblin()], [6, 1]);
    applyForcedResult(fight, { kind: 'end_fight', winner: 'party' }, ctx([]));
    expect(() => applyForcedResult(fight, { kind: 'advance_turn' }, ctx([]))).toThrow(ValidationError);
  });

  it('forces a mortal wound outcome', () => {
    const fight = activeFight([fighter(), goblin()], [6, 1]);
    applyForcedResult(fight, { kind: 'set_mortal_wound', combatantId: 'char_fighter', outcome: 'maimed' }, ctx([]));
    expect(combatant(fight, 'char_fighter').mortalWound).toMatchObject({ severity: 'critically_wounded', outcome: 'maimed' });
    expect(fight.resolution?.winner).toBe('monsters');
  });

  it('advances the turn', () => {
    const fight = activeFight([fighter(), goblin()], [6, 1]);
    const { entry } = applyForcedResult(fight, { kind: 'advance_turn' }, ctx([]));
    expect(entry.actorId).toBe('char_fighter');
    expect(currentActorId(fight)).toBe('goblin-1');
  });
});

describe('rerollMortalWound', () => {
  it('applies treatment modifiers to a downed character', () => {
    const cleric = fighter({ id: 'char_cleric', name: 'Cleric', source: { kind: 'character', characterId: 'char_cleric' } });
    const downed = fighter({ hp: -2, flags: { fled: false, surrendered: false, dead: false, mortallyWounded: true } });
    const fight = activeFight([downed, cleric, goblin()], [3, 2, 5]);

    const { entry } = rerollMortalWound(fight, 'char_fighter', { treatment: 'one_day' }, ctx([4], { issuedBy: 'dm' }));

    // 4 + con 1 + d10 6 + ratio 5 - 8
    expect(combatant(fight, 'char_fighter').mortalWound).toMatchObject({
      roll: 4,
      total: 8,
      severity: 'grievously_wounded',
      outcome: 'maimed',
    });
    expect(entry).toMatchObject({ kind: 'mortal_wound', rolls: [4] });
    expect(fight.state).toBe('active_round');
  });

  it('needs the combatant at 0 HP or below', () => {
    const fight = activeFight([fighter(), goblin()], [6, 1]);
    expect(() => rerollMortalWound(fight, 'goblin-1', {}, ctx([10]))).toThrow(IllegalActionError);
  });
});
