// Domain layer: Fight state machine
// Lifecycle transitions for the encounter embedded in a room.
// Every function mutates the fight it is given; callers hand in a draft copy.

import type {
  Combatant,
  DiceRoller,
  Fight,
  FightResolution,
  FightState,
  ResolutionEvent,
  Side,
} from './types.js';
import { computeFightXp, initiativeOrder, isDefeated, isStanding, rollInitiative } from './rules.js';
import { IllegalActionError } from '@/utils/errors.js';

export interface FormOptions {
  partyId: string | null;
  treasureValue: number;
  approvalRequired: boolean;
}

export function createFight(id: string, now: string): Fight {
  return {
    id,
    state: 'empty',
    combatants: [],
    turnOrder: [],
    turnIndex: 0,
    turnPhase: 'movement',
    round: 0,
    revision: 0,
    pendingActions: [],
    partyId: null,
    treasureValue: 0,
    approvalRequired: false,
    history: [],
    resolution: null,
    createdAt: now,
    updatedAt: now,
  };
}

export function assertState(fight: Fight, ...allowed: FightState[]): void {
  if (!allowed.includes(fight.state)) {
    throw new IllegalActionError(
      `Fight ${fight.id} is ${fight.state}; expected ${allowed.join(' or ')}`,
      { state: fight.state, allowed }
    );
  }
}

export function findCombatant(fight: Fight, combatantId: string): Combatant | undefined {
  return fight.combatants.find((c) => c.id === combatantId);
}

function transition(fight: Fight, to: FightState): ResolutionEvent {
  const from = fight.state;
  fight.state = to;
  return { type: 'state', from, to };
}

/**
 * empty → forming: attach a combatant list.
 */
export function formFight(fight: Fight, combatants: Combatant[], options: FormOptions): ResolutionEvent[] {
  assertState(fight, 'empty');
  if (combatants.length === 0) {
    throw new IllegalActionError('An encounter needs at least one combatant');
  }
  const ids = new Set(combatants.map((c) => c.id));
  if (ids.size !== combatants.length) {
    throw new IllegalActionError('Combatant ids must be unique within a fight');
  }

  fight.combatants = combatants;
  fight.partyId = options.partyId;
  fight.treasureValue = options.treasureValue;
  fight.approvalRequired = options.approvalRequired;
  return [transition(fight, 'forming')];
}

/**
 * forming → empty: the DM called the encounter off before it started.
 */
export function cancelFight(fight: Fight): ResolutionEvent[] {
  assertState(fight, 'forming');
  fight.combatants = [];
  fight.pendingActions = [];
  fight.partyId = null;
  fight.treasureValue = 0;
  return [transition(fight, 'empty')];
}

/**
 * forming → active_initiative: 1d6 + modifier for each combatant, in roster order.
 */
export function startFight(fight: Fight, dice: DiceRoller): ResolutionEvent[] {
  assertState(fight, 'forming');
  for (const combatant of fight.combatants) {
    combatant.initiative = rollInitiative(dice, combatant);
  }
  return [
    transition(fight, 'active_initiative'),
    {
      type: 'initiative',
      order: fight.combatants.map((c) => ({ combatantId: c.id, initiative: c.initiative ?? 0 })),
    },
  ];
}

export function setInitiative(fight: Fight, combatantId: string, initiative: number): ResolutionEvent[] {
  assertState(fight, 'active_initiative', 'active_round');
  const combatant = findCombatant(fight, combatantId);
  if (!combatant) {
    throw new IllegalActionError(`Combatant ${combatantId} is not in fight ${fight.id}`);
  }
  combatant.initiative = initiative;

  if (fight.state === 'active_round') {
    const current = currentActorId(fight);
    fight.combatants = initiativeOrder(fight.combatants);
    fight.turnOrder = fight.combatants.filter((c) => c.id === current || isStanding(c)).map((c) => c.id);
    fight.turnIndex = current ? Math.max(0, fight.turnOrder.indexOf(current)) : 0;
  }

  return [
    {
      type: 'initiative',
      order: fight.combatants.map((c) => ({ combatantId: c.id, initiative: c.initiative ?? 0 })),
    },
  ];
}

/**
 * active_initiative → active_round: fix the order and open round 1.
 */
export function beginRounds(fight: Fight): ResolutionEvent[] {
  assertState(fight, 'active_initiative');
  fight.combatants = initiativeOrder(fight.combatants);
  fight.turnOrder = fight.combatants.filter(isStanding).map((c) => c.id);
  fight.turnIndex = 0;
  fight.turnPhase = 'movement';
  fight.round = 1;
  for (const combatant of fight.combatants) {
    combatant.attackIndex = 0;
  }
  return [transition(fight, 'active_round'), { type: 'turn', round: fight.round, combatantId: currentActorId(fight) }];
}

export function currentActorId(fight: Fight): string | null {
  if (fight.state !== 'active_round') return null;
  return fight.turnOrder[fight.turnIndex] ?? null;
}

/**
 * Drop combatants that can no longer act, keeping the current actor in place.
 */
export function pruneTurnOrder(fight: Fight): void {
  const current = fight.turnOrder[fight.turnIndex];
  fight.turnOrder = fight.turnOrder.filter((id) => {
    if (id === current) return true;
    const combatant = findCombatant(fight, id);
    return combatant !== undefined && isStanding(combatant);
  });
  fight.turnIndex = current === undefined ? 0 : Math.max(0, fight.turnOrder.indexOf(current));
}

/**
 * Hand the turn to the next eligible combatant. Running off the end of the
 * order starts a new round.
 */
export function advanceTurn(fight: Fight): ResolutionEvent[] {
  assertState(fight, 'active_round');

  const order = fight.turnOrder;
  const eligible = (id: string): boolean => {
    const combatant = findCombatant(fight, id);
    return combatant !== undefined && isStanding(combatant);
  };

  const outgoing = findCombatant(fight, order[fight.turnIndex] ?? '');
  if (outgoing) outgoing.attackIndex = 0;

  let next: string | undefined = order.slice(fight.turnIndex + 1).find(eligible);
  if (next === undefined) {
    fight.round += 1;
    next = order.find(eligible);
  }

  fight.turnOrder = order.filter(eligible);
  fight.turnIndex = next === undefined ? 0 : fight.turnOrder.indexOf(next);
  fight.turnPhase = 'movement';

  const incoming = next === undefined ? undefined : findCombatant(fight, next);
  if (incoming) incoming.attackIndex = 0;

  return [{ type: 'turn', round: fight.round, combatantId: next ?? null }];
}

/**
 * The side left standing once the other has nobody able to fight, or null
 * while both sides still do.
 */
export function checkTermination(fight: Fight): { winner: Side | 'none' } | null {
  const standing = (side: Side): boolean => fight.combatants.some((c) => c.side === side && isStanding(c));
  const party = standing('party');
  const monsters = standing('monsters');
  if (party && monsters) return null;
  if (party) return { winner: 'party' };
  if (monsters) return { winner: 'monsters' };
  return { winner: 'none' };
}

export function defeatedMonsters(fight: Fight): Combatant[] {
  return fight.combatants.filter((c) => c.side === 'monsters' && c.source.kind === 'npc' && isDefeated(c));
}

/**
 * → resolved. Terminal: nothing moves a fight out of this state.
 */
export function resolveFight(
  fight: Fight,
  winner: Side | 'none',
  reason: FightResolution['reason'],
  now: string
): ResolutionEvent[] {
  assertState(fight, 'active_initiative', 'active_round');

  const defeated = defeatedMonsters(fight);
  const treasure = winner === 'party' ? fight.treasureValue : 0;
  const resolution: FightResolution = {
    winner,
    reason,
    defeatedIds: defeated.map((c) => c.id),
    treasureValue: treasure,
    xpAwarded: computeFightXp(
      defeated.map((c) => ({ xpValue: c.stats.xpValue })),
      treasure
    ),
    resolvedAt: now,
  };

  const from = fight.state;
  fight.state = 'resolved';
  fight.resolution = resolution;
  fight.turnOrder = [];
  fight.turnIndex = 0;
  fight.pendingActions = [];

  return [
    { type: 'state', from, to: 'resolved' },
    { type: 'resolved', resolution },
  ];
}
