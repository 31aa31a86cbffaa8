// Application layer: Turn gate implementations
// Controls who may request which action, and when

import type { CombatAction, Fight } from '@/domain/combat/types.js';
import { PLAYER_ACTION_TYPES } from '@/domain/combat/types.js';
import type { ViewerRole } from '@/domain/session/types.js';
import { currentActorId, findCombatant } from '@/domain/combat/fightMachine.js';
import { isStanding } from '@/domain/combat/rules.js';
import { IllegalActionError, NotFoundError } from '@/utils/errors.js';

export interface ActionRequest {
  actorId: string;
  action: CombatAction;
}

export interface TurnGateStatus {
  type: 'initiative' | 'dm';
  allowedCombatantIds: string[];
  reason?: string;
}

export interface TurnGate {
  /** Throws IllegalActionError when the request may not go to the resolution engine */
  assertCanAct(fight: Fight, request: ActionRequest): void;
  getStatus(fight: Fight): TurnGateStatus;
}

/**
 * InitiativeGate - players
 * Only the combatant whose turn it is can act, and only through its controller
 */
export class InitiativeGate implements TurnGate {
  constructor(private characterIds: readonly string[]) {}

  private controls(fight: Fight, combatantId: string): boolean {
    const combatant = findCombatant(fight, combatantId);
    return combatant?.source.kind === 'character' && this.characterIds.includes(combatant.source.characterId);
  }

  assertCanAct(fight: Fight, { actorId, action }: ActionRequest): void {
    if (!PLAYER_ACTION_TYPES.includes(action.type)) {
      throw new IllegalActionError(`Players cannot request ${action.type}`, { type: action.type });
    }

    const actor = findCombatant(fight, actorId);
    if (!actor) {
      throw new NotFoundError(`Combatant ${actorId} is not in fight ${fight.id}`, { actorId });
    }
    if (!this.controls(fight, actorId)) {
      throw new IllegalActionError(`${actor.name} is not one of your characters`, { actorId });
    }
    if (fight.state !== 'active_round') {
      throw new IllegalActionError(`Fight is ${fight.state}; no turns are being taken`, { state: fight.state });
    }
    if (currentActorId(fight) !== actorId) {
      throw new IllegalActionError(`It is not ${actor.name}'s turn`, { actorId, current: currentActorId(fight) });
    }
    if (!isStanding(actor)) {
      throw new IllegalActionError(`${actor.name} is out of the fight`, { actorId, flags: actor.flags });
    }
    if (fight.pendingActions.some((p) => p.actorId === actorId)) {
      throw new IllegalActionError(`${actor.name} already has an action awaiting approval`, { actorId });
    }
  }

  getStatus(fight: Fight): TurnGateStatus {
    const current = currentActorId(fight);
    return {
      type: 'initiative',
      allowedCombatantIds: current && this.controls(fight, current) ? [current] : [],
      reason: current ? undefined : 'Waiting for the round to begin',
    };
  }
}

/**
 * DmGate - the DM may act for any combatant at any point in the round.
 * Status legality is still checked by the resolution engine.
 */
export class DmGate implements TurnGate {
  assertCanAct(fight: Fight, { actorId }: ActionRequest): void {
    if (!findCombatant(fight, actorId)) {
      throw new NotFoundError(`Combatant ${actorId} is not in fight ${fight.id}`, { actorId });
    }
  }

  getStatus(fight: Fight): TurnGateStatus {
    return { type: 'dm', allowedCombatantIds: fight.combatants.map((c) => c.id) };
  }
}

export function gateFor(role: ViewerRole): TurnGate {
  return role.kind === 'dm' ? new DmGate() : new InitiativeGate(role.characterIds);
}
