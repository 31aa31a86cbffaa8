// Application layer: Fight service
// Each request is one transaction inside the fight's lock:
// validate, resolve on a copy, credit XP, write characters back, commit the map.

import { v4 as uuidv4 } from 'uuid';
import type {
  CombatAction,
  Combatant,
  CombatRules,
  DiceRoller,
  Fight,
  FightLogEntry,
  ForcedResult,
  MortalWoundModifiers,
  PendingAction,
  ResolutionEvent,
} from '@/domain/combat/types.js';
import type { CharacterMutation, CharacterSheetStore, LifeStatus } from '@/domain/character/types.js';
import type { ViewerRole } from '@/domain/session/types.js';
import {
  beginRounds,
  cancelFight,
  checkTermination,
  createFight,
  formFight,
  resolveFight,
  startFight,
} from '@/domain/combat/fightMachine.js';
import {
  RollTape,
  applyForcedResult,
  recordEntry,
  rerollMortalWound,
  resolveAction,
  type ActionOutcome,
} from '@/domain/combat/resolution.js';
import { combatantFromCharacter, combatantsFromTemplate, type EncounterCombatantInput } from '@/domain/combat/roster.js';
import { makeFightId, parseFightId, type FightLocation } from '@/domain/combat/fightId.js';
import { discoverRoom, requireRoom } from '@/domain/map/graph.js';
import type { MapRegistry } from '@/application/map/MapRegistry.js';
import type { PartyLedger } from '@/application/party/PartyLedger.js';
import { runCompensated, type CompensatedStep } from '@/application/shared/Compensation.js';
import { gateFor } from './TurnGate.js';
import { KeyedMutex } from '@/utils/mutex.js';
import { logFightAction } from '@/utils/logger.js';
import {
  AuthorizationError,
  ConcurrencyConflictError,
  GameEngineError,
  IllegalActionError,
  NotFoundError,
  PersistenceFailureError,
  ValidationError,
  errorMessage,
} from '@/utils/errors.js';

export interface Requester {
  role: ViewerRole;
  sessionId?: string;
}

export interface AttachEncounterInput {
  combatants: EncounterCombatantInput[];
  partyId?: string | null;
  treasureValue?: number;
  approvalRequired?: boolean;
}

export interface SubmitActionInput {
  actorId: string;
  action: CombatAction;
  /** DM only: resolve even when the request is illegal for the actor */
  force?: boolean;
}

export type ActionReceipt =
  | { status: 'resolved'; events: ResolutionEvent[]; entry: FightLogEntry }
  | { status: 'queued'; pending: PendingAction };

export interface FightCommit<T> {
  fight: Fight;
  mapVersion: number;
  result: T;
}

export interface PreviewResult {
  events: ResolutionEvent[];
  entry: FightLogEntry;
  fight: Fight;
}

function requireDm(requester: Requester): void {
  if (requester.role.kind !== 'dm') {
    throw new AuthorizationError('Only the DM can do that');
  }
}

function lifeStatusOf(fight: Fight, combatantId: string): LifeStatus {
  const combatant = fight.combatants.find((c) => c.id === combatantId);
  if (combatant?.flags.dead) return 'dead';
  if (combatant?.flags.mortallyWounded) return 'mortally_wounded';
  return 'alive';
}

export class FightService {
  private locks = new KeyedMutex();

  constructor(
    private registry: MapRegistry,
    private ledger: PartyLedger,
    private characters: CharacterSheetStore,
    private rules: CombatRules
  ) {}

  private locate(fightId: string): FightLocation {
    const location = parseFightId(fightId);
    if (!location) {
      throw new NotFoundError(`Fight ${fightId} not found`, { fightId });
    }
    return location;
  }

  async getFight(fightId: string): Promise<Fight> {
    const { mapId, roomId } = this.locate(fightId);
    const room = await this.registry.getRoom(mapId, roomId);
    if (!room.fight || room.fight.id !== fightId) {
      throw new NotFoundError(`Fight ${fightId} not found`, { fightId });
    }
    return room.fight;
  }

  // Encounter lifecycle

  /**
   * Attach a combatant list to a room: empty → forming. Character combatants
   * discover the room.
   */
  async attachEncounter(
    requester: Requester,
    mapId: string,
    roomId: string,
    input: AttachEncounterInput
  ): Promise<FightCommit<string>> {
    requireDm(requester);
    if (input.partyId) this.ledger.getParty(input.partyId);
    const treasureValue = input.treasureValue ?? 0;
    if (!Number.isFinite(treasureValue) || treasureValue < 0) {
      throw new ValidationError('Treasure value must be zero or more', { treasureValue });
    }

    const combatants: Combatant[] = [];
    const taken = new Set<string>();
    for (const entry of input.combatants) {
      if (entry.kind === 'character') {
        const character = await this.characters.getCharacter(entry.characterId);
        if (!character) {
          throw new NotFoundError(`Character ${entry.characterId} not found`, { characterId: entry.characterId });
        }
        if (character.lifeStatus !== 'alive' || character.currentHp <= 0) {
          const condition = character.lifeStatus === 'alive' ? 'at 0 HP or below' : character.lifeStatus.replace(/_/g, ' ');
          throw new ValidationError(`${character.name} is ${condition} and cannot join a fight`, {
            characterId: character.id,
            lifeStatus: character.lifeStatus,
            currentHp: character.currentHp,
          });
        }
        if (taken.has(character.id)) {
          throw new ValidationError(`${character.name} is listed twice`, { characterId: character.id });
        }
        taken.add(character.id);
        combatants.push(combatantFromCharacter(character, entry.side));
      } else {
        combatants.push(...combatantsFromTemplate(entry, taken));
      }
    }

    const now = new Date().toISOString();
    const { map, result: fight } = await this.registry.mutate(
      mapId,
      (draft) => {
        const room = requireRoom(draft, roomId);
        if (room.fight && room.fight.state !== 'empty') {
          throw new IllegalActionError(`Room ${roomId} already has a ${room.fight.state} fight; clear it first`, {
            fightId: room.fight.id,
            state: room.fight.state,
          });
        }
        const fight = room.fight ?? createFight(makeFightId(mapId, roomId, uuidv4()), now);
        formFight(fight, combatants, {
          partyId: input.partyId ?? null,
          treasureValue,
          approvalRequired: input.approvalRequired ?? false,
        });
        recordEntry(
          fight,
          {
            actorId: null,
            issuedBy: 'dm',
            kind: 'attach',
            summary: [`Encounter: ${combatants.map((c) => `${c.name} (${c.side})`).join(', ')}`],
            rolls: [],
            dmOnly: false,
          },
          now
        );
        room.fight = fight;
        discoverRoom(
          draft,
          roomId,
          combatants.flatMap((c) => (c.source.kind === 'character' ? [c.source.characterId] : []))
        );
        return structuredClone(fight);
      },
      { roomIds: [roomId] }
    );

    console.log(`[FightService] Attached fight ${fight.id} with ${combatants.length} combatants`);
    this.logEntries(fight, fight.history.length - 1, map.version, requester);
    return { fight, mapVersion: map.version, result: fight.id };
  }

  /**
   * forming → empty, or take a finished (or empty) fight off the room.
   */
  async clearEncounter(requester: Requester, mapId: string, roomId: string): Promise<FightCommit<'cancelled' | 'cleared'> | null> {
    requireDm(requester);
    const room = await this.registry.getRoom(mapId, roomId);
    if (!room.fight) return null;
    const fightId = room.fight.id;

    return this.locks.runExclusive(fightId, async () => {
      const now = new Date().toISOString();
      const { map, result } = await this.registry.mutate(
        mapId,
        (draft) => {
          const target = requireRoom(draft, roomId);
          const fight = target.fight;
          if (!fight || fight.id !== fightId) {
            throw new ConcurrencyConflictError(`Fight ${fightId} was replaced`, { fightId });
          }
          if (fight.state === 'forming') {
            cancelFight(fight);
            recordEntry(
              fight,
              { actorId: null, issuedBy: 'dm', kind: 'cancel', summary: ['Encounter called off'], rolls: [], dmOnly: false },
              now
            );
            return { outcome: 'cancelled' as const, fight: structuredClone(fight) };
          }
          if (fight.state === 'empty' || fight.state === 'resolved') {
            target.fight = null;
            return { outcome: 'cleared' as const, fight: structuredClone(fight) };
          }
          throw new IllegalActionError(`Fight ${fightId} is ${fight.state}; end it before clearing`, {
            state: fight.state,
          });
        },
        { roomIds: [roomId] }
      );
      console.log(`[FightService] Fight ${fightId} ${result.outcome}`);
      return { fight: result.fight, mapVersion: map.version, result: result.outcome };
    });
  }

  /**
   * forming → active_initiative
   */
  async startFight(requester: Requester, fightId: string, dice: DiceRoller): Promise<FightCommit<ResolutionEvent[]>> {
    requireDm(requester);
    return this.transact(fightId, requester, (fight, now) => {
      const tape = new RollTape(dice);
      const events = startFight(fight, tape);
      recordEntry(
        fight,
        {
          actorId: null,
          issuedBy: 'dm',
          kind: 'initiative',
          summary: fight.combatants.map((c) => `${c.name} initiative ${c.initiative ?? 0}`),
          rolls: tape.values,
          dmOnly: false,
        },
        now
      );
      return events;
    });
  }

  /**
   * active_initiative → active_round, round 1
   */
  async beginRounds(requester: Requester, fightId: string): Promise<FightCommit<ResolutionEvent[]>> {
    requireDm(requester);
    return this.transact(fightId, requester, (fight, now) => {
      const events = beginRounds(fight);
      const termination = checkTermination(fight);
      if (termination) {
        events.push(...resolveFight(fight, termination.winner, 'side_defeated', now));
      }
      recordEntry(
        fight,
        {
          actorId: null,
          issuedBy: 'dm',
          kind: 'begin',
          summary: [`Round 1: ${fight.combatants.map((c) => c.name).join(', ')}`],
          rolls: [],
          dmOnly: false,
        },
        now
      );
      return events;
    });
  }

  // Actions

  async submitAction(
    requester: Requester,
    fightId: string,
    input: SubmitActionInput,
    dice: DiceRoller
  ): Promise<FightCommit<ActionReceipt>> {
    const { role } = requester;
    if (input.force && role.kind !== 'dm') {
      throw new AuthorizationError('Only the DM can force an action');
    }

    try {
      return await this.transact(fightId, requester, (fight, now): ActionReceipt => {
        const request = { actorId: input.actorId, action: input.action };
        gateFor(role).assertCanAct(fight, request);

        if (role.kind === 'player' && fight.approvalRequired) {
          const pending: PendingAction = {
            id: uuidv4(),
            actorId: input.actorId,
            action: input.action,
            sessionId: requester.sessionId ?? '',
            submittedAt: now,
          };
          fight.pendingActions.push(pending);
          recordEntry(
            fight,
            {
              actorId: input.actorId,
              issuedBy: 'player',
              kind: 'queued',
              summary: [`${input.actorId} requests ${input.action.type}`],
              rolls: [],
              dmOnly: false,
            },
            now
          );
          return { status: 'queued', pending };
        }

        const outcome = resolveAction(
          fight,
          input.actorId,
          input.action,
          { dice, rules: this.rules, issuedBy: role.kind, now },
          { forced: input.force ?? false }
        );
        return { status: 'resolved', ...outcome };
      });
    } catch (error) {
      throw this.offerForce(role, error);
    }
  }

  /**
   * Run an action or forced result against a copy of the fight. Nothing is stored.
   */
  async preview(
    requester: Requester,
    fightId: string,
    request: { actorId: string; action: CombatAction; force?: boolean } | { forced: ForcedResult },
    dice: DiceRoller
  ): Promise<PreviewResult> {
    requireDm(requester);
    const fight = await this.getFight(fightId);
    const ctx = { dice, rules: this.rules, issuedBy: 'dm' as const, now: new Date().toISOString() };
    try {
      const outcome: ActionOutcome =
        'forced' in request
          ? applyForcedResult(fight, request.forced, ctx)
          : resolveAction(fight, request.actorId, request.action, ctx, { forced: request.force ?? false });
      return { ...outcome, fight };
    } catch (error) {
      throw this.offerForce(requester.role, error);
    }
  }

  async approvePending(
    requester: Requester,
    fightId: string,
    pendingId: string,
    dice: DiceRoller
  ): Promise<FightCommit<ActionOutcome>> {
    requireDm(requester);
    try {
      return await this.transact(fightId, requester, (fight, now) => {
        const pending = this.takePending(fight, pendingId);
        return resolveAction(fight, pending.actorId, pending.action, {
          dice,
          rules: this.rules,
          issuedBy: 'player',
          now,
        });
      });
    } catch (error) {
      throw this.offerForce(requester.role, error);
    }
  }

  async rejectPending(
    requester: Requester,
    fightId: string,
    pendingId: string,
    reason?: string
  ): Promise<FightCommit<PendingAction>> {
    requireDm(requester);
    return this.transact(fightId, requester, (fight, now) => {
      const pending = this.takePending(fight, pendingId);
      recordEntry(
        fight,
        {
          actorId: pending.actorId,
          issuedBy: 'dm',
          kind: 'rejected',
          summary: [`DM rejects ${pending.action.type} by ${pending.actorId}${reason ? `: ${reason}` : ''}`],
          rolls: [],
          dmOnly: false,
        },
        now
      );
      return pending;
    });
  }

  async override(
    requester: Requester,
    fightId: string,
    forced: ForcedResult,
    dice: DiceRoller
  ): Promise<FightCommit<ActionOutcome>> {
    requireDm(requester);
    return this.transact(fightId, requester, (fight, now) =>
      applyForcedResult(fight, forced, { dice, rules: this.rules, issuedBy: 'dm', now })
    );
  }

  /**
   * DM rolls a mortal wound check with treatment modifiers for a downed combatant.
   */
  async treatMortalWound(
    requester: Requester,
    fightId: string,
    combatantId: string,
    modifiers: MortalWoundModifiers,
    dice: DiceRoller
  ): Promise<FightCommit<ActionOutcome>> {
    requireDm(requester);
    return this.transact(fightId, requester, (fight, now) =>
      rerollMortalWound(fight, combatantId, modifiers, { dice, rules: this.rules, issuedBy: 'dm', now })
    );
  }

  // Transaction core

  private takePending(fight: Fight, pendingId: string): PendingAction {
    const index = fight.pendingActions.findIndex((p) => p.id === pendingId);
    if (index === -1) {
      throw new NotFoundError(`Pending action ${pendingId} not found`, { pendingId });
    }
    const [pending] = fight.pendingActions.splice(index, 1);
    return pending;
  }

  private offerForce(role: ViewerRole, error: unknown): unknown {
    if (role.kind === 'dm' && error instanceof IllegalActionError) {
      error.forceApplyAvailable = true;
    }
    return error;
  }

  /**
   * Apply `work` to a copy of the fight and commit it. When the fight reaches
   * `resolved`, the party pool is credited and character sheets are written
   * back first; if the map commit then fails those writes are undone.
   */
  private async transact<T>(
    fightId: string,
    requester: Requester,
    work: (fight: Fight, now: string) => T
  ): Promise<FightCommit<T>> {
    const { mapId, roomId } = this.locate(fightId);

    return this.locks.runExclusive(fightId, async () => {
      const fight = await this.getFight(fightId);
      const baseRevision = fight.revision;
      const historyLength = fight.history.length;
      const wasResolved = fight.state === 'resolved';
      const now = new Date().toISOString();

      const result = work(fight, now);

      const steps: CompensatedStep[] = [];
      if (!wasResolved && fight.state === 'resolved') {
        steps.push(...(await this.resolutionSteps(fight)));
      }

      let mapVersion = 0;
      steps.push({
        name: `commit fight ${fightId}`,
        apply: async () => {
          const { map } = await this.registry.mutate(
            mapId,
            (draft) => {
              const room = requireRoom(draft, roomId);
              if (!room.fight || room.fight.id !== fightId || room.fight.revision !== baseRevision) {
                throw new ConcurrencyConflictError(`Fight ${fightId} changed underneath this action`, {
                  fightId,
                  expectedRevision: baseRevision,
                });
              }
              room.fight = structuredClone(fight);
            },
            { roomIds: [roomId] }
          );
          mapVersion = map.version;
        },
        undo: async () => undefined,
      });

      await runCompensated('FightService', steps);

      this.logEntries(fight, historyLength, mapVersion, requester);
      if (fight.state === 'resolved' && !wasResolved && fight.resolution) {
        console.log(
          `[FightService] Fight ${fightId} resolved: ${fight.resolution.winner} (${fight.resolution.xpAwarded} XP)`
        );
      }
      return { fight, mapVersion, result };
    });
  }

  /**
   * Writes that go with a fight ending: the XP credit and each character's
   * final HP and life status.
   */
  private async resolutionSteps(fight: Fight): Promise<CompensatedStep[]> {
    const steps: CompensatedStep[] = [];
    const xp = fight.resolution?.xpAwarded ?? 0;
    const partyId = fight.partyId;

    if (partyId && xp > 0) {
      steps.push({
        name: `credit ${xp} XP to ${partyId}`,
        apply: () => this.persist(`credit XP to party ${partyId}`, () => this.ledger.trackPendingXP(partyId, xp)),
        undo: () => this.ledger.reversePendingXP(partyId, xp),
      });
    }

    for (const combatant of fight.combatants) {
      if (combatant.source.kind !== 'character') continue;
      const characterId = combatant.source.characterId;
      const before = await this.characters.getCharacter(characterId);
      if (!before) continue;

      const status = lifeStatusOf(fight, combatant.id);
      steps.push({
        name: `write back ${characterId}`,
        apply: () => this.writeSheet(characterId, { kind: 'set_condition', hp: combatant.hp, status }),
        undo: () =>
          this.writeSheet(characterId, { kind: 'set_condition', hp: before.currentHp, status: before.lifeStatus }),
      });
    }
    return steps;
  }

  /**
   * Store errors surface as PersistenceFailureError; domain errors pass through.
   */
  private async persist(what: string, write: () => Promise<unknown>): Promise<void> {
    try {
      await write();
    } catch (error) {
      if (error instanceof GameEngineError) throw error;
      throw new PersistenceFailureError(`Failed to ${what}: ${errorMessage(error)}`);
    }
  }

  private writeSheet(characterId: string, mutation: CharacterMutation): Promise<void> {
    return this.persist(`update character ${characterId}`, () =>
      this.characters.updateCharacter(characterId, mutation)
    );
  }

  private logEntries(fight: Fight, from: number, mapVersion: number, requester: Requester): void {
    const location = parseFightId(fight.id);
    if (!location) return;
    for (const entry of fight.history.slice(from)) {
      logFightAction({
        timestamp: entry.at,
        fightId: fight.id,
        mapId: location.mapId,
        roomId: location.roomId,
        mapVersion,
        issuedBy: entry.issuedBy,
        sessionId: requester.sessionId,
        actorId: entry.actorId,
        kind: entry.kind,
        summary: entry.summary,
        rolls: entry.rolls,
        fightState: fight.state,
        round: entry.round,
      });
    }
  }
}
