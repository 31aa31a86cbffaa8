// Domain layer: Combat resolution engine
// Applies rule formulas to a fight draft using the dice it is handed.

import type {
  CombatAction,
  Combatant,
  CombatRules,
  DiceRoller,
  Fight,
  FightLogEntry,
  ForcedResult,
  Issuer,
  MortalWoundModifiers,
  MortalWoundOutcome,
  MortalWoundRecord,
  MovementKind,
  ResolutionEvent,
  SavingThrowType,
  WoundSeverity,
} from './types.js';
import {
  attackOutcome,
  damageFromRolls,
  isStanding,
  moraleOutcome,
  mortalWoundTotal,
  movementEndsTurn,
  rollDice,
  rollExplodingD20,
  savingThrowPasses,
  sum,
  woundOutcome,
  woundSeverity,
} from './rules.js';
import {
  advanceTurn,
  assertState,
  checkTermination,
  currentActorId,
  findCombatant,
  pruneTurnOrder,
  resolveFight,
  setInitiative,
} from './fightMachine.js';
import { IllegalActionError, NotFoundError, ValidationError } from '@/utils/errors.js';

export interface ResolutionContext {
  dice: DiceRoller;
  rules: CombatRules;
  issuedBy: Issuer;
  now: string;
}

export interface ActionOutcome {
  events: ResolutionEvent[];
  entry: FightLogEntry;
}

interface Step {
  events: ResolutionEvent[];
  summary: string[];
  /** Player-facing lines, when `summary` shows NPC numbers */
  publicSummary?: string[];
  endsTurn: boolean;
}

const TURN_ACTIONS: ReadonlySet<CombatAction['type']> = new Set(['attack', 'movement', 'pass', 'surrender']);

/**
 * Passes rolls through from another roller and keeps a copy of each value.
 */
export class RollTape implements DiceRoller {
  readonly values: number[] = [];

  constructor(private readonly source: DiceRoller) {}

  roll(sides: number): number {
    const value = this.source.roll(sides);
    this.values.push(value);
    return value;
  }
}

function signed(value: number): string {
  return value < 0 ? `- ${-value}` : `+ ${value}`;
}

function requireCombatant(fight: Fight, combatantId: string): Combatant {
  const combatant = findCombatant(fight, combatantId);
  if (!combatant) {
    throw new NotFoundError(`Combatant ${combatantId} is not in fight ${fight.id}`, { combatantId });
  }
  return combatant;
}

// Individual rules

export function resolveAttack(
  fight: Fight,
  attacker: Combatant,
  target: Combatant,
  modifier: number,
  dice: DiceRoller,
  rules: CombatRules
): Step {
  const routine = attacker.stats.attacks;
  const damageRoll = routine[attacker.attackIndex] ?? routine[0];
  if (!damageRoll) {
    throw new ValidationError(`${attacker.name} has no attack routine`, { combatantId: attacker.id });
  }

  const rolls = rollExplodingD20(dice);
  const { total, outcome } = attackOutcome(rolls, attacker.stats.attackThrow, target.stats.armorClass, modifier);
  const landed = outcome === 'hit' || outcome === 'critical_hit';
  const damage = landed
    ? damageFromRolls(rollDice(dice, damageRoll.count, damageRoll.sides), damageRoll, outcome === 'critical_hit')
    : 0;

  const hpBefore = target.hp;
  target.hp -= damage;

  const events: ResolutionEvent[] = [
    {
      type: 'attack',
      attackerId: attacker.id,
      targetId: target.id,
      rolls,
      total,
      outcome,
      damage,
      targetHp: target.hp,
    },
  ];
  const hpChange = `HP ${hpBefore} -> ${target.hp}`;
  const summary = [
    `${attacker.name} attacks ${target.name}: ${sum(rolls)} ${signed(attacker.stats.attackThrow)} ${signed(-target.stats.armorClass)} ${signed(modifier)} = ${total} (${outcome})` +
      (landed ? `, ${damage} damage, ${hpChange}` : ''),
  ];
  // players see outcomes, never NPC attack throws, armor or hit points
  const npcInvolved = attacker.source.kind === 'npc' || target.source.kind === 'npc';
  const publicSummary = [
    `${attacker.name} attacks ${target.name}: ${outcome}` +
      (landed ? `, ${damage} damage${target.source.kind === 'npc' ? '' : `, ${hpChange}`}` : ''),
  ];

  if (target.hp <= 0 && !target.flags.dead && !target.flags.mortallyWounded) {
    const wound = resolveMortalWound(fight, target, dice, rules);
    events.push(...wound.events);
    summary.push(...wound.summary);
    publicSummary.push(...(wound.publicSummary ?? wound.summary));
  }

  attacker.attackIndex = Math.min(attacker.attackIndex + 1, routine.length);
  return {
    events,
    summary,
    publicSummary: npcInvolved ? publicSummary : undefined,
    endsTurn: attacker.attackIndex >= routine.length,
  };
}

export function resolveMortalWound(
  fight: Fight,
  combatant: Combatant,
  dice: DiceRoller,
  rules: CombatRules,
  modifiers: MortalWoundModifiers = {}
): Step {
  let record: MortalWoundRecord;
  if (combatant.source.kind === 'npc' && rules.npcsDieAtZero) {
    record = {
      roll: null,
      total: null,
      severity: 'instant_death',
      outcome: 'dies',
      hpAtCheck: combatant.hp,
      round: fight.round,
    };
  } else {
    const roll = dice.roll(20);
    const total = mortalWoundTotal(roll, combatant, modifiers);
    const severity = woundSeverity(total);
    record = { roll, total, severity, outcome: woundOutcome(severity), hpAtCheck: combatant.hp, round: fight.round };
  }

  return applyMortalWound(combatant, record);
}

function applyMortalWound(combatant: Combatant, record: MortalWoundRecord): Step {
  combatant.mortalWound = record;
  const dies = record.outcome === 'dies';
  combatant.flags.dead = dies;
  combatant.flags.mortallyWounded = !dies;

  const detail = record.total === null ? record.severity : `${record.total}, ${record.severity}`;
  return {
    events: [
      { type: 'mortal_wound', combatantId: combatant.id, record },
      { type: 'status', combatantId: combatant.id, flags: { dead: dies, mortallyWounded: !dies } },
    ],
    summary: [`${combatant.name} mortal wound check: ${detail} (${record.outcome})`],
    publicSummary:
      combatant.source.kind === 'npc' ? [`${combatant.name} mortal wound check: ${record.outcome}`] : undefined,
    endsTurn: false,
  };
}

export function resolveMoraleCheck(fight: Fight, combatantIds: string[], modifier: number, dice: DiceRoller): Step {
  const listed = combatantIds.map((id) => requireCombatant(fight, id));
  const standing = listed.filter(isStanding);
  if (standing.length === 0) {
    throw new IllegalActionError('None of the listed combatants is still in the fight', { combatantIds });
  }

  const morale = Math.max(...standing.map((c) => c.stats.morale));
  const rolls = rollDice(dice, 2, 6);
  const total = sum(rolls) + morale + modifier;
  const outcome = moraleOutcome(total);

  const events: ResolutionEvent[] = [
    { type: 'morale', combatantIds: standing.map((c) => c.id), rolls, total, outcome },
  ];
  for (const combatant of standing) {
    if (outcome === 'flees') combatant.flags.fled = true;
    if (outcome === 'surrenders') combatant.flags.surrendered = true;
    if (outcome !== 'holds') {
      events.push({
        type: 'status',
        combatantId: combatant.id,
        flags: outcome === 'flees' ? { fled: true } : { surrendered: true },
      });
    }
  }

  return {
    events,
    summary: [`Morale for ${standing.map((c) => c.name).join(', ')}: ${sum(rolls)} ${signed(morale)} ${signed(modifier)} = ${total} (${outcome})`],
    endsTurn: false,
  };
}

export function resolveSavingThrow(
  combatant: Combatant,
  saveType: SavingThrowType,
  modifier: number,
  dice: DiceRoller
): Step {
  const roll = dice.roll(20);
  const bonus = combatant.stats.saves[saveType];
  const total = roll + bonus + modifier;
  const passed = savingThrowPasses(roll, bonus, modifier);
  return {
    events: [{ type: 'saving_throw', combatantId: combatant.id, saveType, roll, total, passed }],
    summary: [`${combatant.name} saves vs ${saveType}: ${roll} ${signed(bonus)} ${signed(modifier)} = ${total} (${passed ? 'passed' : 'failed'})`],
    endsTurn: false,
  };
}

export function applyMovement(combatant: Combatant, movement: MovementKind): Step {
  const events: ResolutionEvent[] = [{ type: 'movement', combatantId: combatant.id, movement }];
  if (movement === 'full_retreat') {
    combatant.flags.fled = true;
    events.push({ type: 'status', combatantId: combatant.id, flags: { fled: true } });
  }
  return {
    events,
    summary: [`${combatant.name}: ${movement.replace(/_/g, ' ')}`],
    endsTurn: movementEndsTurn(movement),
  };
}

// Transaction tail

/**
 * Run after every action: end the fight if a side is out, otherwise keep the
 * turn order pointing at someone who can still act.
 */
function settle(fight: Fight, now: string): ResolutionEvent[] {
  if (fight.state !== 'active_initiative' && fight.state !== 'active_round') return [];

  const termination = checkTermination(fight);
  if (termination) {
    return resolveFight(fight, termination.winner, 'side_defeated', now);
  }

  if (fight.state === 'active_round') {
    const current = currentActorId(fight);
    const actor = current ? findCombatant(fight, current) : undefined;
    if (actor && !isStanding(actor)) {
      return advanceTurn(fight);
    }
    pruneTurnOrder(fight);
  }
  return [];
}

export function recordEntry(
  fight: Fight,
  entry: Omit<FightLogEntry, 'seq' | 'round' | 'at'>,
  now: string
): FightLogEntry {
  const recorded: FightLogEntry = { ...entry, seq: fight.history.length + 1, round: fight.round, at: now };
  fight.history.push(recorded);
  fight.revision += 1;
  fight.updatedAt = now;
  return recorded;
}

function involvesOnlyNpcs(fight: Fight, ids: readonly string[]): boolean {
  return ids.length > 0 && ids.every((id) => findCombatant(fight, id)?.source.kind === 'npc');
}

// Entry points

/**
 * Resolve one combat action for `actorId`. With `forced`, status checks are
 * skipped and structural problems surface as validation errors instead of
 * illegal actions.
 */
export function resolveAction(
  fight: Fight,
  actorId: string,
  action: CombatAction,
  ctx: ResolutionContext,
  options: { forced?: boolean } = {}
): ActionOutcome {
  const forced = options.forced ?? false;
  const reject = (message: string, details?: Record<string, unknown>): Error =>
    forced ? new ValidationError(message, details) : new IllegalActionError(message, details);

  const turnAction = TURN_ACTIONS.has(action.type);
  const allowedStates = turnAction ? ['active_round'] : ['active_initiative', 'active_round'];
  if (!allowedStates.includes(fight.state)) {
    throw reject(`Cannot ${action.type} while fight is ${fight.state}`, { state: fight.state });
  }

  const actor = requireCombatant(fight, actorId);
  if (turnAction && !forced && !isStanding(actor)) {
    throw reject(`${actor.name} is out of the fight`, { actorId, flags: actor.flags });
  }

  const tape = new RollTape(ctx.dice);
  let step: Step;
  let dmOnly = false;

  switch (action.type) {
    case 'attack': {
      const target = requireCombatant(fight, action.targetId);
      if (target.id === actor.id) {
        throw reject(`${actor.name} cannot attack itself`);
      }
      if (!forced && !isStanding(target)) {
        throw reject(`${target.name} is already out of the fight`, { targetId: target.id });
      }
      step = resolveAttack(fight, actor, target, action.modifier ?? 0, tape, ctx.rules);
      if (currentActorId(fight) === actor.id) fight.turnPhase = 'attack';
      break;
    }
    case 'movement': {
      const ownTurn = currentActorId(fight) === actor.id;
      if (ownTurn && fight.turnPhase === 'attack' && !forced) {
        throw reject(`${actor.name} has already moved or attacked this turn`, { actorId });
      }
      step = applyMovement(actor, action.movement);
      if (ownTurn && !step.endsTurn && fight.turnPhase === 'movement') {
        fight.turnPhase = 'attack';
        step.events.push({ type: 'phase', combatantId: actor.id, phase: 'attack' });
      }
      break;
    }
    case 'pass':
      step = { events: [], summary: [`${actor.name} passes`], endsTurn: true };
      break;
    case 'surrender':
      actor.flags.surrendered = true;
      step = {
        events: [{ type: 'status', combatantId: actor.id, flags: { surrendered: true } }],
        summary: [`${actor.name} surrenders`],
        endsTurn: true,
      };
      break;
    case 'morale_check':
      step = resolveMoraleCheck(fight, action.combatantIds, action.modifier ?? 0, tape);
      dmOnly = involvesOnlyNpcs(fight, action.combatantIds);
      break;
    case 'saving_throw': {
      const combatant = requireCombatant(fight, action.combatantId);
      step = resolveSavingThrow(combatant, action.saveType, action.modifier ?? 0, tape);
      dmOnly = combatant.source.kind === 'npc';
      break;
    }
  }

  const events = [...step.events];
  if (turnAction && step.endsTurn && currentActorId(fight) === actor.id && fight.state === 'active_round') {
    const termination = checkTermination(fight);
    if (!termination) events.push(...advanceTurn(fight));
  }
  events.push(...settle(fight, ctx.now));

  const entry = recordEntry(
    fight,
    {
      actorId: actor.id,
      issuedBy: ctx.issuedBy,
      kind: forced ? `override:act_as:${action.type}` : action.type,
      summary: step.summary,
      publicSummary: step.publicSummary,
      rolls: tape.values,
      dmOnly,
    },
    ctx.now
  );
  return { events, entry };
}

const FORCED_SEVERITY: Record<MortalWoundOutcome, WoundSeverity> = {
  dies: 'instant_death',
  maimed: 'critically_wounded',
  stable: 'in_shock',
};

/**
 * DM override. Never rejected for legality; still refuses anything the state
 * machine cannot represent (resolved fights, rounds that have not begun).
 */
export function applyForcedResult(fight: Fight, forced: ForcedResult, ctx: ResolutionContext): ActionOutcome {
  if (fight.state === 'resolved' || fight.state === 'empty') {
    throw new ValidationError(`Fight ${fight.id} is ${fight.state}; nothing to override`, { state: fight.state });
  }
  const requireStates = (...states: Fight['state'][]): void => {
    if (!states.includes(fight.state)) {
      throw new ValidationError(`${forced.kind} needs the fight to be ${states.join(' or ')}`, { state: fight.state });
    }
  };

  if (forced.kind === 'act_as') {
    return resolveAction(fight, forced.actorId, forced.action, { ...ctx, issuedBy: 'dm' }, { forced: true });
  }

  const tape = new RollTape(ctx.dice);
  const events: ResolutionEvent[] = [];
  const summary: string[] = [];
  let actorId: string | null = null;
  let dmOnly = false;

  switch (forced.kind) {
    case 'set_hp': {
      const combatant = requireCombatant(fight, forced.combatantId);
      actorId = combatant.id;
      dmOnly = combatant.source.kind === 'npc';
      const before = combatant.hp;
      combatant.hp = forced.hp;
      events.push({ type: 'hp', combatantId: combatant.id, hp: combatant.hp });
      summary.push(`DM sets ${combatant.name} HP ${before} -> ${combatant.hp}`);
      if (combatant.hp <= 0 && !combatant.flags.dead && !combatant.flags.mortallyWounded) {
        const wound = resolveMortalWound(fight, combatant, tape, ctx.rules);
        events.push(...wound.events);
        summary.push(...wound.summary);
      }
      break;
    }
    case 'set_flags': {
      const combatant = requireCombatant(fight, forced.combatantId);
      actorId = combatant.id;
      dmOnly = combatant.source.kind === 'npc';
      const changed: string[] = [];
      if (forced.flags.fled !== undefined) combatant.flags.fled = forced.flags.fled;
      if (forced.flags.surrendered !== undefined) combatant.flags.surrendered = forced.flags.surrendered;
      if (forced.flags.dead !== undefined) combatant.flags.dead = forced.flags.dead;
      if (forced.flags.mortallyWounded !== undefined) combatant.flags.mortallyWounded = forced.flags.mortallyWounded;
      for (const [flag, value] of Object.entries(forced.flags)) {
        changed.push(`${flag}=${String(value)}`);
      }
      events.push({ type: 'status', combatantId: combatant.id, flags: forced.flags });
      summary.push(`DM sets ${combatant.name} ${changed.join(', ')}`);
      // a combatant at 0 HP or below always carries dead or mortally wounded
      if (combatant.hp <= 0 && !combatant.flags.dead && !combatant.flags.mortallyWounded) {
        const wound = resolveMortalWound(fight, combatant, tape, ctx.rules);
        events.push(...wound.events);
        summary.push(...wound.summary);
      }
      break;
    }
    case 'set_initiative': {
      requireStates('active_initiative', 'active_round');
      const combatant = requireCombatant(fight, forced.combatantId);
      actorId = combatant.id;
      events.push(...setInitiative(fight, combatant.id, forced.initiative));
      summary.push(`DM sets ${combatant.name} initiative to ${forced.initiative}`);
      break;
    }
    case 'set_mortal_wound': {
      const combatant = requireCombatant(fight, forced.combatantId);
      actorId = combatant.id;
      dmOnly = combatant.source.kind === 'npc';
      const wound = applyMortalWound(combatant, {
        roll: null,
        total: null,
        severity: FORCED_SEVERITY[forced.outcome],
        outcome: forced.outcome,
        hpAtCheck: combatant.hp,
        round: fight.round,
      });
      events.push(...wound.events);
      summary.push(...wound.summary);
      break;
    }
    case 'advance_turn':
      requireStates('active_round');
      actorId = currentActorId(fight);
      events.push(...advanceTurn(fight));
      summary.push('DM advances the turn');
      break;
    case 'end_fight': {
      requireStates('active_initiative', 'active_round');
      const winner = forced.winner ?? checkTermination(fight)?.winner ?? 'none';
      events.push(...resolveFight(fight, winner, 'dm_forced', ctx.now));
      summary.push(`DM ends the fight (winner: ${winner})`);
      break;
    }
  }

  events.push(...settle(fight, ctx.now));

  const entry = recordEntry(
    fight,
    { actorId, issuedBy: 'dm', kind: `override:${forced.kind}`, summary, rolls: tape.values, dmOnly },
    ctx.now
  );
  return { events, entry };
}

/**
 * Mortal wound check on demand, with treatment modifiers, for combatants the
 * DM rolls for outside the automatic check.
 */
export function rerollMortalWound(
  fight: Fight,
  combatantId: string,
  modifiers: MortalWoundModifiers,
  ctx: ResolutionContext
): ActionOutcome {
  assertState(fight, 'active_initiative', 'active_round');
  const combatant = requireCombatant(fight, combatantId);
  if (combatant.hp > 0) {
    throw new IllegalActionError(`${combatant.name} is not at 0 HP or below`, { combatantId });
  }
  const tape = new RollTape(ctx.dice);
  const step = resolveMortalWound(fight, combatant, tape, { npcsDieAtZero: false }, modifiers);
  const events = [...step.events, ...settle(fight, ctx.now)];
  const entry = recordEntry(
    fight,
    {
      actorId: combatant.id,
      issuedBy: ctx.issuedBy,
      kind: 'mortal_wound',
      summary: step.summary,
      rolls: tape.values,
      dmOnly: combatant.source.kind === 'npc',
    },
    ctx.now
  );
  return { events, entry };
}
