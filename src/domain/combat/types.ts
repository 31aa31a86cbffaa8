// Domain layer: Combat types
// NO external dependencies - pure TypeScript

/**
 * Source of dice values for every resolution call.
 * Implementations live in infrastructure; the domain never rolls on its own.
 */
export interface DiceRoller {
  roll(sides: number): number;
}

export const FIGHT_STATES = ['empty', 'forming', 'active_initiative', 'active_round', 'resolved'] as const;
export type FightState = (typeof FIGHT_STATES)[number];

export type Side = 'party' | 'monsters';

export const SAVING_THROW_TYPES = [
  'petrification_paralysis',
  'poison_death',
  'blast_breath',
  'staffs_wands',
  'spells',
] as const;
export type SavingThrowType = (typeof SAVING_THROW_TYPES)[number];

/** Bonus added to a d20 for each save category; a total of 20 or more succeeds. */
export type SavingThrows = Record<SavingThrowType, number>;

export type AttackType = 'melee' | 'missile';

export interface DamageRoll {
  count: number;
  sides: number;
  modifier: number;
  attackType: AttackType;
}

export const HIT_DICE = ['d4', 'd6', 'd8', 'd10', 'd12'] as const;
export type HitDie = (typeof HIT_DICE)[number];

export type CombatantSource =
  | { kind: 'character'; characterId: string }
  | { kind: 'npc'; templateId: string };

export interface CombatantFlags {
  fled: boolean;
  surrendered: boolean;
  dead: boolean;
  mortallyWounded: boolean;
}

export interface CombatantStats {
  maxHp: number;
  armorClass: number;
  attackThrow: number;
  /** Attack routine: one to three damage rolls made in sequence on the combatant's turn */
  attacks: DamageRoll[];
  initiativeModifier: number;
  saves: SavingThrows;
  morale: number;
  xpValue: number;
  hitDie: HitDie;
  constitutionModifier: number;
}

export interface Combatant {
  id: string;
  name: string;
  side: Side;
  source: CombatantSource;
  hp: number;
  stats: CombatantStats;
  attackIndex: number;
  initiative: number | null;
  flags: CombatantFlags;
  mortalWound: MortalWoundRecord | null;
}

export type MortalWoundOutcome = 'dies' | 'maimed' | 'stable';

export type WoundSeverity =
  | 'dazed'
  | 'knocked_out'
  | 'in_shock'
  | 'critically_wounded'
  | 'grievously_wounded'
  | 'mortally_wounded'
  | 'instant_death';

export interface MortalWoundModifiers {
  healingMagic?: number;
  healingProficiency?: number;
  treatment?: TreatmentTiming;
  other?: number;
}

export type TreatmentTiming = 'one_round' | 'one_turn' | 'one_hour' | 'one_day' | 'over_one_day';

export interface MortalWoundRecord {
  /** Natural d20, or null when the combatant died outright without a roll */
  roll: number | null;
  total: number | null;
  severity: WoundSeverity;
  outcome: MortalWoundOutcome;
  hpAtCheck: number;
  round: number;
}

export const MOVEMENT_KINDS = [
  'move',
  'run',
  'charge',
  'fighting_withdrawal',
  'full_retreat',
  'simple_action',
] as const;
export type MovementKind = (typeof MOVEMENT_KINDS)[number];

/** A turn is a movement phase followed by an attack phase */
export type TurnPhase = 'movement' | 'attack';

export type CombatAction =
  | { type: 'attack'; targetId: string; modifier?: number }
  | { type: 'movement'; movement: MovementKind }
  | { type: 'pass' }
  | { type: 'surrender' }
  | { type: 'morale_check'; combatantIds: string[]; modifier?: number }
  | { type: 'saving_throw'; combatantId: string; saveType: SavingThrowType; modifier?: number };

export type CombatActionType = CombatAction['type'];

/** Action types a player may request for a combatant they control */
export const PLAYER_ACTION_TYPES: readonly CombatActionType[] = ['attack', 'movement', 'pass', 'surrender'];

/**
 * DM-forced results. These skip turn and status legality but still run through
 * the resolution engine and are logged like any other action.
 */
export type ForcedResult =
  | { kind: 'act_as'; actorId: string; action: CombatAction }
  | { kind: 'set_hp'; combatantId: string; hp: number }
  | { kind: 'set_flags'; combatantId: string; flags: Partial<CombatantFlags> }
  | { kind: 'set_initiative'; combatantId: string; initiative: number }
  | { kind: 'set_mortal_wound'; combatantId: string; outcome: MortalWoundOutcome }
  | { kind: 'advance_turn' }
  | { kind: 'end_fight'; winner?: Side | 'none' };

export type Issuer = 'player' | 'dm';

export interface PendingAction {
  id: string;
  actorId: string;
  action: CombatAction;
  sessionId: string;
  submittedAt: string;
}

export interface FightLogEntry {
  seq: number;
  round: number;
  actorId: string | null;
  issuedBy: Issuer;
  kind: string;
  summary: string[];
  rolls: number[];
  /** Hidden from player views (NPC morale, NPC saves) */
  dmOnly: boolean;
  /** Shown to players in place of `summary` when that gives away NPC stats */
  publicSummary?: string[];
  at: string;
}

export interface FightResolution {
  winner: Side | 'none';
  reason: 'side_defeated' | 'dm_forced';
  defeatedIds: string[];
  treasureValue: number;
  xpAwarded: number;
  resolvedAt: string;
}

/**
 * A combat encounter. Owned by exactly one room; never shared by reference.
 */
export interface Fight {
  id: string;
  state: FightState;
  /** Full roster, in initiative order once the order is fixed */
  combatants: Combatant[];
  /** Ids still taking turns, in order */
  turnOrder: string[];
  turnIndex: number;
  turnPhase: TurnPhase;
  round: number;
  revision: number;
  pendingActions: PendingAction[];
  partyId: string | null;
  treasureValue: number;
  approvalRequired: boolean;
  history: FightLogEntry[];
  resolution: FightResolution | null;
  createdAt: string;
  updatedAt: string;
}

// Resolution results

export type AttackOutcome = 'critical_miss' | 'miss' | 'hit' | 'critical_hit';
export type MoraleOutcome = 'holds' | 'flees' | 'surrenders';

export type ResolutionEvent =
  | {
      type: 'attack';
      attackerId: string;
      targetId: string;
      rolls: number[];
      total: number;
      outcome: AttackOutcome;
      damage: number;
      targetHp: number;
    }
  | { type: 'mortal_wound'; combatantId: string; record: MortalWoundRecord }
  | { type: 'morale'; combatantIds: string[]; rolls: number[]; total: number; outcome: MoraleOutcome }
  | { type: 'saving_throw'; combatantId: string; saveType: SavingThrowType; roll: number; total: number; passed: boolean }
  | { type: 'movement'; combatantId: string; movement: MovementKind }
  | { type: 'status'; combatantId: string; flags: Partial<CombatantFlags> }
  | { type: 'hp'; combatantId: string; hp: number }
  | { type: 'initiative'; order: Array<{ combatantId: string; initiative: number }> }
  | { type: 'turn'; round: number; combatantId: string | null }
  | { type: 'phase'; combatantId: string; phase: TurnPhase }
  | { type: 'state'; from: FightState; to: FightState }
  | { type: 'resolved'; resolution: FightResolution };

export interface CombatRules {
  npcsDieAtZero: boolean;
}
