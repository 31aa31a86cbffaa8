// API layer: Request body schemas
// Shared by the route modules; every body is parsed before any service call

import { z } from 'zod';
import { HIT_DICE, MOVEMENT_KINDS, SAVING_THROW_TYPES } from '@/domain/combat/types.js';
import { isIdSegment } from '@/domain/combat/fightId.js';

const Id = z
  .string()
  .max(100)
  .refine(isIdSegment, 'Use letters, digits, "_" and "-", and not a built-in property name');
const Int = z.number().int();

// ========== Dice ==========

export const RollInputSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('fixed'), values: z.array(Int.min(1).max(1000)).min(1).max(200) }),
  z.object({ kind: z.literal('seeded'), seed: Int }),
  z.object({ kind: z.literal('server') }),
]);

// ========== Combat ==========

const SideSchema = z.enum(['party', 'monsters']);

const SavesSchema = z.object({
  petrification_paralysis: Int,
  poison_death: Int,
  blast_breath: Int,
  staffs_wands: Int,
  spells: Int,
});

const DamageRollSchema = z.object({
  count: Int.min(1).max(20),
  sides: Int.min(2).max(100),
  modifier: Int.default(0),
  attackType: z.enum(['melee', 'missile']).default('melee'),
});

const CombatantStatsSchema = z.object({
  maxHp: Int.min(1),
  armorClass: Int,
  attackThrow: Int,
  attacks: z.array(DamageRollSchema).min(1).max(3),
  initiativeModifier: Int.default(0),
  saves: SavesSchema,
  morale: Int.min(2).max(12),
  xpValue: Int.min(0),
  hitDie: z.enum(HIT_DICE),
  constitutionModifier: Int.default(0),
});

export const CombatActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('attack'), targetId: z.string().min(1), modifier: Int.optional() }),
  z.object({ type: z.literal('movement'), movement: z.enum(MOVEMENT_KINDS) }),
  z.object({ type: z.literal('pass') }),
  z.object({ type: z.literal('surrender') }),
  z.object({ type: z.literal('morale_check'), combatantIds: z.array(z.string().min(1)).min(1), modifier: Int.optional() }),
  z.object({
    type: z.literal('saving_throw'),
    combatantId: z.string().min(1),
    saveType: z.enum(SAVING_THROW_TYPES),
    modifier: Int.optional(),
  }),
]);

export const ForcedResultSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('act_as'), actorId: z.string().min(1), action: CombatActionSchema }),
  z.object({ kind: z.literal('set_hp'), combatantId: z.string().min(1), hp: Int }),
  z.object({
    kind: z.literal('set_flags'),
    combatantId: z.string().min(1),
    flags: z
      .object({
        fled: z.boolean(),
        surrendered: z.boolean(),
        dead: z.boolean(),
        mortallyWounded: z.boolean(),
      })
      .partial(),
  }),
  z.object({ kind: z.literal('set_initiative'), combatantId: z.string().min(1), initiative: Int }),
  z.object({ kind: z.literal('set_mortal_wound'), combatantId: z.string().min(1), outcome: z.enum(['dies', 'maimed', 'stable']) }),
  z.object({ kind: z.literal('advance_turn') }),
  z.object({ kind: z.literal('end_fight'), winner: z.enum(['party', 'monsters', 'none']).optional() }),
]);

export const MortalWoundModifiersSchema = z.object({
  healingMagic: Int.optional(),
  healingProficiency: Int.optional(),
  treatment: z.enum(['one_round', 'one_turn', 'one_hour', 'one_day', 'over_one_day']).optional(),
  other: Int.optional(),
});

export const EncounterSchema = z.object({
  combatants: z
    .array(
      z.discriminatedUnion('kind', [
        z.object({ kind: z.literal('character'), characterId: z.string().min(1), side: SideSchema.optional() }),
        z.object({
          kind: z.literal('npc'),
          templateId: Id,
          name: z.string().min(1).max(100),
          side: SideSchema.optional(),
          count: Int.min(1).max(50).optional(),
          hp: Int.min(1).optional(),
          stats: CombatantStatsSchema,
        }),
      ])
    )
    .min(1),
  partyId: z.string().min(1).nullable().optional(),
  treasureValue: z.number().min(0).optional(),
  approvalRequired: z.boolean().optional(),
});

export const SubmitActionSchema = z.object({
  actorId: z.string().min(1),
  action: CombatActionSchema,
  force: z.boolean().optional(),
  dice: RollInputSchema.optional(),
});

export const PreviewSchema = z.union([
  z.object({ forced: ForcedResultSchema, dice: RollInputSchema.optional() }),
  z.object({
    actorId: z.string().min(1),
    action: CombatActionSchema,
    force: z.boolean().optional(),
    dice: RollInputSchema.optional(),
  }),
]);

export const OverrideSchema = z.object({ forced: ForcedResultSchema, dice: RollInputSchema.optional() });

export const MortalWoundSchema = z.object({
  combatantId: z.string().min(1),
  modifiers: MortalWoundModifiersSchema.default({}),
  dice: RollInputSchema.optional(),
});

export const DiceOnlySchema = z.object({ dice: RollInputSchema.optional() });

export const RejectSchema = z.object({ reason: z.string().max(500).optional() });

// ========== Maps ==========

export const RoomSchema = z.object({
  id: Id,
  name: z.string().min(1).max(200),
  description: z.string().max(10000).default(''),
  dmNotes: z.string().max(10000).default(''),
  connections: z.array(Id).default([]),
  discoveredBy: z.array(z.string().min(1)).optional(),
});

export const RoomBodySchema = RoomSchema.omit({ id: true });

export const MapLayoutSchema = z.object({
  name: z.string().min(1).max(200),
  summary: z.string().max(10000).default(''),
  version: Int.min(0).default(0),
  rooms: z.array(RoomSchema).default([]),
});

export const RevealSchema = z.object({ characterIds: z.array(z.string().min(1)).min(1) });

// ========== Sessions ==========

export const OpenSessionSchema = z.discriminatedUnion('role', [
  z.object({ role: z.literal('dm'), dmKey: z.string().min(1) }),
  z.object({ role: z.literal('player'), username: z.string().min(1), password: z.string().min(1) }),
]);

export const SubscribeSchema = z.object({ mapId: Id });

export const AckSchema = z.object({ mapId: Id, version: Int.min(0) });

// ========== Parties, characters, players ==========

const HenchmanSchema = z.object({
  characterId: z.string().min(1),
  employerId: z.string().min(1),
  shareMultiplier: z.number().min(0).max(1).optional(),
});

export const MembershipSchema = z.object({
  memberIds: z.array(z.string().min(1)).default([]),
  henchmen: z.array(HenchmanSchema).default([]),
});

export const CreatePartySchema = MembershipSchema.extend({
  name: z.string().min(1).max(100),
});

export const AllocateSchema = z.object({
  distribution: z.array(z.object({ characterId: z.string().min(1), amount: Int.min(1) })).min(1),
});

export const SplitQuerySchema = z.object({
  amount: z.coerce.number().int().min(0).optional(),
});

export const CharacterSchema = z.object({
  id: z.string().min(1).max(100).optional(),
  name: z.string().min(1).max(100),
  ownerUsername: z.string().min(1).nullable().default(null),
  level: Int.min(1).max(36).default(1),
  maxHp: Int.min(1),
  currentHp: Int,
  armorClass: Int,
  attackThrow: Int,
  attacks: z.array(DamageRollSchema).min(1).max(3),
  initiativeModifier: Int.default(0),
  saves: SavesSchema,
  constitutionModifier: Int.default(0),
  hitDie: z.enum(HIT_DICE),
  bankedXp: Int.min(0).default(0),
  lifeStatus: z.enum(['alive', 'mortally_wounded', 'dead']).default('alive'),
});

export const RegisterPlayerSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});
