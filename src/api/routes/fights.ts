// API layer: Fight routes
// Every call is one fight transaction; results are projected through the caller's lens

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler, createError } from '@/api/middleware/errorHandler.js';
import { requesterOf, sessionOf, type AuthModule } from '@/api/middleware/AuthModule.js';
import {
  DiceOnlySchema,
  MortalWoundSchema,
  OverrideSchema,
  PreviewSchema,
  RejectSchema,
  RollInputSchema,
  SubmitActionSchema,
} from '@/api/schemas.js';
import type { ViewerRole } from '@/domain/session/types.js';
import type { DiceRoller, Fight } from '@/domain/combat/types.js';
import { parseFightId } from '@/domain/combat/fightId.js';
import type { ActionReceipt, FightCommit } from '@/application/combat/FightService.js';
import { lensFor } from '@/application/session/ViewLens.js';
import { createDiceRoller } from '@/infrastructure/game/DiceRoller.js';
import type { CampaignServices } from '@/infrastructure/campaign/CampaignFactory.js';

type RollInput = z.infer<typeof RollInputSchema>;

/**
 * Players never choose their dice; the DM may replay table rolls or use a seed.
 */
export function diceFor(role: ViewerRole, input: RollInput | undefined): DiceRoller {
  if (role.kind !== 'dm' && input && input.kind !== 'server') {
    throw createError('Only the DM can supply dice', 403, 'FORBIDDEN');
  }
  return createDiceRoller(input ?? { kind: 'server' });
}

/**
 * Players only see fights in rooms their characters have found.
 */
export async function visibleFight(
  services: Pick<CampaignServices, 'fights' | 'registry'>,
  role: ViewerRole,
  fightId: string
): Promise<Fight> {
  const fight = await services.fights.getFight(fightId);
  const location = parseFightId(fightId);
  if (role.kind !== 'dm' && location) {
    const room = await services.registry.getRoom(location.mapId, location.roomId);
    if (!lensFor(role).canSeeRoom(room)) {
      throw createError('Fight not found', 404, 'NOT_FOUND');
    }
  }
  return fight;
}

function receiptView(role: ViewerRole, receipt: ActionReceipt): Record<string, unknown> {
  if (receipt.status === 'queued') {
    return { status: 'queued', pendingId: receipt.pending.id };
  }
  if (role.kind === 'dm') {
    return { ...receipt };
  }
  return { status: 'resolved', entry: lensFor(role).entry(receipt.entry) };
}

export function createFightRouter(services: CampaignServices, authModule: AuthModule): Router {
  const router = Router();
  const { fights } = services;
  const dmOnly = authModule.dmOnly;

  function respond<T>(req: Request, res: Response, commit: FightCommit<T>, result: unknown): void {
    res.json({
      success: true,
      mapVersion: commit.mapVersion,
      result,
      fight: lensFor(sessionOf(req).role).fight(commit.fight),
    });
  }

  const fightFor = (req: Request): Promise<Fight> => visibleFight(services, sessionOf(req).role, req.params.fightId);

  router.get(
    '/:fightId',
    asyncHandler(async (req: Request, res: Response) => {
      const fight = await fightFor(req);
      res.json({ success: true, fight: lensFor(sessionOf(req).role).fight(fight) });
    })
  );

  // ========== Lifecycle (DM) ==========

  router.post(
    '/:fightId/start',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      const { dice } = DiceOnlySchema.parse(req.body ?? {});
      const requester = requesterOf(req);
      const commit = await fights.startFight(requester, req.params.fightId, diceFor(requester.role, dice));
      respond(req, res, commit, commit.result);
    })
  );

  router.post(
    '/:fightId/begin',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      const commit = await fights.beginRounds(requesterOf(req), req.params.fightId);
      respond(req, res, commit, commit.result);
    })
  );

  // ========== Actions ==========

  router.post(
    '/:fightId/actions',
    asyncHandler(async (req: Request, res: Response) => {
      const body = SubmitActionSchema.parse(req.body);
      const requester = requesterOf(req);
      if (requester.role.kind !== 'dm') {
        await fightFor(req);
      }
      const commit = await fights.submitAction(
        requester,
        req.params.fightId,
        { actorId: body.actorId, action: body.action, force: body.force },
        diceFor(requester.role, body.dice)
      );
      respond(req, res, commit, receiptView(requester.role, commit.result));
    })
  );

  router.post(
    '/:fightId/preview',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      const body = PreviewSchema.parse(req.body);
      const requester = requesterOf(req);
      const request =
        'forced' in body
          ? { forced: body.forced }
          : { actorId: body.actorId, action: body.action, force: body.force };
      const preview = await fights.preview(requester, req.params.fightId, request, diceFor(requester.role, body.dice));
      res.json({ success: true, stored: false, ...preview });
    })
  );

  router.post(
    '/:fightId/pending/:pendingId/approve',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      const { dice } = DiceOnlySchema.parse(req.body ?? {});
      const requester = requesterOf(req);
      const commit = await fights.approvePending(
        requester,
        req.params.fightId,
        req.params.pendingId,
        diceFor(requester.role, dice)
      );
      respond(req, res, commit, commit.result);
    })
  );

  router.post(
    '/:fightId/pending/:pendingId/reject',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      const { reason } = RejectSchema.parse(req.body ?? {});
      const commit = await fights.rejectPending(requesterOf(req), req.params.fightId, req.params.pendingId, reason);
      respond(req, res, commit, commit.result);
    })
  );

  // ========== DM overrides ==========

  router.post(
    '/:fightId/override',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      const { forced, dice } = OverrideSchema.parse(req.body);
      const requester = requesterOf(req);
      const commit = await fights.override(requester, req.params.fightId, forced, diceFor(requester.role, dice));
      respond(req, res, commit, commit.result);
    })
  );

  router.post(
    '/:fightId/mortal-wound',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      const { combatantId, modifiers, dice } = MortalWoundSchema.parse(req.body);
      const requester = requesterOf(req);
      const commit = await fights.treatMortalWound(
        requester,
        req.params.fightId,
        combatantId,
        modifiers,
        diceFor(requester.role, dice)
      );
      respond(req, res, commit, commit.result);
    })
  );

  return router;
}
