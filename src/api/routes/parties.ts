// API layer: Party routes
// Membership and the XP pool; allocation is the only way XP reaches characters

import { Router, type Request, type Response } from 'express';
import { asyncHandler, createError } from '@/api/middleware/errorHandler.js';
import { sessionOf, type AuthModule } from '@/api/middleware/AuthModule.js';
import { AllocateSchema, CreatePartySchema, MembershipSchema, SplitQuerySchema } from '@/api/schemas.js';
import { lensFor } from '@/application/session/ViewLens.js';
import type { CampaignServices } from '@/infrastructure/campaign/CampaignFactory.js';

export function createPartyRouter(services: CampaignServices, authModule: AuthModule): Router {
  const router = Router();
  const { ledger } = services;
  const dmOnly = authModule.dmOnly;

  router.get('/', (req: Request, res: Response) => {
    const role = sessionOf(req).role;
    const parties = role.kind === 'dm' ? ledger.listParties() : ledger.partiesForCharacters(role.characterIds);
    res.json({ success: true, count: parties.length, parties });
  });

  router.get('/:partyId', (req: Request, res: Response) => {
    const party = ledger.getParty(req.params.partyId);
    if (!lensFor(sessionOf(req).role).canSeeParty(party)) {
      throw createError('Party not found', 404, 'NOT_FOUND');
    }
    res.json({ success: true, party });
  });

  router.post(
    '/',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      const input = CreatePartySchema.parse(req.body);
      const party = await ledger.createParty(input);
      res.status(201).json({ success: true, party });
    })
  );

  router.put(
    '/:partyId/membership',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      const input = MembershipSchema.parse(req.body);
      const party = await ledger.setMembership(req.params.partyId, input);
      res.json({ success: true, party });
    })
  );

  // Suggested even split of the pool (or of `?amount=`); nothing is moved
  router.get('/:partyId/split', dmOnly, (req: Request, res: Response) => {
    const { amount } = SplitQuerySchema.parse(req.query);
    const plan = ledger.planEvenSplit(req.params.partyId, amount);
    res.json({ success: true, plan });
  });

  router.post(
    '/:partyId/allocate',
    asyncHandler(async (req: Request, res: Response) => {
      const { distribution } = AllocateSchema.parse(req.body);
      const result = await ledger.allocate(sessionOf(req).role, req.params.partyId, distribution);
      res.json({ success: true, result });
    })
  );

  return router;
}
