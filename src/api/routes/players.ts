// API layer: Player account routes (DM only)

import { Router, type Request, type Response } from 'express';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import { RegisterPlayerSchema } from '@/api/schemas.js';
import type { CampaignServices } from '@/infrastructure/campaign/CampaignFactory.js';

export function createPlayerRouter(services: CampaignServices): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const players = services.db.players.list();
    res.json({ success: true, count: players.length, players });
  });

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const { username, password } = RegisterPlayerSchema.parse(req.body);
      const player = await services.auth.registerPlayer(username, password);
      res.status(201).json({ success: true, player });
    })
  );

  return router;
}
