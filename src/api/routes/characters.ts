// API layer: Character routes
// Sheets are read by everyone who owns them and written by the DM

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler, createError } from '@/api/middleware/errorHandler.js';
import { sessionOf, type AuthModule } from '@/api/middleware/AuthModule.js';
import { CharacterSchema } from '@/api/schemas.js';
import type { CampaignServices } from '@/infrastructure/campaign/CampaignFactory.js';

const ListQuerySchema = z.object({
  owner: z.string().optional(),
  name: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export function createCharacterRouter(services: CampaignServices, authModule: AuthModule): Router {
  const router = Router();
  const repo = services.db.characters;
  const dmOnly = authModule.dmOnly;

  // List characters: the DM sees everyone, a player their own
  router.get('/', (req: Request, res: Response) => {
    const role = sessionOf(req).role;
    const query = ListQuerySchema.parse(req.query);
    const result = repo.list({
      ownerUsername: role.kind === 'dm' ? query.owner : role.username,
      name: query.name,
      limit: query.limit,
      offset: query.offset,
    });

    res.json({
      success: true,
      count: result.total,
      characters: result.characters,
    });
  });

  // Get character by ID
  router.get('/:id', (req: Request, res: Response) => {
    const role = sessionOf(req).role;
    const character = repo.findById(req.params.id);

    if (!character || (role.kind !== 'dm' && character.ownerUsername !== role.username)) {
      throw createError('Character not found', 404, 'CHARACTER_NOT_FOUND');
    }

    res.json({
      success: true,
      character,
    });
  });

  // Create, or replace by id
  router.post(
    '/',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      const data = CharacterSchema.parse(req.body);
      const character = await repo.upsert(data);
      res.status(201).json({ success: true, character });
    })
  );

  router.put(
    '/:id',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      const data = CharacterSchema.parse(req.body);
      const character = await repo.upsert({ ...data, id: req.params.id });
      res.json({ success: true, character });
    })
  );

  router.delete(
    '/:id',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      const deleted = await repo.delete(req.params.id);
      if (!deleted) {
        throw createError('Character not found', 404, 'CHARACTER_NOT_FOUND');
      }
      res.json({ success: true });
    })
  );

  return router;
}
