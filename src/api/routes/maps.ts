// API layer: Map routes
// Room graph editing for the DM, projected snapshots for everyone

import { Router, type Request, type Response } from 'express';
import { asyncHandler, createError } from '@/api/middleware/errorHandler.js';
import { requesterOf, sessionOf, type AuthModule } from '@/api/middleware/AuthModule.js';
import { EncounterSchema, MapLayoutSchema, RevealSchema, RoomBodySchema } from '@/api/schemas.js';
import { lensFor } from '@/application/session/ViewLens.js';
import { findRoom } from '@/domain/map/graph.js';
import type { CampaignServices } from '@/infrastructure/campaign/CampaignFactory.js';

export function createMapRouter(services: CampaignServices, authModule: AuthModule): Router {
  const router = Router();
  const { registry, sessions, fights } = services;
  const dmOnly = authModule.dmOnly;

  // ========== Reads ==========

  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      const maps = await registry.listMaps();
      res.json({ success: true, count: maps.length, maps });
    })
  );

  router.get(
    '/:mapId',
    asyncHandler(async (req: Request, res: Response) => {
      const map = await sessions.getMapSnapshot(req.params.mapId, sessionOf(req).role);
      res.json({ success: true, map });
    })
  );

  router.get(
    '/:mapId/rooms/:roomId',
    asyncHandler(async (req: Request, res: Response) => {
      const { mapId, roomId } = req.params;
      const lens = lensFor(sessionOf(req).role);
      const map = await registry.loadMap(mapId);
      const room = findRoom(map, roomId);
      if (!room || !lens.canSeeRoom(room)) {
        throw createError('Room not found', 404, 'NOT_FOUND');
      }
      res.json({ success: true, version: map.version, room: lens.room(map, room) });
    })
  );

  // ========== DM editing ==========

  router.put(
    '/:mapId',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      const layout = MapLayoutSchema.parse(req.body);
      const map = await registry.saveLayout({ id: req.params.mapId, ...layout });
      res.json({ success: true, map });
    })
  );

  router.put(
    '/:mapId/rooms/:roomId',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      const body = RoomBodySchema.parse(req.body);
      const room = await registry.putRoom(req.params.mapId, { id: req.params.roomId, ...body });
      res.json({ success: true, room });
    })
  );

  router.delete(
    '/:mapId/rooms/:roomId',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      await registry.deleteRoom(req.params.mapId, req.params.roomId);
      res.json({ success: true });
    })
  );

  router.post(
    '/:mapId/rooms/:roomId/reveal',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      const { characterIds } = RevealSchema.parse(req.body);
      const changed = await registry.revealRoom(req.params.mapId, req.params.roomId, characterIds);
      res.json({ success: true, changed });
    })
  );

  // ========== Encounters ==========

  router.post(
    '/:mapId/rooms/:roomId/encounter',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      const input = EncounterSchema.parse(req.body);
      const commit = await fights.attachEncounter(requesterOf(req), req.params.mapId, req.params.roomId, input);
      res.status(201).json({
        success: true,
        fightId: commit.result,
        mapVersion: commit.mapVersion,
        fight: commit.fight,
      });
    })
  );

  router.delete(
    '/:mapId/rooms/:roomId/encounter',
    dmOnly,
    asyncHandler(async (req: Request, res: Response) => {
      const commit = await fights.clearEncounter(requesterOf(req), req.params.mapId, req.params.roomId);
      if (!commit) {
        throw createError('Room has no encounter', 404, 'NOT_FOUND');
      }
      res.json({ success: true, outcome: commit.result, mapVersion: commit.mapVersion, fight: commit.fight });
    })
  );

  return router;
}
