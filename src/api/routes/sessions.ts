// API layer: Session routes
// Open a viewer session, stream its events over SSE, manage subscriptions

import { Router, type Request, type Response } from 'express';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import { SESSION_COOKIE, sessionOf, type AuthModule } from '@/api/middleware/AuthModule.js';
import { SseChannel, setupStreaming } from '@/api/middleware/streaming.js';
import { AckSchema, OpenSessionSchema, SubscribeSchema } from '@/api/schemas.js';
import type { CampaignServices } from '@/infrastructure/campaign/CampaignFactory.js';

export function createSessionRouter(services: CampaignServices, authModule: AuthModule): Router {
  const router = Router();
  const { auth, sessions } = services;

  // Log in and open a session. The session id is the bearer token for every other call.
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const credentials = OpenSessionSchema.parse(req.body);
      const role = await auth.authenticate(credentials);
      const session = sessions.openSession(role);

      res.cookie(SESSION_COOKIE, session.id, {
        httpOnly: true,
        sameSite: 'strict',
        secure: process.env.NODE_ENV === 'production',
      });
      res.status(201).json({
        success: true,
        session: { id: session.id, role: session.role },
      });
    })
  );

  router.use(authModule.requireSession);

  router.get('/', (req: Request, res: Response) => {
    const session = sessionOf(req);
    res.json({
      success: true,
      session: {
        id: session.id,
        role: session.role,
        connected: session.channel !== null,
        subscriptions: [...session.subscriptions.entries()].map(([mapId, sub]) => ({
          mapId,
          sent: sub.sent,
          acked: sub.acked,
        })),
      },
    });
  });

  // SSE stream. Reconnecting replaces the previous stream and resends every subscribed map.
  router.get(
    '/stream',
    asyncHandler(async (req: Request, res: Response) => {
      const session = sessionOf(req);
      setupStreaming(res);
      const channel = new SseChannel(res);
      req.on('close', () => sessions.detachChannel(session.id, channel));
      await sessions.attachChannel(session.id, channel);
    })
  );

  router.post(
    '/subscribe',
    asyncHandler(async (req: Request, res: Response) => {
      const { mapId } = SubscribeSchema.parse(req.body);
      const map = await sessions.subscribeMap(sessionOf(req).id, mapId);
      res.json({ success: true, map });
    })
  );

  router.post('/unsubscribe', (req: Request, res: Response) => {
    const { mapId } = SubscribeSchema.parse(req.body);
    const removed = sessions.unsubscribeMap(sessionOf(req).id, mapId);
    res.json({ success: true, removed });
  });

  router.post('/ack', (req: Request, res: Response) => {
    const { mapId, version } = AckSchema.parse(req.body);
    const subscription = sessions.acknowledge(sessionOf(req).id, mapId, version);
    res.json({ success: true, mapId, sent: subscription.sent, acked: subscription.acked });
  });

  router.delete('/', (req: Request, res: Response) => {
    sessions.closeSession(sessionOf(req).id);
    res.clearCookie(SESSION_COOKIE);
    res.json({ success: true });
  });

  return router;
}
