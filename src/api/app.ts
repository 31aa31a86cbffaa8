// API layer: Express app configuration
// Composes all middleware and routes

import express, { type Application, type Request, type Response } from 'express';
import cookieParser from 'cookie-parser';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { errorHandler } from './middleware/errorHandler.js';
import { createAuthModule } from './middleware/AuthModule.js';
import { createSessionRouter } from './routes/sessions.js';
import { createMapRouter } from './routes/maps.js';
import { createFightRouter } from './routes/fights.js';
import { createPartyRouter } from './routes/parties.js';
import { createCharacterRouter } from './routes/characters.js';
import { createPlayerRouter } from './routes/players.js';
import type { CampaignServices } from '@/infrastructure/campaign/CampaignFactory.js';

export interface AppConfig {
  corsOrigins: string[];
  trustProxy: boolean;
  /** morgan format; an empty string turns request logging off */
  logFormat: string;
}

export function createApp(services: CampaignServices, config: Partial<AppConfig> = {}): Application {
  const app = express();

  const {
    corsOrigins = ['http://localhost:3000', 'http://127.0.0.1:3000'],
    trustProxy = false,
    logFormat = process.env.NODE_ENV === 'production' ? 'combined' : 'dev',
  } = config;

  // Trust proxy (for proper client IP behind reverse proxy)
  if (trustProxy) {
    app.set('trust proxy', 1);
  }

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // Disable for API-only server
  }));

  // CORS
  app.use(cors({
    origin: corsOrigins,
    credentials: true,
  }));

  // Logging
  if (logFormat) {
    app.use(morgan(logFormat));
  }

  // Body parsing
  app.use(express.json({ limit: '2mb' }));

  // Cookie parser for session tokens
  app.use(cookieParser());

  // Health check (before routes)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      sessions: services.sessions.listSessions().length,
      events: services.events.getCounts(),
    });
  });

  const authModule = createAuthModule(services.sessions);

  // Opening a session is the login; the router guards its other endpoints itself
  app.use('/api/sessions', createSessionRouter(services, authModule));

  // Everything else requires a session
  app.use('/api', authModule.requireSession);

  app.use('/api/maps', createMapRouter(services, authModule));
  app.use('/api/fights', createFightRouter(services, authModule));
  app.use('/api/parties', createPartyRouter(services, authModule));
  app.use('/api/characters', createCharacterRouter(services, authModule));
  app.use('/api/players', authModule.dmOnly, createPlayerRouter(services));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Resource not found',
      },
    });
  });

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
