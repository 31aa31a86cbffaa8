// Server entry point
// Bootstrap and start the HTTP server

import 'dotenv/config';
import { createApp } from '@/api/app.js';
import { buildAppConfig, validateConfig } from '@/utils/config.js';
import { DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import { CampaignFactory } from '@/infrastructure/campaign/CampaignFactory.js';
import { errorMessage } from '@/utils/errors.js';

async function main(): Promise<void> {
  // Build configuration from environment
  const config = buildAppConfig(process.env);

  // Validate configuration
  const errors = validateConfig(config);
  if (errors.length > 0) {
    console.error('Configuration errors:');
    errors.forEach((err) => console.error(`  - ${err}`));
    process.exit(1);
  }

  // Open campaign data
  console.log('Initializing database...');
  let dbService: DatabaseService;
  try {
    dbService = await DatabaseService.initialize(config.storage.dataDir);
    const stats = dbService.getStats();
    console.log(`  Characters: ${stats.characters}`);
    console.log(`  Parties: ${stats.parties}`);
    console.log(`  Players: ${stats.players}`);
  } catch (error) {
    console.error('Failed to initialize database:', error);
    process.exit(1);
  }

  const services = CampaignFactory.create(dbService, config);

  // Log startup info
  console.log('========================================');
  console.log('  Campaign Server Starting...');
  console.log('========================================');
  console.log(`  Node Env: ${config.server.nodeEnv}`);
  console.log(`  Port: ${config.server.port}`);
  console.log(`  Data: ${config.storage.dataDir}`);
  console.log(`  NPCs die at 0 HP: ${config.rules.npcsDieAtZero}`);
  console.log(`  Henchman XP share: ${config.rules.henchmanXpShare}`);
  console.log('========================================');

  const app = createApp(services, {
    corsOrigins: config.server.corsOrigins,
    trustProxy: config.server.nodeEnv === 'production',
    logFormat: config.server.nodeEnv === 'production' ? 'combined' : 'dev',
  });

  // Start server
  const server = app.listen(config.server.port, config.server.host, () => {
    console.log(`✓ Server running at http://${config.server.host}:${config.server.port}`);
    console.log(`✓ Health check: http://${config.server.host}:${config.server.port}/health`);
    console.log('========================================');
  });

  // Drop maps nobody is using
  const evictTimer = config.storage.mapIdleEvictMinutes > 0
    ? setInterval(() => services.registry.evictIdle(), 60_000)
    : null;

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n${signal} received. Starting graceful shutdown...`);
    if (evictTimer) clearInterval(evictTimer);

    // SSE streams hold connections open; close them so the server can finish
    services.sessions.closeAll();
    server.close(() => {
      console.log('✓ Server closed');
      CampaignFactory.shutdown(services)
        .then(() => {
          console.log('✓ Maps and campaign data flushed');
          process.exit(0);
        })
        .catch((error: unknown) => {
          console.error('✗ Flush failed:', errorMessage(error));
          process.exit(1);
        });
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('✗ Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (err) => {
    console.error('Uncaught Exception:', err);
    shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled Rejection:', reason);
  });
}

// Run main
main().catch((error) => {
  console.error('Fatal error during startup:', error);
  process.exit(1);
});
