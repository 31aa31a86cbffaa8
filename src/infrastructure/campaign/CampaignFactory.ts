// Infrastructure layer: Campaign factory for dependency wiring
// Builds every service from one database and one config, so the server and
// the tests assemble the same graph

import type { DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import type { AppConfig } from '@/utils/config.js';
import { EventManager } from '@/application/events/EventManager.js';
import { MapRegistry } from '@/application/map/MapRegistry.js';
import { PartyLedger } from '@/application/party/PartyLedger.js';
import { FightService } from '@/application/combat/FightService.js';
import { SessionSynchronizer } from '@/application/session/SessionSynchronizer.js';
import { PlayerAuthService } from '@/application/auth/PlayerAuthService.js';

export interface CampaignServices {
  db: DatabaseService;
  events: EventManager;
  registry: MapRegistry;
  ledger: PartyLedger;
  fights: FightService;
  sessions: SessionSynchronizer;
  auth: PlayerAuthService;
}

export class CampaignFactory {
  /**
   * @param now clock for map bookkeeping; tests pass a fake one
   */
  static create(db: DatabaseService, config: AppConfig, now?: () => number): CampaignServices {
    const events = new EventManager();

    const registry = new MapRegistry(db.maps, events, {
      idleEvictMs: config.storage.mapIdleEvictMinutes * 60_000,
      now,
    });

    const ledger = new PartyLedger(db.parties, db.characters, events, {
      henchmanXpShare: config.rules.henchmanXpShare,
    });

    const fights = new FightService(registry, ledger, db.characters, {
      npcsDieAtZero: config.rules.npcsDieAtZero,
    });

    const sessions = new SessionSynchronizer(registry, events);

    const auth = new PlayerAuthService(db.players, db.characters, {
      dmKey: config.auth.dmKey,
      bcryptRounds: config.auth.bcryptRounds,
    });

    return { db, events, registry, ledger, fights, sessions, auth };
  }

  /**
   * Stop accepting work and wait for writes in flight
   */
  static async shutdown(services: CampaignServices): Promise<void> {
    services.sessions.dispose();
    await services.registry.close();
    await services.db.close();
  }
}
