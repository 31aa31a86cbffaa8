// LowDB connection and database instance management
// Campaign-wide records (characters, parties, player accounts) in one JSON document

import { Low, Memory, type Adapter } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import type { DamageRoll, HitDie, SavingThrows } from '@/domain/combat/types.js';
import type { LifeStatus } from '@/domain/character/types.js';
import { KeyedMutex } from '@/utils/mutex.js';
import { PersistenceFailureError, errorMessage } from '@/utils/errors.js';

// Database schema definition; _version counts committed writes
export interface CampaignSchema {
  _version: number;
  characters: CharacterRecord[];
  parties: PartyRecord[];
  players: PlayerRecord[];
}

export interface CharacterRecord {
  id: string;
  owner_username: string | null;
  name: string;
  level: number;
  max_hp: number;
  current_hp: number;
  armor_class: number;
  attack_throw: number;
  attacks: DamageRoll[];
  initiative_modifier: number;
  saves: SavingThrows;
  constitution_modifier: number;
  hit_die: HitDie;
  banked_xp: number;
  life_status: LifeStatus;
  created_at: string;
  updated_at: string;
}

export interface HenchmanRecord {
  character_id: string;
  employer_id: string;
  share_multiplier?: number;
}

export interface PartyRecord {
  id: string;
  name: string;
  member_ids: string[];
  henchmen: HenchmanRecord[];
  pending_xp: number;
  created_at: string;
  updated_at: string;
}

export interface PlayerRecord {
  id: string;
  username: string;
  password_hash: string;
  created_at: string;
  last_login?: string;
}

function defaultData(): CampaignSchema {
  return {
    _version: 1,
    characters: [],
    parties: [],
    players: [],
  };
}

// Database configuration: a file path, or an adapter (tests pass lowdb's Memory)
export type DatabaseConfig = { path: string } | { adapter: Adapter<CampaignSchema> };

export class DatabaseConnection {
  private db: Low<CampaignSchema>;
  private writes = new KeyedMutex();

  constructor(config: DatabaseConfig) {
    if ('adapter' in config) {
      this.db = new Low(config.adapter, defaultData());
      return;
    }

    mkdirSync(dirname(config.path), { recursive: true });
    this.db = new Low(new JSONFile<CampaignSchema>(config.path), defaultData());
  }

  static inMemory(): DatabaseConnection {
    return new DatabaseConnection({ adapter: new Memory<CampaignSchema>() });
  }

  /**
   * Initialize by reading data
   */
  async init(): Promise<void> {
    await this.db.read();

    // Documents written before a collection existed
    const data = this.db.data;
    data._version ??= 1;
    data.characters ??= [];
    data.parties ??= [];
    data.players ??= [];
  }

  /**
   * Last committed document. Treat as read-only; change it through atomicUpdate.
   */
  getData(): CampaignSchema {
    return this.db.data;
  }

  getVersion(): number {
    return this.db.data._version;
  }

  /**
   * Apply `updater` to a copy of the document and persist it. The copy only
   * becomes the committed document once the write succeeds; a throwing
   * updater or a failed write leaves the committed document as it was.
   */
  async atomicUpdate<T>(updater: (draft: CampaignSchema) => T): Promise<T> {
    return this.writes.runExclusive('campaign', async () => {
      const previous = this.db.data;
      const draft = structuredClone(previous);
      const result = updater(draft);
      draft._version = previous._version + 1;

      this.db.data = draft;
      try {
        await this.db.write();
      } catch (error) {
        this.db.data = previous;
        throw new PersistenceFailureError(`Failed to write campaign data: ${errorMessage(error)}`);
      }
      return result;
    });
  }

  /**
   * Wait for in-flight writes
   */
  async close(): Promise<void> {
    await this.writes.drain();
  }
}
