// Database Service - Main entry point for database operations
// Provides access to all repositories and handles initialization

import { join } from 'path';
import {
  DatabaseConnection,
  CharacterRepository,
  PartyRepository,
  PlayerRepository,
  MapRepository,
  fileMapStorage,
  memoryMapStorage,
  type MapStorage,
} from './lowdb/index.js';

export class DatabaseService {
  // Repositories
  public readonly characters: CharacterRepository;
  public readonly parties: PartyRepository;
  public readonly players: PlayerRepository;
  public readonly maps: MapRepository;

  private constructor(
    private readonly db: DatabaseConnection,
    mapStorage: MapStorage
  ) {
    this.characters = new CharacterRepository(db);
    this.parties = new PartyRepository(db);
    this.players = new PlayerRepository(db);
    this.maps = new MapRepository(mapStorage);
  }

  /**
   * Open the campaign document and map directory under `dataDir`
   */
  static async initialize(dataDir: string): Promise<DatabaseService> {
    const db = new DatabaseConnection({ path: join(dataDir, 'campaign.json') });
    await db.init();
    console.log(`[DatabaseService] Campaign data loaded from ${dataDir}`);
    return new DatabaseService(db, fileMapStorage(join(dataDir, 'maps')));
  }

  /**
   * Everything in process memory; used by tests
   */
  static async inMemory(): Promise<DatabaseService> {
    const db = DatabaseConnection.inMemory();
    await db.init();
    return new DatabaseService(db, memoryMapStorage());
  }

  getConnection(): DatabaseConnection {
    return this.db;
  }

  /**
   * Wait for pending campaign writes
   */
  async close(): Promise<void> {
    await this.db.close();
  }

  getStats() {
    const data = this.db.getData();
    return {
      characters: data.characters.length,
      parties: data.parties.length,
      players: data.players.length,
      version: data._version,
    };
  }
}

export default DatabaseService;
