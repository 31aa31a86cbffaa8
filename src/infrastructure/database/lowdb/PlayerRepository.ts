// Player Repository - LowDB implementation
// Player accounts: username and bcrypt hash

import { v4 as uuidv4 } from 'uuid';
import type { DatabaseConnection, PlayerRecord } from './connection.js';
import { ValidationError } from '@/utils/errors.js';

export interface PlayerAccount {
  id: string;
  username: string;
  createdAt: string;
  lastLogin?: string;
}

export class PlayerRepository {
  constructor(private db: DatabaseConnection) {}

  async create(username: string, passwordHash: string): Promise<PlayerAccount> {
    const record: PlayerRecord = {
      id: uuidv4(),
      username,
      password_hash: passwordHash,
      created_at: new Date().toISOString(),
    };

    await this.db.atomicUpdate((data) => {
      if (data.players.some((p) => p.username === username)) {
        throw new ValidationError(`Username ${username} is already taken`, { username });
      }
      data.players.push(record);
    });
    return this.toAccount(record);
  }

  findByUsername(username: string): PlayerRecord | null {
    return this.db.getData().players.find((p) => p.username === username) ?? null;
  }

  list(): PlayerAccount[] {
    return this.db.getData().players.map((p) => this.toAccount(p));
  }

  async recordLogin(username: string): Promise<void> {
    await this.db.atomicUpdate((data) => {
      const player = data.players.find((p) => p.username === username);
      if (player) player.last_login = new Date().toISOString();
    });
  }

  private toAccount(row: PlayerRecord): PlayerAccount {
    return {
      id: row.id,
      username: row.username,
      createdAt: row.created_at,
      ...(row.last_login !== undefined ? { lastLogin: row.last_login } : {}),
    };
  }
}
