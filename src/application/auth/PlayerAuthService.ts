// Application: Player authentication
// Opens a viewer role from credentials: the DM key, or a player account

import bcrypt from 'bcryptjs';
import { timingSafeEqual } from 'crypto';
import type { ViewerRole } from '@/domain/session/types.js';
import type { CharacterRepository, PlayerAccount, PlayerRepository } from '@/infrastructure/database/lowdb/index.js';
import { authLogger } from '@/utils/auth-logger.js';
import { AuthorizationError, ValidationError, errorMessage } from '@/utils/errors.js';

export interface PlayerAuthConfig {
  dmKey: string;
  bcryptRounds: number;
}

export type Credentials =
  | { role: 'dm'; dmKey: string }
  | { role: 'player'; username: string; password: string };

const USERNAME_PATTERN = /^[A-Za-z0-9_-]{3,32}$/;

export class PlayerAuthService {
  constructor(
    private players: PlayerRepository,
    private characters: CharacterRepository,
    private config: PlayerAuthConfig
  ) {}

  async registerPlayer(username: string, password: string): Promise<PlayerAccount> {
    if (!USERNAME_PATTERN.test(username)) {
      throw new ValidationError('Username must be 3-32 letters, digits, "_" or "-"', { username });
    }
    if (password.length < 8) {
      throw new ValidationError('Password must be at least 8 characters');
    }
    const passwordHash = await bcrypt.hash(password, this.config.bcryptRounds);
    const account = await this.players.create(username, passwordHash);
    authLogger.info('Player registered', { username });
    return account;
  }

  /**
   * Resolve credentials to a role. A player's role carries the characters the account owns.
   */
  async authenticate(credentials: Credentials): Promise<ViewerRole> {
    if (credentials.role === 'dm') {
      if (!this.isDmKey(credentials.dmKey)) {
        authLogger.warn('DM login rejected');
        throw new AuthorizationError('Invalid DM key');
      }
      authLogger.info('DM session opened');
      return { kind: 'dm' };
    }

    const record = this.players.findByUsername(credentials.username);
    const valid = record !== null && (await bcrypt.compare(credentials.password, record.password_hash));
    if (!record || !valid) {
      authLogger.warn('Player login rejected', { username: credentials.username });
      throw new AuthorizationError('Invalid username or password');
    }

    try {
      await this.players.recordLogin(record.username);
    } catch (error) {
      authLogger.error('Could not record login', { username: record.username, error: errorMessage(error) });
      throw error;
    }
    const characterIds = this.characters.findByOwner(record.username).map((c) => c.id);
    authLogger.info('Player session opened', { username: record.username, characters: characterIds.length });
    return { kind: 'player', username: record.username, characterIds };
  }

  private isDmKey(candidate: string): boolean {
    const expected = Buffer.from(this.config.dmKey);
    const given = Buffer.from(candidate);
    return expected.length > 0 && expected.length === given.length && timingSafeEqual(expected, given);
  }
}
