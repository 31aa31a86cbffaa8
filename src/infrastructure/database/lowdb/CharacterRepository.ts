// Character Repository - LowDB implementation
// Default Character Sheet Store: character records in the campaign document

import { v4 as uuidv4 } from 'uuid';
import type {
  Character,
  CharacterMutation,
  CharacterSheetStore,
} from '@/domain/character/types.js';
import type { CharacterRecord, DatabaseConnection } from './connection.js';
import { NotFoundError, ValidationError } from '@/utils/errors.js';

export interface CharacterFilter {
  ownerUsername?: string;
  name?: string;
  limit?: number;
  offset?: number;
}

export interface CharacterListResult {
  characters: Character[];
  total: number;
  page: number;
  pageSize: number;
}

export type CharacterInput = Omit<Character, 'id' | 'createdAt' | 'updatedAt'> & { id?: string };

export class CharacterRepository implements CharacterSheetStore {
  constructor(private db: DatabaseConnection) {}

  /**
   * Create a character, or replace the sheet of an existing one (DM edit)
   */
  async upsert(character: CharacterInput): Promise<Character> {
    const id = character.id ?? `char_${uuidv4()}`;
    const now = new Date().toISOString();

    const record = await this.db.atomicUpdate((data) => {
      const idx = data.characters.findIndex((c) => c.id === id);
      const next = this.characterToRow({ ...character, id, createdAt: now, updatedAt: now });
      if (idx === -1) {
        data.characters.push(next);
        return next;
      }
      const existing = data.characters[idx];
      const replaced = { ...next, created_at: existing.created_at };
      data.characters[idx] = replaced;
      return replaced;
    });

    return this.rowToCharacter(record);
  }

  /**
   * Get character by ID
   */
  findById(id: string): Character | null {
    const row = this.db.getData().characters.find((c) => c.id === id);
    return row ? this.rowToCharacter(row) : null;
  }

  async getCharacter(id: string): Promise<Character | null> {
    return this.findById(id);
  }

  findByOwner(username: string): Character[] {
    return this.db
      .getData()
      .characters.filter((c) => c.owner_username === username)
      .map((c) => this.rowToCharacter(c));
  }

  /**
   * List characters with optional filtering
   */
  list(filter: CharacterFilter = {}): CharacterListResult {
    let rows = this.db.getData().characters;

    if (filter.ownerUsername !== undefined) {
      rows = rows.filter((c) => c.owner_username === filter.ownerUsername);
    }

    if (filter.name) {
      const query = filter.name.toLowerCase();
      rows = rows.filter((c) => c.name.toLowerCase().includes(query));
    }

    const total = rows.length;
    const limit = filter.limit ?? 20;
    const offset = filter.offset ?? 0;

    const page = [...rows]
      .sort((a, b) => a.name.localeCompare(b.name))
      .slice(offset, offset + limit);

    return {
      characters: page.map((c) => this.rowToCharacter(c)),
      total,
      page: Math.floor(offset / limit) + 1,
      pageSize: limit,
    };
  }

  /**
   * Apply one of the mutations the fight engine and party ledger are allowed to make
   */
  async updateCharacter(id: string, mutation: CharacterMutation): Promise<void> {
    await this.db.atomicUpdate((data) => {
      const row = data.characters.find((c) => c.id === id);
      if (!row) {
        throw new NotFoundError(`Character ${id} not found`, { characterId: id });
      }

      switch (mutation.kind) {
        case 'set_hp':
          row.current_hp = Math.min(mutation.hp, row.max_hp);
          break;
        case 'set_condition':
          row.current_hp = Math.min(mutation.hp, row.max_hp);
          row.life_status = mutation.status;
          break;
        case 'bank_xp':
          if (row.banked_xp + mutation.amount < 0) {
            throw new ValidationError(`Banked XP for ${row.name} cannot go below zero`, { characterId: id });
          }
          row.banked_xp += mutation.amount;
          break;
      }
      row.updated_at = new Date().toISOString();
    });
  }

  /**
   * Delete character
   */
  async delete(id: string): Promise<boolean> {
    return this.db.atomicUpdate((data) => {
      const idx = data.characters.findIndex((c) => c.id === id);
      if (idx === -1) return false;
      data.characters.splice(idx, 1);
      return true;
    });
  }

  private characterToRow(character: Character): CharacterRecord {
    return {
      id: character.id,
      owner_username: character.ownerUsername,
      name: character.name,
      level: character.level,
      max_hp: character.maxHp,
      current_hp: character.currentHp,
      armor_class: character.armorClass,
      attack_throw: character.attackThrow,
      attacks: character.attacks.map((a) => ({ ...a })),
      initiative_modifier: character.initiativeModifier,
      saves: { ...character.saves },
      constitution_modifier: character.constitutionModifier,
      hit_die: character.hitDie,
      banked_xp: character.bankedXp,
      life_status: character.lifeStatus,
      created_at: character.createdAt,
      updated_at: character.updatedAt,
    };
  }

  /**
   * Convert database row to Character
   */
  private rowToCharacter(row: CharacterRecord): Character {
    return {
      id: row.id,
      ownerUsername: row.owner_username,
      name: row.name,
      level: row.level,
      maxHp: row.max_hp,
      currentHp: row.current_hp,
      armorClass: row.armor_class,
      attackThrow: row.attack_throw,
      attacks: row.attacks.map((a) => ({ ...a })),
      initiativeModifier: row.initiative_modifier,
      saves: { ...row.saves },
      constitutionModifier: row.constitution_modifier,
      hitDie: row.hit_die,
      bankedXp: row.banked_xp,
      lifeStatus: row.life_status,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
