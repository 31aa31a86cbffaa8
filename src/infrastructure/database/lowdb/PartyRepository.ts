// Party Repository - LowDB implementation

import { v4 as uuidv4 } from 'uuid';
import type { Henchman, Party } from '@/domain/party/types.js';
import type { DatabaseConnection, PartyRecord } from './connection.js';
import { NotFoundError, ValidationError } from '@/utils/errors.js';

export interface PartyInput {
  name: string;
  memberIds: string[];
  henchmen: Henchman[];
}

export class PartyRepository {
  constructor(private db: DatabaseConnection) {}

  async create(input: PartyInput): Promise<Party> {
    const now = new Date().toISOString();
    const record: PartyRecord = {
      id: `party_${uuidv4()}`,
      name: input.name,
      member_ids: [...input.memberIds],
      henchmen: input.henchmen.map((h) => this.henchmanToRow(h)),
      pending_xp: 0,
      created_at: now,
      updated_at: now,
    };

    await this.db.atomicUpdate((data) => {
      data.parties.push(record);
    });
    return this.rowToParty(record);
  }

  findById(id: string): Party | null {
    const row = this.db.getData().parties.find((p) => p.id === id);
    return row ? this.rowToParty(row) : null;
  }

  list(): Party[] {
    return this.db.getData().parties.map((p) => this.rowToParty(p));
  }

  /**
   * Parties with any of the given characters as member or henchman
   */
  findByCharacters(characterIds: readonly string[]): Party[] {
    const wanted = new Set(characterIds);
    return this.list().filter(
      (p) => p.memberIds.some((id) => wanted.has(id)) || p.henchmen.some((h) => wanted.has(h.characterId))
    );
  }

  async setMembership(id: string, input: Pick<PartyInput, 'memberIds' | 'henchmen'>): Promise<Party> {
    const row = await this.db.atomicUpdate((data) => {
      const party = this.requireRow(data.parties, id);
      party.member_ids = [...input.memberIds];
      party.henchmen = input.henchmen.map((h) => this.henchmanToRow(h));
      party.updated_at = new Date().toISOString();
      return party;
    });
    return this.rowToParty(row);
  }

  /**
   * Add (or with a negative delta, take back) pending XP. The pool never goes below zero.
   */
  async adjustPendingXp(id: string, delta: number): Promise<Party> {
    const row = await this.db.atomicUpdate((data) => {
      const party = this.requireRow(data.parties, id);
      if (party.pending_xp + delta < 0) {
        throw new ValidationError(`Party ${party.name} has only ${party.pending_xp} pending XP`, {
          partyId: id,
          pendingXp: party.pending_xp,
          requested: -delta,
        });
      }
      party.pending_xp += delta;
      party.updated_at = new Date().toISOString();
      return party;
    });
    return this.rowToParty(row);
  }

  private requireRow(parties: PartyRecord[], id: string): PartyRecord {
    const party = parties.find((p) => p.id === id);
    if (!party) {
      throw new NotFoundError(`Party ${id} not found`, { partyId: id });
    }
    return party;
  }

  private henchmanToRow(henchman: Henchman): PartyRecord['henchmen'][number] {
    return {
      character_id: henchman.characterId,
      employer_id: henchman.employerId,
      ...(henchman.shareMultiplier !== undefined ? { share_multiplier: henchman.shareMultiplier } : {}),
    };
  }

  private rowToParty(row: PartyRecord): Party {
    return {
      id: row.id,
      name: row.name,
      memberIds: [...row.member_ids],
      henchmen: row.henchmen.map((h) => ({
        characterId: h.character_id,
        employerId: h.employer_id,
        ...(h.share_multiplier !== undefined ? { shareMultiplier: h.share_multiplier } : {}),
      })),
      pendingXp: row.pending_xp,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
