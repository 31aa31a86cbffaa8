import { describe, it, expect, beforeEach } from 'vitest';
import type { Adapter } from 'lowdb';
import { DatabaseConnection, type CampaignSchema } from '../connection.js';
import { CharacterRepository, type CharacterInput } from '../CharacterRepository.js';
import { PartyRepository } from '../PartyRepository.js';
import { PlayerRepository } from '../PlayerRepository.js';
import { MapRepository, memoryMapStorage } from '../MapRepository.js';
import { NotFoundError, PersistenceFailureError, ValidationError } from '@/utils/errors.js';
import { fighterCharacter, keepMap } from '@/__tests__/fixtures.js';

function sheet(overrides: Partial<CharacterInput> = {}): CharacterInput {
  const { createdAt: _createdAt, updatedAt: _updatedAt, ...rest } = fighterCharacter();
  return { ...rest, ...overrides };
}

class SwitchableAdapter implements Adapter<CampaignSchema> {
  failWrites = false;
  stored: CampaignSchema | null = null;

  async read(): Promise<CampaignSchema | null> {
    return this.stored;
  }

  async write(data: CampaignSchema): Promise<void> {
    if (this.failWrites) throw new Error('disk full');
    this.stored = structuredClone(data);
  }
}

describe('DatabaseConnection', () => {
  it('leaves the committed document alone when the write fails', async () => {
    const adapter = new SwitchableAdapter();
    const db = new DatabaseConnection({ adapter });
    await db.init();
    const characters = new CharacterRepository(db);
    await characters.upsert(sheet());

    adapter.failWrites = true;
    await expect(characters.updateCharacter('char_fighter', { kind: 'set_hp', hp: 3 })).rejects.toThrow(
      PersistenceFailureError
    );

    expect(characters.findById('char_fighter')?.currentHp).toBe(12);
    expect(db.getVersion()).toBe(2);
  });

  it('leaves the committed document alone when the updater throws', async () => {
    const db = DatabaseConnection.inMemory();
    await db.init();
    await expect(
      db.atomicUpdate((data) => {
        data.players.push({ id: 'p1', username: 'ghost', password_hash: 'x', created_at: 'now' });
        throw new Error('changed my mind');
      })
    ).rejects.toThrow('changed my mind');
    expect(db.getData().players).toEqual([]);
    expect(db.getVersion()).toBe(1);
  });
});

describe('CharacterRepository', () => {
  let characters: CharacterRepository;

  beforeEach(async () => {
    const db = DatabaseConnection.inMemory();
    await db.init();
    characters = new CharacterRepository(db);
    await characters.upsert(sheet());
  });

  it('caps hit points at the maximum', async () => {
    await characters.updateCharacter('char_fighter', { kind: 'set_hp', hp: 40 });
    expect(characters.findById('char_fighter')?.currentHp).toBe(12);
  });

  it('keeps negative hit points', async () => {
    await characters.updateCharacter('char_fighter', { kind: 'set_hp', hp: -3 });
    expect(characters.findById('char_fighter')?.currentHp).toBe(-3);
  });

  it('writes hit points and life status together', async () => {
    await characters.updateCharacter('char_fighter', { kind: 'set_condition', hp: -4, status: 'mortally_wounded' });
    expect(characters.findById('char_fighter')).toMatchObject({ currentHp: -4, lifeStatus: 'mortally_wounded' });
  });

  it('refuses to bank XP below zero', async () => {
    await characters.updateCharacter('char_fighter', { kind: 'bank_xp', amount: 10 });
    await expect(characters.updateCharacter('char_fighter', { kind: 'bank_xp', amount: -11 })).rejects.toThrow(
      ValidationError
    );
    expect(characters.findById('char_fighter')?.bankedXp).toBe(10);
  });

  it('reports missing characters', async () => {
    await expect(characters.updateCharacter('char_nobody', { kind: 'set_hp', hp: 1 })).rejects.toThrow(NotFoundError);
  });

  it('keeps the creation time when a sheet is replaced', async () => {
    const created = characters.findById('char_fighter')?.createdAt;
    const updated = await characters.upsert(sheet({ name: 'Sir Fighter' }));
    expect(updated.name).toBe('Sir Fighter');
    expect(updated.createdAt).toBe(created);
  });

  it('lists by owner and name', async () => {
    await characters.upsert(sheet({ id: 'char_thief', name: 'Thief', ownerUsername: 'bob' }));
    expect(characters.findByOwner('bob').map((c) => c.id)).toEqual(['char_thief']);
    expect(characters.list({ name: 'fight' }).characters.map((c) => c.id)).toEqual(['char_fighter']);
    expect(characters.list().total).toBe(2);
  });
});

describe('PartyRepository', () => {
  it('never lets the pending pool go below zero', async () => {
    const db = DatabaseConnection.inMemory();
    await db.init();
    const parties = new PartyRepository(db);
    const party = await parties.create({ name: 'Lanterns', memberIds: ['char_fighter'], henchmen: [] });

    await parties.adjustPendingXp(party.id, 30);
    await expect(parties.adjustPendingXp(party.id, -31)).rejects.toThrow(ValidationError);
    expect(parties.findById(party.id)?.pendingXp).toBe(30);
  });

  it('finds parties by member or henchman', async () => {
    const db = DatabaseConnection.inMemory();
    await db.init();
    const parties = new PartyRepository(db);
    const party = await parties.create({
      name: 'Lanterns',
      memberIds: ['char_fighter'],
      henchmen: [{ characterId: 'char_torch', employerId: 'char_fighter' }],
    });

    expect(parties.findByCharacters(['char_torch']).map((p) => p.id)).toEqual([party.id]);
    expect(parties.findByCharacters(['char_other'])).toEqual([]);
  });
});

describe('PlayerRepository', () => {
  it('rejects a taken username', async () => {
    const db = DatabaseConnection.inMemory();
    await db.init();
    const players = new PlayerRepository(db);
    await players.create('alice', 'hash');
    await expect(players.create('alice', 'other')).rejects.toThrow('Username alice is already taken');
    expect(players.list().map((p) => p.username)).toEqual(['alice']);
  });
});

describe('MapRepository', () => {
  it('hands out copies', async () => {
    const maps = new MapRepository(memoryMapStorage());
    const map = keepMap();
    await maps.write(map);
    map.name = 'Changed after write';

    const read = await maps.read('keep');
    expect(read?.name).toBe('Old Keep');
    expect(await maps.list()).toEqual(['keep']);
    expect(await maps.read('crypt')).toBeNull();
  });

  it('rejects ids that are not safe file names', async () => {
    const maps = new MapRepository(memoryMapStorage());
    await expect(maps.read('../etc')).rejects.toThrow(ValidationError);
  });
});
