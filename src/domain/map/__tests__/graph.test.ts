import { describe, it, expect } from 'vitest';
import { deleteRoom, discoverRoom, findRoom, normalizeMap, putRoom } from '../graph.js';
import { isIdSegment, parseFightId } from '@/domain/combat/fightId.js';
import { createFight } from '@/domain/combat/fightMachine.js';
import { IllegalActionError, NotFoundError, ValidationError } from '@/utils/errors.js';
import { NOW, keepMap, room } from '@/__tests__/fixtures.js';

describe('normalizeMap', () => {
  it('makes one-way links two-way', () => {
    const map = keepMap();
    map.rooms.cellar.connections = [];
    map.rooms.tower = room('tower', { connections: ['hall', 'hall'] });

    normalizeMap(map);

    expect(map.rooms.cellar.connections).toEqual(['hall']);
    expect(map.rooms.tower.connections).toEqual(['hall']);
    expect(map.rooms.hall.connections).toEqual(['cellar', 'tower']);
  });

  it('rejects links to missing rooms', () => {
    const map = keepMap();
    map.rooms.hall.connections.push('vault');
    expect(() => normalizeMap(map)).toThrow(ValidationError);
  });

  it('rejects a room stored under another key', () => {
    const map = keepMap();
    map.rooms.hall = room('attic');
    expect(() => normalizeMap(map)).toThrow('Room stored under "hall" has id "attic"');
  });

  it('rejects a fight whose id points at another room', () => {
    const map = keepMap();
    map.rooms.cellar.fight = createFight('keep:hall:abc', NOW);
    expect(() => normalizeMap(map)).toThrow(ValidationError);
  });

  it('rejects room ids that cannot appear in a fight id', () => {
    const map = keepMap();
    map.rooms['great:hall'] = room('great:hall');
    expect(() => normalizeMap(map)).toThrow(ValidationError);
  });
});

describe('putRoom', () => {
  it('adds a room and links it back', () => {
    const map = keepMap();
    putRoom(map, { id: 'tower', name: 'Tower', description: '', dmNotes: '', connections: ['hall'] });
    expect(map.rooms.hall.connections).toEqual(['cellar', 'tower']);
    expect(map.rooms.tower.discoveredBy).toEqual([]);
  });

  it('drops links the new version no longer has on both sides', () => {
    const map = keepMap();
    putRoom(map, { id: 'hall', name: 'Hall', description: '', dmNotes: '', connections: [] });
    expect(map.rooms.cellar.connections).toEqual([]);
  });

  it('keeps the fight and the discoverers of a replaced room', () => {
    const map = keepMap();
    map.rooms.hall.discoveredBy = ['char_fighter'];
    map.rooms.hall.fight = createFight('keep:hall:abc', NOW);

    const updated = putRoom(map, { id: 'hall', name: 'Great Hall', description: 'Bigger', dmNotes: '', connections: ['cellar'] });

    expect(updated.name).toBe('Great Hall');
    expect(updated.discoveredBy).toEqual(['char_fighter']);
    expect(updated.fight?.id).toBe('keep:hall:abc');
  });

  it('rejects links to names every object inherits', () => {
    const map = keepMap();
    expect(() =>
      putRoom(map, { id: 'tower', name: 'Tower', description: '', dmNotes: '', connections: ['toString'] })
    ).toThrow('Room tower connects to unknown room toString');
    expect(map.rooms.tower).toBeUndefined();
  });

  it('rejects inherited property names as room ids', () => {
    const map = keepMap();
    expect(() => putRoom(map, { id: '__proto__', name: 'Proto', description: '', dmNotes: '', connections: [] })).toThrow(
      ValidationError
    );
    expect(Object.keys(map.rooms)).toEqual(['hall', 'cellar']);
  });

  it('rejects self links', () => {
    const map = keepMap();
    expect(() => putRoom(map, { id: 'hall', name: 'Hall', description: '', dmNotes: '', connections: ['hall'] })).toThrow(
      ValidationError
    );
  });
});

describe('deleteRoom', () => {
  it('removes the room and every link to it', () => {
    const map = keepMap();
    deleteRoom(map, 'cellar');
    expect(Object.keys(map.rooms)).toEqual(['hall']);
    expect(map.rooms.hall.connections).toEqual([]);
  });

  it('refuses while a fight is running', () => {
    const map = keepMap();
    const fight = createFight('keep:cellar:abc', NOW);
    fight.state = 'active_round';
    map.rooms.cellar.fight = fight;
    expect(() => deleteRoom(map, 'cellar')).toThrow(IllegalActionError);
  });

  it('reports unknown rooms', () => {
    expect(() => deleteRoom(keepMap(), 'vault')).toThrow(NotFoundError);
    expect(() => deleteRoom(keepMap(), 'constructor')).toThrow(NotFoundError);
  });
});

describe('discoverRoom', () => {
  it('adds new discoverers once', () => {
    const map = keepMap();
    expect(discoverRoom(map, 'hall', ['char_fighter', 'char_fighter'])).toBe(true);
    expect(discoverRoom(map, 'hall', ['char_fighter'])).toBe(false);
    expect(map.rooms.hall.discoveredBy).toEqual(['char_fighter']);
  });
});

describe('room ids', () => {
  it('finds own rooms only', () => {
    const map = keepMap();
    expect(findRoom(map, 'hall')?.name).toBe('Hall');
    expect(findRoom(map, 'constructor')).toBeUndefined();
    expect(findRoom(map, 'hasOwnProperty')).toBeUndefined();
  });

  it.each(['__proto__', 'constructor', 'toString', 'great:hall', ''])('refuses "%s"', (id) => {
    expect(isIdSegment(id)).toBe(false);
  });

  it('accepts letters, digits, "_" and "-"', () => {
    expect(isIdSegment('west_wing-2')).toBe(true);
  });

  it('does not parse a fight id that points at an inherited name', () => {
    expect(parseFightId('keep:constructor:abc')).toBeNull();
    expect(parseFightId('keep:hall:abc')).toEqual({ mapId: 'keep', roomId: 'hall' });
  });
});
