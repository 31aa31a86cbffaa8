// Domain layer: Room graph operations
// Pure functions over a map draft

import type { DungeonMap, Room } from './types.js';
import { isIdSegment, parseFightId } from '@/domain/combat/fightId.js';
import { IllegalActionError, NotFoundError, ValidationError } from '@/utils/errors.js';

export type RoomInput = Omit<Room, 'fight' | 'discoveredBy'> & { discoveredBy?: string[] };

function assertRoomId(roomId: string): void {
  if (!isIdSegment(roomId)) {
    throw new ValidationError(`Invalid room id "${roomId}": use letters, digits, "_" and "-"`, { roomId });
  }
}

/** Own rooms only; never a property inherited from Object.prototype. */
export function findRoom(map: Pick<DungeonMap, 'rooms'>, roomId: string): Room | undefined {
  return Object.hasOwn(map.rooms, roomId) ? map.rooms[roomId] : undefined;
}

export function requireRoom(map: DungeonMap, roomId: string): Room {
  const room = findRoom(map, roomId);
  if (!room) {
    throw new NotFoundError(`Room ${roomId} not found in map ${map.id}`, { mapId: map.id, roomId });
  }
  return room;
}

/**
 * Check a whole map and make every connection two-way.
 */
export function normalizeMap(map: DungeonMap): void {
  for (const [key, room] of Object.entries(map.rooms)) {
    assertRoomId(room.id);
    if (key !== room.id) {
      throw new ValidationError(`Room stored under "${key}" has id "${room.id}"`, { roomId: room.id });
    }
    if (room.fight) {
      const location = parseFightId(room.fight.id);
      if (!location || location.mapId !== map.id || location.roomId !== room.id) {
        throw new ValidationError(`Fight ${room.fight.id} does not belong to room ${room.id}`, { roomId: room.id });
      }
    }
  }

  for (const room of Object.values(map.rooms)) {
    room.connections = [...new Set(room.connections)];
    for (const target of room.connections) {
      if (target === room.id) {
        throw new ValidationError(`Room ${room.id} cannot connect to itself`, { roomId: room.id });
      }
      const other = findRoom(map, target);
      if (!other) {
        throw new ValidationError(`Room ${room.id} connects to unknown room ${target}`, {
          roomId: room.id,
          connection: target,
        });
      }
      if (!other.connections.includes(room.id)) {
        other.connections.push(room.id);
      }
    }
  }
}

/**
 * Insert or replace a room's description and links. The room's fight and
 * discovery list are kept unless the input names discoverers.
 */
export function putRoom(map: DungeonMap, input: RoomInput): Room {
  assertRoomId(input.id);
  const existing = findRoom(map, input.id);
  const connections = [...new Set(input.connections)];

  for (const target of connections) {
    if (target === input.id) {
      throw new ValidationError(`Room ${input.id} cannot connect to itself`, { roomId: input.id });
    }
    if (!findRoom(map, target)) {
      throw new ValidationError(`Room ${input.id} connects to unknown room ${target}`, {
        roomId: input.id,
        connection: target,
      });
    }
  }

  const room: Room = {
    id: input.id,
    name: input.name,
    description: input.description,
    dmNotes: input.dmNotes,
    connections,
    discoveredBy: input.discoveredBy ? [...new Set(input.discoveredBy)] : (existing?.discoveredBy ?? []),
    fight: existing?.fight ?? null,
  };
  map.rooms[room.id] = room;

  for (const other of Object.values(map.rooms)) {
    if (other.id === room.id) continue;
    const linked = connections.includes(other.id);
    const listed = other.connections.includes(room.id);
    if (linked && !listed) other.connections.push(room.id);
    if (!linked && listed) other.connections = other.connections.filter((id) => id !== room.id);
  }
  return room;
}

export function deleteRoom(map: DungeonMap, roomId: string): void {
  const room = requireRoom(map, roomId);
  if (room.fight && room.fight.state !== 'empty' && room.fight.state !== 'resolved') {
    throw new IllegalActionError(`Room ${roomId} has a fight in progress`, { roomId, state: room.fight.state });
  }
  delete map.rooms[roomId];
  for (const other of Object.values(map.rooms)) {
    other.connections = other.connections.filter((id) => id !== roomId);
  }
}

/**
 * Mark a room as discovered by characters. Returns true when anything changed.
 */
export function discoverRoom(map: DungeonMap, roomId: string, characterIds: readonly string[]): boolean {
  const room = requireRoom(map, roomId);
  const before = room.discoveredBy.length;
  room.discoveredBy = [...new Set([...room.discoveredBy, ...characterIds])];
  return room.discoveredBy.length !== before;
}
