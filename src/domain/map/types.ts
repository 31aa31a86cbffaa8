// Domain layer: Dungeon map types
// NO external dependencies - pure TypeScript

import type { Fight } from '@/domain/combat/types.js';

/**
 * A room in a map. The room is the unit of spatial identity; its fight, if
 * any, is an owned field rather than a reference.
 */
export interface Room {
  id: string;
  name: string;
  /** Shown to players who have discovered the room */
  description: string;
  dmNotes: string;
  /** Ids of connected rooms in the same map; kept symmetric */
  connections: string[];
  /** Character ids that have discovered this room */
  discoveredBy: string[];
  fight: Fight | null;
}

/**
 * A named collection of rooms, persisted and loaded as one unit.
 * Not a grid: rooms have no spatial position beyond their connections.
 */
export interface DungeonMap {
  id: string;
  name: string;
  summary: string;
  rooms: Record<string, Room>;
  /** Bumped on every committed write */
  version: number;
  updatedAt: string;
}

export interface MapSummary {
  id: string;
  name: string;
  roomCount: number;
  version: number;
}

/**
 * Durable storage for whole maps. Writes replace the stored map atomically.
 */
export interface MapStore {
  read(mapId: string): Promise<DungeonMap | null>;
  write(map: DungeonMap): Promise<void>;
  list(): Promise<string[]>;
}
