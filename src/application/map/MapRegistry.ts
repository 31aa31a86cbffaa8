// Application layer: Map registry
// Loaded maps with an explicit lifecycle: load on demand, write through on
// every commit, evict when idle, drain on shutdown.

import type { DungeonMap, MapStore, MapSummary, Room } from '@/domain/map/types.js';
import {
  deleteRoom,
  discoverRoom,
  findRoom,
  normalizeMap,
  putRoom,
  requireRoom,
  type RoomInput,
} from '@/domain/map/graph.js';
import { isIdSegment } from '@/domain/combat/fightId.js';
import type { EventManager } from '@/application/events/EventManager.js';
import { KeyedMutex } from '@/utils/mutex.js';
import {
  ConcurrencyConflictError,
  GameEngineError,
  IllegalActionError,
  NotFoundError,
  PersistenceFailureError,
  ValidationError,
  errorMessage,
} from '@/utils/errors.js';

interface LoadedMap {
  map: DungeonMap;
  lastUsed: number;
}

export interface MapRegistryOptions {
  /** Clean maps unused for this long are dropped by evictIdle(); 0 disables */
  idleEvictMs: number;
  now?: () => number;
}

/**
 * A map as an editor sends it: rooms without fight state
 */
export interface MapLayout {
  id: string;
  name: string;
  summary: string;
  /** Version the edit started from; 0 for a new map */
  version: number;
  rooms: RoomInput[];
}

export interface MapCommit<T> {
  map: DungeonMap;
  result: T;
}

export class MapRegistry {
  private loaded = new Map<string, LoadedMap>();
  private loading = new Map<string, Promise<LoadedMap | null>>();
  private locks = new KeyedMutex();
  private readonly now: () => number;

  constructor(
    private store: MapStore,
    private events: EventManager,
    private options: MapRegistryOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Committed map, loading it from the store the first time
   */
  private async committed(mapId: string): Promise<LoadedMap | null> {
    const cached = this.loaded.get(mapId);
    if (cached) {
      cached.lastUsed = this.now();
      return cached;
    }

    let pending = this.loading.get(mapId);
    if (!pending) {
      pending = this.readFromStore(mapId);
      this.loading.set(mapId, pending);
    }
    try {
      return await pending;
    } finally {
      this.loading.delete(mapId);
    }
  }

  private async readFromStore(mapId: string): Promise<LoadedMap | null> {
    let map: DungeonMap | null;
    try {
      map = await this.store.read(mapId);
    } catch (error) {
      if (error instanceof GameEngineError) throw error;
      throw new PersistenceFailureError(`Failed to read map ${mapId}: ${errorMessage(error)}`, { mapId });
    }
    if (!map) return null;

    const entry = { map, lastUsed: this.now() };
    this.loaded.set(mapId, entry);
    console.log(`[MapRegistry] Loaded map ${mapId} (v${map.version})`);
    return entry;
  }

  private async require(mapId: string): Promise<LoadedMap> {
    const entry = await this.committed(mapId);
    if (!entry) {
      throw new NotFoundError(`Map ${mapId} not found`, { mapId });
    }
    return entry;
  }

  /**
   * Copy of the last committed map
   */
  async loadMap(mapId: string): Promise<DungeonMap> {
    const entry = await this.require(mapId);
    return structuredClone(entry.map);
  }

  async getRoom(mapId: string, roomId: string): Promise<Room> {
    const entry = await this.require(mapId);
    return structuredClone(requireRoom(entry.map, roomId));
  }

  async listMaps(): Promise<MapSummary[]> {
    const ids = new Set(await this.store.list());
    for (const id of this.loaded.keys()) ids.add(id);

    const summaries: MapSummary[] = [];
    for (const id of [...ids].sort()) {
      const entry = await this.committed(id);
      if (!entry) continue;
      summaries.push({
        id,
        name: entry.map.name,
        roomCount: Object.keys(entry.map.rooms).length,
        version: entry.map.version,
      });
    }
    return summaries;
  }

  /**
   * Replace a whole map. A map carrying an older version than the stored one
   * was edited from a stale copy and is refused.
   */
  async saveMap(map: DungeonMap): Promise<DungeonMap> {
    return this.locks.runExclusive(map.id, async () => {
      const current = await this.committed(map.id);
      if (current && map.version < current.map.version) {
        throw new ConcurrencyConflictError(
          `Map ${map.id} changed since version ${map.version} (now ${current.map.version})`,
          { mapId: map.id, expected: map.version, actual: current.map.version }
        );
      }

      const draft = structuredClone(map);
      normalizeMap(draft);
      const baseVersion = current?.map.version ?? 0;
      await this.commit(draft, baseVersion, null);
      return structuredClone(draft);
    });
  }

  /**
   * Replace a map's rooms and links from an editor. Fights and discoveries
   * stay with rooms that keep their id; dropping a room with a live fight is
   * refused.
   */
  async saveLayout(layout: MapLayout): Promise<DungeonMap> {
    return this.locks.runExclusive(layout.id, async () => {
      const current = await this.committed(layout.id);
      if (current && layout.version < current.map.version) {
        throw new ConcurrencyConflictError(
          `Map ${layout.id} changed since version ${layout.version} (now ${current.map.version})`,
          { mapId: layout.id, expected: layout.version, actual: current.map.version }
        );
      }

      const previous = current?.map.rooms ?? {};
      const keptIds = new Set(layout.rooms.map((r) => r.id));
      for (const room of Object.values(previous)) {
        const state = room.fight?.state;
        if (!keptIds.has(room.id) && state && state !== 'empty' && state !== 'resolved') {
          throw new IllegalActionError(`Room ${room.id} has a ${state} fight and cannot be removed`, {
            roomId: room.id,
          });
        }
      }

      const rooms: Record<string, Room> = {};
      for (const input of layout.rooms) {
        if (!isIdSegment(input.id)) {
          throw new ValidationError(`Invalid room id "${input.id}": use letters, digits, "_" and "-"`, {
            roomId: input.id,
          });
        }
        if (Object.hasOwn(rooms, input.id)) {
          throw new ValidationError(`Room ${input.id} is listed twice`, { roomId: input.id });
        }
        const before = Object.hasOwn(previous, input.id) ? previous[input.id] : undefined;
        rooms[input.id] = {
          ...input,
          connections: [...input.connections],
          discoveredBy: [...(input.discoveredBy ?? before?.discoveredBy ?? [])],
          fight: before?.fight ? structuredClone(before.fight) : null,
        };
      }

      const draft: DungeonMap = {
        id: layout.id,
        name: layout.name,
        summary: layout.summary,
        rooms,
        version: layout.version,
        updatedAt: current?.map.updatedAt ?? new Date(this.now()).toISOString(),
      };
      normalizeMap(draft);
      await this.commit(draft, current?.map.version ?? 0, null);
      return structuredClone(draft);
    });
  }

  async putRoom(mapId: string, input: RoomInput): Promise<Room> {
    const { result } = await this.mutate(
      mapId,
      (draft, touched) => {
        // links are two-way, so neighbours old and new change as well
        for (const id of findRoom(draft, input.id)?.connections ?? []) touched.add(id);
        const room = putRoom(draft, input);
        for (const id of room.connections) touched.add(id);
        return structuredClone(room);
      },
      { roomIds: [input.id] }
    );
    return result;
  }

  /**
   * Mark a room discovered by the given characters. Returns false (and
   * commits nothing) when all of them had already found it.
   */
  async revealRoom(mapId: string, roomId: string, characterIds: readonly string[]): Promise<boolean> {
    const current = await this.getRoom(mapId, roomId);
    if (characterIds.every((id) => current.discoveredBy.includes(id))) return false;

    const { result } = await this.mutate(
      mapId,
      (draft, touched) => {
        const changed = discoverRoom(draft, roomId, characterIds);
        // newly visible rooms show up as links in their neighbours
        for (const id of findRoom(draft, roomId)?.connections ?? []) touched.add(id);
        return changed;
      },
      { roomIds: [roomId] }
    );
    return result;
  }

  async deleteRoom(mapId: string, roomId: string): Promise<void> {
    await this.mutate(mapId, (draft) => deleteRoom(draft, roomId), { roomIds: null });
  }

  /**
   * Apply `fn` to a copy of the committed map, persist it with the version
   * bumped, then make it the committed map. If `fn` throws or the write
   * fails, the committed map is left as it was.
   *
   * `roomIds` names the rooms the change touches (null: the whole map); `fn`
   * may add more through `touched`.
   */
  async mutate<T>(
    mapId: string,
    fn: (draft: DungeonMap, touched: Set<string>) => T,
    options: { roomIds: string[] | null }
  ): Promise<MapCommit<T>> {
    return this.locks.runExclusive(mapId, async () => {
      const current = await this.require(mapId);
      const draft = structuredClone(current.map);
      const touched = new Set(options.roomIds ?? []);
      const result = fn(draft, touched);
      await this.commit(draft, current.map.version, options.roomIds === null ? null : [...touched]);
      return { map: structuredClone(draft), result };
    });
  }

  private async commit(draft: DungeonMap, baseVersion: number, roomIds: string[] | null): Promise<void> {
    draft.version = baseVersion + 1;
    draft.updatedAt = new Date(this.now()).toISOString();

    try {
      await this.store.write(draft);
    } catch (error) {
      console.error(`[MapRegistry] Write failed for map ${draft.id}:`, errorMessage(error));
      throw new PersistenceFailureError(`Failed to persist map ${draft.id}: ${errorMessage(error)}`, {
        mapId: draft.id,
      });
    }

    this.loaded.set(draft.id, { map: draft, lastUsed: this.now() });
    this.events.emitCampaignEvent({
      type: 'map_changed',
      map: structuredClone(draft),
      roomIds,
      baseVersion,
      version: draft.version,
    });
  }

  isLoaded(mapId: string): boolean {
    return this.loaded.has(mapId);
  }

  /**
   * Drop maps nobody has touched for the idle window. Maps with a write in
   * flight stay.
   */
  evictIdle(): string[] {
    if (this.options.idleEvictMs <= 0) return [];
    const cutoff = this.now() - this.options.idleEvictMs;
    const evicted: string[] = [];
    for (const [mapId, entry] of this.loaded) {
      if (entry.lastUsed < cutoff && !this.locks.isLocked(mapId)) {
        this.loaded.delete(mapId);
        evicted.push(mapId);
      }
    }
    if (evicted.length > 0) {
      console.log(`[MapRegistry] Evicted idle maps: ${evicted.join(', ')}`);
    }
    return evicted;
  }

  /**
   * Every commit is written through, so flushing means waiting for writes in flight.
   */
  async flushAll(): Promise<void> {
    await this.locks.drain();
  }

  async close(): Promise<void> {
    await this.flushAll();
    this.loaded.clear();
  }
}
