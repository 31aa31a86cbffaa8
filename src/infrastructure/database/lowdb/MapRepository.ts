// Map Repository - LowDB adapters, one JSON document per map
// JSONFile writes go to a temp file and are renamed into place, so a reader
// never sees a half-written map.

import { Memory, type Adapter } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { mkdir, readdir } from 'fs/promises';
import { join } from 'path';
import type { DungeonMap, MapStore } from '@/domain/map/types.js';
import { ValidationError } from '@/utils/errors.js';

export const STORAGE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export function assertStorageId(kind: string, id: string): void {
  if (!STORAGE_ID_PATTERN.test(id)) {
    throw new ValidationError(`Invalid ${kind} id "${id}": use letters, digits, "_" and "-"`, { [kind]: id });
  }
}

/**
 * Where map documents live: one adapter per map id plus a listing.
 */
export interface MapStorage {
  adapter(mapId: string): Adapter<DungeonMap>;
  list(): Promise<string[]>;
}

export function fileMapStorage(directory: string): MapStorage {
  let ready: Promise<string | undefined> | null = null;
  const ensureDir = (): Promise<string | undefined> => (ready ??= mkdir(directory, { recursive: true }));

  return {
    adapter(mapId) {
      const file = new JSONFile<DungeonMap>(join(directory, `${mapId}.json`));
      return {
        read: () => file.read(),
        write: async (data) => {
          await ensureDir();
          await file.write(data);
        },
      };
    },
    async list() {
      await ensureDir();
      const entries = await readdir(directory);
      return entries
        .filter((name) => name.endsWith('.json'))
        .map((name) => name.slice(0, -'.json'.length))
        .filter((id) => STORAGE_ID_PATTERN.test(id))
        .sort();
    },
  };
}

/**
 * In-process storage with copy-in/copy-out semantics, like the files.
 */
export function memoryMapStorage(): MapStorage {
  const adapters = new Map<string, Memory<DungeonMap>>();
  const written = new Set<string>();

  return {
    adapter(mapId) {
      let memory = adapters.get(mapId);
      if (!memory) {
        memory = new Memory<DungeonMap>();
        adapters.set(mapId, memory);
      }
      const target = memory;
      return {
        read: async () => {
          const data = await target.read();
          return data === null ? null : structuredClone(data);
        },
        write: async (data) => {
          await target.write(structuredClone(data));
          written.add(mapId);
        },
      };
    },
    async list() {
      return [...written].sort();
    },
  };
}

export class MapRepository implements MapStore {
  private adapters = new Map<string, Adapter<DungeonMap>>();

  constructor(private storage: MapStorage) {}

  private adapterFor(mapId: string): Adapter<DungeonMap> {
    assertStorageId('mapId', mapId);
    let adapter = this.adapters.get(mapId);
    if (!adapter) {
      adapter = this.storage.adapter(mapId);
      this.adapters.set(mapId, adapter);
    }
    return adapter;
  }

  async read(mapId: string): Promise<DungeonMap | null> {
    return this.adapterFor(mapId).read();
  }

  async write(map: DungeonMap): Promise<void> {
    await this.adapterFor(map.id).write(map);
  }

  async list(): Promise<string[]> {
    return this.storage.list();
  }
}
