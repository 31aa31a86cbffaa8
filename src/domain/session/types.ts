// Domain layer: Client session types
// NO external dependencies - pure TypeScript

import type { DungeonMap } from '@/domain/map/types.js';
import type { Party } from '@/domain/party/types.js';

/**
 * Who is looking. Selects the projection applied to every outbound view.
 */
export type ViewerRole =
  | { kind: 'player'; username: string; characterIds: readonly string[] }
  | { kind: 'dm' };

export interface SyncEvent {
  event: 'map_snapshot' | 'room_updated' | 'room_hidden' | 'party_updated' | 'session' | 'closed';
  data: Record<string, unknown>;
}

/**
 * Outbound half of a client connection. The transport guarantees ordered delivery.
 */
export interface SessionChannel {
  send(event: SyncEvent): boolean;
  close(): void;
}

export interface MapSubscription {
  /** Version of the last view pushed to this session */
  sent: number;
  /** Version the client last confirmed */
  acked: number;
  /** Rooms the session could see as of `sent` */
  visibleRoomIds: Set<string>;
}

export interface SyncSession {
  id: string;
  role: ViewerRole;
  channel: SessionChannel | null;
  subscriptions: Map<string, MapSubscription>;
  openedAt: number;
  lastSeenAt: number;
}

/**
 * Committed changes published by the services, consumed by the synchronizer.
 * `roomIds: null` means the whole map was replaced.
 */
export type CampaignEvent =
  | {
      type: 'map_changed';
      map: DungeonMap;
      roomIds: string[] | null;
      baseVersion: number;
      version: number;
    }
  | { type: 'party_changed'; party: Party };
