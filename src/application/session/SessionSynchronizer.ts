// Application layer: Session synchronizer
// One session per connected client. Committed changes are pushed to every
// session whose lens includes them, as deltas when the session is current
// and as a full snapshot when it is not.

import { v4 as uuidv4 } from 'uuid';
import type { DungeonMap } from '@/domain/map/types.js';
import { findRoom } from '@/domain/map/graph.js';
import type {
  CampaignEvent,
  MapSubscription,
  SessionChannel,
  SyncEvent,
  SyncSession,
  ViewerRole,
} from '@/domain/session/types.js';
import type { MapRegistry } from '@/application/map/MapRegistry.js';
import type { EventManager } from '@/application/events/EventManager.js';
import { lensFor, type MapView } from './ViewLens.js';
import { NotFoundError, ValidationError, errorMessage } from '@/utils/errors.js';

export class SessionSynchronizer {
  private sessions = new Map<string, SyncSession>();
  private readonly handler = (event: CampaignEvent): void => this.handle(event);

  constructor(
    private registry: MapRegistry,
    private events: EventManager
  ) {
    this.events.onCampaignEvent(this.handler);
  }

  openSession(role: ViewerRole): SyncSession {
    const now = Date.now();
    const session: SyncSession = {
      id: uuidv4(),
      role,
      channel: null,
      subscriptions: new Map(),
      openedAt: now,
      lastSeenAt: now,
    };
    this.sessions.set(session.id, session);
    console.log(`[SessionSynchronizer] Opened ${role.kind} session ${session.id}`);
    return session;
  }

  getSession(sessionId: string): SyncSession | null {
    const session = this.sessions.get(sessionId) ?? null;
    if (session) session.lastSeenAt = Date.now();
    return session;
  }

  private require(sessionId: string): SyncSession {
    const session = this.getSession(sessionId);
    if (!session) {
      throw new NotFoundError(`Session ${sessionId} not found`, { sessionId });
    }
    return session;
  }

  listSessions(): SyncSession[] {
    return [...this.sessions.values()];
  }

  /**
   * Bind a (new) outbound channel. Every subscribed map is re-sent in full,
   * since whatever happened while detached was not delivered.
   */
  async attachChannel(sessionId: string, channel: SessionChannel): Promise<void> {
    const session = this.require(sessionId);
    if (session.channel && session.channel !== channel) {
      session.channel.close();
    }
    session.channel = channel;
    this.send(session, { event: 'session', data: { sessionId: session.id, role: session.role.kind } });

    await Promise.all(
      [...session.subscriptions.keys()].map(async (mapId) => {
        try {
          const map = await this.registry.loadMap(mapId);
          this.sendSnapshot(session, map, true);
        } catch (error) {
          console.error(`[SessionSynchronizer] Resync of ${mapId} for ${session.id} failed: ${errorMessage(error)}`);
        }
      })
    );
  }

  /**
   * The transport went away. The session stays; fights are not touched.
   */
  detachChannel(sessionId: string, channel: SessionChannel): void {
    const session = this.sessions.get(sessionId);
    if (session && session.channel === channel) {
      session.channel = null;
      console.log(`[SessionSynchronizer] Session ${sessionId} detached`);
    }
  }

  closeSession(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    this.sessions.delete(sessionId);
    if (session.channel) {
      this.send(session, { event: 'closed', data: { reason: 'session_closed' } });
      session.channel.close();
      session.channel = null;
    }
    console.log(`[SessionSynchronizer] Closed session ${sessionId}`);
    return true;
  }

  /**
   * Projection of the current map for a viewer
   */
  async getMapSnapshot(mapId: string, role: ViewerRole): Promise<MapView> {
    const map = await this.registry.loadMap(mapId);
    return lensFor(role).map(map);
  }

  async subscribeMap(sessionId: string, mapId: string): Promise<MapView> {
    const session = this.require(sessionId);
    const map = await this.registry.loadMap(mapId);
    return this.sendSnapshot(session, map, false);
  }

  unsubscribeMap(sessionId: string, mapId: string): boolean {
    return this.require(sessionId).subscriptions.delete(mapId);
  }

  acknowledge(sessionId: string, mapId: string, version: number): MapSubscription {
    const session = this.require(sessionId);
    const subscription = session.subscriptions.get(mapId);
    if (!subscription) {
      throw new NotFoundError(`Session is not subscribed to map ${mapId}`, { mapId });
    }
    if (!Number.isInteger(version) || version > subscription.sent) {
      throw new ValidationError(`Version ${version} of map ${mapId} was never sent`, {
        mapId,
        version,
        sent: subscription.sent,
      });
    }
    subscription.acked = Math.max(subscription.acked, version);
    return subscription;
  }

  /**
   * Close every session, telling clients the server is going away
   */
  closeAll(): void {
    for (const session of this.sessions.values()) {
      if (!session.channel) continue;
      this.send(session, { event: 'closed', data: { reason: 'server_shutdown' } });
      session.channel.close();
      session.channel = null;
    }
    this.sessions.clear();
  }

  dispose(): void {
    this.events.offCampaignEvent(this.handler);
    this.closeAll();
  }

  // Broadcast

  private handle(event: CampaignEvent): void {
    switch (event.type) {
      case 'map_changed':
        for (const session of this.sessions.values()) {
          this.deliverMapChange(session, event);
        }
        break;
      case 'party_changed':
        for (const session of this.sessions.values()) {
          if (lensFor(session.role).canSeeParty(event.party)) {
            this.send(session, { event: 'party_updated', data: { party: event.party } });
          }
        }
        break;
    }
  }

  private deliverMapChange(session: SyncSession, event: Extract<CampaignEvent, { type: 'map_changed' }>): void {
    const subscription = session.subscriptions.get(event.map.id);
    if (!subscription || !session.channel) return;

    if (subscription.sent !== event.baseVersion || event.roomIds === null) {
      this.sendSnapshot(session, event.map, subscription.sent !== event.baseVersion);
      return;
    }

    const lens = lensFor(session.role);
    const canSee = (roomId: string): boolean => {
      const room = findRoom(event.map, roomId);
      return room !== undefined && lens.canSeeRoom(room);
    };

    // a room appearing or disappearing changes its visible neighbours' links
    const touched = new Set(event.roomIds);
    for (const roomId of event.roomIds) {
      if (canSee(roomId) === subscription.visibleRoomIds.has(roomId)) continue;
      const room = findRoom(event.map, roomId);
      for (const neighbour of room?.connections ?? []) touched.add(neighbour);
      for (const id of subscription.visibleRoomIds) {
        if (findRoom(event.map, id)?.connections.includes(roomId)) touched.add(id);
      }
    }

    for (const roomId of touched) {
      const room = findRoom(event.map, roomId);
      if (room !== undefined && lens.canSeeRoom(room)) {
        subscription.visibleRoomIds.add(roomId);
        this.send(session, {
          event: 'room_updated',
          data: {
            mapId: event.map.id,
            baseVersion: event.baseVersion,
            version: event.version,
            room: lens.room(event.map, room),
          },
        });
      } else if (subscription.visibleRoomIds.delete(roomId)) {
        this.send(session, {
          event: 'room_hidden',
          data: { mapId: event.map.id, baseVersion: event.baseVersion, version: event.version, roomId },
        });
      }
    }
    subscription.sent = event.version;
  }

  private sendSnapshot(session: SyncSession, map: DungeonMap, resync: boolean): MapView {
    const lens = lensFor(session.role);
    const view = lens.map(map);
    const existing = session.subscriptions.get(map.id);
    if (existing && existing.sent > map.version) {
      // a newer version went out while this copy was loading
      return view;
    }
    session.subscriptions.set(map.id, {
      sent: map.version,
      acked: existing?.acked ?? 0,
      visibleRoomIds: new Set(Object.keys(view.rooms)),
    });
    this.send(session, { event: 'map_snapshot', data: { mapId: map.id, version: map.version, resync, map: view } });
    return view;
  }

  private send(session: SyncSession, event: SyncEvent): boolean {
    const channel = session.channel;
    if (!channel) return false;
    try {
      if (channel.send(event)) return true;
    } catch (error) {
      console.error(`[SessionSynchronizer] Send to ${session.id} failed: ${errorMessage(error)}`);
    }
    session.channel = null;
    return false;
  }
}
