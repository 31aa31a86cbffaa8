// Application layer: View lenses
// The projection applied to everything a session is sent, chosen by role

import type { Combatant, CombatantFlags, Fight, FightLogEntry, Side } from '@/domain/combat/types.js';
import type { DungeonMap, Room } from '@/domain/map/types.js';
import { findRoom } from '@/domain/map/graph.js';
import type { Party } from '@/domain/party/types.js';
import type { ViewerRole } from '@/domain/session/types.js';

export type WoundBand = 'unhurt' | 'wounded' | 'badly_wounded' | 'down';

/** What players learn about a combatant they do not control */
export interface CombatantSummary {
  id: string;
  name: string;
  side: Side;
  flags: CombatantFlags;
  wound: WoundBand;
  initiative: number | null;
}

export type CombatantView = Combatant | CombatantSummary;

export type FightView = Omit<Fight, 'combatants'> & { combatants: CombatantView[] };

export type RoomView = Omit<Room, 'dmNotes' | 'fight'> & { dmNotes?: string; fight: FightView | null };

export interface MapView {
  id: string;
  name: string;
  summary: string;
  version: number;
  updatedAt: string;
  rooms: Record<string, RoomView>;
}

export interface ViewLens {
  canSeeRoom(room: Room): boolean;
  canSeeParty(party: Party): boolean;
  room(map: DungeonMap, room: Room): RoomView;
  map(map: DungeonMap): MapView;
  fight(fight: Fight): FightView;
  /** A history entry as this viewer may read it, or null when hidden */
  entry(entry: FightLogEntry): FightLogEntry | null;
}

export function woundBand(hp: number, maxHp: number): WoundBand {
  if (hp <= 0) return 'down';
  if (hp >= maxHp) return 'unhurt';
  if (hp * 2 >= maxHp) return 'wounded';
  return 'badly_wounded';
}

/**
 * DM lens: everything, unfiltered
 */
class DmLens implements ViewLens {
  canSeeRoom(): boolean {
    return true;
  }

  canSeeParty(): boolean {
    return true;
  }

  room(_map: DungeonMap, room: Room): RoomView {
    return room;
  }

  map(map: DungeonMap): MapView {
    return map;
  }

  fight(fight: Fight): FightView {
    return fight;
  }

  entry(entry: FightLogEntry): FightLogEntry {
    return entry;
  }
}

/**
 * Player lens: rooms their characters discovered, no DM notes, NPCs reduced
 * to a summary
 */
class PlayerLens implements ViewLens {
  private characterIds: Set<string>;

  constructor(characterIds: readonly string[]) {
    this.characterIds = new Set(characterIds);
  }

  canSeeRoom(room: Room): boolean {
    return room.discoveredBy.some((id) => this.characterIds.has(id));
  }

  canSeeParty(party: Party): boolean {
    return (
      party.memberIds.some((id) => this.characterIds.has(id)) ||
      party.henchmen.some((h) => this.characterIds.has(h.characterId))
    );
  }

  private controls(combatant: Combatant): boolean {
    return combatant.source.kind === 'character' && this.characterIds.has(combatant.source.characterId);
  }

  private combatant(combatant: Combatant): CombatantView {
    if (combatant.source.kind === 'character') return combatant;
    return {
      id: combatant.id,
      name: combatant.name,
      side: combatant.side,
      flags: combatant.flags,
      wound: woundBand(combatant.hp, combatant.stats.maxHp),
      initiative: combatant.initiative,
    };
  }

  fight(fight: Fight): FightView {
    const own = new Set(fight.combatants.filter((c) => this.controls(c)).map((c) => c.id));
    return {
      ...fight,
      combatants: fight.combatants.map((c) => this.combatant(c)),
      history: fight.history.flatMap((entry) => {
        const visible = this.entry(entry);
        return visible ? [visible] : [];
      }),
      pendingActions: fight.pendingActions.filter((p) => own.has(p.actorId)),
    };
  }

  entry(entry: FightLogEntry): FightLogEntry | null {
    if (entry.dmOnly) return null;
    const { publicSummary, ...rest } = entry;
    return publicSummary ? { ...rest, summary: publicSummary } : rest;
  }

  room(map: DungeonMap, room: Room): RoomView {
    const visible = (id: string): boolean => {
      const other = findRoom(map, id);
      return other !== undefined && this.canSeeRoom(other);
    };
    return {
      id: room.id,
      name: room.name,
      description: room.description,
      connections: room.connections.filter(visible),
      discoveredBy: room.discoveredBy.filter((id) => this.characterIds.has(id)),
      fight: room.fight ? this.fight(room.fight) : null,
    };
  }

  map(map: DungeonMap): MapView {
    const rooms: Record<string, RoomView> = {};
    for (const room of Object.values(map.rooms)) {
      if (this.canSeeRoom(room)) rooms[room.id] = this.room(map, room);
    }
    return {
      id: map.id,
      name: map.name,
      summary: map.summary,
      version: map.version,
      updatedAt: map.updatedAt,
      rooms,
    };
  }
}

export function lensFor(role: ViewerRole): ViewLens {
  return role.kind === 'dm' ? new DmLens() : new PlayerLens(role.characterIds);
}
