// Domain layer: Fight identifiers
// `<mapId>:<roomId>:<unique>` so a fight id alone locates its room

const SEGMENT = /^[A-Za-z0-9_-]+$/;

export interface FightLocation {
  mapId: string;
  roomId: string;
}

/**
 * Ids key plain objects, so names every object inherits (`__proto__`,
 * `constructor`, `toString`) are refused along with bad characters.
 */
export function isIdSegment(value: string): boolean {
  return SEGMENT.test(value) && !(value in Object.prototype);
}

export function makeFightId(mapId: string, roomId: string, unique: string): string {
  return `${mapId}:${roomId}:${unique}`;
}

export function parseFightId(fightId: string): FightLocation | null {
  const parts = fightId.split(':');
  if (parts.length !== 3) return null;
  const [mapId, roomId, unique] = parts;
  if (!isIdSegment(mapId) || !isIdSegment(roomId) || unique.length === 0) return null;
  return { mapId, roomId };
}
