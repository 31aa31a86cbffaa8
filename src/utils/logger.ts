import fs from 'fs';
import path from 'path';

const LOG_DIR = path.join(process.cwd(), 'logs');
const ACTION_LOG_FILE = path.join(LOG_DIR, 'fight-actions.jsonl');

const ACTION_LOG_ENABLED =
  process.env.FIGHT_ACTION_LOG === '1' ||
  (process.env.NODE_ENV !== 'test' && process.env.FIGHT_ACTION_LOG !== '0');

/**
 * One committed fight action. Player requests and DM overrides are written
 * with the same shape so the file reads as a single history.
 */
export interface FightActionLog {
  timestamp: string;
  fightId: string;
  mapId: string;
  roomId: string;
  mapVersion: number;
  issuedBy: 'player' | 'dm';
  sessionId?: string;
  actorId: string | null;
  kind: string;
  summary: string[];
  rolls: number[];
  fightState: string;
  round: number;
}

let logDirReady = false;

function ensureLogDir(): void {
  if (logDirReady) return;
  if (!fs.existsSync(LOG_DIR)) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
  }
  logDirReady = true;
}

export function logFightAction(log: FightActionLog): void {
  if (!ACTION_LOG_ENABLED) return;

  ensureLogDir();
  fs.appendFileSync(ACTION_LOG_FILE, JSON.stringify(log) + '\n', 'utf8');
}
