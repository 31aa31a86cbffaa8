// Type declarations for Express Request augmentation
import type { SyncSession } from '@/domain/session/types.js';

declare global {
  namespace Express {
    interface Request {
      syncSession?: SyncSession;
    }
  }
}

export {};
