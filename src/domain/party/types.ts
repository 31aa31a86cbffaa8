// Domain layer: Party types
// NO external dependencies - pure TypeScript

export interface Henchman {
  characterId: string;
  employerId: string;
  /** Overrides the configured henchman XP share for this henchman */
  shareMultiplier?: number;
}

export interface Party {
  id: string;
  name: string;
  memberIds: string[];
  henchmen: Henchman[];
  /** XP earned in fights and not yet allocated to anyone */
  pendingXp: number;
  createdAt: string;
  updatedAt: string;
}

export interface XpShare {
  characterId: string;
  amount: number;
}

export interface AllocationResult {
  partyId: string;
  distributed: XpShare[];
  total: number;
  remainingPool: number;
}
