// Application layer: Party ledger
// Pooled XP for a party. Fights credit the pool; only a DM allocation moves
// XP from the pool onto characters.

import type { CharacterSheetStore } from '@/domain/character/types.js';
import type { AllocationResult, Henchman, Party, XpShare } from '@/domain/party/types.js';
import type { ViewerRole } from '@/domain/session/types.js';
import type { PartyInput, PartyRepository } from '@/infrastructure/database/lowdb/index.js';
import type { EventManager } from '@/application/events/EventManager.js';
import { runCompensated, type CompensatedStep } from '@/application/shared/Compensation.js';
import { KeyedMutex } from '@/utils/mutex.js';
import { AuthorizationError, NotFoundError, ValidationError } from '@/utils/errors.js';

export interface SplitPlan {
  partyId: string;
  amount: number;
  shares: XpShare[];
  remainder: number;
}

export class PartyLedger {
  private locks = new KeyedMutex();

  constructor(
    private parties: PartyRepository,
    private characters: CharacterSheetStore,
    private events: EventManager,
    private rules: { henchmanXpShare: number }
  ) {}

  getParty(partyId: string): Party {
    const party = this.parties.findById(partyId);
    if (!party) {
      throw new NotFoundError(`Party ${partyId} not found`, { partyId });
    }
    return party;
  }

  listParties(): Party[] {
    return this.parties.list();
  }

  partiesForCharacters(characterIds: readonly string[]): Party[] {
    return this.parties.findByCharacters(characterIds);
  }

  async createParty(input: PartyInput): Promise<Party> {
    await this.validateMembership(input.memberIds, input.henchmen);
    const party = await this.parties.create(input);
    console.log(`[PartyLedger] Created party ${party.name} (${party.id})`);
    this.events.emitCampaignEvent({ type: 'party_changed', party });
    return party;
  }

  async setMembership(partyId: string, input: Pick<PartyInput, 'memberIds' | 'henchmen'>): Promise<Party> {
    return this.locks.runExclusive(partyId, async () => {
      await this.validateMembership(input.memberIds, input.henchmen);
      const party = await this.parties.setMembership(partyId, input);
      this.events.emitCampaignEvent({ type: 'party_changed', party });
      return party;
    });
  }

  /**
   * Add XP to the pending pool. Additive only.
   */
  async trackPendingXP(partyId: string, amount: number): Promise<Party> {
    if (!Number.isInteger(amount) || amount < 0) {
      throw new ValidationError('Pending XP must be a non-negative integer', { amount });
    }
    return this.locks.runExclusive(partyId, async () => {
      const party = amount === 0 ? this.getParty(partyId) : await this.parties.adjustPendingXp(partyId, amount);
      if (amount > 0) {
        this.events.emitCampaignEvent({ type: 'party_changed', party });
      }
      return party;
    });
  }

  /**
   * Take back a credit made by trackPendingXP when the transaction around it fails.
   */
  async reversePendingXP(partyId: string, amount: number): Promise<void> {
    if (amount <= 0) return;
    await this.locks.runExclusive(partyId, async () => {
      const party = await this.parties.adjustPendingXp(partyId, -amount);
      this.events.emitCampaignEvent({ type: 'party_changed', party });
    });
  }

  /**
   * Weighted even split: members count 1, henchmen their share multiplier.
   * Shares are floored and what is left over stays in the pool.
   */
  planEvenSplit(partyId: string, amount?: number): SplitPlan {
    const party = this.getParty(partyId);
    const total = amount ?? party.pendingXp;
    if (!Number.isInteger(total) || total < 0) {
      throw new ValidationError('Split amount must be a non-negative integer', { amount: total });
    }
    if (total > party.pendingXp) {
      throw new ValidationError(`Party ${party.name} has only ${party.pendingXp} pending XP`, {
        partyId,
        pendingXp: party.pendingXp,
        requested: total,
      });
    }

    const weights: Array<{ characterId: string; weight: number }> = [
      ...party.memberIds.map((characterId) => ({ characterId, weight: 1 })),
      ...party.henchmen.map((h) => ({
        characterId: h.characterId,
        weight: h.shareMultiplier ?? this.rules.henchmanXpShare,
      })),
    ];
    const totalWeight = weights.reduce((sum, w) => sum + w.weight, 0);
    if (totalWeight <= 0) {
      return { partyId, amount: total, shares: [], remainder: total };
    }

    const shares = weights
      .map(({ characterId, weight }) => ({ characterId, amount: Math.floor((total * weight) / totalWeight) }))
      .filter((share) => share.amount > 0);
    const distributed = shares.reduce((sum, s) => sum + s.amount, 0);
    return { partyId, amount: total, shares, remainder: total - distributed };
  }

  /**
   * Move XP from the pool to characters. Either every listed character is
   * credited and the pool debited by the total, or nothing changes.
   */
  async allocate(role: ViewerRole, partyId: string, distribution: XpShare[]): Promise<AllocationResult> {
    if (role.kind !== 'dm') {
      throw new AuthorizationError('Only the DM can allocate party XP');
    }

    return this.locks.runExclusive(partyId, async () => {
      const party = this.getParty(partyId);
      const total = this.validateDistribution(party, distribution);

      const steps: CompensatedStep[] = [
        {
          name: `debit pool of ${party.id}`,
          apply: async () => {
            await this.parties.adjustPendingXp(party.id, -total);
          },
          undo: async () => {
            await this.parties.adjustPendingXp(party.id, total);
          },
        },
        ...distribution.map(
          (share): CompensatedStep => ({
            name: `bank ${share.amount} XP on ${share.characterId}`,
            apply: () => this.characters.updateCharacter(share.characterId, { kind: 'bank_xp', amount: share.amount }),
            undo: () => this.characters.updateCharacter(share.characterId, { kind: 'bank_xp', amount: -share.amount }),
          })
        ),
      ];
      await runCompensated('PartyLedger', steps);

      const updated = this.getParty(party.id);
      console.log(`[PartyLedger] Allocated ${total} XP from party ${party.id}; ${updated.pendingXp} left`);
      this.events.emitCampaignEvent({ type: 'party_changed', party: updated });
      return {
        partyId: party.id,
        distributed: distribution.map((s) => ({ ...s })),
        total,
        remainingPool: updated.pendingXp,
      };
    });
  }

  private validateDistribution(party: Party, distribution: XpShare[]): number {
    if (distribution.length === 0) {
      throw new ValidationError('Distribution is empty');
    }
    const eligible = new Set([...party.memberIds, ...party.henchmen.map((h) => h.characterId)]);
    const seen = new Set<string>();
    let total = 0;

    for (const share of distribution) {
      if (!eligible.has(share.characterId)) {
        throw new ValidationError(`${share.characterId} is not in party ${party.name}`, {
          characterId: share.characterId,
        });
      }
      if (seen.has(share.characterId)) {
        throw new ValidationError(`${share.characterId} is listed twice`, { characterId: share.characterId });
      }
      if (!Number.isInteger(share.amount) || share.amount <= 0) {
        throw new ValidationError('Each share must be a positive integer', { share });
      }
      seen.add(share.characterId);
      total += share.amount;
    }

    if (total > party.pendingXp) {
      throw new ValidationError(`Distribution of ${total} XP exceeds the pool of ${party.pendingXp}`, {
        total,
        pendingXp: party.pendingXp,
      });
    }
    return total;
  }

  private async validateMembership(memberIds: string[], henchmen: Henchman[]): Promise<void> {
    const members = new Set(memberIds);
    if (members.size !== memberIds.length) {
      throw new ValidationError('Party members must be unique');
    }
    for (const henchman of henchmen) {
      if (members.has(henchman.characterId)) {
        throw new ValidationError(`${henchman.characterId} cannot be both member and henchman`);
      }
      if (!members.has(henchman.employerId)) {
        throw new ValidationError(`Henchman ${henchman.characterId} must be employed by a party member`, {
          employerId: henchman.employerId,
        });
      }
      if (henchman.shareMultiplier !== undefined && (henchman.shareMultiplier < 0 || henchman.shareMultiplier > 1)) {
        throw new ValidationError('Henchman share multiplier must be between 0 and 1');
      }
    }
    for (const id of [...memberIds, ...henchmen.map((h) => h.characterId)]) {
      if (!(await this.characters.getCharacter(id))) {
        throw new NotFoundError(`Character ${id} not found`, { characterId: id });
      }
    }
  }
}
