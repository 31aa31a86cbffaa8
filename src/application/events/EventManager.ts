// Application layer: Campaign event bus
// Services publish committed changes here; the session synchronizer fans them out

import { EventEmitter } from 'events';
import type { CampaignEvent } from '@/domain/session/types.js';

const CHANNEL = 'campaign-event';

export type CampaignEventCounts = Record<CampaignEvent['type'], number>;

export class EventManager {
  private emitter = new EventEmitter();
  private counts: CampaignEventCounts = { map_changed: 0, party_changed: 0 };

  constructor() {
    // every open synchronizer and test harness subscribes
    this.emitter.setMaxListeners(0);
  }

  onCampaignEvent(handler: (event: CampaignEvent) => void): void {
    this.emitter.on(CHANNEL, handler);
  }

  offCampaignEvent(handler: (event: CampaignEvent) => void): void {
    this.emitter.off(CHANNEL, handler);
  }

  /**
   * Listeners run synchronously, so events reach them in commit order.
   */
  emitCampaignEvent(event: CampaignEvent): void {
    this.counts[event.type] += 1;
    this.emitter.emit(CHANNEL, event);
  }

  /** Events published since startup, by type */
  getCounts(): CampaignEventCounts {
    return { ...this.counts };
  }
}
