import { SubscribeOutcome } from '@/types/monitoring';
import { MonitorStorage } from '@/services/storage/types';
import { logger } from '@/utils/logger';
import { FollowerSync } from './wallet-registry';

/**
 * Active/inactive registry of alert recipients. Subscribers are never
 * deleted; unsubscribing keeps their wallet links so a later subscribe
 * restores monitoring as it was.
 */
export class SubscriberStore {
  constructor(
    private readonly storage: MonitorStorage,
    private readonly followers: FollowerSync
  ) {}

  async subscribe(id: number, displayName: string, now = new Date()): Promise<SubscribeOutcome> {
    const outcome = await this.storage.transaction(async session => {
      const existing = await session.subscribers.lock(id);

      if (!existing) {
        await session.subscribers.insert({ id, displayName, subscribedAt: now, active: true });
        return SubscribeOutcome.NEWLY_SUBSCRIBED;
      }

      if (existing.active) {
        return SubscribeOutcome.ALREADY_ACTIVE;
      }

      await session.subscribers.setActive(id, true, displayName);
      await this.followers.restoreFollowers(session, id);
      return SubscribeOutcome.REACTIVATED;
    });

    logger.info('Subscribe processed', { subscriberId: id, outcome });
    return outcome;
  }

  /** False when the subscriber is unknown or already inactive. */
  async unsubscribe(id: number): Promise<boolean> {
    const changed = await this.storage.transaction(async session => {
      const existing = await session.subscribers.lock(id);
      if (!existing || !existing.active) {
        return false;
      }

      await session.subscribers.setActive(id, false);
      await this.followers.releaseFollowers(session, id);
      return true;
    });

    if (changed) {
      logger.info('Subscriber deactivated', { subscriberId: id });
    }
    return changed;
  }

  async isActive(id: number): Promise<boolean> {
    const subscriber = await this.storage.subscribers.find(id);
    return subscriber?.active ?? false;
  }
}
