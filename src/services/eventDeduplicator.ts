import type { ProcessedEventRepository } from '../repositories';
import { logger } from '../utils/logger';

/**
 * Durable "seen this event id" gate in front of the reducer.
 * Storage errors are not caught here: the webhook must answer 500 so Stripe re-delivers.
 */
export class EventDeduplicator {
  constructor(private readonly processedEvents: ProcessedEventRepository) {}

  async alreadyProcessed(eventId: string): Promise<boolean> {
    const seen = await this.processedEvents.exists(eventId);
    if (seen) {
      logger.debug(`[Dedup] Event ${eventId} already processed`);
    }
    return seen;
  }

  async record(eventId: string, eventType: string): Promise<void> {
    await this.processedEvents.insert(eventId, eventType);
  }

  /**
   * Drop processed-event records older than the retention window.
   * An event re-delivered after that is treated as new; the reducer is idempotent for it.
   */
  async purgeOlderThan(cutoff: Date): Promise<number> {
    const deleted = await this.processedEvents.deleteOlderThan(cutoff);
    logger.info(`[Dedup] Purged ${deleted} processed event(s) older than ${cutoff.toISOString()}`);
    return deleted;
  }
}
