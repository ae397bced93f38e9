import { pruneActivity } from './activity-log.service.js';
import type { ReviewGate } from './review.service.js';

export const HOUSEKEEPING_INTERVAL_MS = 60 * 60 * 1000;
export const ACTIVITY_RETENTION_MS = 30 * 24 * 60 * 60 * 1000;

export interface HousekeepingResult {
  reviews: number;
  records: number;
}

/**
 * Drops stale previews and old activity records. A failure is logged and
 * returns null.
 */
export function runHousekeeping(reviews: ReviewGate, now: Date = new Date()): HousekeepingResult | null {
  try {
    const result = {
      reviews: reviews.prune(),
      records: pruneActivity(new Date(now.getTime() - ACTIVITY_RETENTION_MS)),
    };
    if (result.reviews || result.records) {
      console.log(`[Housekeeping] Pruned ${result.reviews} stale preview(s) and ${result.records} log record(s)`);
    }
    return result;
  } catch (error) {
    console.error('[Housekeeping] Pass failed:', error);
    return null;
  }
}
