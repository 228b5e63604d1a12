import type { RemovalReason, SubscriptionState } from '../types/subscription';
import { DAY_MS } from '../utils/helpers';

type SelectableState = Pick<SubscriptionState, 'status' | 'expiresAt'>;

/** Instant before which an expiry counts as "past grace". */
export function graceCutoff(now: Date, gracePeriodDays: number): Date {
  return new Date(now.getTime() - gracePeriodDays * DAY_MS);
}

function isPastGrace(expiresAt: Date, now: Date, gracePeriodDays: number): boolean {
  return now.getTime() - expiresAt.getTime() > gracePeriodDays * DAY_MS;
}

/**
 * Removal candidates:
 * - active with a known expiry more than `gracePeriodDays` in the past;
 * - canceled with no expiry, or with one more than `gracePeriodDays` in the past
 *   (a cancellation does not cut short a period that was already paid for).
 * Active records without an expiry are never candidates.
 */
export function isRemovalCandidate(state: SelectableState, now: Date, gracePeriodDays: number): boolean {
  if (state.status === 'active') {
    return state.expiresAt !== null && isPastGrace(state.expiresAt, now, gracePeriodDays);
  }
  if (state.status === 'canceled') {
    return state.expiresAt === null || isPastGrace(state.expiresAt, now, gracePeriodDays);
  }
  return false;
}

/** Active, expired, but still inside the grace window. Shown to operators, not removed. */
export function isInGracePeriod(state: SelectableState, now: Date, gracePeriodDays: number): boolean {
  if (state.status !== 'active' || state.expiresAt === null) {
    return false;
  }
  const overdueMs = now.getTime() - state.expiresAt.getTime();
  return overdueMs >= 0 && overdueMs <= gracePeriodDays * DAY_MS;
}

export function removalReasonFor(state: SelectableState): RemovalReason {
  return state.status === 'canceled' ? 'cancelled' : 'expired';
}
