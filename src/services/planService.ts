import { PLAN_DURATION_DAYS, type PlanType } from '../types/subscription';
import { addDays, laterOf } from '../utils/helpers';

export type PlanSource = 'price' | 'description' | 'existing' | 'unknown';

export interface PlanResolution {
  plan: PlanType | null;
  source: PlanSource;
}

export function planFromPriceId(priceId: string | null, pricePlans: Record<string, PlanType>): PlanType | null {
  if (!priceId) return null;
  return pricePlans[priceId.trim()] ?? null;
}

/**
 * Best-effort guess from an invoice line description such as "1 × Premium (at €30.00 / month)".
 * Only a fallback for prices missing from the configured mapping; callers log whenever
 * a plan comes from here.
 */
export function inferPlanFromDescription(description: string | null): PlanType | null {
  if (!description) return null;
  const text = description.toLowerCase();

  if (text.includes('month')) return 'monthly';
  if (text.includes('quarter')) return 'quarterly';
  if (text.includes('annual') || text.includes('year')) return 'annual';
  return null;
}

export function resolvePlan(
  input: { priceId: string | null; description: string | null; existing: PlanType | null },
  pricePlans: Record<string, PlanType>
): PlanResolution {
  const fromPrice = planFromPriceId(input.priceId, pricePlans);
  if (fromPrice) {
    return { plan: fromPrice, source: 'price' };
  }

  const fromDescription = inferPlanFromDescription(input.description);
  if (fromDescription) {
    return { plan: fromDescription, source: 'description' };
  }

  if (input.existing) {
    return { plan: input.existing, source: 'existing' };
  }

  return { plan: null, source: 'unknown' };
}

/** Extend from whichever is later, the current expiry or now. */
export function extendExpiry(current: Date | null, plan: PlanType, now: Date): Date {
  const base = current ? laterOf(current, now) : now;
  return addDays(base, PLAN_DURATION_DAYS[plan]);
}
