import { extendExpiry, inferPlanFromDescription, planFromPriceId, resolvePlan } from '../src/services/planService';

describe('Plan Service', () => {
  const pricePlans = { price_month: 'monthly', price_quarter: 'quarterly' } as const;

  describe('planFromPriceId', () => {
    it('should map configured price ids', () => {
      expect(planFromPriceId('price_month', pricePlans)).toBe('monthly');
      expect(planFromPriceId(' price_quarter ', pricePlans)).toBe('quarterly');
    });

    it('should return null for unknown or missing ids', () => {
      expect(planFromPriceId('price_other', pricePlans)).toBeNull();
      expect(planFromPriceId(null, pricePlans)).toBeNull();
    });
  });

  describe('inferPlanFromDescription', () => {
    it.each([
      ['1 × VIP (at $30.00 / month)', 'monthly'],
      ['VIP Quarterly', 'quarterly'],
      ['VIP Annual pass', 'annual'],
      ['1 × VIP (at $300.00 / year)', 'annual'],
    ])('should read %s as %s', (description, plan) => {
      expect(inferPlanFromDescription(description)).toBe(plan);
    });

    it('should return null when nothing matches', () => {
      expect(inferPlanFromDescription('Lifetime access')).toBeNull();
      expect(inferPlanFromDescription(null)).toBeNull();
    });
  });

  describe('resolvePlan', () => {
    it('should prefer the price mapping over the description', () => {
      expect(resolvePlan({ priceId: 'price_quarter', description: 'monthly', existing: null }, pricePlans)).toEqual({
        plan: 'quarterly',
        source: 'price',
      });
    });

    it('should fall back to the description, then the stored plan', () => {
      expect(resolvePlan({ priceId: 'price_x', description: 'per month', existing: 'annual' }, pricePlans)).toEqual({
        plan: 'monthly',
        source: 'description',
      });
      expect(resolvePlan({ priceId: null, description: null, existing: 'annual' }, pricePlans)).toEqual({
        plan: 'annual',
        source: 'existing',
      });
      expect(resolvePlan({ priceId: null, description: null, existing: null }, pricePlans)).toEqual({
        plan: null,
        source: 'unknown',
      });
    });
  });

  describe('extendExpiry', () => {
    const now = new Date('2024-05-01T00:00:00Z');

    it('should extend from the current expiry when it is in the future', () => {
      const current = new Date('2024-05-10T00:00:00Z');
      expect(extendExpiry(current, 'monthly', now).toISOString()).toBe('2024-06-09T00:00:00.000Z');
    });

    it('should extend from now when the expiry has passed or is unknown', () => {
      expect(extendExpiry(new Date('2024-04-01T00:00:00Z'), 'quarterly', now).toISOString()).toBe(
        '2024-07-30T00:00:00.000Z'
      );
      expect(extendExpiry(null, 'annual', now).toISOString()).toBe('2025-05-01T00:00:00.000Z');
    });
  });
});
