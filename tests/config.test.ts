import { loadReconcilerConfig, parseGroupIds } from '../src/config';

describe('Reconciler configuration', () => {
  describe('parseGroupIds', () => {
    it('should keep signed integer ids and drop the rest', () => {
      expect(parseGroupIds('-1001234, 55 ,abc,,-7')).toEqual(['-1001234', '55', '-7']);
    });

    it('should return an empty list for missing input', () => {
      expect(parseGroupIds(undefined)).toEqual([]);
    });
  });

  describe('loadReconcilerConfig', () => {
    it('should apply defaults when nothing is set', () => {
      const config = loadReconcilerConfig({});

      expect(config).toEqual({
        gracePeriodDays: 3,
        sweepHour: 3,
        notifyHour: 10,
        timezone: 'UTC',
        autoRemovalEnabled: true,
        fallbackInviteEnabled: false,
        fallbackInviteLink: null,
        groupIds: [],
        pricePlans: {},
        renewUrl: '',
        supportContact: '',
        inviteTtlHours: 24,
        inviteCooldownSeconds: 300,
        heartbeatMinutes: 15,
        eventRetentionDays: 90,
        warningLeadDays: [7, 3, 1, 0],
      });
    });

    it('should read values from the environment', () => {
      const config = loadReconcilerConfig({
        GRACE_PERIOD_DAYS: '5',
        SWEEP_HOUR: '4',
        NOTIFY_HOUR: '9',
        TIMEZONE: 'Europe/Rome',
        AUTO_REMOVAL_ENABLED: 'false',
        GROUP_IDS: '-100,-200',
        PRICE_MONTHLY_ID: 'price_month',
        PRICE_ANNUAL_ID: ' price_year ',
        FALLBACK_INVITE_ENABLED: 'true',
        FALLBACK_INVITE_LINK: 'https://t.me/+static',
      });

      expect(config.gracePeriodDays).toBe(5);
      expect(config.sweepHour).toBe(4);
      expect(config.notifyHour).toBe(9);
      expect(config.timezone).toBe('Europe/Rome');
      expect(config.autoRemovalEnabled).toBe(false);
      expect(config.groupIds).toEqual(['-100', '-200']);
      expect(config.pricePlans).toEqual({ price_month: 'monthly', price_year: 'annual' });
      expect(config.fallbackInviteEnabled).toBe(true);
      expect(config.fallbackInviteLink).toBe('https://t.me/+static');
    });

    it('should fall back when hours are out of range or not numbers', () => {
      const config = loadReconcilerConfig({ SWEEP_HOUR: '24', NOTIFY_HOUR: 'noon', GRACE_PERIOD_DAYS: '-2' });

      expect(config.sweepHour).toBe(3);
      expect(config.notifyHour).toBe(10);
      expect(config.gracePeriodDays).toBe(0);
    });
  });
});
