import { ExpiryWarningService } from '../src/services/expiryWarningService';
import { ReconciliationLogService } from '../src/services/reconciliationLogService';
import { DAY_MS } from '../src/utils/helpers';
import { FakeDirectory } from './support/fakeDirectory';
import { createMemoryRepositories, type MemoryRepositories } from './support/memoryRepositories';

jest.mock('../src/utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const HOUR_MS = 60 * 60 * 1000;
const now = new Date('2024-05-10T10:00:00Z');

function fromNow(ms: number): Date {
  return new Date(now.getTime() + ms);
}

describe('Expiry Warning Service', () => {
  let repos: MemoryRepositories;
  let notifier: FakeDirectory;
  let logs: ReconciliationLogService;
  let service: ExpiryWarningService;

  beforeEach(() => {
    repos = createMemoryRepositories(() => now);
    notifier = new FakeDirectory(() => now);
    logs = new ReconciliationLogService(repos.removalLogs, repos.notificationLogs);
    service = new ExpiryWarningService({
      subscriptions: repos.subscriptions,
      logs,
      notifier,
      config: {
        warningLeadDays: [7, 3, 1, 0],
        renewUrl: 'https://example.com/renew',
        supportContact: '@support',
      },
      now: () => now,
    });
  });

  it('should warn each member once per lead time that matches', async () => {
    await repos.subscriptions.seed({ email: 'week@example.com', memberId: '101', expiresAt: fromNow(7 * DAY_MS + 2 * HOUR_MS) });
    await repos.subscriptions.seed({ email: 'three@example.com', memberId: '102', expiresAt: fromNow(3 * DAY_MS + 23 * HOUR_MS) });
    await repos.subscriptions.seed({ email: 'today@example.com', memberId: '103', expiresAt: fromNow(30 * 60 * 1000) });
    await repos.subscriptions.seed({ email: 'no-id@example.com', memberId: null, expiresAt: fromNow(DAY_MS) });
    await repos.subscriptions.seed({ email: 'later@example.com', memberId: '104', expiresAt: fromNow(5 * DAY_MS) });

    const result = await service.run();

    expect(result).toEqual({
      status: 'completed',
      startedAt: now,
      leads: [
        { leadDays: 7, due: 1, sent: 1, failed: 0, alreadySent: 0 },
        { leadDays: 3, due: 1, sent: 1, failed: 0, alreadySent: 0 },
        { leadDays: 1, due: 0, sent: 0, failed: 0, alreadySent: 0 },
        { leadDays: 0, due: 1, sent: 1, failed: 0, alreadySent: 0 },
      ],
      sent: 3,
      failed: 0,
    });
    expect(notifier.messages.map((message) => message.memberId)).toEqual(['101', '102', '103']);
  });

  it('should render the warning with the date and renewal details', async () => {
    await repos.subscriptions.seed({ email: 'week@example.com', memberId: '101', expiresAt: fromNow(7 * DAY_MS + 2 * HOUR_MS) });

    await service.run();

    expect(notifier.messages[0].text).toBe(
      [
        '⏰ <b>Your VIP subscription is about to expire</b>',
        'Your access expires in <b>7 days</b> (2024-05-17).',
        '🔁 Renew here: https://example.com/renew',
        'Questions? Contact @support.',
      ].join('\n')
    );
  });

  it('should not send the same warning twice', async () => {
    await repos.subscriptions.seed({ email: 'three@example.com', memberId: '102', expiresAt: fromNow(3 * DAY_MS) });

    await service.run();
    const second = await service.run();

    expect(notifier.messages).toHaveLength(1);
    expect(second).toMatchObject({ sent: 0, failed: 0 });
    if (second.status === 'completed') {
      expect(second.leads[1]).toEqual({ leadDays: 3, due: 1, sent: 0, failed: 0, alreadySent: 1 });
    }
  });

  it('should log failed sends and retry them on the next run', async () => {
    const record = await repos.subscriptions.seed({ email: 'one@example.com', memberId: '105', expiresAt: fromNow(DAY_MS) });
    notifier.messageFailures.set('105', 'Forbidden: bot was blocked by the user');

    const first = await service.run();
    expect(first).toMatchObject({ sent: 0, failed: 1 });
    expect((await logs.listNotifications({ subscriptionId: record.id }))[0]).toMatchObject({
      leadDays: 1,
      status: 'failed',
      error: 'Forbidden: bot was blocked by the user',
    });

    notifier.messageFailures.clear();
    const second = await service.run();
    expect(second).toMatchObject({ sent: 1, failed: 0 });
  });

  it('should warn again for a new expiry after renewal', async () => {
    const record = await repos.subscriptions.seed({ email: 'renew@example.com', memberId: '106', expiresAt: fromNow(DAY_MS) });
    await service.run();

    await repos.subscriptions.update(record.id, { ...record, expiresAt: fromNow(DAY_MS + HOUR_MS) });
    await service.run();

    expect(notifier.messages).toHaveLength(2);
  });

  it('should turn a throwing notifier into a failed log entry', async () => {
    await repos.subscriptions.seed({ email: 'boom@example.com', memberId: '107', expiresAt: fromNow(0) });
    jest.spyOn(notifier, 'sendDirectMessage').mockRejectedValueOnce(new Error('socket hang up'));

    const result = await service.run();

    expect(result).toMatchObject({ sent: 0, failed: 1 });
    expect((await logs.listNotifications())[0]).toMatchObject({ leadDays: 0, status: 'failed', error: 'socket hang up' });
  });
});
