import axios from 'axios';
import { config } from '../src/config';
import { buildSweepSummaryPayload, sendSlackMessage, sendSweepSummary } from '../src/services/slackService';
import type { CompletedSweep } from '../src/services/sweepService';

jest.mock('../src/utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

function sweep(counts: Partial<CompletedSweep['counts']> = {}): CompletedSweep {
  return {
    status: 'completed',
    trigger: 'scheduled',
    runId: 'sweep_abc',
    startedAt: new Date('2024-05-10T03:00:00Z'),
    finishedAt: new Date('2024-05-10T03:00:02Z'),
    durationMs: 2000,
    candidates: 4,
    counts: {
      success: 2,
      failed: 1,
      whitelisted: 1,
      no_member_id: 0,
      invalid_member_id: 0,
      error: 0,
      superseded: 0,
      dropped: 0,
      ...counts,
    },
    removedSubscriptionIds: [1, 2],
  };
}

describe('Slack Service', () => {
  const originalWebhookUrl = config.slackWebhookUrl;
  let post: jest.SpyInstance;

  beforeEach(() => {
    config.slackWebhookUrl = 'https://hooks.slack.test/services/test';
    post = jest.spyOn(axios, 'post').mockResolvedValue({ data: 'ok' });
  });

  afterEach(() => {
    config.slackWebhookUrl = originalWebhookUrl;
    jest.restoreAllMocks();
  });

  describe('buildSweepSummaryPayload', () => {
    it('should flag runs with failures', () => {
      const payload = buildSweepSummaryPayload(sweep());

      expect(payload.text).toBe('⚠️ Removal sweep sweep_abc: 2 removed, 1 failed');
      expect(payload.blocks[1].fields?.map((field) => field.text)).toEqual([
        '*Removed:*\n2',
        '*Failed:*\n1',
        '*Errors:*\n0',
        '*Changed during removal:*\n0',
        '*Whitelisted:*\n1',
        '*No member id:*\n0',
        '*Trigger:*\nscheduled',
      ]);
      expect(payload.blocks[2].elements?.[0].text).toBe('4 candidate(s) | 2000ms | 2024-05-10T03:00:02.000Z');
    });

    it('should use the broom for clean runs', () => {
      expect(buildSweepSummaryPayload(sweep({ failed: 0 })).text).toBe('🧹 Removal sweep sweep_abc: 2 removed, 0 failed');
    });
  });

  describe('sendSweepSummary', () => {
    it('should post the summary to the webhook', async () => {
      await sendSweepSummary(sweep());

      expect(post).toHaveBeenCalledWith(
        'https://hooks.slack.test/services/test',
        buildSweepSummaryPayload(sweep()),
        { headers: { 'Content-Type': 'application/json' }, timeout: 5000 }
      );
    });

    it('should stay quiet when nobody was removed or failed', async () => {
      await sendSweepSummary(sweep({ success: 0, failed: 0 }));

      expect(post).not.toHaveBeenCalled();
    });

    it('should skip when no webhook is configured', async () => {
      config.slackWebhookUrl = '';

      await sendSweepSummary(sweep());

      expect(post).not.toHaveBeenCalled();
    });

    it('should not throw when Slack is unreachable', async () => {
      post.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND'));

      await expect(sendSweepSummary(sweep())).resolves.toBeUndefined();
    });
  });

  describe('sendSlackMessage', () => {
    it('should post a plain text message', async () => {
      await sendSlackMessage('hello');

      expect(post).toHaveBeenCalledWith(
        'https://hooks.slack.test/services/test',
        { text: 'hello' },
        { headers: { 'Content-Type': 'application/json' }, timeout: 5000 }
      );
    });
  });
});
