import axios from 'axios';
import { config } from '../config';
import { logger } from '../utils/logger';
import { recordSlackAlert } from '../utils/metrics';
import type { CompletedSweep } from './sweepService';

/**
 * Block Kit payload summarising one sweep run
 */
export function buildSweepSummaryPayload(result: CompletedSweep) {
  const { counts } = result;
  const emoji = counts.failed > 0 || counts.error > 0 || counts.superseded > 0 ? '⚠️' : '🧹';
  const title = `${emoji} Removal sweep ${result.runId}`;

  return {
    text: `${title}: ${counts.success} removed, ${counts.failed} failed`,
    blocks: [
      {
        type: 'header',
        text: { type: 'plain_text', text: title, emoji: true },
      },
      {
        type: 'section',
        fields: [
          { type: 'mrkdwn', text: `*Removed:*\n${counts.success}` },
          { type: 'mrkdwn', text: `*Failed:*\n${counts.failed}` },
          { type: 'mrkdwn', text: `*Errors:*\n${counts.error}` },
          { type: 'mrkdwn', text: `*Changed during removal:*\n${counts.superseded}` },
          { type: 'mrkdwn', text: `*Whitelisted:*\n${counts.whitelisted}` },
          { type: 'mrkdwn', text: `*No member id:*\n${counts.no_member_id + counts.invalid_member_id}` },
          { type: 'mrkdwn', text: `*Trigger:*\n${result.trigger}` },
        ],
      },
      {
        type: 'context',
        elements: [
          {
            type: 'mrkdwn',
            text: `${result.candidates} candidate(s) | ${result.durationMs}ms | ${result.finishedAt.toISOString()}`,
          },
        ],
      },
    ],
  };
}

/**
 * Post a sweep summary when the run removed or failed to remove anyone.
 * Never throws; a Slack outage must not fail the sweep job.
 */
export async function sendSweepSummary(result: CompletedSweep): Promise<void> {
  const webhookUrl = config.slackWebhookUrl;

  if (!webhookUrl) {
    logger.debug('[Slack] SLACK_WEBHOOK_URL not configured, skipping sweep summary');
    return;
  }

  const { counts } = result;
  if (counts.success === 0 && counts.failed === 0 && counts.error === 0 && counts.superseded === 0) {
    return;
  }

  try {
    await axios.post(webhookUrl, buildSweepSummaryPayload(result), {
      headers: { 'Content-Type': 'application/json' },
      timeout: 5000,
    });

    logger.info('[Slack] Sweep summary sent', { runId: result.runId });
    recordSlackAlert('sweep_summary');
  } catch (error) {
    logger.error('[Slack] Failed to send sweep summary', {
      error: error instanceof Error ? error.message : String(error),
      runId: result.runId,
    });
  }
}

/**
 * Send a simple text message to Slack
 */
export async function sendSlackMessage(message: string): Promise<void> {
  const webhookUrl = config.slackWebhookUrl;

  if (!webhookUrl) {
    logger.debug('[Slack] SLACK_WEBHOOK_URL not configured, skipping message');
    return;
  }

  try {
    await axios.post(
      webhookUrl,
      { text: message },
      {
        headers: { 'Content-Type': 'application/json' },
        timeout: 5000,
      }
    );

    logger.info('[Slack] Message sent successfully');
    recordSlackAlert('message');
  } catch (error) {
    logger.error('[Slack] Failed to send message', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
