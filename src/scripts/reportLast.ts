import 'dotenv/config';
import { closeDatabase } from '../db';
import type { RunSummary } from '../services/reconciliationLogService';
import { initializeReconciler } from '../services/reconciler';
import { logger } from '../utils/logger';

export function formatRunSummary(summary: RunSummary): string {
  const lines = [
    '='.repeat(60),
    `SWEEP RUN ${summary.runId}`,
    '='.repeat(60),
    `Started:  ${summary.startedAt.toISOString()}`,
    `Finished: ${summary.finishedAt.toISOString()}`,
    '',
    'Outcomes:',
    ...Object.entries(summary.counts).map(([status, count]) => `  ${status.padEnd(18)} ${count}`),
    '',
    'Subscriptions:',
    ...summary.entries.map((entry) => {
      const failed = entry.groupsFailed.length > 0 ? ` failed=[${entry.groupsFailed.join(',')}]` : '';
      return `  #${entry.subscriptionId} ${entry.status} (${entry.reason})${failed}`;
    }),
  ];
  return lines.join('\n');
}

async function main() {
  try {
    const summary = await initializeReconciler().logs.lastRunSummary();
    if (!summary) {
      console.log('No sweep run has been logged yet.');
    } else {
      console.log(formatRunSummary(summary));
    }
    await closeDatabase();
    process.exit(0);
  } catch (error) {
    logger.error('[Report] Failed to load last sweep run', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
