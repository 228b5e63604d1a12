import {
  getMetrics,
  recordBillingEvent,
  recordHeartbeat,
  recordSweepRun,
  resetMetrics,
  updateGracePeriodCount,
} from '../src/utils/metrics';

jest.mock('../src/utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

describe('Metrics', () => {
  beforeEach(() => {
    resetMetrics();
  });

  function metricLines(output: string, name: string): string[] {
    return output.split('\n').filter((line) => line.startsWith(name));
  }

  it('should count billing events by type and outcome', async () => {
    recordBillingEvent('invoice.paid', 'applied');
    recordBillingEvent('invoice.paid', 'applied');
    recordBillingEvent('invoice.paid', 'duplicate');

    const lines = metricLines(await getMetrics(), 'membership_billing_events_total{');

    expect(lines).toEqual([
      'membership_billing_events_total{eventType="invoice.paid",outcome="applied"} 2',
      'membership_billing_events_total{eventType="invoice.paid",outcome="duplicate"} 1',
    ]);
  });

  it('should count sweep runs and observe their duration', async () => {
    recordSweepRun('scheduled', 'completed', 1.5);
    recordSweepRun('manual', 'already_running');

    const output = await getMetrics();

    expect(metricLines(output, 'membership_sweep_runs_total{')).toEqual([
      'membership_sweep_runs_total{trigger="scheduled",result="completed"} 1',
      'membership_sweep_runs_total{trigger="manual",result="already_running"} 1',
    ]);
    expect(metricLines(output, 'membership_sweep_duration_seconds_count')).toEqual([
      'membership_sweep_duration_seconds_count 1',
    ]);
  });

  it('should expose the grace period size and last heartbeat', async () => {
    updateGracePeriodCount(4);
    recordHeartbeat(new Date('2024-05-01T00:00:00Z'));

    const output = await getMetrics();

    expect(metricLines(output, 'membership_grace_period_subscriptions ')).toEqual([
      'membership_grace_period_subscriptions 4',
    ]);
    expect(metricLines(output, 'membership_last_heartbeat_timestamp_seconds ')).toEqual([
      'membership_last_heartbeat_timestamp_seconds 1714521600',
    ]);
  });
});
