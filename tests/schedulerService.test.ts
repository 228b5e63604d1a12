import {
  buildJobSchedules,
  catchUpJobId,
  enqueueCatchUpJobs,
  enqueueManualRun,
  registerJobSchedulers,
  type ManualTriggerQueue,
  type SchedulerConfig,
  type SchedulingQueue,
} from '../src/services/schedulerService';

jest.mock('../src/utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

describe('Scheduler Service', () => {
  const config: SchedulerConfig = { sweepHour: 3, notifyHour: 10, timezone: 'UTC', heartbeatMinutes: 15 };
  let queue: { upsertJobScheduler: jest.Mock; add: jest.Mock };

  beforeEach(() => {
    queue = {
      upsertJobScheduler: jest.fn().mockResolvedValue(undefined),
      add: jest.fn().mockResolvedValue(undefined),
    };
  });

  function asQueue(): SchedulingQueue {
    return queue;
  }

  it('should build one schedule per maintenance job', () => {
    expect(buildJobSchedules({ ...config, timezone: 'Europe/Rome' })).toEqual([
      { name: 'removal-sweep', repeat: { pattern: '0 3 * * *', tz: 'Europe/Rome' } },
      { name: 'expiry-warnings', repeat: { pattern: '0 10 * * *', tz: 'Europe/Rome' } },
      { name: 'heartbeat', repeat: { every: 900000 } },
      { name: 'event-retention', repeat: { pattern: '0 4 * * *', tz: 'Europe/Rome' } },
    ]);
  });

  it('should upsert every schedule under a fixed id', async () => {
    await registerJobSchedulers(asQueue(), config);

    expect(queue.upsertJobScheduler).toHaveBeenCalledTimes(4);
    expect(queue.upsertJobScheduler).toHaveBeenCalledWith(
      'removal-sweep',
      { pattern: '0 3 * * *', tz: 'UTC' },
      { name: 'removal-sweep', data: { trigger: 'scheduled' } }
    );
    expect(queue.upsertJobScheduler).toHaveBeenCalledWith(
      'heartbeat',
      { every: 900000 },
      { name: 'heartbeat', data: { trigger: 'scheduled' } }
    );
  });

  describe('enqueueCatchUpJobs', () => {
    it('should queue the jobs whose hour already passed today', async () => {
      const now = new Date('2024-06-15T05:00:00Z');

      const queued = await enqueueCatchUpJobs(asQueue(), config, now);

      expect(queued).toEqual(['removal-sweep']);
      expect(queue.add).toHaveBeenCalledTimes(1);
      expect(queue.add).toHaveBeenCalledWith(
        'removal-sweep',
        { trigger: 'catch_up' },
        { jobId: 'catch-up-removal-sweep-2024-06-15' }
      );
    });

    it('should queue both jobs late in the day', async () => {
      const queued = await enqueueCatchUpJobs(asQueue(), config, new Date('2024-06-15T22:00:00Z'));

      expect(queued).toEqual(['removal-sweep', 'expiry-warnings']);
    });

    it('should leave a run starting at the scheduled hour to the scheduler', async () => {
      const queued = await enqueueCatchUpJobs(asQueue(), config, new Date('2024-06-15T03:00:00Z'));

      expect(queued).toEqual([]);
      expect(queue.add).not.toHaveBeenCalled();
    });

    it('should catch up a start later in the scheduled hour', async () => {
      const queued = await enqueueCatchUpJobs(asQueue(), config, new Date('2024-06-15T03:30:00Z'));

      expect(queued).toEqual(['removal-sweep']);
    });

    it('should judge the hour in the configured timezone', async () => {
      // 05:00 UTC is 01:00 in New York
      const queued = await enqueueCatchUpJobs(
        asQueue(),
        { ...config, timezone: 'America/New_York' },
        new Date('2024-06-15T05:00:00Z')
      );

      expect(queued).toEqual([]);
      expect(queue.add).not.toHaveBeenCalled();
    });
  });

  it('should key catch-up jobs by the local date', () => {
    const now = new Date('2024-06-15T01:30:00Z');

    expect(catchUpJobId('expiry-warnings', now, 'UTC')).toBe('catch-up-expiry-warnings-2024-06-15');
    expect(catchUpJobId('expiry-warnings', now, 'America/New_York')).toBe('catch-up-expiry-warnings-2024-06-14');
  });

  describe('enqueueManualRun', () => {
    let manualQueue: { getJobs: jest.Mock; add: jest.Mock };

    beforeEach(() => {
      manualQueue = {
        getJobs: jest.fn().mockResolvedValue([]),
        add: jest.fn().mockResolvedValue({ id: '17' }),
      };
    });

    function asManualQueue(): ManualTriggerQueue {
      return manualQueue;
    }

    it('should hand the run to the worker queue', async () => {
      const result = await enqueueManualRun(asManualQueue(), 'removal-sweep', 'admin');

      expect(result).toEqual({ status: 'queued', job: 'removal-sweep', jobId: '17' });
      expect(manualQueue.getJobs).toHaveBeenCalledWith(['active', 'waiting', 'prioritized']);
      expect(manualQueue.add).toHaveBeenCalledWith('removal-sweep', { trigger: 'manual' });
    });

    it('should skip while the same job is running', async () => {
      manualQueue.getJobs.mockResolvedValue([{ name: 'heartbeat' }, { name: 'removal-sweep' }]);

      const result = await enqueueManualRun(asManualQueue(), 'removal-sweep', 'admin');

      expect(result).toEqual({ status: 'skipped', job: 'removal-sweep', reason: 'already_running' });
      expect(manualQueue.add).not.toHaveBeenCalled();
    });

    it('should not be blocked by a different job', async () => {
      manualQueue.getJobs.mockResolvedValue([{ name: 'removal-sweep' }]);

      const result = await enqueueManualRun(asManualQueue(), 'expiry-warnings', 'admin');

      expect(result).toEqual({ status: 'queued', job: 'expiry-warnings', jobId: '17' });
    });
  });
});
