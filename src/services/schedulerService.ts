import type { JobsOptions, JobType, RepeatOptions } from 'bullmq';
import type { ReconcilerConfig } from '../config';
import { logger } from '../utils/logger';
import { getZonedDateKey, isPastHourToday } from '../utils/time';
import type { MaintenanceJobData, MaintenanceJobName } from './queueService';

export type SchedulerConfig = Pick<ReconcilerConfig, 'sweepHour' | 'notifyHour' | 'timezone' | 'heartbeatMinutes'>;

export const EVENT_RETENTION_HOUR = 4;

/** The subset of a BullMQ queue the scheduler touches. */
export interface SchedulingQueue {
  upsertJobScheduler(
    jobSchedulerId: string,
    repeatOpts: Omit<RepeatOptions, 'key'>,
    jobTemplate?: { name?: MaintenanceJobName; data?: MaintenanceJobData }
  ): Promise<unknown>;
  add(name: MaintenanceJobName, data: MaintenanceJobData, opts?: JobsOptions): Promise<unknown>;
}

/** The subset of a BullMQ queue a manual trigger touches. */
export interface ManualTriggerQueue {
  getJobs(types: JobType[]): Promise<Array<{ name: string }>>;
  add(name: MaintenanceJobName, data: MaintenanceJobData, opts?: JobsOptions): Promise<{ id?: string }>;
}

export type ManualJobName = Extract<MaintenanceJobName, 'removal-sweep' | 'expiry-warnings'>;

export type ManualTriggerResult =
  | { status: 'queued'; job: ManualJobName; jobId: string | null }
  | { status: 'skipped'; job: ManualJobName; reason: 'already_running' };

// Running or about to run. Not 'delayed': every job scheduler parks its next run there.
const IN_FLIGHT_STATES: JobType[] = ['active', 'waiting', 'prioritized'];

export interface JobSchedule {
  name: MaintenanceJobName;
  repeat: Omit<RepeatOptions, 'key'>;
}

export function buildJobSchedules(config: SchedulerConfig): JobSchedule[] {
  return [
    { name: 'removal-sweep', repeat: { pattern: `0 ${config.sweepHour} * * *`, tz: config.timezone } },
    { name: 'expiry-warnings', repeat: { pattern: `0 ${config.notifyHour} * * *`, tz: config.timezone } },
    { name: 'heartbeat', repeat: { every: config.heartbeatMinutes * 60 * 1000 } },
    { name: 'event-retention', repeat: { pattern: `0 ${EVENT_RETENTION_HOUR} * * *`, tz: config.timezone } },
  ];
}

/**
 * Create or update the repeatable jobs. Upserting by a fixed scheduler id keeps exactly
 * one schedule per job across restarts and picks up changed hours.
 */
export async function registerJobSchedulers(queue: SchedulingQueue, config: SchedulerConfig): Promise<JobSchedule[]> {
  const schedules = buildJobSchedules(config);

  for (const schedule of schedules) {
    await queue.upsertJobScheduler(schedule.name, schedule.repeat, {
      name: schedule.name,
      data: { trigger: 'scheduled' },
    });
    logger.info(`[Scheduler] Registered ${schedule.name}`, { repeat: schedule.repeat });
  }

  return schedules;
}

export function catchUpJobId(name: MaintenanceJobName, now: Date, timeZone: string): string {
  return `catch-up-${name}-${getZonedDateKey(now, timeZone)}`;
}

/**
 * A process started after today's sweep or warning hour runs that job once right away.
 * The job id carries the local date, so restarting again the same day adds nothing.
 */
export async function enqueueCatchUpJobs(
  queue: SchedulingQueue,
  config: SchedulerConfig,
  now: Date = new Date()
): Promise<MaintenanceJobName[]> {
  const daily: Array<[MaintenanceJobName, number]> = [
    ['removal-sweep', config.sweepHour],
    ['expiry-warnings', config.notifyHour],
  ];

  const queued: MaintenanceJobName[] = [];
  for (const [name, hour] of daily) {
    if (!isPastHourToday(now, hour, config.timezone)) {
      continue;
    }

    const jobId = catchUpJobId(name, now, config.timezone);
    await queue.add(name, { trigger: 'catch_up' }, { jobId });
    queued.push(name);
    logger.info(`[Scheduler] Catch-up ${name} queued`, { jobId });
  }

  return queued;
}

/**
 * Hand an operator-requested run to the worker. Only the worker runs sweeps, one job at a
 * time, so a manual trigger never runs beside a scheduled one; while a run of the same job
 * is in flight or waiting, the trigger is skipped rather than queued behind it.
 */
export async function enqueueManualRun(
  queue: ManualTriggerQueue,
  name: ManualJobName,
  requestedBy: string
): Promise<ManualTriggerResult> {
  const inFlight = await queue.getJobs(IN_FLIGHT_STATES);
  if (inFlight.some((job) => job.name === name)) {
    logger.warn(`[Scheduler] ${name} already in flight, manual trigger skipped`, { requestedBy });
    return { status: 'skipped', job: name, reason: 'already_running' };
  }

  const job = await queue.add(name, { trigger: 'manual' });
  logger.info(`[Scheduler] Manual ${name} queued`, { jobId: job.id, requestedBy });
  return { status: 'queued', job: name, jobId: job.id ?? null };
}
