import { nanoid } from 'nanoid';
import type { ReconcilerConfig } from '../config';
import type { SubscriptionRepository } from '../repositories';
import type { NewRemovalLogEntry, RemovalLogStatus, SubscriptionRecord } from '../types/subscription';
import { DAY_MS, formatError } from '../utils/helpers';
import { logger } from '../utils/logger';
import { recordSweepOutcome, recordSweepRun, updateGracePeriodCount } from '../utils/metrics';
import { redactEmail } from '../utils/redact';
import type { MembershipDirectory, Notifier } from './directory/types';
import { renderRemovalNotice } from './messages';
import type { ReconciliationLogService } from './reconciliationLogService';
import { isRemovalCandidate, removalReasonFor } from './sweepSelection';
import type { WhitelistService } from './whitelistService';

export type SweepTrigger = 'scheduled' | 'catch_up' | 'manual';

export type SweepSkipReason = 'disabled' | 'already_running' | 'no_groups';

/** What happened to one candidate. `dropped`: no longer a candidate when re-read. */
export type CandidateOutcome = Exclude<RemovalLogStatus, 'processing'> | 'dropped';

export type SweepCounts = Record<CandidateOutcome, number>;

export type SweepResult =
  | { status: 'skipped'; trigger: SweepTrigger; reason: SweepSkipReason }
  | {
      status: 'completed';
      trigger: SweepTrigger;
      runId: string;
      startedAt: Date;
      finishedAt: Date;
      durationMs: number;
      candidates: number;
      counts: SweepCounts;
      removedSubscriptionIds: number[];
    };

export type CompletedSweep = Extract<SweepResult, { status: 'completed' }>;

export interface GracePeriodEntry {
  subscription: SubscriptionRecord;
  daysOverdue: number;
  removableAt: Date;
}

export type SweepConfig = Pick<
  ReconcilerConfig,
  'gracePeriodDays' | 'autoRemovalEnabled' | 'groupIds' | 'renewUrl' | 'supportContact'
>;

export interface SweepServiceDeps {
  subscriptions: SubscriptionRepository;
  whitelist: WhitelistService;
  logs: ReconciliationLogService;
  directory: MembershipDirectory;
  notifier: Notifier;
  config: SweepConfig;
  /** Called with every completed run; used for the Slack summary. */
  onCompleted?: (result: CompletedSweep) => Promise<void>;
  now?: () => Date;
  generateRunId?: () => string;
}

function emptyCounts(): SweepCounts {
  return {
    success: 0,
    failed: 0,
    whitelisted: 0,
    no_member_id: 0,
    invalid_member_id: 0,
    error: 0,
    superseded: 0,
    dropped: 0,
  };
}

/**
 * Removal Sweep
 *
 * Removes members whose subscription is past the grace period from every managed group.
 * One run at a time per process; a second call while a run is in progress returns
 * `already_running` instead of waiting. Each candidate is handled on its own: a failure
 * is logged and the sweep moves on, and whatever was not finished is picked up next run.
 */
export class SweepService {
  private readonly subscriptions: SubscriptionRepository;
  private readonly whitelist: WhitelistService;
  private readonly logs: ReconciliationLogService;
  private readonly directory: MembershipDirectory;
  private readonly notifier: Notifier;
  private readonly config: SweepConfig;
  private readonly onCompleted?: (result: CompletedSweep) => Promise<void>;
  private readonly now: () => Date;
  private readonly generateRunId: () => string;
  private running = false;

  constructor(deps: SweepServiceDeps) {
    this.subscriptions = deps.subscriptions;
    this.whitelist = deps.whitelist;
    this.logs = deps.logs;
    this.directory = deps.directory;
    this.notifier = deps.notifier;
    this.config = deps.config;
    this.onCompleted = deps.onCompleted;
    this.now = deps.now ?? (() => new Date());
    this.generateRunId = deps.generateRunId ?? (() => `sweep_${nanoid(12)}`);
  }

  get isRunning(): boolean {
    return this.running;
  }

  async run(trigger: SweepTrigger = 'manual'): Promise<SweepResult> {
    if (!this.config.autoRemovalEnabled) {
      logger.info('[Sweep] Auto removal disabled, skipping run', { trigger });
      recordSweepRun(trigger, 'disabled');
      return { status: 'skipped', trigger, reason: 'disabled' };
    }

    if (this.running) {
      logger.warn('[Sweep] Previous run still in progress, skipping', { trigger });
      recordSweepRun(trigger, 'already_running');
      return { status: 'skipped', trigger, reason: 'already_running' };
    }

    if (this.config.groupIds.length === 0) {
      logger.warn('[Sweep] No groups configured, nothing to remove members from', { trigger });
      recordSweepRun(trigger, 'no_groups');
      return { status: 'skipped', trigger, reason: 'no_groups' };
    }

    this.running = true;
    try {
      const result = await this.execute(trigger);
      recordSweepRun(trigger, 'completed', result.durationMs / 1000);

      if (this.onCompleted) {
        await this.onCompleted(result);
      }
      return result;
    } finally {
      this.running = false;
    }
  }

  /** Active subscriptions that expired but are still inside the grace window. */
  async listGracePeriod(): Promise<GracePeriodEntry[]> {
    const now = this.now();
    const records = await this.subscriptions.findInGracePeriod(now, this.config.gracePeriodDays);
    updateGracePeriodCount(records.length);

    const entries: GracePeriodEntry[] = [];
    for (const subscription of records) {
      if (!subscription.expiresAt) continue;
      entries.push({
        subscription,
        daysOverdue: Math.floor((now.getTime() - subscription.expiresAt.getTime()) / DAY_MS),
        removableAt: new Date(subscription.expiresAt.getTime() + this.config.gracePeriodDays * DAY_MS),
      });
    }
    return entries;
  }

  private async execute(trigger: SweepTrigger): Promise<CompletedSweep> {
    const runId = this.generateRunId();
    const startedAt = this.now();
    const counts = emptyCounts();
    const removedSubscriptionIds: number[] = [];

    const candidates = await this.subscriptions.findRemovalCandidates(startedAt, this.config.gracePeriodDays);
    logger.info(`[Sweep] Run ${runId} started with ${candidates.length} candidate(s)`, { trigger });

    for (const candidate of candidates) {
      const outcome = await this.processSafely(runId, candidate);
      counts[outcome]++;
      recordSweepOutcome(outcome);
      if (outcome === 'success') {
        removedSubscriptionIds.push(candidate.id);
      }
    }

    const finishedAt = this.now();
    const result: CompletedSweep = {
      status: 'completed',
      trigger,
      runId,
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      candidates: candidates.length,
      counts,
      removedSubscriptionIds,
    };

    logger.info(`[Sweep] Run ${runId} finished`, { trigger, counts, durationMs: result.durationMs });
    return result;
  }

  private async processSafely(runId: string, candidate: SubscriptionRecord): Promise<CandidateOutcome> {
    try {
      return await this.processCandidate(runId, candidate.id);
    } catch (error) {
      const message = formatError(error);
      logger.error(`[Sweep] Unexpected error for subscription ${candidate.id}: ${message}`, { runId });

      try {
        await this.logs.logRemoval({
          ...this.baseEntry(runId, candidate),
          status: 'error',
          error: message,
        });
      } catch (logError) {
        logger.error(`[Sweep] Could not write error log for subscription ${candidate.id}`, {
          runId,
          error: formatError(logError),
        });
      }
      return 'error';
    }
  }

  private async processCandidate(runId: string, subscriptionId: number): Promise<CandidateOutcome> {
    // A payment may have arrived since selection
    const record = await this.subscriptions.findById(subscriptionId);
    if (!record || !isRemovalCandidate(record, this.now(), this.config.gracePeriodDays)) {
      logger.debug(`[Sweep] Subscription ${subscriptionId} no longer a candidate`, { runId });
      return 'dropped';
    }

    const base = this.baseEntry(runId, record);

    const whitelisted = await this.whitelist.findMatch(record.memberId, record.email);
    if (whitelisted) {
      await this.logs.logRemoval({ ...base, status: 'whitelisted' });
      logger.info(`[Sweep] Subscription ${record.id} whitelisted, skipping`, { runId });
      return 'whitelisted';
    }

    const memberId = record.memberId;
    if (!memberId) {
      await this.logs.logRemoval({ ...base, status: 'no_member_id' });
      logger.warn(`[Sweep] Subscription ${record.id} (${redactEmail(record.email)}) has no member id`, { runId });
      return 'no_member_id';
    }

    if (!this.directory.isValidMemberId(memberId)) {
      await this.logs.logRemoval({ ...base, status: 'invalid_member_id', error: `Invalid member id: ${memberId}` });
      logger.warn(`[Sweep] Subscription ${record.id} has an invalid member id`, { runId });
      return 'invalid_member_id';
    }

    await this.logs.logRemoval({ ...base, status: 'processing' });

    const groupsRemoved: string[] = [];
    const groupsFailed: string[] = [];
    const errors: string[] = [];

    for (const groupId of this.config.groupIds) {
      const result = await this.directory.removeMember(groupId, memberId);
      if (result.ok) {
        groupsRemoved.push(groupId);
      } else {
        groupsFailed.push(groupId);
        errors.push(`${groupId}: ${result.error}`);
      }
    }

    if (groupsRemoved.length === 0) {
      await this.logs.logRemoval({
        ...base,
        status: 'failed',
        groupsFailed,
        error: errors.join('; '),
      });
      logger.warn(`[Sweep] Could not remove subscription ${record.id} from any group`, { runId, errors });
      return 'failed';
    }

    // Conditional on the version read above: a payment that landed during the directory
    // calls keeps its reactivation
    const marked = await this.subscriptions.updateStatusIfUnchanged(record.id, record.updatedAt, 'auto_removed');
    if (!marked) {
      const latest = await this.subscriptions.findById(record.id);
      const latestStatus = latest ? latest.status : 'deleted';
      await this.logs.logRemoval({
        ...base,
        status: 'superseded',
        groupsRemoved,
        groupsFailed,
        error: `Subscription changed during removal; status left as ${latestStatus}`,
      });
      logger.warn(`[Sweep] Subscription ${record.id} changed during removal, left as ${latestStatus}`, {
        runId,
        groupsRemoved,
      });
      return 'superseded';
    }

    const notificationSent = await this.sendRemovalNotice(runId, memberId);
    await this.logs.logRemoval({
      ...base,
      status: 'success',
      groupsRemoved,
      groupsFailed,
      notificationSent,
      error: errors.length > 0 ? errors.join('; ') : null,
    });

    logger.info(`[Sweep] Removed subscription ${record.id} from ${groupsRemoved.length} group(s)`, {
      runId,
      reason: base.reason,
      groupsFailed,
    });
    return 'success';
  }

  /** Best effort: a failed or throwing notifier never undoes a removal. */
  private async sendRemovalNotice(runId: string, memberId: string): Promise<boolean> {
    try {
      const notice = await this.notifier.sendDirectMessage(memberId, renderRemovalNotice(this.config));
      if (!notice.ok) {
        logger.warn(`[Sweep] Removal notice to member ${memberId} failed: ${notice.error}`, { runId });
      }
      return notice.ok;
    } catch (error) {
      logger.warn(`[Sweep] Removal notice to member ${memberId} failed: ${formatError(error)}`, { runId });
      return false;
    }
  }

  private baseEntry(runId: string, record: SubscriptionRecord): Omit<NewRemovalLogEntry, 'status'> {
    return {
      runId,
      subscriptionId: record.id,
      email: record.email,
      memberId: record.memberId,
      reason: removalReasonFor(record),
      groupsRemoved: [],
      groupsFailed: [],
      notificationSent: false,
      error: null,
    };
  }
}
