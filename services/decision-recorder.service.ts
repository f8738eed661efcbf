import { randomUUID } from 'crypto';
import { StoreUnavailableError } from '../utils/app-error';
import { loggingService } from './logging.service';
import { roundTo } from './decision-policy.service';
import type { DecisionStore } from './decision-store.service';
import type { AggregateStats, Application, Decision, DecisionRecord } from '../types';

const log = loggingService.scope('recorder');

export const DEFAULT_RECENT_LIMIT = 10;
export const MAX_RECENT_LIMIT = 100;

export interface DecisionRecorderOptions {
  /** Writes waiting beyond this many are dropped. */
  queueLimit?: number;
  idFactory?: () => string;
}

export interface RecorderStatus {
  enabled: boolean;
  connected: boolean;
  pending: number;
  written: number;
  failed: number;
  dropped: number;
}

/**
 * Best-effort decision log. `record` never blocks or throws: writes go through a bounded
 * queue drained by a single background writer, and store failures are logged and counted.
 * A null store means recording is disabled (no connection string configured).
 */
export class DecisionRecorder {
  private readonly queue: DecisionRecord[] = [];
  private readonly queueLimit: number;
  private readonly idFactory: () => string;
  private draining: Promise<void> | null = null;
  private written = 0;
  private failed = 0;
  private dropped = 0;

  constructor(private readonly store: DecisionStore | null, options: DecisionRecorderOptions = {}) {
    this.queueLimit = Math.max(1, Math.floor(options.queueLimit ?? 1000));
    this.idFactory = options.idFactory ?? randomUUID;
  }

  get enabled(): boolean {
    return this.store !== null;
  }

  isConnected(): boolean {
    return this.store?.isConnected() ?? false;
  }

  /**
   * Queues the decision for persistence and returns its record id,
   * or null when recording is disabled, the store is unavailable or the queue is full.
   */
  record(application: Application, decision: Decision): string | null {
    if (!this.store) return null;

    if (!this.store.isConnected()) {
      this.dropped += 1;
      log.warn(`Decision store not connected; applicant ${decision.applicantId} not recorded`, undefined, {
        dropped: this.dropped,
      });
      return null;
    }

    if (this.queue.length >= this.queueLimit) {
      this.dropped += 1;
      log.warn(`Decision queue full (${this.queueLimit}); dropped record for applicant ${decision.applicantId}`, undefined, {
        dropped: this.dropped,
      });
      return null;
    }

    const record: DecisionRecord = {
      recordId: this.idFactory(),
      timestamp: decision.createdAt,
      application: { ...application },
      decision,
      modelVersion: decision.modelVersion,
    };
    this.queue.push(record);
    this.startDrain();
    return record.recordId;
  }

  /** Resolves once every queued write has been attempted. */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  async recent(limit: number = DEFAULT_RECENT_LIMIT): Promise<DecisionRecord[]> {
    if (!this.store || !this.store.isConnected()) return [];
    const bounded = Number.isFinite(limit) ? Math.min(MAX_RECENT_LIMIT, Math.max(1, Math.floor(limit))) : DEFAULT_RECENT_LIMIT;
    try {
      return await this.store.findRecent(bounded);
    } catch (error) {
      log.warn('Failed to read recent decisions', error);
      return [];
    }
  }

  /** Recomputed from the store on every call. */
  async stats(): Promise<AggregateStats> {
    if (!this.store || !this.store.isConnected()) {
      return { connected: false, message: 'Decision store not connected' };
    }

    try {
      const { total, approved, averageCreditScore } = await this.store.summarize();
      if (total === 0) {
        return {
          connected: true,
          empty: true,
          totalDecisions: 0,
          approvalRate: 0,
          averageCreditScore: null,
          message: 'No decisions recorded yet',
        };
      }
      return {
        connected: true,
        empty: false,
        totalDecisions: total,
        approvalRate: roundTo(approved / total, 3),
        averageCreditScore: Math.round(averageCreditScore ?? 0),
      };
    } catch (error) {
      log.warn('Failed to compute decision statistics', error);
      return { connected: true, error: 'Failed to compute decision statistics' };
    }
  }

  status(): RecorderStatus {
    return {
      enabled: this.enabled,
      connected: this.isConnected(),
      pending: this.queue.length,
      written: this.written,
      failed: this.failed,
      dropped: this.dropped,
    };
  }

  private startDrain(): void {
    if (this.draining) return;
    this.draining = this.drain().finally(() => {
      this.draining = null;
      if (this.queue.length > 0) this.startDrain();
    });
  }

  private async drain(): Promise<void> {
    while (this.queue.length > 0) {
      const record = this.queue.shift();
      if (!record) break;
      try {
        await this.write(record);
        this.written += 1;
      } catch (error) {
        this.failed += 1;
        log.warn(`Decision ${record.recordId} not recorded`, error, { failed: this.failed });
      }
    }
  }

  private async write(record: DecisionRecord): Promise<void> {
    const store = this.store;
    if (!store || !store.isConnected()) {
      throw new StoreUnavailableError('Decision store is not connected');
    }
    try {
      await store.insert(record);
    } catch (cause) {
      throw new StoreUnavailableError(`Failed to write decision ${record.recordId}`, { cause });
    }
  }
}
