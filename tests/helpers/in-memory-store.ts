import type { DecisionStore, DecisionSummary } from '../../services/decision-store.service';
import type { DecisionRecord } from '../../types';

/**
 * In-process stand-in for the MongoDB decision collection.
 */
export class InMemoryDecisionStore implements DecisionStore {
  readonly records: DecisionRecord[] = [];
  connected = true;
  failInserts = false;
  /** When set, inserts wait for this promise before landing. */
  gate: Promise<void> | null = null;

  isConnected(): boolean {
    return this.connected;
  }

  async insert(record: DecisionRecord): Promise<string> {
    if (this.gate) await this.gate;
    if (this.failInserts) {
      throw new Error('connection reset by peer');
    }
    this.records.push(record);
    return record.recordId;
  }

  async findRecent(limit: number): Promise<DecisionRecord[]> {
    return [...this.records]
      .reverse()
      .sort((a, b) => b.timestamp.localeCompare(a.timestamp))
      .slice(0, limit);
  }

  async summarize(): Promise<DecisionSummary> {
    const total = this.records.length;
    const approved = this.records.filter((record) => record.decision.approved).length;
    const averageCreditScore =
      total === 0 ? null : this.records.reduce((sum, record) => sum + record.decision.creditScore, 0) / total;
    return { total, approved, averageCreditScore };
  }
}
