import mongoose from 'mongoose';
import { DecisionRecordModel } from '../models/DecisionRecord';
import type { IDecisionRecord } from '../models/DecisionRecord';
import type { DecisionRecord } from '../types';

export interface DecisionSummary {
  total: number;
  approved: number;
  /** null when the store is empty */
  averageCreditScore: number | null;
}

/**
 * Append-only document store for decision records.
 * Implementations must give readers at least read-committed visibility of appends.
 */
export interface DecisionStore {
  isConnected(): boolean;
  insert(record: DecisionRecord): Promise<string>;
  /** Most recent first. */
  findRecent(limit: number): Promise<DecisionRecord[]>;
  summarize(): Promise<DecisionSummary>;
}

const toRecord = (doc: IDecisionRecord): DecisionRecord => ({
  recordId: doc.recordId,
  timestamp: doc.timestamp instanceof Date ? doc.timestamp.toISOString() : String(doc.timestamp),
  application: doc.application,
  decision: doc.decision,
  modelVersion: doc.modelVersion,
});

/** Newest first; `_id` breaks ties between decisions stamped in the same millisecond. */
export const recentQuery = (limit: number) =>
  DecisionRecordModel.find({}, { _id: 0 }).sort({ timestamp: -1, _id: -1 }).limit(limit).lean<IDecisionRecord[]>();

export class MongoDecisionStore implements DecisionStore {
  isConnected(): boolean {
    return mongoose.connection.readyState === mongoose.ConnectionStates.connected;
  }

  async insert(record: DecisionRecord): Promise<string> {
    await DecisionRecordModel.create({
      ...record,
      timestamp: new Date(record.timestamp),
    });
    return record.recordId;
  }

  async findRecent(limit: number): Promise<DecisionRecord[]> {
    const docs = await recentQuery(limit).exec();
    return docs.map(toRecord);
  }

  async summarize(): Promise<DecisionSummary> {
    const [total, approved, averages] = await Promise.all([
      DecisionRecordModel.countDocuments({}).exec(),
      DecisionRecordModel.countDocuments({ 'decision.approved': true }).exec(),
      DecisionRecordModel.aggregate<{ avgCreditScore: number | null }>([
        { $group: { _id: null, avgCreditScore: { $avg: '$decision.creditScore' } } },
      ]).exec(),
    ]);
    return {
      total,
      approved,
      averageCreditScore: averages[0]?.avgCreditScore ?? null,
    };
  }
}
