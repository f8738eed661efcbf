import mongoose, { Schema } from 'mongoose';
import type { Application, Decision } from '../types';

/** One document per credit decision. Append-only: nothing in this service updates or deletes these. */
export interface IDecisionRecord {
  recordId: string;
  timestamp: Date;
  application: Application;
  decision: Decision;
  modelVersion: string;
}

const decisionRecordSchema = new Schema<IDecisionRecord>(
  {
    recordId: { type: String, required: true, unique: true },
    timestamp: { type: Date, required: true },
    application: { type: Schema.Types.Mixed, required: true },
    decision: { type: Schema.Types.Mixed, required: true },
    modelVersion: { type: String, required: true, index: true },
  },
  {
    collection: 'decisions',
    versionKey: false,
  }
);

decisionRecordSchema.index({ timestamp: -1 }); // recent-first reads
decisionRecordSchema.index({ 'decision.approved': 1 }); // approval rate

export const DecisionRecordModel = mongoose.model<IDecisionRecord>('DecisionRecord', decisionRecordSchema);
