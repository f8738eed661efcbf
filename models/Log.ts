import mongoose, { Schema } from 'mongoose';

export type LogLevel = 'error' | 'warn' | 'info';

export type LogSource = 'http' | 'recorder' | 'drift' | 'startup';

/** Persisted copy of a console log line, kept for LOG_RETENTION_DAYS. */
export interface ILog {
  level: LogLevel;
  source: LogSource;
  message: string;
  context?: {
    requestId?: string;
    ip?: string;
    route?: string;
    method?: string;
    userAgent?: string;
    duration?: number;
  };
  error?: {
    name?: string;
    message?: string;
    stack?: string;
    code?: string;
    status?: number;
  };
  metadata?: Record<string, unknown>;
  createdAt: Date;
}

const logSchema = new Schema<ILog>({
  level: {
    type: String,
    enum: ['error', 'warn', 'info'],
    required: true,
    index: true
  },
  source: {
    type: String,
    enum: ['http', 'recorder', 'drift', 'startup'],
    default: 'http',
    index: true
  },
  message: {
    type: String,
    required: true
  },
  context: {
    requestId: String,
    ip: String,
    route: String,
    method: String,
    userAgent: String,
    duration: Number
  },
  error: {
    name: String,
    message: String,
    stack: String,
    code: String,
    status: Number
  },
  metadata: {
    type: Schema.Types.Mixed,
    default: {}
  }
}, {
  timestamps: true
});

logSchema.index({ level: 1, createdAt: -1 });
logSchema.index({ 'context.requestId': 1 });
logSchema.index({ source: 1, createdAt: -1 });

// TTL index for automatic log cleanup (default 30 days, configurable via env)
const retentionDays = parseInt(process.env.LOG_RETENTION_DAYS || '30', 10);
logSchema.index({ createdAt: 1 }, { expireAfterSeconds: retentionDays * 24 * 60 * 60 });

const Log = mongoose.model<ILog>('Log', logSchema);

export default Log;
