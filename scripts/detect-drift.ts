import env from '../config/env';
import { connectDB, disconnectDB } from '../config/db';
import { MongoDecisionStore } from '../services/decision-store.service';
import { runDriftJob } from '../services/drift-job.service';
import type { BatchSource } from '../services/drift-job.service';
import { logger } from '../utils/logger';

/**
 * Offline drift check.
 *   npm run drift                 reference CSV vs current CSV
 *   npm run drift -- --from-store reference CSV vs the latest recorded applications
 */
const FROM_STORE_LIMIT = 5000;

export const detectDrift = async (argv: readonly string[]) => {
  const fromStore = argv.includes('--from-store');

  let current: BatchSource = { kind: 'csv', path: env.drift.CURRENT_PATH };
  if (fromStore) {
    const connected = await connectDB(env.MONGO_URI);
    if (!connected) {
      throw new Error('--from-store needs a reachable MONGO_URI');
    }
    current = { kind: 'store', store: new MongoDecisionStore(), limit: FROM_STORE_LIMIT };
  }

  try {
    const summary = await runDriftJob({
      reference: { kind: 'csv', path: env.drift.REFERENCE_PATH },
      current,
      outputDir: env.drift.OUTPUT_DIR,
      options: {
        method: env.drift.METHOD,
        threshold: env.drift.THRESHOLD,
        driftShare: env.drift.SHARE,
      },
    });
    logger.divider();
    for (const feature of summary.report?.features ?? []) {
      const line = `${feature.feature}: ${feature.method}=${feature.statistic}${feature.pValue === null ? '' : ` p=${feature.pValue.toExponential(2)}`}`;
      if (feature.drifted) {
        logger.warn(`${line} DRIFTED`);
      } else {
        logger.info(line);
      }
    }
    logger.divider();
    return summary;
  } finally {
    if (fromStore) await disconnectDB();
  }
};

// Run if called directly
if (require.main === module) {
  detectDrift(process.argv.slice(2))
    .then((summary) => {
      logger.success(`Drift detection complete (drift detected: ${summary.driftDetected}); see ${env.drift.OUTPUT_DIR}/`);
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.error('Drift detection failed:', error);
      process.exit(1);
    });
}
