import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { DriftInputError } from '../utils/app-error';
import { loggingService } from './logging.service';
import { detectDrift } from './drift.service';
import type { DatasetRow, DriftOptions, DriftSummary } from './drift.service';
import type { DecisionStore } from './decision-store.service';

const log = loggingService.scope('drift');

export const SUMMARY_FILE = 'drift_summary.json';
export const REPORT_FILE = 'drift_report.json';
const LOCK_FILE = '.drift.lock';
/** A lock older than this is taken over even if its pid looks alive (pids get reused). */
export const LOCK_STALE_MS = 60 * 60 * 1000;

export type BatchSource =
  | { kind: 'csv'; path: string }
  | { kind: 'store'; store: DecisionStore; limit: number };

export interface DriftJobConfig {
  reference: BatchSource;
  current: BatchSource;
  outputDir: string;
  options?: Omit<DriftOptions, 'includeReport'>;
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

const unquote = (cell: string) => cell.trim().replace(/^"(.*)"$/, '$1');

/**
 * Header row plus numeric rows. Empty or unparseable cells become NaN and are rejected by the detector
 * if they belong to a monitored feature.
 */
export function parseCsv(content: string, label: string): DatasetRow[] {
  const lines = content.split(/\r?\n/).filter((line) => line.trim() !== '');
  if (lines.length === 0) {
    throw new DriftInputError(`${label} CSV is empty`);
  }
  const header = lines[0].split(',').map(unquote);
  return lines.slice(1).map((line, index) => {
    const cells = line.split(',');
    if (cells.length !== header.length) {
      throw new DriftInputError(`${label} CSV line ${index + 2} has ${cells.length} cells, expected ${header.length}`);
    }
    const row: Record<string, number> = {};
    header.forEach((column, i) => {
      const cell = unquote(cells[i]);
      row[column] = cell === '' ? Number.NaN : Number(cell);
    });
    return row;
  });
}

async function loadBatch(source: BatchSource, label: string): Promise<DatasetRow[]> {
  if (source.kind === 'store') {
    if (!source.store.isConnected()) {
      throw new DriftInputError(`${label} batch needs the decision store, which is not connected`);
    }
    const records = await source.store.findRecent(source.limit);
    return records.map((record) => record.application);
  }

  let content: string;
  try {
    content = await fs.readFile(path.resolve(source.path), 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DriftInputError(`Could not read ${label.toLowerCase()} CSV ${source.path}: ${reason}`);
  }
  return parseCsv(content, label);
}

const writeJson = async (file: string, payload: unknown) => {
  // write-then-rename so readers never see a half-written file
  const temp = `${file}.tmp`;
  await fs.writeFile(temp, `${JSON.stringify(payload, null, 2)}\n`, 'utf8');
  await fs.rename(temp, file);
};

const toSummaryFile = (summary: DriftSummary) => ({
  timestamp: summary.timestamp,
  drift_detected: summary.driftDetected,
  reference_size: summary.referenceSize,
  current_size: summary.currentSize,
  drifted_features: summary.driftedFeatures,
  feature_count: summary.featureCount,
  drift_share: summary.driftShare,
  method: summary.method,
});

export const driftSummaryFileSchema = z.object({
  timestamp: z.string(),
  drift_detected: z.boolean(),
  reference_size: z.number(),
  current_size: z.number(),
  drifted_features: z.number(),
  feature_count: z.number(),
  drift_share: z.number(),
  method: z.enum(['ks', 'psi']),
});

export type DriftSummaryFile = z.infer<typeof driftSummaryFileSchema>;

const lockOwnerSchema = z.object({ pid: z.number().int().positive(), startedAt: z.string().optional() });

/** Lock contents: `{pid, startedAt}`, or a bare pid. Anything else yields null. */
const readLockOwner = (content: string): z.infer<typeof lockOwnerSchema> | null => {
  const trimmed = content.trim();
  if (/^\d+$/.test(trimmed)) return { pid: Number(trimmed) };
  try {
    const parsed = lockOwnerSchema.safeParse(JSON.parse(trimmed));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
};

const isProcessAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return !(isErrnoException(error) && error.code === 'ESRCH');
  }
};

/** A lock is stale when its owner is gone or it has been held longer than LOCK_STALE_MS. */
async function isStaleLock(lockPath: string, now: Date): Promise<boolean> {
  let content: string;
  let modifiedAt: number;
  try {
    [content, modifiedAt] = await Promise.all([
      fs.readFile(lockPath, 'utf8'),
      fs.stat(lockPath).then((stats) => stats.mtimeMs),
    ]);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return true;
    throw error;
  }

  const owner = readLockOwner(content);
  const startedAt = owner?.startedAt ? Date.parse(owner.startedAt) : modifiedAt;
  if (Number.isFinite(startedAt) && now.getTime() - startedAt > LOCK_STALE_MS) return true;
  return owner !== null && !isProcessAlive(owner.pid);
}

const openExclusive = async (lockPath: string, outputDir: string): Promise<FileHandle> => {
  try {
    return await fs.open(lockPath, 'wx');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      throw new DriftInputError(`Another drift run is writing to ${outputDir}`);
    }
    throw error;
  }
};

async function acquireLock(lockPath: string, outputDir: string, now: () => Date): Promise<FileHandle> {
  try {
    return await openExclusive(lockPath, outputDir);
  } catch (error) {
    if (!(error instanceof DriftInputError) || !(await isStaleLock(lockPath, now()))) throw error;
  }
  log.warn(`Taking over stale drift lock ${lockPath}`);
  await fs.rm(lockPath, { force: true });
  return openExclusive(lockPath, outputDir);
}

/**
 * One offline run: load both batches, compare, overwrite summary and report.
 * A lock file keeps two runs from writing the same output directory at once;
 * a lock left behind by a dead or long-gone run is taken over.
 */
export async function runDriftJob(config: DriftJobConfig): Promise<DriftSummary> {
  const outputDir = path.resolve(config.outputDir);
  await fs.mkdir(outputDir, { recursive: true });

  const now = config.options?.now ?? (() => new Date());
  const lockPath = path.join(outputDir, LOCK_FILE);
  const lock = await acquireLock(lockPath, outputDir, now);

  try {
    await lock.writeFile(JSON.stringify({ pid: process.pid, startedAt: now().toISOString() }));
    const [reference, current] = await Promise.all([
      loadBatch(config.reference, 'Reference'),
      loadBatch(config.current, 'Current'),
    ]);
    log.info(`Comparing ${current.length} current rows against ${reference.length} reference rows`);

    const summary = detectDrift(reference, current, { ...config.options, includeReport: true });

    await writeJson(path.join(outputDir, SUMMARY_FILE), toSummaryFile(summary));
    await writeJson(path.join(outputDir, REPORT_FILE), { ...toSummaryFile(summary), report: summary.report });

    log.info(`Dataset drift detected: ${summary.driftDetected} (${summary.driftedFeatures}/${summary.featureCount} features)`, {
      driftDetected: summary.driftDetected,
      driftedFeatures: summary.driftedFeatures,
    });
    return summary;
  } finally {
    await lock.close();
    await fs.rm(lockPath, { force: true });
  }
}

/** Latest summary written by runDriftJob, or null before the first run. */
export async function readLatestSummary(outputDir: string): Promise<DriftSummaryFile | null> {
  let content: string;
  try {
    content = await fs.readFile(path.join(path.resolve(outputDir), SUMMARY_FILE), 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return null;
    throw error;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new DriftInputError(`Drift summary in ${outputDir} is not valid JSON`);
  }
  const parsed = driftSummaryFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DriftInputError(`Drift summary in ${outputDir} is malformed`);
  }
  return parsed.data;
}
