import chalk from 'chalk';

type Level = 'info' | 'warn' | 'error' | 'success';

const getTimestamp = () => new Date().toISOString();
const isProduction = process.env.NODE_ENV === 'production';
const isDevelopment = process.env.NODE_ENV === 'development';

const LEVEL_PRIORITY: Record<Level, number> = {
  error: 0,
  warn: 1,
  success: 2,
  info: 2,
};

const configuredLevel = (): number => {
  const raw = (process.env.LOG_LEVEL || '').toLowerCase();
  if (raw === 'error' || raw === 'warn' || raw === 'info' || raw === 'success') {
    return LEVEL_PRIORITY[raw];
  }
  // In production, only log warnings and errors unless told otherwise
  return isProduction ? LEVEL_PRIORITY.warn : LEVEL_PRIORITY.info;
};

const shouldLog = (level: Level) => {
  if (isProduction && level === 'success') return true;
  return LEVEL_PRIORITY[level] <= configuredLevel();
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Reduce error-like values to the handful of fields worth printing.
 */
export const errorField = (err: Error, key: string): unknown => (key in err ? Reflect.get(err, key) : undefined);

export const simplifyError = (err: unknown): unknown => {
  if (err instanceof Error) {
    const code = errorField(err, 'code');
    const statusCode = errorField(err, 'statusCode');
    const field = errorField(err, 'field');
    return {
      name: err.name,
      message: err.message,
      ...(code !== undefined ? { code } : {}),
      ...(statusCode !== undefined ? { statusCode } : {}),
      ...(field !== undefined ? { field } : {}),
      ...(isDevelopment && err.stack ? { stack: err.stack.split('\n').slice(0, 3).join('\n') } : {}),
    };
  }

  if (!isRecord(err)) {
    return err;
  }

  const simplified: Record<string, unknown> = {};
  const importantKeys = ['message', 'error', 'code', 'status', 'statusCode', 'type', 'detail'];

  for (const key of importantKeys) {
    if (err[key] !== undefined) {
      simplified[key] = err[key];
    }
  }

  if (Object.keys(simplified).length === 0) {
    return { type: typeof err, keys: Object.keys(err).slice(0, 10) };
  }

  return simplified;
};

export const logger = {
  info: (msg: string) => {
    if (shouldLog('info')) {
      console.log(`${chalk.blue('[INFO]')} ${chalk.gray(getTimestamp())} → ${msg}`);
    }
  },

  success: (msg: string) => {
    if (shouldLog('success')) {
      console.log(`${chalk.green('[SUCCESS]')} ${chalk.gray(getTimestamp())} → ${msg}`);
    }
  },

  warn: (msg: string) => {
    if (shouldLog('warn')) {
      console.log(`${chalk.yellow('[WARN]')} ${chalk.gray(getTimestamp())} → ${msg}`);
    }
  },

  error: (msg: string, err?: unknown) => {
    if (shouldLog('error')) {
      console.log(`${chalk.red('[ERROR]')} ${chalk.gray(getTimestamp())} → ${msg}`);
      if (err !== undefined) {
        const simplified = simplifyError(err);
        try {
          console.error(chalk.red(JSON.stringify(simplified, null, isDevelopment ? 2 : 0)));
        } catch {
          // Fallback if JSON.stringify fails
          console.error(chalk.red(err instanceof Error ? `  Message: ${err.message}` : String(err)));
        }
      }
    }
  },

  divider: () => {
    if (!isProduction) {
      console.log(chalk.cyan('----------------------------------------'));
    }
  },
};
