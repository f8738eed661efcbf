import type { Request, Response, NextFunction } from 'express';
import chalk from 'chalk';
import { logger } from '../utils/logger';

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = req.startTime ?? Date.now();

  logger.info(`${chalk.cyan(req.method)} ${req.originalUrl} ${chalk.gray(req.requestId ?? '')}`);

  res.on('finish', () => {
    const duration = Date.now() - start;
    const statusColor =
      res.statusCode >= 500
        ? chalk.red
        : res.statusCode >= 400
        ? chalk.yellow
        : chalk.green;

    logger.info(`${chalk.cyan(req.method)} ${req.originalUrl} → ${statusColor(res.statusCode)} (${duration}ms)`);
  });

  next();
};
