import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';

/**
 * Request logging middleware
 *
 * Logs each call with its caller and attached deposit, and the response
 * status once it is sent
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();
  const callerId = req.header('x-account-id');
  const attachedDeposit = req.header('x-attached-deposit');

  logger.info('Incoming request', {
    method: req.method,
    path: req.path,
    query: req.query,
    ...(callerId && { callerId }),
    ...(attachedDeposit && { attachedDeposit }),
    ip: req.ip,
  });

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const log = res.statusCode >= 500 ? logger.error.bind(logger) : logger.info.bind(logger);

    log('Outgoing response', {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: `${duration}ms`,
    });
  });

  next();
};
