import morgan, { StreamOptions } from 'morgan';
import { Request } from 'express';
import { logger } from '../utils';
import { env } from '../config';

// Morgan lines go to winston at the http level
const stream: StreamOptions = {
  write: (message: string) => {
    logger.http(message.trim());
  },
};

// Liveness probes arrive every few seconds
const isLivenessProbe = (req: Request): boolean => req.originalUrl.endsWith('/health/live');

const skip = (req: Request): boolean => {
  return env.NODE_ENV === 'test' || isLivenessProbe(req);
};

// Request logger middleware
export const requestLogger = morgan(
  env.NODE_ENV === 'production' ? 'combined' : 'dev',
  { stream, skip }
);

export default requestLogger;
