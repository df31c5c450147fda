import pino from 'pino';
import { env } from '../config/env';

export const logger = pino({
  name: 'player-crosswalk',
  level: env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL,
});
