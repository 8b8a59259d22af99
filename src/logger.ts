import { pino } from 'pino';
import { config } from './config.js';

export const logger = pino({
  name: 'statement-harvester',
  level: config.logLevel,
  redact: ['password', 'passwords', '*.password', '*.passwords'],
});
