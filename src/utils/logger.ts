import { pino, type Logger } from 'pino';
import { getConfig } from '../config/index.js';

/**
 * Named module logger at the configured level
 */
export function createLogger(name: string): Logger {
  return pino({ name, level: getConfig().logLevel });
}
