import pino from 'pino';
import { v4 as uuid } from 'uuid';

const prettyOutput = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
const level = process.env.LOG_LEVEL || 'info';

// stderr only: stdout carries `scan --json` output
export const logger = prettyOutput
  ? pino({ level, transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } } })
  : pino({ level }, process.stderr);

export function createScanLogger() {
  return logger.child({ scanId: uuid() });
}

export function createStoreLogger(file: string) {
  return logger.child({ store: file });
}
