import { mkdirSync } from 'fs';
import { resolve } from 'path';
import pino, { type TransportMultiOptions } from 'pino';

type Target = TransportMultiOptions['targets'][number];

const level = process.env.LOG_LEVEL || 'info';
const targets: Target[] = [];

// File output is opt-in; stdout stays synchronous otherwise.
if (process.env.LOG_DIR) {
  const logDir = resolve(process.cwd(), process.env.LOG_DIR);
  const logFileName = process.env.LOG_FILE_NAME ?? 'scanner.log';
  try {
    mkdirSync(logDir, { recursive: true });
    if (process.env.LOG_DISABLE_STDOUT !== '1') {
      targets.push({ target: 'pino/file', options: { destination: 1 }, level });
    }
    targets.push({
      target: 'pino/file',
      options: { destination: resolve(logDir, logFileName), mkdir: true },
      level,
    });
  } catch (err) {
    // eslint-disable-next-line no-console
    console.warn('logger-file-init-failed', err instanceof Error ? err.message : String(err));
  }
}

const transport = targets.length > 0 ? pino.transport({ targets }) : undefined;

export type Logger = pino.Logger;

export const log: Logger = transport ? pino({ level }, transport) : pino({ level });
