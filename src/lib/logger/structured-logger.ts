/**
 * Structured Logger with Pino
 *
 * - Fast JSON logging with Pino
 * - Pretty console output in DEV
 * - Optional daily rotated log files
 * - Automatic secret redaction
 * - Per-component child loggers
 */

import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import { PinoPretty } from 'pino-pretty';
import * as rfs from 'rotating-file-stream';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

function createFileStream(): rfs.RotatingFileStream | undefined {
  if (!config.toFile) return undefined;

  const logsDir = path.resolve(process.cwd(), config.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  return rfs.createStream('assistant.log', {
    interval: '1d',
    path: logsDir,
    maxFiles: config.rotateDays,
    compress: 'gzip',
  });
}

const fileStream = createFileStream();

const streams: pino.StreamEntry[] = [];

if (config.console) {
  streams.push({
    level: config.level === 'silent' ? 'fatal' : config.level,
    stream: config.pretty
      ? PinoPretty({
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
        })
      : process.stdout,
  });
}

if (fileStream) {
  streams.push({
    level: config.level === 'silent' ? 'fatal' : config.level,
    stream: fileStream,
  });
}

export const logger = pino(
  {
    level: config.level,
    redact: {
      paths: config.redactFields,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.multistream(streams)
);

export type Logger = pino.Logger;

/**
 * Child logger bound to a component name
 */
export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
