import { createLogger, transports, format } from 'winston';
import type { Logger } from 'winston';
import { Config } from './config.js';

export function createModuleLogger(label: string): Logger {
  return createLogger({
    level: Config.LOG_LEVEL,
    format: format.combine(
      format.label({ label: `[${label}]` }),
      format.timestamp(),
      format.json()
    ),
    transports: [
      new transports.Console(),
    ],
  });
}
