import dotenv from 'dotenv'

dotenv.config()

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

const DEFAULT_LOG_LEVEL: LogLevel = 'info';
const DEFAULT_OUTPUT_PATH = 'result.json';

export function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_LOG_LEVEL;
  }
  const level = LOG_LEVELS.find((candidate) => candidate === value.trim());
  if (!level) {
    throw new Error(`Invalid PROFILER_LOG_LEVEL environment variable: ${value}`);
  }
  return level;
}

export function parseOutputPath(value: string | undefined): string {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_OUTPUT_PATH;
  }
  return value.trim();
}

export class Config {
  static readonly DEFAULT_OUTPUT_PATH = parseOutputPath(process.env.PROFILER_OUTPUT_PATH);
  static readonly LOG_LEVEL = parseLogLevel(process.env.PROFILER_LOG_LEVEL);
}
