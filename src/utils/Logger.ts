import { existsSync, renameSync, rmSync, statSync } from 'node:fs';
import pino from 'pino';
import pretty from 'pino-pretty';
import type { Logger } from 'pino';

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;
export type StreamLevel = (typeof LEVELS)[number];

export interface FileTarget {
  path: string;
  level: StreamLevel;
  maxBytes: number;
  keep: number;
}

export interface LoggerOptions {
  // 'silent' turns the console stream off
  consoleLevel: StreamLevel | 'silent';
  pretty: boolean;
  file?: FileTarget;
}

export interface BuiltLogger {
  logger: Logger;
  file: ReturnType<typeof pino.destination> | null;
}

export function parseLevel(value: string | undefined, fallback: StreamLevel): StreamLevel {
  return LEVELS.find((level) => level === value) ?? fallback;
}

/**
 * Shifts `path` to `path.1`, `path.1` to `path.2` and so on once `path` has
 * reached `maxBytes`. The file past `keep` is dropped.
 */
export function rotateLogFile(path: string, maxBytes: number, keep: number): void {
  if (!existsSync(path) || statSync(path).size < maxBytes) return;
  rmSync(`${path}.${keep}`, { force: true });
  for (let i = keep - 1; i >= 1; i--) {
    if (existsSync(`${path}.${i}`)) renameSync(`${path}.${i}`, `${path}.${i + 1}`);
  }
  renameSync(path, `${path}.1`);
}

export function buildLogger(options: LoggerOptions): BuiltLogger {
  const streams: pino.StreamEntry[] = [];
  const levels: StreamLevel[] = [];

  if (options.consoleLevel !== 'silent') {
    levels.push(options.consoleLevel);
    streams.push({
      level: options.consoleLevel,
      stream: options.pretty
        ? pretty({ translateTime: 'SYS:yyyy-mm-dd HH:MM:ss', colorize: true })
        : pino.destination(1),
    });
  }

  let file: BuiltLogger['file'] = null;
  if (options.file) {
    rotateLogFile(options.file.path, options.file.maxBytes, options.file.keep);
    file = pino.destination({ dest: options.file.path, mkdir: true, sync: true });
    levels.push(options.file.level);
    streams.push({ level: options.file.level, stream: file });
  }

  // the logger must let through whatever the most verbose stream wants
  const lowest = levels.sort((a, b) => pino.levels.values[a] - pino.levels.values[b])[0] ?? 'silent';

  const logger = pino({
    timestamp: pino.stdTimeFunctions.isoTime,
    level: lowest,
    base: {
      pid: process.pid,
      hostname: process.env.HOSTNAME || 'localhost',
      service: 'weather-facts-etl',
    },
  }, pino.multistream(streams));

  return { logger, file };
}

const logFile = process.env.LOG_FILE ?? 'logs/weather_etl.log';

//central logger to be used in all components
const central = buildLogger({
  consoleLevel: process.env.LOG_LEVEL === 'silent' ? 'silent' : parseLevel(process.env.LOG_LEVEL, 'info'),
  pretty: process.env.NODE_ENV === 'development',
  file: logFile
    ? { path: logFile, level: parseLevel(process.env.LOG_FILE_LEVEL, parseLevel(process.env.LOG_LEVEL, 'info')), maxBytes: 2_000_000, keep: 5 }
    : undefined,
});

const centralFile = central.file;
if (centralFile) {
  // logrotate sends SIGHUP after moving the file
  process.on('SIGHUP', () => centralFile.reopen());
}

export function createLogger(context?: string): Logger {
  return context ? central.logger.child({ context }) : central.logger;
}

export default central.logger;
