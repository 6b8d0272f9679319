import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';
import { LoggingOptions } from '../config/agent.config';
import { SecretRedactor } from './secret-redactor';

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';
const FILE_PREFIX = 'procdoc-agent';

export function formatFileLine({
  timestamp,
  level,
  message,
  context,
  stack,
}: winston.Logform.TransformableInfo): string {
  const contextStr = context ? `[${String(context)}] ` : '';
  const stackStr = stack ? `\n${String(stack)}` : '';
  return `[${String(timestamp)}] [${level.toUpperCase()}] ${contextStr}${String(message)}${stackStr}`;
}

export function formatConsoleLine({
  timestamp,
  level,
  message,
  context,
}: winston.Logform.TransformableInfo): string {
  const contextStr = context ? `[${String(context)}] ` : '';
  return `[${String(timestamp)}] ${level} ${contextStr}${String(message)}`;
}

function resolveLogDirectory(directory: string): string {
  const resolved = path.resolve(directory);
  try {
    fs.mkdirSync(resolved, { recursive: true });
    return resolved;
  } catch (error) {
    console.error(
      `Failed to create log directory ${resolved}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return os.tmpdir();
  }
}

function rotatingFile(
  logDir: string,
  name: string,
  format: winston.Logform.Format,
  level?: string,
): DailyRotateFile {
  return new DailyRotateFile({
    filename: path.join(logDir, `${FILE_PREFIX}${name}-%DATE%.log`),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles: '14d',
    format,
    level,
  });
}

/**
 * Console at the configured level, a debug file per day, and separate files
 * for errors, uncaught exceptions and unhandled rejections. Registered
 * secrets are masked before any transport sees a line.
 */
export function createWinstonLogger(
  options: LoggingOptions,
  redactor: SecretRedactor,
): winston.Logger {
  const logDir = resolveLogDirectory(options.directory);

  const fileFormat = winston.format.combine(
    redactor.format(),
    winston.format.timestamp({ format: TIMESTAMP_FORMAT }),
    winston.format.errors({ stack: true }),
    winston.format.printf(formatFileLine),
  );
  const consoleFormat = winston.format.combine(
    redactor.format(),
    winston.format.colorize(),
    winston.format.timestamp({ format: TIMESTAMP_FORMAT }),
    winston.format.printf(formatConsoleLine),
  );

  return winston.createLogger({
    level: 'debug',
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
        level: options.level,
      }),
      rotatingFile(logDir, '', fileFormat, 'debug'),
      rotatingFile(logDir, '-error', fileFormat, 'error'),
    ],
    exceptionHandlers: [rotatingFile(logDir, '-exceptions', fileFormat)],
    rejectionHandlers: [rotatingFile(logDir, '-rejections', fileFormat)],
  });
}
