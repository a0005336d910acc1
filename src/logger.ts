import * as fs from 'node:fs';
import { getRunId } from './context.js';
import { errorMessage } from './errors.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogFileOptions {
  path: string;
  maxBytes: number;
  backupCount: number;
}

export interface LoggerOptions {
  level?: LogLevel;
  file?: LogFileOptions | null;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

const envLevel = process.env.LOG_LEVEL;
let configuredLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
let fileSink: LogFileOptions | null = null;

// stdout belongs to the report; every log line goes to stderr.
const isTTY = process.stderr.isTTY ?? false;

export function configureLogger(options: LoggerOptions): void {
  if (options.level) configuredLevel = options.level;
  if (options.file !== undefined) fileSink = options.file;
}

export function getLogLevel(): LogLevel {
  return configuredLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[configuredLevel];
}

function formatTTY(level: LogLevel, msg: string, meta?: Record<string, unknown>): string {
  const color = LEVEL_COLORS[level];
  const ts = new Date().toISOString().slice(11, 23);
  const runId = getRunId();
  const rid = runId ? ` [${runId.slice(0, 8)}]` : '';
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
  return `${color}${ts} ${level.toUpperCase().padEnd(5)}${RESET}${rid} ${msg}${metaStr}`;
}

function formatJSON(level: LogLevel, msg: string, meta?: Record<string, unknown>): string {
  const entry: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    message: msg,
  };
  const runId = getRunId();
  if (runId) entry.runId = runId;
  if (meta) Object.assign(entry, meta);
  return JSON.stringify(entry);
}

function rotateIfNeeded(sink: LogFileOptions, incomingBytes: number): void {
  if (!fs.existsSync(sink.path)) return;
  const size = fs.statSync(sink.path).size;
  if (size === 0 || size + incomingBytes <= sink.maxBytes) return;

  if (sink.backupCount === 0) {
    fs.truncateSync(sink.path, 0);
    return;
  }

  for (let i = sink.backupCount - 1; i >= 1; i--) {
    const source = `${sink.path}.${i}`;
    if (fs.existsSync(source)) fs.renameSync(source, `${sink.path}.${i + 1}`);
  }
  fs.renameSync(sink.path, `${sink.path}.1`);
}

function writeToFile(line: string): void {
  if (!fileSink) return;
  const sink = fileSink;
  const data = `${line}\n`;
  try {
    rotateIfNeeded(sink, Buffer.byteLength(data));
    fs.appendFileSync(sink.path, data, 'utf-8');
  } catch (err) {
    fileSink = null;
    console.error(`Log file ${sink.path} disabled: ${errorMessage(err)}`);
  }
}

function log(level: LogLevel, msg: string, meta?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  console.error(isTTY ? formatTTY(level, msg, meta) : formatJSON(level, msg, meta));
  writeToFile(formatJSON(level, msg, meta));
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => log('debug', msg, meta),
  info: (msg: string, meta?: Record<string, unknown>) => log('info', msg, meta),
  warn: (msg: string, meta?: Record<string, unknown>) => log('warn', msg, meta),
  error: (msg: string, meta?: Record<string, unknown>) => log('error', msg, meta),
};

export type Logger = typeof logger;
