import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import { getTraceContext } from './trace-context.js';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Directory for log files */
  logDir: string;
  /** Maximum number of log files to keep */
  maxFiles: number;
  /** Log level */
  level: pino.Level;
  /** Enable pretty printing (development) */
  pretty: boolean;
  /** Write a log file besides the console (default: true) */
  toFile: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: './data/logs',
  maxFiles: 10,
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
  toFile: true,
};

const LOG_PREFIX = 'bot-';

function generateLogFilename(): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  return `${LOG_PREFIX}${timestamp}.log`;
}

/**
 * Remove empty log files and keep only the newest maxFiles.
 */
function cleanupOldLogs(logDir: string, maxFiles: number): void {
  if (!fs.existsSync(logDir)) {
    return;
  }

  const files = fs
    .readdirSync(logDir)
    .filter((f) => f.startsWith(LOG_PREFIX) && f.endsWith('.log'))
    .map((f) => {
      const filePath = path.join(logDir, f);
      const stats = fs.statSync(filePath);
      return { path: filePath, mtime: stats.mtime.getTime(), size: stats.size };
    });

  const stale = [
    ...files.filter((f) => f.size === 0),
    ...files
      .filter((f) => f.size > 0)
      .sort((a, b) => b.mtime - a.mtime)
      .slice(maxFiles),
  ];

  for (const file of stale) {
    try {
      fs.unlinkSync(file.path);
    } catch (error) {
      // Another process may have removed it already
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') throw error;
    }
  }
}

/**
 * Pino mixin that adds the current trace context to every entry.
 * Fields passed explicitly to a log call win over it.
 */
function createTraceMixin(): () => Record<string, unknown> {
  return () => {
    const ctx = getTraceContext();
    if (!ctx) return {};

    const result: Record<string, unknown> = { traceId: ctx.traceId };
    if (ctx.userId) result['userId'] = ctx.userId;
    if (ctx.spanId) result['spanId'] = ctx.spanId;
    return result;
  };
}

/**
 * Create the process logger.
 *
 * - Console output (pino-pretty in development, JSON on stdout otherwise)
 * - Timestamped file under logDir, with old and empty files cleaned up
 * - Trace context injected from AsyncLocalStorage
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { logDir, maxFiles, level, pretty, toFile } = { ...DEFAULT_CONFIG, ...config };

  const targets: pino.TransportTargetOptions[] = [];

  if (pretty) {
    targets.push({ target: 'pino-pretty', level, options: { colorize: true } });
  } else {
    targets.push({ target: 'pino/file', level, options: { destination: 1 } });
  }

  if (toFile) {
    fs.mkdirSync(logDir, { recursive: true });
    cleanupOldLogs(logDir, maxFiles);
    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        destination: path.join(logDir, generateLogFilename()),
        mkdir: true,
        colorize: false,
      },
    });
  }

  return pino({
    level,
    transport: { targets },
    mixin: createTraceMixin(),
  });
}
