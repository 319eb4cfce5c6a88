import * as fs from 'fs';
import * as path from 'path';
import * as util from 'util';
import { config } from '../config';

// Log levels
type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

const minLevel: LogLevel = config.debug ? 'debug' : isLogLevel(config.logging.level) ? config.logging.level : 'info';

let logStream: fs.WriteStream | undefined;

/**
 * Opens the log file on first use so that importing the logger has no side effects
 */
function getLogStream(): fs.WriteStream {
  if (!logStream) {
    const logDir = path.resolve(config.logging.dir);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const logPath = path.join(logDir, `grader-${timestamp}.log`);
    logStream = fs.createWriteStream(logPath, { flags: 'a', encoding: 'utf8' });
  }
  return logStream;
}

/**
 * Formats a log message with timestamp and level
 */
export function formatLogMessage(level: LogLevel, message: string, ...args: unknown[]): string {
  const timestamp = new Date().toLocaleString();
  const formattedMessage = args.length > 0 ? util.format(message, ...args) : message;
  const paddedLevel = level.toUpperCase().padEnd(5, ' ');
  return `[${timestamp}] [${paddedLevel}] ${formattedMessage}`;
}

/**
 * Writes a log message to console and log file
 */
function log(level: LogLevel, message: string, ...args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
    return;
  }
  const formattedMessage = formatLogMessage(level, message, ...args);

  switch (level) {
    case 'info':
      console.info(formattedMessage);
      break;
    case 'warn':
      console.warn(formattedMessage);
      break;
    case 'error':
      console.error(formattedMessage);
      break;
    case 'debug':
      console.debug(formattedMessage);
      break;
  }

  if (config.logging.toFile) {
    getLogStream().write(formattedMessage + '\n');
  }
}

/**
 * Logger utility for consistent logging across the application
 */
export const logger = {
  info: (message: string, ...args: unknown[]) => log('info', message, ...args),
  warn: (message: string, ...args: unknown[]) => log('warn', message, ...args),
  error: (message: string, ...args: unknown[]) => log('error', message, ...args),
  debug: (message: string, ...args: unknown[]) => log('debug', message, ...args),

  // Close the log stream (call this when the application exits)
  close: () => {
    logStream?.end();
    logStream = undefined;
  }
};

process.on('exit', () => {
  logger.close();
});
