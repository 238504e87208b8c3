import fs from 'fs';
import path from 'path';
import util from 'util';
import { loadConfig, LogLevelName, ExtractorConfig } from '../config.js';

const LOG_LEVELS: Record<LogLevelName, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3
};

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
  browser: {
    action(type: string, data?: unknown): void;
    error(type: string, error: unknown): void;
  };
  setLevel(level: LogLevelName): void;
  getLevel(): LogLevelName;
  close(): void;
  getLogFilePath(): string | null;
}

declare global {
  // Shared across re-imports of this module within one process
  var __webparserLogger: Logger | undefined;
}

// Utility to format objects for logging
export function formatData(data: unknown): string {
  if (data === undefined || data === null || data === '') return '';
  if (typeof data === 'string') return data;

  if (data instanceof Error) {
    return `${data.message}\n${data.stack ?? ''}`;
  }

  return util.inspect(data, {
    depth: 4,
    colors: false,
    maxArrayLength: 10,
    breakLength: 120
  });
}

// Get ANSI color code for log level
function getColorForLevel(level: LogLevelName): string {
  switch (level) {
    case 'DEBUG': return '\x1b[90m'; // Gray
    case 'INFO': return '\x1b[32m';  // Green
    case 'WARN': return '\x1b[33m';  // Yellow
    case 'ERROR': return '\x1b[31m'; // Red
    default: return '\x1b[0m';
  }
}

function readLoggingConfig(): Pick<ExtractorConfig, 'logLevel' | 'logDir'> {
  try {
    const { logLevel, logDir } = loadConfig();
    return { logLevel, logDir };
  } catch (error) {
    // The logger must come up even when the rest of the configuration is broken
    console.warn(`Falling back to INFO console logging: ${formatData(error)}`);
    return { logLevel: 'INFO' };
  }
}

export function createLogger(options: { level?: LogLevelName; logDir?: string } = {}): Logger {
  let currentLevel: LogLevelName = options.level ?? 'INFO';
  let logStream: fs.WriteStream | null = null;
  let logFilePath: string | null = null;

  if (options.logDir) {
    fs.mkdirSync(options.logDir, { recursive: true });
    // One file per process run
    logFilePath = path.join(options.logDir, `webparser-${process.pid}.log`);
    logStream = fs.createWriteStream(logFilePath, { flags: 'a' });
  }

  function log(level: LogLevelName, message: string, data?: unknown) {
    if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) return;

    const timestamp = new Date().toISOString();
    const formattedData = formatData(data);
    const suffix = formattedData ? '\n' + formattedData : '';

    logStream?.write(`[${timestamp}] [${level}] ${message}${suffix}\n`);

    const consoleMsg = `[${timestamp}] ${getColorForLevel(level)}[${level}]\x1b[0m ${message}${suffix}`;
    if (level === 'ERROR') {
      console.error(consoleMsg);
    } else {
      console.log(consoleMsg);
    }
  }

  return {
    debug: (msg, data) => log('DEBUG', msg, data),
    info: (msg, data) => log('INFO', msg, data),
    warn: (msg, data) => log('WARN', msg, data),
    error: (msg, data) => log('ERROR', msg, data),

    browser: {
      action: (type, data) => log('INFO', `Browser Action: ${type}`, data),
      error: (type, error) => log('ERROR', `Browser Error: ${type}`, error)
    },

    setLevel: (level) => {
      currentLevel = level;
    },
    getLevel: () => currentLevel,

    close: () => {
      if (logStream) {
        logStream.end();
        logStream = null;
      }
    },

    getLogFilePath: () => logFilePath
  };
}

function initLogger(): Logger {
  const { logLevel, logDir } = readLoggingConfig();
  const instance = createLogger({ level: logLevel, logDir });

  if (instance.getLogFilePath()) {
    process.on('exit', () => instance.close());
  }

  return instance;
}

const logger: Logger = globalThis.__webparserLogger ?? initLogger();
globalThis.__webparserLogger = logger;

export default logger;
