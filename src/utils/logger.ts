import { DEFAULT_CONFIG, LogLevel, LOG_LEVELS, isLogLevel } from '../config';

let currentLevel: LogLevel | undefined;

/**
 * Level from LOG_LEVEL, read on first use. Hosts may use LOG_LEVEL for their
 * own values, so an unknown one falls back to the default.
 */
function levelFromEnvironment(): LogLevel {
  const raw = process.env.LOG_LEVEL;
  if (raw === undefined || raw === '') {
    return DEFAULT_CONFIG.logLevel;
  }
  const level = raw.toLowerCase();
  if (isLogLevel(level)) {
    return level;
  }
  console.warn(`⚠️ [logger] Ignoring unknown LOG_LEVEL "${raw}", using ${DEFAULT_CONFIG.logLevel}`);
  return DEFAULT_CONFIG.logLevel;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  if (currentLevel === undefined) {
    currentLevel = levelFromEnvironment();
  }
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(getLogLevel());
}

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

/**
 * Console logger tagged with the component name
 */
export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    debug: (message, ...meta) => {
      if (enabled('debug')) console.debug(`🔍 ${prefix} ${message}`, ...meta);
    },
    info: (message, ...meta) => {
      if (enabled('info')) console.log(`✅ ${prefix} ${message}`, ...meta);
    },
    warn: (message, ...meta) => {
      if (enabled('warn')) console.warn(`⚠️ ${prefix} ${message}`, ...meta);
    },
    error: (message, ...meta) => {
      if (enabled('error')) console.error(`❌ ${prefix} ${message}`, ...meta);
    }
  };
}
