/**
 * Logger Module - Category Logging with Pino
 *
 * Features:
 * - Structured logging powered by Pino
 * - Pretty-printing in development with pino-pretty, JSON in production
 * - Hierarchical category-specific loggers with independent levels
 * - Auto-initialization from environment variables on module load
 *
 * Categories: Dot-separated hierarchies (e.g., "game.session", "server.ws")
 * Usage: createCategoryLogger(category, bindings?)
 *
 * Environment Variable Support:
 *   - LOG_LEVEL sets the global default (default: error)
 *   - LOG_{CATEGORY} sets a per-category level (e.g., LOG_GAME_SESSION=debug)
 *   - Most-specific match wins: LOG_GAME_SESSION > LOG_GAME > LOG_LEVEL
 */

import dotenv from 'dotenv';
import pino from 'pino';
dotenv.config({ quiet: true });

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10, debug: 20, info: 30, warn: 40, error: 50
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function shouldLog(messageLevel: LogLevel, currentLevel: LogLevel): boolean {
  return LOG_LEVELS[messageLevel] >= LOG_LEVELS[currentLevel];
}

// Preserves dots for hierarchy, converts other non-alphanumeric characters to dots
export function normalizeCategoryKey(raw: string): string {
  if (!raw) return '';

  return raw
    .toLowerCase()
    .replace(/[^a-z0-9.]+/g, '.')
    .replace(/\.+/g, '.')
    .replace(/^\.|\.$/g, '');
}

const usePrettyTransport = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

const pinoOptions: pino.LoggerOptions = {
  level: 'trace', // filtering happens in the category wrapper
  formatters: {
    level: (label) => {
      return { level: label.toUpperCase() };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(usePrettyTransport ? {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        translateTime: 'SYS:standard',
      },
    },
  } : {}),
};

const pinoLogger = pino(pinoOptions);

let globalLevel: LogLevel = 'error';
const categoryLevels: Record<string, LogLevel> = {};
const categoryLoggers: Record<string, Logger> = {};

// e.g., for "game.session.rejoin": LOG_GAME_SESSION_REJOIN > LOG_GAME_SESSION > LOG_GAME > LOG_LEVEL
function getEffectiveLevelForCategory(category: string): LogLevel {
  const normalizedCategory = normalizeCategoryKey(category);
  if (!normalizedCategory) return globalLevel;

  const exact = categoryLevels[normalizedCategory];
  if (exact) return exact;

  const parts = normalizedCategory.split('.');
  for (let i = parts.length - 1; i > 0; i--) {
    const parent = categoryLevels[parts.slice(0, i).join('.')];
    if (parent) return parent;
  }

  return globalLevel;
}

type LogMethod = (msg: string, ...args: unknown[]) => void;

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  child: (bindings: Record<string, unknown>) => Logger;
  level: LogLevel;
}

function serializeArg(arg: unknown): unknown {
  if (arg instanceof Error) {
    return { name: arg.name, message: arg.message, stack: arg.stack };
  }
  return arg;
}

function createSimpleLogger(category?: string, level: LogLevel = 'error', bindings?: Record<string, unknown>): Logger {
  const childBindings = { ...(category ? { category: category.toUpperCase() } : {}), ...bindings };
  const childLogger = Object.keys(childBindings).length > 0 ? pinoLogger.child(childBindings) : pinoLogger;

  const write = (messageLevel: LogLevel): LogMethod => (msg, ...args) => {
    if (!shouldLog(messageLevel, level)) return;
    if (args.length > 0) {
      childLogger[messageLevel]({ args: args.map(serializeArg) }, msg);
    } else {
      childLogger[messageLevel](msg);
    }
  };

  return {
    trace: write('trace'),
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (extra) => createSimpleLogger(category, level, { ...bindings, ...extra }),
    level
  };
}

// LOG_GAME_SESSION -> game.session
function scanEnvironment(): void {
  const env = process.env;
  Object.keys(env).forEach(key => {
    if (key.startsWith('LOG_') && key !== 'LOG_LEVEL') {
      const category = normalizeCategoryKey(key.slice(4).toLowerCase().replace(/_/g, '.'));
      const value = env[key]?.toLowerCase();
      if (category && value && isLogLevel(value)) {
        categoryLevels[category] = value;
      }
    }
  });
}

function autoInitializeLogger(): void {
  const envGlobalLevel = process.env.LOG_LEVEL?.toLowerCase();
  globalLevel = envGlobalLevel && isLogLevel(envGlobalLevel) ? envGlobalLevel : 'error';
  scanEnvironment();
}

autoInitializeLogger();

export interface LoggerConfig {
  globalLevel?: LogLevel;
  categoryLevels?: Record<string, LogLevel>;
}

export function initializeLogger(config: LoggerConfig = {}): void {
  if (config.globalLevel) {
    globalLevel = config.globalLevel;
  }

  if (config.categoryLevels) {
    for (const [category, level] of Object.entries(config.categoryLevels)) {
      categoryLevels[normalizeCategoryKey(category)] = level;
    }
  }

  // Environment variables take precedence over config
  scanEnvironment();

  Object.keys(categoryLoggers).forEach(category => {
    categoryLoggers[category] = createSimpleLogger(category, getEffectiveLevelForCategory(category));
  });
}

/**
 * Drops every per-category level and resets the global level. Cached loggers
 * are rebuilt on their next lookup.
 */
export function resetLogger(level: LogLevel = 'error'): void {
  globalLevel = level;
  for (const key of Object.keys(categoryLevels)) delete categoryLevels[key];
  for (const key of Object.keys(categoryLoggers)) delete categoryLoggers[key];
}

export function createCategoryLogger(category: string, bindings?: Record<string, unknown>): Logger {
  const normalizedCategory = normalizeCategoryKey(category);

  const cached = categoryLoggers[normalizedCategory];
  if (!bindings && cached) {
    return cached;
  }

  const logger = createSimpleLogger(normalizedCategory, getEffectiveLevelForCategory(normalizedCategory), bindings);

  // Only cache loggers without additional bindings
  if (!bindings) {
    categoryLoggers[normalizedCategory] = logger;
  }

  return logger;
}

export function getCategoryLogLevel(category: string): LogLevel {
  return getEffectiveLevelForCategory(category);
}

export function shouldLogForCategory(messageLevel: LogLevel, category: string): boolean {
  return shouldLog(messageLevel, getCategoryLogLevel(category));
}
