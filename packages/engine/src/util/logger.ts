/**
 * osbkit logger
 *
 * Centralized logging utility for the engine and the CLI.
 *
 * Features:
 * - Runtime configurable log levels
 * - Module namespaces (parser, commands, serializer, cli, ...)
 * - Optional ANSI colour output
 * - Structured logging support
 * - Safe production defaults (error-only)
 *
 * Usage:
 * ```typescript
 * import { createLogger } from './util/logger.js';
 *
 * const log = createLogger('parser');
 *
 * log.debug('Parsing events section');
 * log.info({ event: 'parsed', lines: 120 });
 * log.warn('Colour transformation cannot be written at version 14');
 * log.error('Failed to read file', error);
 * ```
 */

export type LogLevel = 'none' | 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  level: LogLevel;
  modules?: string[];
  timestamps?: boolean;
  colorize?: boolean;
}

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

// ---------- State ----------
let config: LoggerConfig = {
  level: 'error', // Safe production default
  modules: undefined,
  timestamps: true,
  colorize: false,
};

const moduleSet = new Set<string>();

const levelOrder: LogLevel[] = ['none', 'error', 'warn', 'info', 'debug'];

export function isLogLevel(value: string): value is LogLevel {
  return (levelOrder as string[]).includes(value);
}

// ---------- Configuration ----------

/**
 * Configure global logging settings.
 *
 * @example
 * ```typescript
 * configureLogging({
 *   level: 'debug',
 *   modules: ['parser', 'commands'],
 *   timestamps: false,
 * });
 * ```
 */
export function configureLogging(opts: Partial<LoggerConfig>): void {
  config = { ...config, ...opts };
  if (opts.modules) {
    moduleSet.clear();
    opts.modules.forEach(m => moduleSet.add(m));
  }

  // Only log configuration message if at info level or higher
  if (shouldLog('info')) {
    console.info('[osbkit] Logging configured:', config);
  }
}

/**
 * Load logging configuration from environment variables.
 * Looks for: OSBKIT_LOG_LEVEL, OSBKIT_LOG_MODULES, OSBKIT_LOG_COLOR
 */
export function loadLoggingFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const rawLevel = env.OSBKIT_LOG_LEVEL?.trim().toLowerCase();
  const modulesStr = env.OSBKIT_LOG_MODULES;
  const modules = modulesStr ? modulesStr.split(',').map(m => m.trim()).filter(Boolean) : undefined;
  const colorize = env.OSBKIT_LOG_COLOR === '1' ? true : undefined;

  const level = rawLevel && isLogLevel(rawLevel) ? rawLevel : undefined;
  if (level || modules || colorize) {
    configureLogging({
      level: level ?? config.level,
      modules,
      colorize: colorize ?? config.colorize,
    });
  }
}

/**
 * Get current logging configuration.
 */
export function getLoggingConfig(): Readonly<LoggerConfig> {
  return { ...config };
}

// ---------- Helpers ----------

function shouldLog(level: LogLevel, module?: string): boolean {
  const levelIndex = levelOrder.indexOf(level);
  const configIndex = levelOrder.indexOf(config.level);

  if (levelIndex > configIndex) return false;
  if (module && moduleSet.size > 0 && !moduleSet.has(module)) return false;

  return true;
}

function formatTimestamp(): string {
  if (!config.timestamps) return '';

  const now = new Date();
  const iso = now.toISOString();
  return `${iso} `;
}

const colors: Record<Exclude<LogLevel, 'none'>, string> = {
  error: '\x1b[31m',
  warn: '\x1b[33m',
  info: '\x1b[36m',
  debug: '\x1b[32m',
};

const RESET = '\x1b[0m';

function output(level: Exclude<LogLevel, 'none'>, module: string | undefined, args: unknown[]): void {
  const prefix = `${formatTimestamp()}[${module ?? 'osbkit'}]`;
  const method = level === 'debug' ? console.log : console[level];

  if (config.colorize) {
    method(`${colors[level]}${prefix}${RESET}`, ...args);
  } else {
    method(prefix, ...args);
  }
}

// ---------- Public Logger Factory ----------

/**
 * Create a namespaced logger for a specific module.
 *
 * @param module - Module name (e.g., 'parser', 'commands', 'serializer', 'cli')
 */
export function createLogger(module: string): Logger {
  return {
    error: (...args: unknown[]) => {
      if (shouldLog('error', module)) {
        output('error', module, args);
      }
    },
    warn: (...args: unknown[]) => {
      if (shouldLog('warn', module)) {
        output('warn', module, args);
      }
    },
    info: (...args: unknown[]) => {
      if (shouldLog('info', module)) {
        output('info', module, args);
      }
    },
    debug: (...args: unknown[]) => {
      if (shouldLog('debug', module)) {
        output('debug', module, args);
      }
    },
  };
}

export default createLogger;
