/**
 * Colored console logger with step output for run progress.
 * ANSI colors via constants only; no external deps.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

/** ANSI color constants (do not hardcode colors elsewhere). */
export const COLORS = {
  reset: '\u001b[0m',
  dim: '\u001b[2m',
  bold: '\u001b[1m',
  gray: '\u001b[90m',
  red: '\u001b[31m',
  green: '\u001b[32m',
  yellow: '\u001b[33m',
  blue: '\u001b[34m',
  magenta: '\u001b[35m',
  cyan: '\u001b[36m'
} as const;

export interface Logger {
  enabled: boolean;
  level: LogLevel;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  /** Step update for visual progress (high signal). */
  step(title: string, detail?: string): void;
  /** Same sink and level, messages prefixed with `[scope]`. */
  child(scope: string): Logger;
}

const ORDER: Record<Exclude<LogLevel, 'silent'>, number> = { error: 0, warn: 1, info: 2, debug: 3 };

function shouldLog(message: Exclude<LogLevel, 'silent'>, configured: LogLevel): boolean {
  if (configured === 'silent') return false;
  return ORDER[message] <= ORDER[configured];
}

export function isLogLevel(x: unknown): x is LogLevel {
  return typeof x === 'string' && LOG_LEVELS.some(l => l === x);
}

export function createLogger(enabled: boolean, level: LogLevel = 'info', scope?: string): Logger {
  const prefix = scope ? `${COLORS.blue}[${scope}]${COLORS.reset} ` : '';
  const fmt = (color: string, label: string, msg: string): string =>
    `${COLORS.dim}${new Date().toISOString()}${COLORS.reset} ${color}${label}${COLORS.reset} ${prefix}${msg}`;

  const write = (target: 'log' | 'warn' | 'error', color: string, label: string, msg: string): void => {
    if (!enabled) return;
    // eslint-disable-next-line no-console
    console[target](fmt(color, label, msg));
  };

  return {
    enabled,
    level,
    info(message: string): void {
      if (shouldLog('info', level)) write('log', COLORS.cyan, '[info]', message);
    },
    warn(message: string): void {
      if (shouldLog('warn', level)) write('warn', COLORS.yellow, '[warn]', message);
    },
    error(message: string): void {
      if (shouldLog('error', level)) write('error', COLORS.red, '[error]', message);
    },
    debug(message: string): void {
      if (shouldLog('debug', level)) write('log', COLORS.gray, '[debug]', message);
    },
    step(title: string, detail?: string): void {
      if (!enabled || level === 'silent') return;
      const t = `${COLORS.magenta}${COLORS.bold}${title}${COLORS.reset}`;
      const d = detail ? `${COLORS.gray}${detail}${COLORS.reset}` : '';
      // eslint-disable-next-line no-console
      console.log(`${prefix}${t} ${d}`.trim());
    },
    child(childScope: string): Logger {
      return createLogger(enabled, level, scope ? `${scope}:${childScope}` : childScope);
    }
  };
}

/** A no-op logger you can use as default. */
export const silentLogger: Logger = createLogger(false, 'silent');
