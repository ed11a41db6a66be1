type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogContext = Record<string, string | number | boolean | null | undefined>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// loadConfig에서 검증한 레벨 (설정 전에는 환경 변수를 직접 읽음)
let configuredLevel: LogLevel | null = null;

export function setLogLevel(level: LogLevel | null): void {
  configuredLevel = level;
}

function currentLevel(): LogLevel {
  if (process.env.DEBUG === 'true') {
    return 'debug';
  }
  if (configuredLevel) {
    return configuredLevel;
  }
  const level = (process.env.LOG_LEVEL || 'info').trim().toLowerCase();
  return level === 'debug' || level === 'warn' || level === 'error' ? level : 'info';
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

/**
 * 로그 한 줄 포맷: "<ISO 시각> <기호> <메시지> key=value ..."
 */
export function formatLine(symbol: string, message: string, context?: LogContext, now: Date = new Date()): string {
  let line = `${now.toISOString()} ${symbol} ${message}`;

  if (context) {
    for (const [key, value] of Object.entries(context)) {
      if (value === undefined) continue;
      line += ` ${key}=${typeof value === 'string' && /\s/.test(value) ? JSON.stringify(value) : String(value)}`;
    }
  }

  return line;
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (enabled('info')) console.log(formatLine('ℹ', message, context));
  },

  success: (message: string, context?: LogContext) => {
    if (enabled('info')) console.log(formatLine('✓', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('warn')) console.warn(formatLine('⚠', message, context));
  },

  error: (message: string, context?: LogContext) => {
    if (enabled('error')) console.error(formatLine('✗', message, context));
  },

  debug: (message: string, context?: LogContext) => {
    if (enabled('debug')) console.log(formatLine('[DEBUG]', message, context));
  }
};

export type { LogContext, LogLevel };
