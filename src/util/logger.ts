interface LogFields {
  [key: string]: unknown;
  msg: string;
  level: string;
  time: string; // ISO timestamp
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'human';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
export const LOG_FORMATS: readonly LogFormat[] = ['human', 'json'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

// ANSI color codes
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

const LEVEL_STYLES: Record<LogLevel, { icon: string; color: string }> = {
  debug: { icon: '🔍', color: COLORS.gray },
  info: { icon: 'ℹ️ ', color: COLORS.blue },
  warn: { icon: '⚠️ ', color: COLORS.yellow },
  error: { icon: '❌', color: COLORS.red }
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

export function isLogFormat(value: unknown): value is LogFormat {
  return typeof value === 'string' && LOG_FORMATS.some(format => format === value);
}

export class Logger {
  constructor(
    private level: LogLevel = 'info',
    private format: LogFormat = 'human'
  ) {}

  setLevel(level: LogLevel) {
    this.level = level;
  }

  setFormat(format: LogFormat) {
    this.format = format;
  }

  private should(level: LogLevel) {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private formatTime(date: Date): string {
    return date.toLocaleTimeString('en-US', {
      hour12: false,
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit'
    });
  }

  private formatFields(fields?: Record<string, unknown>): string {
    if (!fields || Object.keys(fields).length === 0) return '';

    const formatted = Object.entries(fields)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => {
        const valueStr = typeof value === 'string' ? value : JSON.stringify(value);
        return `${COLORS.dim}${key}=${valueStr}${COLORS.reset}`;
      })
      .join(' ');

    return formatted ? ` ${formatted}` : '';
  }

  private writeHuman(level: LogLevel, msg: string, fields?: Record<string, unknown>) {
    const { icon, color } = LEVEL_STYLES[level];
    const timestamp = `${COLORS.gray}${this.formatTime(new Date())}${COLORS.reset}`;
    const levelStr = `${color}${level.toUpperCase()}${COLORS.reset}`;
    const fieldsStr = this.formatFields(fields);
    const stream = level === 'error' || level === 'warn' ? process.stderr : process.stdout;

    stream.write(`${timestamp} ${icon} ${levelStr} ${msg}${fieldsStr}\n`);
  }

  private writeJson(level: LogLevel, msg: string, fields?: Record<string, unknown>) {
    const rec: LogFields = {
      ...(fields || {}),
      level,
      msg,
      time: new Date().toISOString()
    };
    process.stdout.write(JSON.stringify(rec) + '\n');
  }

  private write(level: LogLevel, msg: string, fields?: Record<string, unknown>) {
    if (!this.should(level)) return;

    if (this.format === 'human') {
      this.writeHuman(level, msg, fields);
    } else {
      this.writeJson(level, msg, fields);
    }
  }

  debug(msg: string, fields?: Record<string, unknown>) { this.write('debug', msg, fields); }
  info(msg: string, fields?: Record<string, unknown>) { this.write('info', msg, fields); }
  warn(msg: string, fields?: Record<string, unknown>) { this.write('warn', msg, fields); }
  error(msg: string, fields?: Record<string, unknown>) { this.write('error', msg, fields); }
}

export const logger = new Logger(
  isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info',
  isLogFormat(process.env.LOG_FORMAT) ? process.env.LOG_FORMAT : 'human'
);
