type Level = 'info' | 'warn' | 'error' | 'debug';

const RANK: Record<Level | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

function isThreshold(value: string): value is Level | 'silent' {
  return Object.prototype.hasOwnProperty.call(RANK, value);
}

/** `LOG_LEVEL` is read on every call; unknown or missing values mean `info`. */
export function enabled(level: Level): boolean {
  const configured = (process.env.LOG_LEVEL || '').trim().toLowerCase();
  const threshold = isThreshold(configured) ? configured : 'info';
  return RANK[level] >= RANK[threshold];
}

const COLORS: Record<Level | 'reset' | 'dim', string> = {
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  debug: '\x1b[36m',
  reset: '\x1b[0m',
  dim: '\x1b[90m',
};

export class Logger {
  constructor(private readonly moduleName: string) {}

  private line(level: Level, message: string, meta?: unknown): string {
    const timestamp = new Date().toISOString();
    const suffix = meta ? ` ${JSON.stringify(meta)}` : '';
    return `${COLORS.dim}${timestamp}${COLORS.reset} ${COLORS[level]}${level.toUpperCase()}${COLORS.reset} ${COLORS.dim}[${this.moduleName}]${COLORS.reset} ${message}${suffix}`;
  }

  info(message: string, meta?: unknown): void {
    if (!enabled('info')) return;
    console.log(this.line('info', message, meta));
  }

  warn(message: string, meta?: unknown): void {
    if (!enabled('warn')) return;
    console.warn(this.line('warn', message, meta));
  }

  error(message: string, meta?: unknown): void {
    if (!enabled('error')) return;
    console.error(this.line('error', message, meta));
  }

  debug(message: string, meta?: unknown): void {
    if (!enabled('debug')) return;
    console.debug(this.line('debug', message, meta));
  }
}

export function createLogger(moduleName: string): Logger {
  return new Logger(moduleName);
}
