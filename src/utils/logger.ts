type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogFormat = 'text' | 'json';
const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLevel(v: string | undefined): v is LogLevel {
  return v !== undefined && v in LEVELS;
}

const settings: { level: LogLevel; format: LogFormat } = {
  level:  isLevel(process.env['LOG_LEVEL']) ? process.env['LOG_LEVEL'] : 'info',
  format: process.env['LOG_FORMAT'] === 'json' ? 'json' : 'text',
};

/** Apply the level/format from the loaded config. Called once at startup. */
export function configureLogger(opts: { level: LogLevel; format: LogFormat }): void {
  settings.level = opts.level;
  settings.format = opts.format;
}

function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (LEVELS[level] < LEVELS[settings.level]) return;
  const ts = new Date().toISOString();
  const out = settings.format === 'json'
    ? JSON.stringify({ timestamp: ts, level, message, ...meta })
    : meta ? `[${ts}] [${level.toUpperCase()}] ${message} ${JSON.stringify(meta)}`
           : `[${ts}] [${level.toUpperCase()}] ${message}`;
  level === 'error' ? process.stderr.write(out + '\n') : process.stdout.write(out + '\n');
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => log('debug', msg, meta),
  info:  (msg: string, meta?: Record<string, unknown>) => log('info',  msg, meta),
  warn:  (msg: string, meta?: Record<string, unknown>) => log('warn',  msg, meta),
  error: (msg: string, meta?: Record<string, unknown>) => log('error', msg, meta),
};
