// Console-backed logger. Everything goes to stderr so stdout carries only the report.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = 'info';

export const setLogLevel = (level: LogLevel): void => {
  threshold = level;
};

export const getLogLevel = (): LogLevel => threshold;

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

const write = (level: Exclude<LogLevel, 'silent'>, component: string, message: string, data?: unknown) => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const line = `[${new Date().toISOString()}] ${level.toUpperCase()} [${component}] ${message}`;
  if (data !== undefined) {
    console.error(line, data);
  } else {
    console.error(line);
  }
};

export const createLogger = (component: string): Logger => ({
  debug: (message, data) => write('debug', component, message, data),
  info: (message, data) => write('info', component, message, data),
  warn: (message, data) => write('warn', component, message, data),
  error: (message, data) => write('error', component, message, data),
});
