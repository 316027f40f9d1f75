type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  info(type: string, fields?: LogFields): void;
  warn(type: string, fields?: LogFields): void;
  error(type: string, fields?: LogFields): void;
  debug(type: string, fields?: LogFields): void;
}

function write(level: LogLevel, type: string, fields: LogFields = {}) {
  const line = JSON.stringify({
    level,
    type,
    timestamp: new Date().toISOString(),
    ...fields,
  });

  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else if (level === 'debug') {
    if (process.env.LOG_DEBUG === '1') console.debug(line);
  } else {
    console.info(line);
  }
}

export const logger: Logger = {
  info: (type, fields) => write('info', type, fields),
  warn: (type, fields) => write('warn', type, fields),
  error: (type, fields) => write('error', type, fields),
  debug: (type, fields) => write('debug', type, fields),
};

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

export function describeError(error: unknown) {
  return {
    name: error instanceof Error && error.name ? error.name : 'UnknownError',
    message: getErrorMessage(error),
    stack: error instanceof Error && typeof error.stack === 'string' ? error.stack : null,
  };
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error && typeof error === 'object' && 'message' in error) {
    const maybeMessage = error.message;
    if (typeof maybeMessage === 'string' && maybeMessage.trim().length > 0) {
      return maybeMessage;
    }
  }
  return String(error);
}
