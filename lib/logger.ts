type LogPayload = Record<string, unknown> | undefined;

function write(
  sink: (...args: unknown[]) => void,
  level: string,
  scope: string | undefined,
  msg: string,
  data: unknown,
) {
  const prefix = scope ? `[${level}][${scope}]` : `[${level}]`;
  sink(`${prefix} ${msg}`, JSON.stringify(data ?? {}, null, 2));
}

function toErrorPayload(error: unknown) {
  return error instanceof Error ? { message: error.message, stack: error.stack } : error;
}

export type Logger = {
  info: (msg: string, data?: LogPayload) => void;
  warn: (msg: string, data?: LogPayload) => void;
  error: (msg: string, error: unknown) => void;
};

export function createLogger(scope?: string): Logger {
  return {
    info: (msg, data) => write(console.log, 'INFO', scope, msg, data),
    warn: (msg, data) => write(console.warn, 'WARN', scope, msg, data),
    error: (msg, error) => write(console.error, 'ERROR', scope, msg, toErrorPayload(error)),
  };
}

export const logger = createLogger();
