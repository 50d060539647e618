export type LogMeta = Record<string, unknown>;

export interface CurationLogger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

function formatMeta(meta?: LogMeta) {
  if (!meta) {
    return {};
  }
  return { meta };
}

export const defaultLogger: CurationLogger = {
  info(message, meta) {
    console.log(
      JSON.stringify({
        level: 'info',
        message,
        ...formatMeta(meta),
      }),
    );
  },
  warn(message, meta) {
    console.warn(
      JSON.stringify({
        level: 'warn',
        message,
        ...formatMeta(meta),
      }),
    );
  },
  error(message, meta) {
    console.error(
      JSON.stringify({
        level: 'error',
        message,
        ...formatMeta(meta),
      }),
    );
  },
};

export const silentLogger: CurationLogger = {
  info() {},
  warn() {},
  error() {},
};

export function describeError(error: unknown): { error: string; stack?: string } {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}
