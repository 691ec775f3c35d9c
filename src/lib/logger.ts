import { Logtail } from '@logtail/node';

export type LogMeta = Record<string, unknown>;

let logtail: Logtail | null | undefined;

// Ships logs to Better Stack when a source token is configured. Resolved on
// first use so a token loaded from .env at startup is still picked up.
const getLogtail = (): Logtail | null => {
  if (logtail === undefined) {
    const token = process.env.LOGTAIL_TOKEN;
    logtail = token ? new Logtail(token) : null;
  }
  return logtail;
};

const timestamp = () => new Date().toISOString();

const toMeta = (detail?: Error | LogMeta): LogMeta => {
  if (detail instanceof Error) {
    return { error: detail.message, stack: detail.stack };
  }
  return detail ?? {};
};

const reportShipFailure = (error: unknown) => {
  console.error(`[ERROR] ${timestamp()} - Failed to ship log entry`, error);
};

export const logger = {
  info: (message: string, meta?: LogMeta) => {
    console.log(`[INFO] ${timestamp()} - ${message}`, meta || '');
    getLogtail()?.info(message, toMeta(meta)).catch(reportShipFailure);
  },

  error: (message: string, error?: Error | LogMeta) => {
    console.error(`[ERROR] ${timestamp()} - ${message}`, error || '');
    getLogtail()?.error(message, toMeta(error)).catch(reportShipFailure);
  },

  warn: (message: string, meta?: LogMeta) => {
    console.warn(`[WARN] ${timestamp()} - ${message}`, meta || '');
    getLogtail()?.warn(message, toMeta(meta)).catch(reportShipFailure);
  },

  debug: (message: string, meta?: LogMeta) => {
    if (process.env.NODE_ENV === 'development') {
      console.debug(`[DEBUG] ${timestamp()} - ${message}`, meta || '');
    }
    getLogtail()?.debug(message, toMeta(meta)).catch(reportShipFailure);
  },
};

export type Logger = typeof logger;

/**
 * Flush buffered entries before the process exits
 */
export const flushLogs = async (): Promise<void> => {
  const client = getLogtail();
  if (client) {
    await client.flush();
  }
};
