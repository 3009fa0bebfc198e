import pino from 'pino';

const isProduction = process.env['NODE_ENV'] === 'production';
const level = process.env['LOG_LEVEL'] ?? 'info';

/**
 * The dashboard owns stdout, so logs always go to a file (or nowhere).
 */
export function resolveLogFile(raw: string | undefined) {
  if (raw === undefined) return 'sysdash.log';
  const trimmed = raw.trim();
  if (trimmed.length === 0 || trimmed.toLowerCase() === 'none') return null;
  return trimmed;
}

export const LOG_FILE = resolveLogFile(process.env['SYSDASH_LOG_FILE']);

function createLogger() {
  if (LOG_FILE === null) {
    return pino({ enabled: false });
  }

  if (isProduction) {
    return pino({ level }, pino.destination({ dest: LOG_FILE, mkdir: true, sync: false }));
  }

  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        destination: LOG_FILE,
        mkdir: true,
        colorize: false,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  });
}

export const logger = createLogger();
