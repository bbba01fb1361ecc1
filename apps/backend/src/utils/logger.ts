import { pino } from 'pino';

const env = process.env.NODE_ENV || 'development';
const isProduction = env === 'production';

const pinoLogger = pino({
  name: 'backend',
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
  transport:
    isProduction || env === 'test'
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
  base: { env },
  redact: ['privateKey', 'passphrase', '*.privateKey', '*.passphrase'],
});

type LogMethod = (message: string, obj?: Record<string, unknown>) => void;

function bind(level: 'debug' | 'info' | 'warn' | 'error' | 'fatal'): LogMethod {
  return (message, obj) => {
    if (obj) {
      pinoLogger[level](obj, message);
    } else {
      pinoLogger[level](message);
    }
  };
}

// Takes (message, obj) rather than pino's (obj, message)
export const logger = {
  info: bind('info'),
  error: bind('error'),
  warn: bind('warn'),
  debug: bind('debug'),
  fatal: bind('fatal'),
};

export default logger;
