import pino from 'pino';
import { config } from '../config';

// Logs go to stderr so that the CLI can keep stdout for JSON output.
const options: pino.LoggerOptions = {
  level: config.logging.level,
  base: {
    service: 'par-bids-sidecar',
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

export const logger = config.isDevelopment
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
        },
      },
    })
  : pino(options, pino.destination(2));
