import pino from 'pino';
import type { AppConfig } from './config';

export const createLogger = (config: Pick<AppConfig, 'logLevel' | 'isProduction'>): pino.Logger => {
  const loggerOptions: pino.LoggerOptions = {
    level: config.logLevel,
  };

  if (!config.isProduction) {
    loggerOptions.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(loggerOptions);
};
