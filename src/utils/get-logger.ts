import pino from 'pino';
import pretty from 'pino-pretty';

export type Logger = pino.Logger;

let rootLogger: Logger | null = null;

const createLogger = (): Logger => {
  const environment = process.env.NODE_ENV ?? 'development';
  const isProduction = environment === 'production';

  const loggerConfig: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL ?? 'info',
    base: {
      service: 'periodic-audit',
      environment,
    },
  };

  if (!isProduction) {
    // Keep stdout free for the report when no other sink is configured
    const prettyStream = pretty({
      colorize: process.stderr.isTTY,
      singleLine: true,
      translateTime: 'yyyy-mm-dd HH:MM:ss',
      ignore: 'pid,hostname,service,environment',
      destination: process.stderr,
    });

    return pino(loggerConfig, prettyStream);
  }

  return pino(loggerConfig);
};

/** Every caller shares one logger, and with it one output stream. */
export const getLogger = (): Logger => {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return rootLogger;
};
