import winston from 'winston';
import { config } from './index';

const isProduction = config.env === 'production';

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.env === 'test',
  format: isProduction
    ? winston.format.combine(winston.format.timestamp(), winston.format.json())
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'HH:mm:ss' }),
        winston.format.splat(),
        winston.format.simple()
      ),
  transports: [new winston.transports.Console()],
});
