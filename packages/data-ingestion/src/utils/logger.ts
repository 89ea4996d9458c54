import winston from 'winston';

const { combine, timestamp, errors, json } = winston.format;

/**
 * Structured JSON logger for the ingestion pipeline.
 * Level comes from LOG_LEVEL; output is silenced under Jest.
 */
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: combine(timestamp(), errors({ stack: true }), json()),
  defaultMeta: { service: 'data-ingestion' },
  transports: [
    new winston.transports.Console({
      silent: process.env.NODE_ENV === 'test'
    })
  ]
});

export type Logger = winston.Logger;

export default logger;
