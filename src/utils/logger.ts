import winston from 'winston';

const { combine, colorize, errors, printf, splat, timestamp } = winston.format;

/**
 * `time level: message`, then any context fields as JSON and the stack
 * of a logged error
 */
const consoleLine = printf(({ timestamp: time, level, message, stack, ...context }) => {
  const fields = Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
  const trace = typeof stack === 'string' ? `\n${stack}` : '';
  return `${time} ${level}: ${message}${fields}${trace}`;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: combine(
    errors({ stack: true }),
    splat(),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })
  ),
  transports: [
    new winston.transports.Console({
      format: process.stdout.isTTY ? combine(colorize(), consoleLine) : consoleLine,
    }),
  ],
});

export default logger;
