import winston from 'winston'

const isProduction = process.env.NODE_ENV === 'production'

/**
 * Process-wide logger. Every level goes to stderr: stdout is reserved for
 * the records and state messages a sync run emits.
 */
export const logger = winston.createLogger({
  level: process.env.FORMS_TAP_LOG_LEVEL || 'info',
  format: isProduction
    ? winston.format.combine(winston.format.timestamp(), winston.format.json())
    : winston.format.combine(
        winston.format.timestamp({ format: 'HH:mm:ss' }),
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, context, ...rest }) => {
          const ctx = context ? `[${String(context)}]` : ''
          const extra = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : ''
          return `${String(timestamp)} ${level} ${ctx} ${String(message)}${extra}`
        }),
      ),
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    }),
  ],
})

export function createChildLogger(context: string): winston.Logger {
  return logger.child({ context })
}
