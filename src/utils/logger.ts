import fs from 'node:fs'
import path from 'node:path'
import winston from 'winston'

const logDir = process.env.LOG_DIR || 'logs'
const isTest = process.env.NODE_ENV === 'test'

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
)

// Define console format for development
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    let msg = `${String(timestamp)} [${level}] ${String(message)}`
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`
    }
    return msg
  })
)

function createTransports(): NonNullable<winston.LoggerOptions['transports']> {
  if (isTest) {
    return [new winston.transports.Console({ format: consoleFormat })]
  }

  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true })
  }

  return [
    // Console writes to stderr; stdout carries the rendered dashboard
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']
    }),
    // File transport for all logs
    new winston.transports.File({
      filename: path.join(logDir, 'combined.log'),
      maxsize: 5242880, // 5MB
      maxFiles: 5
    }),
    // File transport for errors
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5
    })
  ]
}

// Create the logger
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'warn',
  format: logFormat,
  silent: isTest,
  transports: createTransports()
})

/**
 * Changes the logger level at runtime (used by -v flags)
 */
export function setLogLevel(level: string): void {
  logger.level = level
}

export default logger
