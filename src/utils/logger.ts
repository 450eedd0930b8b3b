// =============================================================================
// Logger — winston, one line per event, NEVER logs cached values
// =============================================================================
import winston from 'winston';
import config from '../config';

export interface LogLineInfo {
  timestamp?: unknown;
  level: string;
  message: unknown;
  [meta: string]: unknown;
}

/** `[timestamp] LEVEL: message {"meta":"as json"}` */
export function renderLogLine({ timestamp, level, message, ...meta }: LogLineInfo): string {
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `[${String(timestamp)}] ${level.toUpperCase()}: ${String(message)}${metaStr}`;
}

const logger = winston.createLogger({
  level: config.logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf((info) => renderLogLine(info)),
  ),
  transports: [
    new winston.transports.Console(),
    ...(config.logFile
      ? [new winston.transports.File({ filename: config.logFile, maxsize: 5_000_000, maxFiles: 3 })]
      : []),
  ],
});

export default logger;
