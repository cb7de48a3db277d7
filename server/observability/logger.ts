import winston from 'winston';
import WinstonCloudWatch from 'winston-cloudwatch';
import { loadEnvironment } from '../config/env.js';

interface CloudWatchConfig {
  logGroupName: string;
  logStreamName: string;
  awsRegion: string;
  jsonMessage: boolean;
  awsOptions: {
    credentials: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
}

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

loadEnvironment();

const isTestRun = process.env.NODE_ENV === 'test' || process.env.TEST_MODE === 'true';

const transports: winston.transport[] = [
  new winston.transports.Console({
    silent: isTestRun,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const context = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} ${level}: ${String(message)}${context}`;
      }),
    ),
  }),
];

if (process.env.AWS_ACCESS_KEY_ID && process.env.AWS_SECRET_ACCESS_KEY) {
  const cloudWatchConfig: CloudWatchConfig = {
    logGroupName: process.env.MESH_LOG_GROUP || 'mcp-switchboard',
    logStreamName: 'connectivity',
    awsRegion: process.env.AWS_REGION || 'us-east-1',
    jsonMessage: true,
    awsOptions: {
      credentials: {
        accessKeyId: process.env.AWS_ACCESS_KEY_ID,
        secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY,
      },
    },
  };
  transports.push(new WinstonCloudWatch(cloudWatchConfig));
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  transports,
});

export function setLogLevel(level: LogLevel): void {
  if (logger.level !== level) {
    logger.level = level;
    logger.debug('Log level changed', { level });
  }
}

/**
 * Short, non-reversible preview of a credential for log lines.
 */
export function describeToken(token: string): string {
  return `${token.slice(0, 6)}… (${token.length} chars)`;
}
