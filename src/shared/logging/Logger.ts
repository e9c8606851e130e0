/**
 * Application logger based on pino.
 * This provides structured, JSON logs suitable for production.
 *
 * Logs go to stderr: under the stdio transport stdout carries
 * MCP protocol frames and must stay clean.
 */
import pino, { Logger as PinoLogger } from 'pino';
import { config } from '../config/Config';

export interface AppLogger extends PinoLogger {}

const STDERR_FD = 2;

const base = {
  service: config.serviceName,
  version: config.serviceVersion,
  env: config.env,
};

export const logger: AppLogger =
  config.env === 'development'
    ? pino({
        level: config.logLevel,
        base,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: STDERR_FD,
          },
        },
      })
    : pino({ level: config.logLevel, base }, pino.destination(STDERR_FD));
