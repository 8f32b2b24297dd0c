/**
 * Logger Module
 *
 * Configures structured logging using Pino.
 * In an interactive terminal, uses pino-pretty for human-readable colored output.
 * In production, outputs JSON logs.
 */

import pino from 'pino';
import { cfg } from './config.js';

const pretty = process.env.NODE_ENV !== 'production'
  && process.env.NODE_ENV !== 'test'
  && process.stderr.isTTY === true;

/**
 * Pino logger instance
 *
 * Logs go to stderr so stdout carries only the rendered views.
 */
export const logger = pino(
  {
    level: cfg.logLevel,
    transport: pretty
      ? { target: 'pino-pretty', options: { colorize: true, destination: 2 } }
      : undefined
  },
  pretty ? undefined : pino.destination(2)
);
