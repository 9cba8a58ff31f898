import pino from 'pino';
import type { LauncherConfig } from '../config.js';

export type Logger = pino.Logger;

// JSON diagnostics go to stderr so stdout carries only the status lines.
export function createLogger(config: LauncherConfig): Logger {
  return pino({ name: 'dev-stack', level: config.logLevel }, pino.destination(2));
}

export function status(message: string): void {
  process.stdout.write(`${message}\n`);
}
