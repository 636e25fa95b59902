import type { Logger } from 'winston';
import { Notifier } from './types';

/**
 * Forwards injector messages to a winston logger. Leading indentation used
 * for terminal output is dropped.
 */
export function createLoggerNotifier(logger: Logger): Notifier {
  return {
    info: (message: string) => {
      logger.info(message.trim());
    },
    error: (message: string) => {
      logger.error(message.trim());
    },
  };
}

export interface NotifierMessage {
  level: 'info' | 'error';
  message: string;
}

/**
 * Keeps every message in order. Used by dry runs to report what would happen.
 */
export class CollectingNotifier implements Notifier {
  readonly messages: NotifierMessage[] = [];

  info(message: string): void {
    this.messages.push({ level: 'info', message });
  }

  error(message: string): void {
    this.messages.push({ level: 'error', message });
  }

  errors(): string[] {
    return this.messages.filter(m => m.level === 'error').map(m => m.message);
  }
}
