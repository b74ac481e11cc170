import { Logger } from '../../src/logging/logger';
import type { LogBackend, LogLevel, LogMessage } from '../../src/logging/types';

/**
 * Collects log messages in memory for assertions
 */
export class MemoryLogBackend implements LogBackend {
  public readonly messages: LogMessage[] = [];

  async log(message: LogMessage): Promise<void> {
    this.messages.push(message);
  }

  byLevel(level: LogLevel): LogMessage[] {
    return this.messages.filter((message) => message.level === level);
  }

  texts(level?: LogLevel): string[] {
    return (level ? this.byLevel(level) : this.messages).map((message) => message.message);
  }
}

export function createTestLogger(level: LogLevel = 'debug'): { logger: Logger; backend: MemoryLogBackend } {
  const backend = new MemoryLogBackend();
  return { logger: new Logger([backend], { level, console: false }), backend };
}
