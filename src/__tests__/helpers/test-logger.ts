import type { Logger } from 'winston';
import { initializeLogger, MockTransport } from '../../utils/logger.js';

export interface TestLogger {
  logger: Logger;
  transport: MockTransport;
  /** Messages logged at the given level, in order. */
  messagesAt(level: string): string[];
}

/**
 * A logger whose only transport keeps entries in memory.
 */
export function createTestLogger(): TestLogger {
  const transport = new MockTransport();
  const logger = initializeLogger('test-logs', false, [transport]);
  return {
    logger,
    transport,
    messagesAt: (level) =>
      transport.messages
        .filter((info) => info.level === level)
        .map((info) => String(info.message)),
  };
}
