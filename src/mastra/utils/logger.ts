import { LogLevel, type IMastraLogger } from '@mastra/core/logger';
import { PinoLogger } from '@mastra/loggers';

export type { IMastraLogger } from '@mastra/core/logger';

/**
 * Create the structured logger handed to each service.
 * Services log with a message plus a fields object, e.g.
 * `logger.info('Document chunked', { documentType, chunkCount })`.
 */
export function createLogger(name: string, level: LogLevel = LogLevel.INFO): IMastraLogger {
  return new PinoLogger({ name, level });
}
