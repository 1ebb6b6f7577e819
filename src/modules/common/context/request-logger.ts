import { Logger } from '@nestjs/common';

export type LogFields = Record<string, unknown>;

/**
 * Request-bound logger
 *
 * Wraps a NestJS Logger and merges the request's correlation ID into every
 * structured entry, so code running inside a request never threads the ID
 * through its own log calls.
 */
export class RequestLogger {
  private readonly logger: Logger;

  constructor(
    scope: string,
    private readonly correlationId: () => string | undefined,
  ) {
    this.logger = new Logger(scope);
  }

  log(message: string, fields: LogFields = {}): void {
    this.logger.log(message, this.bind(fields));
  }

  debug(message: string, fields: LogFields = {}): void {
    this.logger.debug(message, this.bind(fields));
  }

  warn(message: string, fields: LogFields = {}): void {
    this.logger.warn(message, this.bind(fields));
  }

  error(message: string, fields: LogFields = {}): void {
    this.logger.error(message, this.bind(fields));
  }

  private bind(fields: LogFields): LogFields {
    return { correlationId: this.correlationId() ?? 'unassigned', ...fields };
  }
}
