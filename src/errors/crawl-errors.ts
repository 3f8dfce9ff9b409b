export type TransientReason = 'timeout' | 'navigation' | 'detected' | 'storage';
export type PermanentReason = 'not-found' | 'removed';

export abstract class CrawlError extends Error {
  abstract readonly code: string;
  abstract readonly transient: boolean;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class TransientFetchError extends CrawlError {
  readonly code: string = 'TRANSIENT_FETCH';
  readonly transient = true;

  constructor(
    message: string,
    readonly reason: TransientReason,
  ) {
    super(message);
  }
}

export class DetectionError extends TransientFetchError {
  readonly code = 'DETECTED';

  constructor(readonly marker: string, url: string) {
    super(`Automated-traffic detection marker "${marker}" on ${url}`, 'detected');
  }
}

export class PermanentFetchError extends CrawlError {
  readonly code = 'PERMANENT_FETCH';
  readonly transient = false;

  constructor(
    message: string,
    readonly reason: PermanentReason,
  ) {
    super(message);
  }
}

export class ExtractionFailure extends CrawlError {
  readonly code = 'EXTRACTION_FAILED';
  readonly transient = false;

  constructor(
    message: string,
    readonly url: string,
    readonly rawContentRef: string | null,
  ) {
    super(message);
  }
}

export class ProxyExhaustedError extends CrawlError {
  readonly code = 'PROXY_EXHAUSTED';
  readonly transient = false;

  constructor(waitedMs: number) {
    super(`No healthy proxy became available within ${waitedMs}ms`);
  }
}

export class CircuitBreakerTripError extends CrawlError {
  readonly code = 'CIRCUIT_BREAKER_TRIPPED';
  readonly transient = false;
}

export class JobTimeoutError extends CrawlError {
  readonly code = 'JOB_TIMEOUT';
  readonly transient = false;

  constructor(timeoutMs: number) {
    super(`Job exceeded its overall timeout of ${timeoutMs}ms`);
  }
}

export class ConfigError extends CrawlError {
  readonly code = 'CONFIG_INVALID';
  readonly transient = false;

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export class InvalidJobRequestError extends CrawlError {
  readonly code = 'INVALID_JOB_REQUEST';
  readonly transient = false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const TIMEOUT_PATTERN = /timeout|timed out/i;
const ABORT_PATTERN = /abort/i;

/**
 * Maps anything a browser navigation can throw onto the fetch taxonomy.
 * Unknown failures are treated as transient so they get another attempt.
 */
export function classifyFetchError(error: unknown): CrawlError {
  if (error instanceof CrawlError) {
    return error;
  }

  const message = errorMessage(error);
  const name = error instanceof Error ? error.name : '';

  if (name === 'TimeoutError' || TIMEOUT_PATTERN.test(message)) {
    return new TransientFetchError(`Fetch timed out: ${message}`, 'timeout');
  }
  if (name === 'AbortError' || ABORT_PATTERN.test(message)) {
    return new TransientFetchError(`Fetch aborted: ${message}`, 'navigation');
  }
  return new TransientFetchError(`Navigation failed: ${message}`, 'navigation');
}
