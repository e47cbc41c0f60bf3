// Network failures: never retried automatically, the user re-triggers the operation.
export class TransportError extends Error {
  constructor(readonly url: string, cause: unknown) {
    super(`Request to ${url} failed: ${errorMessage(cause)}`, { cause });
    this.name = 'TransportError';
  }
}

export class TimeoutError extends Error {
  constructor(readonly url: string, readonly phase: 'connect' | 'total', readonly ms: number) {
    super(`Request to ${url} timed out after ${ms / 1000}s (${phase})`);
    this.name = 'TimeoutError';
  }
}

export class HttpStatusError extends Error {
  constructor(readonly url: string, readonly status: number, readonly statusText: string) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = 'HttpStatusError';
  }
}

// A remote API answered, but not with what we asked for.
export class RemoteServiceError extends Error {
  constructor(readonly service: string, message: string, readonly status?: number) {
    super(`${service} API error: ${message}`);
    this.name = 'RemoteServiceError';
  }
}

export class FeedParseError extends Error {
  constructor(readonly url: string, cause: unknown) {
    super(`Feed parsing failed for ${url}: ${errorMessage(cause)}`, { cause });
    this.name = 'FeedParseError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
