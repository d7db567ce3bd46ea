export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class BucketfanError extends Error {
  constructor(message: string, public code: string, public details?: Record<string, unknown>) {
    super(message);
    this.name = 'BucketfanError';
  }
}

export class DeadlineExceededError extends BucketfanError {
  constructor(timeoutMs: number) {
    super(`deadline of ${timeoutMs}ms exceeded`, 'DEADLINE_EXCEEDED', { timeoutMs });
    this.name = 'DeadlineExceededError';
  }
}

export class ConfigurationError extends BucketfanError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIG');
    this.name = 'ConfigurationError';
  }
}
