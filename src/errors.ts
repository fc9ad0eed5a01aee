export interface ValidationIssue {
  path: string;
  message: string;
}

// Malformed input rejected before it reaches the queue (job payloads, request bodies).
export class ValidationError extends Error {
  constructor(message: string, public readonly issues: ValidationIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
  }
}

// A stored record that cannot be turned back into a job. Never retried.
export class DeserializationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DeserializationError';
  }
}

export class ExecutionError extends Error {
  constructor(message: string, public readonly jobName: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExecutionError';
  }
}

export class TerminalFailureHookError extends Error {
  constructor(jobName: string, options?: ErrorOptions) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`failed() hook of job "${jobName}" threw${detail}`, options);
    this.name = 'TerminalFailureHookError';
  }
}

export class RegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistrationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: ValidationIssue[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class HttpError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
