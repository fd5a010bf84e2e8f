export class TodoError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TodoError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AdapterError extends TodoError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class LLMError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('LLM', message, options);
    this.name = 'LLMError';
  }
}

export class EmailError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('EMAIL', message, options);
    this.name = 'EmailError';
  }
}

export class ConfigError extends TodoError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export class UsageError extends TodoError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'USAGE_ERROR', options);
    this.name = 'UsageError';
  }
}

/** Raised only when a delivery attempt cap is configured and exhausted. */
export class DeliveryError extends TodoError {
  public readonly attempts: number;

  constructor(message: string, attempts: number, options?: ErrorOptions) {
    super(message, 'DELIVERY_ERROR', options);
    this.name = 'DeliveryError';
    this.attempts = attempts;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
