import { randomUUID } from 'node:crypto';
import { setTimeout as delay } from 'node:timers/promises';
import type { EmailPort, OutboundMessage } from '../../ports/EmailPort.js';
import { createLogger } from '../../utils/logger.js';
import { DeliveryError, describeError } from '../../utils/errors.js';

export interface DeliveryReceipt {
  id?: string;
  attempts: number;
}

export interface DeliverySenderOptions {
  timeoutMs?: number;
  retryDelayMs?: number;
  /** Absent means keep trying until the provider accepts the message. */
  maxAttempts?: number;
  sleep?: (ms: number) => Promise<void>;
  newIdempotencyKey?: () => string;
  onRetry?: (attempt: number, error: unknown) => void;
}

export const DEFAULT_SEND_TIMEOUT_MS = 10_000;
export const DEFAULT_RETRY_DELAY_MS = 3_000;

export class SendTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`send timed out after ${timeoutMs}ms`);
    this.name = 'SendTimeoutError';
  }
}

function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new SendTimeoutError(timeoutMs)), timeoutMs);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

export class DeliverySender {
  private readonly logger = createLogger({ component: 'DeliverySender' });
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly maxAttempts: number | undefined;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly newIdempotencyKey: () => string;

  constructor(
    private readonly emailPort: EmailPort,
    private readonly options: DeliverySenderOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.maxAttempts = options.maxAttempts;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.newIdempotencyKey = options.newIdempotencyKey ?? (() => `todo-${randomUUID()}`);
  }

  /**
   * A timed-out attempt may still reach the provider, so all attempts share
   * one idempotency key and a late success cannot produce a second email.
   */
  async send(message: OutboundMessage): Promise<DeliveryReceipt> {
    const idempotencyKey = this.newIdempotencyKey();

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await withTimeout(
          this.emailPort.send(message, { idempotencyKey }),
          this.timeoutMs
        );
        this.logger.debug({ attempt, id: result.id }, 'Message delivered');
        return { id: result.id, attempts: attempt };
      } catch (error) {
        this.logger.warn({ error, attempt, to: message.to }, 'Failed to send TODO');

        if (this.maxAttempts !== undefined && attempt >= this.maxAttempts) {
          throw new DeliveryError(
            `giving up after ${attempt} attempts: ${describeError(error)}`,
            attempt,
            { cause: error }
          );
        }

        this.options.onRetry?.(attempt, error);
        await this.sleep(this.retryDelayMs);
      }
    }
  }
}
