import { Resend } from 'resend';
import type { EmailPort, OutboundMessage, SendOptions, SendResult } from '../../ports/EmailPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { EmailError } from '../../utils/errors.js';

export class ResendAdapter implements EmailPort {
  private readonly logger = createLogger({ adapter: 'ResendAdapter' });
  private readonly client: Resend;

  constructor(config: Pick<Config, 'apiKey' | 'domain'>) {
    this.client = new Resend(config.apiKey);
    this.logger.debug({ domain: config.domain }, 'Resend adapter initialized');
  }

  async send(message: OutboundMessage, options: SendOptions = {}): Promise<SendResult> {
    const logger = this.logger.child({ method: 'send' });

    let response: Awaited<ReturnType<Resend['emails']['send']>>;
    try {
      response = await this.client.emails.send(
        {
          from: message.from,
          to: [message.to],
          subject: message.subject,
          text: message.text,
        },
        options.idempotencyKey ? { idempotencyKey: options.idempotencyKey } : undefined
      );
    } catch (error) {
      throw new EmailError('Resend request failed', { cause: error });
    }

    if (response.error) {
      throw new EmailError(`Resend rejected the message: ${response.error.message}`, {
        cause: response.error,
      });
    }

    logger.debug({ id: response.data?.id }, 'Email accepted');
    return { id: response.data?.id };
  }
}
