export interface OutboundMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

export interface SendResult {
  id?: string;
}

export interface SendOptions {
  /** Shared by every attempt at one message so the provider accepts it at most once. */
  idempotencyKey?: string;
}

export interface EmailPort {
  send(message: OutboundMessage, options?: SendOptions): Promise<SendResult>;
}
