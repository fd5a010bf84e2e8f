import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Resend } from 'resend';
import { ResendAdapter } from '../../adapters/email/ResendAdapter.js';
import type { OutboundMessage } from '../../ports/EmailPort.js';
import { EmailError } from '../../utils/errors.js';

const mocks = vi.hoisted(() => ({
  send: vi.fn(),
}));

// Mock resend
vi.mock('resend', () => ({
  Resend: vi.fn(function () {
    return { emails: { send: mocks.send } };
  }),
}));

describe('ResendAdapter', () => {
  const config = { apiKey: 'test-secret', domain: 'mail.example.com' };
  const message: OutboundMessage = {
    from: 'Test Person <todo@mail.example.com>',
    to: 'inbox@example.com',
    subject: 'todo: call mom',
    text: 'call mom\nthis evening',
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('creates the client with the resolved key', () => {
    new ResendAdapter(config);

    expect(Resend).toHaveBeenCalledWith('test-secret');
  });

  it('sends a plain-text email to the single recipient', async () => {
    mocks.send.mockResolvedValue({ data: { id: 'email-123' }, error: null });
    const adapter = new ResendAdapter(config);

    const result = await adapter.send(message);

    expect(result).toEqual({ id: 'email-123' });
    expect(mocks.send.mock.calls[0]?.[0]).toEqual({
      from: 'Test Person <todo@mail.example.com>',
      to: ['inbox@example.com'],
      subject: 'todo: call mom',
      text: 'call mom\nthis evening',
    });
  });

  it('forwards the idempotency key to the provider', async () => {
    mocks.send.mockResolvedValue({ data: { id: 'email-124' }, error: null });
    const adapter = new ResendAdapter(config);

    await adapter.send(message, { idempotencyKey: 'todo-key-1' });

    expect(mocks.send.mock.calls[0]?.[1]).toEqual({ idempotencyKey: 'todo-key-1' });
  });

  it('throws when the provider returns an error', async () => {
    mocks.send.mockResolvedValue({
      data: null,
      error: { name: 'validation_error', message: 'The domain is not verified' },
    });
    const adapter = new ResendAdapter(config);

    const failure = adapter.send(message);

    await expect(failure).rejects.toBeInstanceOf(EmailError);
    await expect(failure).rejects.toThrow('Resend rejected the message: The domain is not verified');
  });

  it('wraps transport failures', async () => {
    mocks.send.mockRejectedValue(new TypeError('fetch failed'));
    const adapter = new ResendAdapter(config);

    await expect(adapter.send(message)).rejects.toThrow('Resend request failed');
  });
});
