import { describe, it, expect, vi, afterEach } from 'vitest';
import { createEmailAdapter } from '../../adapters/email/index.js';
import { ResendAdapter } from '../../adapters/email/ResendAdapter.js';

// Mock resend
vi.mock('resend', () => ({
  Resend: vi.fn(function () {
    return { emails: { send: vi.fn() } };
  }),
}));

describe('createEmailAdapter', () => {
  const original = process.env.RESEND_BASE_URL;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.RESEND_BASE_URL;
    } else {
      process.env.RESEND_BASE_URL = original;
    }
  });

  it('exports the configured API base before loading the provider', async () => {
    const adapter = await createEmailAdapter({
      apiKey: 'test-secret',
      domain: 'mail.example.com',
      apiBase: 'https://api.example.com',
    });

    expect(adapter).toBeInstanceOf(ResendAdapter);
    expect(process.env.RESEND_BASE_URL).toBe('https://api.example.com');
  });

  it('leaves the provider default alone without an override', async () => {
    delete process.env.RESEND_BASE_URL;

    await createEmailAdapter({ apiKey: 'test-secret', domain: 'mail.example.com' });

    expect(process.env.RESEND_BASE_URL).toBeUndefined();
  });
});
