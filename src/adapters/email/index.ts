import type { EmailPort } from '../../ports/EmailPort.js';
import type { Config } from '../../config/index.js';

/**
 * The resend SDK reads its base URL from RESEND_BASE_URL once, when the module
 * is first evaluated, so the override is exported before the adapter loads.
 */
export async function createEmailAdapter(
  config: Pick<Config, 'apiKey' | 'apiBase' | 'domain'>
): Promise<EmailPort> {
  if (config.apiBase) {
    process.env.RESEND_BASE_URL = config.apiBase;
  }
  const { ResendAdapter } = await import('./ResendAdapter.js');
  return new ResendAdapter(config);
}
