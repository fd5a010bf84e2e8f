import { readFile } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_CONFIG_PATH = join(__dirname, '../../config/todo.json');

const optionalFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

function belongsToDomain(email: string, domain: string): boolean {
  const host = email.slice(email.lastIndexOf('@') + 1).toLowerCase();
  const expected = domain.toLowerCase();
  return host === expected || host.endsWith(`.${expected}`);
}

// Shape of the static config document.
const documentSchema = z
  .object({
    person: z.string().min(1),
    email: z.string().email(),
    domain: z.string().min(1),
    // Name of the environment variable holding the key, not the key itself.
    apikey: z.string().min(1),
    apibase: z.string().url().optional(),
    inbox: z.string().email(),
    maxAttempts: z.number().int().positive().optional(),
    retryDelayMs: z.number().int().nonnegative().default(3000),
    sendTimeoutMs: z.number().int().positive().default(10000),
  })
  .refine((doc) => belongsToDomain(doc.email, doc.domain), {
    message: 'sender email must belong to the sending domain or one of its subdomains',
    path: ['email'],
  });

const envSchema = z.object({
  anthropicApiKey: z.string().min(1).optional(),
  llmTextModel: z.string().min(1).default('claude-sonnet-4-5'),
  llmStream: optionalFlag,
  llmTimeoutMs: z.coerce.number().int().positive().default(60000),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('warn'),
});

export interface Config {
  // Email
  person: string;
  email: string;
  domain: string;
  apiKey: string;
  apiBase?: string;
  inbox: string;

  // Delivery
  maxAttempts?: number;
  retryDelayMs: number;
  sendTimeoutMs: number;

  // Anthropic
  anthropicApiKey?: string;
  llmTextModel: string;
  llmStream: boolean;
  llmTimeoutMs: number;

  // App
  logLevel: z.infer<typeof envSchema>['logLevel'];
}

export interface LoadConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('\n');
}

async function readDocument(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`cannot read config from ${path}`, { cause: error });
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`cannot parse config from ${path}`, { cause: error });
  }
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const source = options.env ?? process.env;

  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const path = options.path ?? env('TODO_CONFIG') ?? DEFAULT_CONFIG_PATH;
  const document = documentSchema.safeParse(await readDocument(path));
  if (!document.success) {
    throw new ConfigError(`Configuration validation failed:\n${formatIssues(document.error)}`);
  }

  const settings = envSchema.safeParse({
    anthropicApiKey: env('ANTHROPIC_API_KEY'),
    llmTextModel: env('LLM_TEXT_MODEL'),
    llmStream: env('LLM_STREAM'),
    llmTimeoutMs: env('LLM_TIMEOUT_MS'),
    logLevel: env('LOG_LEVEL'),
  });
  if (!settings.success) {
    throw new ConfigError(`Configuration validation failed:\n${formatIssues(settings.error)}`);
  }

  const doc = document.data;
  const apiKey = env(doc.apikey);
  if (!apiKey) {
    throw new ConfigError(`missing email API key from $${doc.apikey}`);
  }

  return {
    person: doc.person,
    email: doc.email,
    domain: doc.domain,
    apiKey,
    apiBase: doc.apibase,
    inbox: doc.inbox,
    maxAttempts: doc.maxAttempts,
    retryDelayMs: doc.retryDelayMs,
    sendTimeoutMs: doc.sendTimeoutMs,
    ...settings.data,
  };
}
