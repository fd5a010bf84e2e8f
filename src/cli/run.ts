import type { Config } from '../config/index.js';
import type { EmailPort } from '../ports/EmailPort.js';
import type { LLMPort } from '../ports/LLMPort.js';
import type { TerminalPort } from '../ports/TerminalPort.js';
import { InputCollector } from '../core/capture/InputCollector.js';
import { SuggestionEnricher } from '../core/enrich/SuggestionEnricher.js';
import { DeliverySender } from '../core/delivery/DeliverySender.js';
import { TodoApp } from '../core/todo/TodoApp.js';
import { ConfigError, DeliveryError, UsageError } from '../utils/errors.js';
import { configureLogger } from '../utils/logger.js';
import { USAGE, parseArgs } from './args.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliServices {
  terminal: TerminalPort;
  email: EmailPort;
  /** Present only when a completion credential is configured. */
  llm?: { port: LLMPort; systemPrompt: string };
}

export interface CliDeps {
  loadConfig: () => Promise<Config>;
  createServices: (config: Config) => Promise<CliServices>;
  stderr: { write(text: string): unknown };
  sleep?: (ms: number) => Promise<void>;
}

export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const notice = (message: string): void => {
    deps.stderr.write(`todo: ${message}\n`);
  };

  let title: string;
  try {
    const args = parseArgs(argv);
    if (args.help) {
      deps.stderr.write(USAGE);
      return EXIT_OK;
    }
    title = args.title;
    if (!title.trim()) {
      throw new UsageError('missing todo subject.');
    }
  } catch (error) {
    if (error instanceof UsageError) {
      notice(error.message);
      deps.stderr.write(USAGE);
      return EXIT_USAGE;
    }
    throw error;
  }

  let config: Config;
  let services: CliServices;
  try {
    config = await deps.loadConfig();
    configureLogger({ level: config.logLevel });
    services = await deps.createServices(config);
  } catch (error) {
    if (error instanceof ConfigError) {
      notice(error.message);
      return EXIT_FAILURE;
    }
    throw error;
  }
  const { terminal } = services;

  const enricher = services.llm
    ? new SuggestionEnricher(services.llm.port, services.llm.systemPrompt, {
        onWarning: notice,
        onText: (fragment) => terminal.write(fragment),
        onStreamEnd: () => terminal.write('\n'),
      })
    : undefined;

  const retrySeconds = config.retryDelayMs / 1000;
  const sender = new DeliverySender(services.email, {
    timeoutMs: config.sendTimeoutMs,
    retryDelayMs: config.retryDelayMs,
    maxAttempts: config.maxAttempts,
    sleep: deps.sleep,
    onRetry: () => notice(`failed to send email, retry in ${retrySeconds} seconds...`),
  });

  const app = new TodoApp({
    collector: new InputCollector(terminal),
    enricher,
    sender,
    identity: { person: config.person, email: config.email },
    inbox: config.inbox,
  });

  try {
    const outcome = await app.run(title);
    if (outcome.status === 'cancelled') {
      notice('TODO is canceled.');
      return EXIT_OK;
    }
    notice('SENT!');
    return EXIT_OK;
  } catch (error) {
    if (error instanceof DeliveryError) {
      notice(`cannot send the TODO to ${config.person}: ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  } finally {
    terminal.close();
  }
}
