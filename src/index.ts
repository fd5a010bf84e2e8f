#!/usr/bin/env node
// Load environment variables first
import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { loadPrompt } from './utils/prompts.js';
import { ReadlineTerminal } from './adapters/terminal/ReadlineTerminal.js';
import { ClaudeAdapter } from './adapters/llm/ClaudeAdapter.js';
import { createEmailAdapter } from './adapters/email/index.js';
import { runCli, type CliServices } from './cli/run.js';
import type { Config } from './config/index.js';

async function createServices(config: Config): Promise<CliServices> {
  const email = await createEmailAdapter(config);
  const llm = config.anthropicApiKey
    ? { port: new ClaudeAdapter(config), systemPrompt: await loadPrompt('todo_suggestion.md') }
    : undefined;

  return { terminal: new ReadlineTerminal(), email, llm };
}

async function main(): Promise<number> {
  return runCli(process.argv.slice(2), {
    loadConfig: () => loadConfig(),
    createServices,
    stderr: process.stderr,
  });
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error('Unhandled error:', error);
    process.exit(1);
  });
