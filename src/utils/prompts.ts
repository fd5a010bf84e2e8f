import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { ConfigError } from './errors.js';

// Resolves to <package>/prompts from both src/utils and dist/utils.
const PROMPTS_URL = new URL('../../prompts/', import.meta.url);

export function promptPath(name: string): string {
  return fileURLToPath(new URL(name, PROMPTS_URL));
}

/** Reads a bundled prompt; a missing or empty file is a setup problem. */
export async function loadPrompt(name: string): Promise<string> {
  const path = promptPath(name);
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`cannot read prompt ${name}`, { cause: error });
  }

  if (!text.trim()) {
    throw new ConfigError(`prompt ${name} is empty`);
  }
  return text.trim();
}
