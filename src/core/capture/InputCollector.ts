import type { TerminalPort } from '../../ports/TerminalPort.js';
import { createLogger } from '../../utils/logger.js';

export interface CollectResult {
  lines: string[];
  completed: boolean;
}

export const COLLECT_HINT = '(Enter an empty line to complete; Ctrl+C/Ctrl+D to cancel)\n';

export class InputCollector {
  private readonly logger = createLogger({ component: 'InputCollector' });

  constructor(private readonly terminal: TerminalPort) {}

  /**
   * Reads body lines until an empty line (completed) or an interrupt or end of
   * input (cancelled). Lines gathered before a cancellation are dropped.
   * The terminal is closed afterwards so Ctrl+C regains its default meaning.
   */
  async collect(): Promise<CollectResult> {
    try {
      return await this.readLines();
    } finally {
      this.terminal.close();
    }
  }

  private async readLines(): Promise<CollectResult> {
    const lines: string[] = [];
    this.terminal.write(COLLECT_HINT);

    for (;;) {
      this.terminal.prompt();
      const event = await this.terminal.next();

      if (event.type !== 'line') {
        this.logger.debug({ reason: event.type, discarded: lines.length }, 'Collection cancelled');
        return { lines: [], completed: false };
      }
      if (event.text.length === 0) {
        this.logger.debug({ lines: lines.length }, 'Collection completed');
        return { lines, completed: true };
      }
      lines.push(event.text);
    }
  }
}
