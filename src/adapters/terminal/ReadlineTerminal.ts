import { createInterface, type Interface } from 'node:readline';
import type { EventEmitter } from 'node:events';
import type { TerminalEvent, TerminalPort } from '../../ports/TerminalPort.js';

export interface ReadlineTerminalOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Receives SIGINT when input is not a TTY and readline cannot see Ctrl+C. */
  signals?: EventEmitter;
}

/**
 * Reader side of the capture loop: readline events are queued in arrival
 * order and handed out one per `next()` call. An interrupt jumps the queue.
 */
export class ReadlineTerminal implements TerminalPort {
  private readonly rl: Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly signals: EventEmitter;
  private readonly lines: string[] = [];
  private waiter: ((event: TerminalEvent) => void) | undefined;
  private interrupted = false;
  private ended = false;
  private closed = false;

  constructor(options: ReadlineTerminalOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.signals = options.signals ?? process;
    this.rl = createInterface({
      input: options.input ?? process.stdin,
      output: this.output,
      prompt: '> ',
    });

    this.rl.on('line', (line) => {
      this.lines.push(line);
      this.flush();
    });
    this.rl.on('SIGINT', this.onInterrupt);
    this.rl.on('close', () => {
      this.ended = true;
      this.flush();
    });
    this.signals.on('SIGINT', this.onInterrupt);
  }

  write(text: string): void {
    this.output.write(text);
  }

  prompt(): void {
    if (!this.closed) {
      this.rl.prompt();
    }
  }

  next(): Promise<TerminalEvent> {
    return new Promise((resolve) => {
      this.waiter = resolve;
      this.flush();
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.signals.off('SIGINT', this.onInterrupt);
    this.rl.close();
  }

  private readonly onInterrupt = (): void => {
    this.interrupted = true;
    this.flush();
  };

  private flush(): void {
    const resolve = this.waiter;
    if (!resolve) {
      return;
    }

    let event: TerminalEvent | undefined;
    if (this.interrupted) {
      event = { type: 'interrupt' };
    } else {
      const line = this.lines.shift();
      if (line !== undefined) {
        event = { type: 'line', text: line };
      } else if (this.ended) {
        event = { type: 'end' };
      }
    }

    if (event) {
      this.waiter = undefined;
      resolve(event);
    }
  }
}
