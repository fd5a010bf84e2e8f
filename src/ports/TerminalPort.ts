export type TerminalEvent =
  | { type: 'line'; text: string }
  | { type: 'interrupt' }
  | { type: 'end' };

export interface TerminalPort {
  write(text: string): void;
  prompt(): void;
  /** Resolves with the next event; lines arrive in the order they were typed. */
  next(): Promise<TerminalEvent>;
  close(): void;
}
